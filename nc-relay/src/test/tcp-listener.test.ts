import assert from "node:assert/strict";
import { PassThrough } from "node:stream";
import test from "node:test";

import { NcError } from "../errors";
import { InputDispatcher } from "../inputDispatcher";
import { startTcpListener } from "../tcpListener";
import { captureStream, collectSocket, connectClient, startTcpServer, waitFor } from "./helpers";

function isListenError(pattern: RegExp) {
  return (err: unknown) => {
    assert.ok(err instanceof NcError);
    assert.equal(err.code, "ERR_NC_LISTEN");
    assert.match(err.message, pattern);
    return true;
  };
}

async function startListener() {
  const stdin = new PassThrough();
  const stdout = captureStream();
  const input = new InputDispatcher(stdin);
  const listener = await startTcpListener({ port: 0, protocol: "tcp" }, { stdout: stdout.stream, input, host: "127.0.0.1" });
  return { stdin, stdout, input, listener };
}

test("listener prints its address and binds an ephemeral port", async () => {
  const { stdout, input, listener } = await startListener();
  assert.ok(listener.port > 0);
  assert.equal(listener.listenAddress, `127.0.0.1:${listener.port}`);
  assert.equal(stdout.text(), `Listening on 127.0.0.1:${listener.port} (TCP)\n`);
  await listener.close();
  input.close();
});

test("two concurrent connections each get an independent relay", async () => {
  const { stdin, stdout, input, listener } = await startListener();

  const first = await connectClient(listener.port);
  const firstReceived = collectSocket(first);
  await waitFor(() => input.subscriberCount === 1, 2_000, "first relay");
  assert.match(stdout.text(), new RegExp(`Accepted connection from 127\\.0\\.0\\.1:${first.localPort}\\n`));

  stdin.write("to-first\n");
  await waitFor(() => firstReceived() === "to-first\n", 2_000, "input on first connection");

  const second = await connectClient(listener.port);
  const secondReceived = collectSocket(second);
  await waitFor(() => input.subscriberCount === 2, 2_000, "second relay");

  stdin.write("to-second\n");
  await waitFor(() => secondReceived() === "to-second\n", 2_000, "input on second connection");
  assert.equal(firstReceived(), "to-first\n");

  first.write("from-first\n");
  second.write("from-second\n");
  await waitFor(
    () => stdout.text().includes("from-first\n") && stdout.text().includes("from-second\n"),
    2_000,
    "socket bytes on output"
  );

  first.end();
  await waitFor(() => input.subscriberCount === 1, 2_000, "first relay to finish");
  second.write("after-first-closed\n");
  await waitFor(() => stdout.text().includes("after-first-closed\n"), 2_000, "second relay still running");

  await listener.close();
  await assert.rejects(listener.closed, isListenError(/closed/));
  input.close();
});

test("many simultaneous connections are all accepted", async () => {
  const { stdout, input, listener } = await startListener();

  const clients = await Promise.all(Array.from({ length: 20 }, () => connectClient(listener.port)));
  await waitFor(() => stdout.text().split("Accepted connection from").length - 1 === 20, 2_000, "20 accepts");
  assert.equal(input.subscriberCount, 20);

  for (const client of clients) client.destroy();
  await listener.close();
  input.close();
});

test("an error on the listening socket ends the accept loop", async () => {
  const { input, listener } = await startListener();

  listener.handle.emit("error", new Error("accept boom"));
  await assert.rejects(listener.closed, isListenError(/^failed to accept connection: accept boom$/));
  assert.equal(listener.handle.listening, false);
  input.close();
});

test("closing the listening socket from outside ends the accept loop", async () => {
  const { input, listener } = await startListener();

  listener.handle.close();
  await assert.rejects(listener.closed, isListenError(/^TCP listener on 127\.0\.0\.1:\d+ closed$/));
  input.close();
});

test("a bind failure is reported before the accept loop starts", async () => {
  const occupied = await startTcpServer(() => undefined);
  const input = new InputDispatcher(new PassThrough());

  await assert.rejects(
    startTcpListener({ port: occupied.port, protocol: "tcp" }, { stdout: new PassThrough(), input, host: "127.0.0.1" }),
    isListenError(/^failed to start TCP listener: listen EADDRINUSE/)
  );
  input.close();
  await occupied.close();
});
