import net from "node:net";
import type { Writable } from "node:stream";

import { NcError } from "./errors";
import type { InputDispatcher } from "./inputDispatcher";
import { formatPeerAddress, joinHostPort } from "./ipUtils";
import type { RunningListener } from "./listener";
import { formatError, log } from "./logger";
import { destroyBestEffort } from "./socketSafe";
import { relayConnection } from "./tcpRelay";
import { formatOneLineError } from "./text";
import { printLine, type ListenRequest } from "./types";

export interface TcpListenOptions {
  stdout: Writable;
  input: InputDispatcher;
  // Bind address; all interfaces when omitted.
  host?: string;
}

/**
 * Binds `request.port` and relays every accepted connection to the local streams.
 *
 * There is no connection limit: each accepted socket gets its own relay straight away.
 * Any error on the listening socket after bind, or the socket closing, ends the accept
 * loop and rejects `closed`.
 */
export async function startTcpListener(
  request: ListenRequest,
  opts: TcpListenOptions
): Promise<RunningListener<net.Server>> {
  const { stdout } = opts;
  const connections = new Set<net.Socket>();
  let nextConnId = 1;

  const server = net.createServer((socket) => {
    const connId = nextConnId++;
    connections.add(socket);
    const remoteAddress = formatPeerAddress(socket.remoteAddress, socket.remotePort);
    log("info", "conn_accept", { connId, remoteAddress, active: connections.size });
    printLine(stdout, `Accepted connection from ${remoteAddress}`);

    const input = opts.input.subscribe();
    void relayConnection(socket, { input, output: stdout }, connId).finally(() => {
      connections.delete(socket);
      destroyBestEffort(input);
    });
  });

  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      log("error", "listen_stop", { proto: "tcp", port: request.port, err: formatError(err) });
      reject(
        new NcError("ERR_NC_LISTEN", `failed to start TCP listener: ${formatOneLineError(err, 512)}`, { cause: err })
      );
    };
    server.once("error", onError);
    server.listen(request.port, opts.host, () => {
      server.off("error", onError);
      resolve();
    });
  });

  const addr = server.address();
  const port = addr !== null && typeof addr === "object" ? addr.port : request.port;
  const listenAddress = joinHostPort(opts.host ?? "", port);

  const closed = new Promise<void>((_resolve, reject) => {
    server.on("error", (err) => {
      log("error", "listen_stop", { proto: "tcp", listenAddress, err: formatError(err) });
      server.close();
      reject(
        new NcError("ERR_NC_LISTEN", `failed to accept connection: ${formatOneLineError(err, 512)}`, { cause: err })
      );
    });
    server.once("close", () => {
      log("info", "listen_stop", { proto: "tcp", listenAddress });
      reject(new NcError("ERR_NC_LISTEN", `TCP listener on ${listenAddress} closed`));
    });
  });

  log("info", "listen_start", { proto: "tcp", listenAddress });
  printLine(stdout, `Listening on ${listenAddress} (TCP)`);

  return {
    handle: server,
    port,
    listenAddress,
    closed,
    close: async () => {
      server.close();
      for (const socket of connections) destroyBestEffort(socket);
      await closed.catch((err: unknown) => {
        if (!(err instanceof NcError)) throw err;
      });
    }
  };
}
