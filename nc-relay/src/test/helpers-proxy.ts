import assert from "node:assert/strict";
import http from "node:http";
import type net from "node:net";

export interface ConnectRequestSeen {
  url: string;
  host: string | undefined;
  authorization: string | undefined;
}

export interface FakeProxy {
  port: number;
  requests: ConnectRequestSeen[];
  close: () => Promise<void>;
}

// An HTTP proxy that answers every CONNECT with `response` written verbatim.
export async function startFakeProxy(response: string): Promise<FakeProxy> {
  const requests: ConnectRequestSeen[] = [];
  const sockets = new Set<net.Socket>();
  const server = http.createServer();
  server.on("connect", (req: http.IncomingMessage, socket: net.Socket) => {
    sockets.add(socket);
    socket.on("error", () => {
      // The client tears the tunnel down as soon as it has the answer.
    });
    socket.once("close", () => sockets.delete(socket));
    requests.push({
      url: req.url ?? "",
      host: req.headers.host,
      authorization: req.headers["proxy-authorization"]
    });
    socket.write(response);
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  assert.ok(addr && typeof addr !== "string");

  return {
    port: addr.port,
    requests,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      server.closeAllConnections();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  };
}
