import assert from "node:assert/strict";
import dgram from "node:dgram";
import net from "node:net";
import { PassThrough } from "node:stream";

export interface CapturedStream {
  stream: PassThrough;
  text: () => string;
}

export function captureStream(): CapturedStream {
  const stream = new PassThrough();
  const chunks: Buffer[] = [];
  stream.on("data", (chunk: Buffer) => chunks.push(chunk));
  return { stream, text: () => Buffer.concat(chunks).toString("utf8") };
}

export async function waitFor(condition: () => boolean, timeoutMs = 2_000, label = "condition"): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!condition()) {
    if (Date.now() > deadline) throw new Error(`timeout waiting for ${label}`);
    await new Promise<void>((resolve) => setTimeout(resolve, 5));
  }
}

export async function readAll(stream: NodeJS.ReadableStream): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString("utf8");
}

export interface TcpTestServer {
  server: net.Server;
  port: number;
  sockets: Set<net.Socket>;
  close: () => Promise<void>;
}

export async function startTcpServer(onConnection: (socket: net.Socket) => void): Promise<TcpTestServer> {
  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on("error", () => {
      // Ignore socket errors for test shutdown.
    });
    socket.once("close", () => sockets.delete(socket));
    onConnection(socket);
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const addr = server.address();
  assert.ok(addr && typeof addr !== "string");

  return {
    server,
    port: addr.port,
    sockets,
    close: async () => {
      for (const socket of sockets) socket.destroy();
      await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
    }
  };
}

// A port on 127.0.0.1 that was just free; nothing listens on it.
export async function unusedTcpPort(): Promise<number> {
  const { port, close } = await startTcpServer(() => undefined);
  await close();
  return port;
}

export async function connectClient(port: number): Promise<net.Socket> {
  const socket = net.createConnection({ host: "127.0.0.1", port });
  await new Promise<void>((resolve, reject) => {
    socket.once("connect", resolve);
    socket.once("error", reject);
  });
  socket.on("error", () => {
    // Listener teardown resets client sockets.
  });
  return socket;
}

export function collectSocket(socket: net.Socket): () => string {
  const chunks: Buffer[] = [];
  socket.on("data", (chunk: Buffer) => chunks.push(chunk));
  return () => Buffer.concat(chunks).toString("utf8");
}

export async function bindUdp(family: "udp4" | "udp6" = "udp4"): Promise<dgram.Socket> {
  const socket = dgram.createSocket(family);
  await new Promise<void>((resolve) => socket.bind(0, family === "udp6" ? "::1" : "127.0.0.1", resolve));
  return socket;
}

export async function closeUdp(socket: dgram.Socket): Promise<void> {
  await new Promise<void>((resolve) => socket.close(() => resolve()));
}
