import type { Readable, Writable } from "node:stream";

export type Protocol = "tcp" | "udp";

export const SUPPORTED_PROTOCOLS: readonly Protocol[] = ["tcp", "udp"];

export interface ConnectionRequest {
  readonly host: string;
  readonly port: number;
  readonly protocol: Protocol;
  readonly timeoutMs: number;
  readonly proxyUrl?: string;
}

export interface ListenRequest {
  readonly port: number;
  readonly protocol: Protocol;
}

// The local standard streams a command reads from and prints to.
export interface NcIo {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

export function printLine(stream: Writable, line: string): void {
  stream.write(`${line}\n`);
}
