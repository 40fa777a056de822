import { tryGetErrorCode } from "./errorCode";
import { formatOneLineError, formatOneLineUtf8 } from "./text";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

export type LogEvent =
  | "dial_start"
  | "dial_ok"
  | "dial_error"
  | "tunnel_ok"
  | "tunnel_error"
  | "listen_start"
  | "listen_stop"
  | "conn_accept"
  | "conn_close"
  | "udp_datagram"
  | "udp_truncated"
  | "udp_error";

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

const MAX_LOG_ERROR_MESSAGE_BYTES = 512;

let threshold: LogThreshold = "warn";

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

export function log(level: LogLevel, event: LogEvent, fields: Record<string, unknown> = {}): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
  const entry = {
    ts: new Date().toISOString(),
    level,
    event,
    ...fields
  };
  // JSONL structured logging. stdout carries relayed payload, so logs go to stderr.
  // eslint-disable-next-line no-console
  console.error(JSON.stringify(entry));
}

export function formatError(err: unknown): { message: string; name?: string; code?: string } {
  if (err instanceof Error) {
    const safeMessage = formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES);
    let rawName = "Error";
    try {
      if (typeof err.name === "string") rawName = err.name;
    } catch {
      // ignore getters throwing
    }
    const safeName = formatOneLineUtf8(rawName, 128) || "Error";
    return { name: safeName, message: safeMessage, code: tryGetErrorCode(err) };
  }
  return { message: formatOneLineError(err, MAX_LOG_ERROR_MESSAGE_BYTES) };
}
