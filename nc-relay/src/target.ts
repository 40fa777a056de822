import { NcError } from "./errors";
import { SUPPORTED_PROTOCOLS, type Protocol } from "./types";
import { formatOneLineUtf8 } from "./text";

export interface ProxyEndpoint {
  host: string;
  port: number;
  auth: { username: string; password: string } | null;
  // The proxy URL as printed: any password is replaced by `***`.
  display: string;
}

function formatForError(value: string, maxBytes = 256): string {
  const out = formatOneLineUtf8(value, maxBytes);
  if (out.length === value.length) return out;
  return `${out}…(${value.length} chars)`;
}

export function parseProtocol(raw: string): Protocol {
  const normalized = raw.trim().toLowerCase();
  for (const protocol of SUPPORTED_PROTOCOLS) {
    if (protocol === normalized) return protocol;
  }
  throw new NcError("ERR_NC_CONFIG", `unsupported protocol: ${formatForError(raw)}`);
}

export function parsePort(raw: string, opts: { allowZero?: boolean } = {}): number {
  const trimmed = raw.trim();
  if (!/^\d{1,5}$/.test(trimmed)) {
    throw new NcError("ERR_NC_CONFIG", `invalid port: ${formatForError(raw)}`);
  }
  const port = Number.parseInt(trimmed, 10);
  const min = opts.allowZero ? 0 : 1;
  if (port < min || port > 65535) {
    throw new NcError("ERR_NC_CONFIG", `invalid port: ${formatForError(raw)}`);
  }
  return port;
}

function stripOptionalIpv6Brackets(host: string): string {
  if (host.startsWith("[") && host.endsWith("]")) return host.slice(1, -1);
  return host;
}

export function parseProxyUrl(raw: string): ProxyEndpoint {
  let url: URL;
  try {
    url = new URL(raw.trim());
  } catch {
    throw new NcError("ERR_NC_CONFIG", `invalid proxy URL: ${formatForError(raw)}`);
  }

  if (url.protocol !== "http:") {
    throw new NcError("ERR_NC_CONFIG", `invalid proxy URL scheme (expected http://): ${formatForError(raw)}`);
  }
  if (url.hostname === "") {
    throw new NcError("ERR_NC_CONFIG", `invalid proxy URL (missing host): ${formatForError(raw)}`);
  }

  let username: string;
  let password: string;
  try {
    username = decodeURIComponent(url.username);
    password = decodeURIComponent(url.password);
  } catch {
    throw new NcError("ERR_NC_CONFIG", `invalid proxy URL (bad credentials encoding): ${formatForError(raw)}`);
  }
  const auth = username !== "" || password !== "" ? { username, password } : null;

  if (url.password !== "") url.password = "***";

  return {
    host: stripOptionalIpv6Brackets(url.hostname),
    port: url.port === "" ? 80 : Number.parseInt(url.port, 10),
    auth,
    display: url.toString().replace(/\/$/, "")
  };
}
