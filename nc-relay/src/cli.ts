import { parseDuration } from "./duration";
import { NcError } from "./errors";
import { parsePort, parseProtocol } from "./target";
import type { ConnectionRequest, ListenRequest } from "./types";

export type NcCommand =
  | { kind: "help" }
  | { kind: "connect"; request: ConnectionRequest }
  | { kind: "listen"; request: ListenRequest };

export const USAGE = `Usage:
  nc [host] <port> [flags]

Dial a TCP or UDP endpoint to check that it is reachable, or listen on a port and
relay accepted connections to standard input/output.

Flags:
  -p, --protocol <tcp|udp>   protocol to use (default "tcp")
  -t, --timeout <duration>   dial timeout, e.g. 500ms, 5s, 1m (default 5s)
  -x, --proxy <url>          HTTP proxy for TCP connections (e.g. http://proxy.example.com:8080)
  -l, --listen               listen for incoming connections on <port>
  -h, --help                 show this help
`;

type ValueFlag = "protocol" | "timeout" | "proxy";

const VALUE_FLAGS: Record<string, ValueFlag> = {
  "--protocol": "protocol",
  "-p": "protocol",
  "--timeout": "timeout",
  "-t": "timeout",
  "--proxy": "proxy",
  "-x": "proxy"
};

export interface ParseDefaults {
  timeoutMs: number;
}

/**
 * Turns `nc` arguments into a command. Every argument error is an `ERR_NC_CONFIG`
 * `NcError` and is raised before anything touches the network.
 */
export function parseNcArgs(argv: readonly string[], defaults: ParseDefaults): NcCommand {
  const values: Partial<Record<ValueFlag, string>> = {};
  const positional: string[] = [];
  let listen = false;
  let help = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      positional.push(...argv.slice(i + 1));
      break;
    }
    if (arg === "--listen" || arg === "-l") {
      listen = true;
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      help = true;
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const name = eq === -1 ? arg : arg.slice(0, eq);
    const flag = VALUE_FLAGS[name];
    if (flag !== undefined) {
      if (eq !== -1) {
        values[flag] = arg.slice(eq + 1);
        continue;
      }
      const value = argv[i + 1];
      if (value === undefined) {
        throw new NcError("ERR_NC_CONFIG", `flag needs an argument: ${name}`);
      }
      values[flag] = value;
      i += 1;
      continue;
    }

    if (arg.length > 1 && arg.startsWith("-")) {
      throw new NcError("ERR_NC_CONFIG", `unknown flag: ${name}`);
    }
    positional.push(arg);
  }

  if (help) return { kind: "help" };

  if (positional.length < 1 || positional.length > 2) {
    throw new NcError("ERR_NC_CONFIG", `accepts between 1 and 2 arg(s), received ${positional.length}`);
  }

  const protocol = parseProtocol(values.protocol ?? "tcp");

  if (listen) {
    if (positional.length === 2) {
      throw new NcError("ERR_NC_CONFIG", "host must be omitted with --listen");
    }
    if (values.proxy !== undefined) {
      throw new NcError("ERR_NC_CONFIG", "--proxy cannot be combined with --listen");
    }
    return { kind: "listen", request: { port: parsePort(positional[0], { allowZero: true }), protocol } };
  }

  if (positional.length === 1) {
    throw new NcError("ERR_NC_CONFIG", "host is required unless --listen is set");
  }

  const [host, portRaw] = positional;
  if (host.trim() === "") {
    throw new NcError("ERR_NC_CONFIG", "host must not be empty");
  }

  const request: ConnectionRequest = {
    host,
    port: parsePort(portRaw),
    protocol,
    timeoutMs: values.timeout === undefined ? defaults.timeoutMs : parseDuration(values.timeout),
    ...(values.proxy ? { proxyUrl: values.proxy } : {})
  };
  return { kind: "connect", request };
}
