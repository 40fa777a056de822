import dgram from "node:dgram";
import net from "node:net";
import type { Writable } from "node:stream";

import { NcError } from "./errors";
import { formatPeerAddress, isIpv6Literal, joinHostPort } from "./ipUtils";
import { formatError, log } from "./logger";
import { negotiateConnectTunnel, type CreateTcpConnection } from "./proxyTunnel";
import { closeBestEffort, destroyBestEffort, destroyWithErrorBestEffort } from "./socketSafe";
import { parseProxyUrl } from "./target";
import { formatOneLineError } from "./text";
import { printLine, type ConnectionRequest, type Protocol } from "./types";
import { withTimeout } from "./withTimeout";

export interface ProbeOptions {
  stdout: Writable;
  createTcpConnection?: CreateTcpConnection;
}

export interface ProbeResult {
  address: string;
  protocol: Protocol;
  remoteAddress: string;
  via: "direct" | "http_proxy";
}

function dialFailed(protocol: Protocol, err: unknown): NcError {
  const label = protocol.toUpperCase();
  return new NcError("ERR_NC_DIAL", `failed to establish ${label} connection: ${formatOneLineError(err, 512)}`, {
    cause: err
  });
}

async function dialTcp(
  host: string,
  port: number,
  timeoutMs: number,
  createConnection: CreateTcpConnection
): Promise<net.Socket> {
  return await new Promise<net.Socket>((resolve, reject) => {
    let socket: net.Socket;
    try {
      socket = createConnection({ host, port });
    } catch (err) {
      reject(err);
      return;
    }

    let connectTimer: NodeJS.Timeout | null = null;
    if (timeoutMs > 0) {
      connectTimer = setTimeout(() => {
        destroyWithErrorBestEffort(socket, new Error(`connect timeout after ${timeoutMs}ms`));
      }, timeoutMs);
    }

    const clearConnectTimer = () => {
      if (connectTimer) {
        clearTimeout(connectTimer);
        connectTimer = null;
      }
    };

    const onError = (err: Error) => {
      clearConnectTimer();
      destroyBestEffort(socket);
      reject(err);
    };

    socket.once("error", onError);
    socket.once("connect", () => {
      clearConnectTimer();
      socket.off("error", onError);
      resolve(socket);
    });
  });
}

async function dialUdp(host: string, port: number, timeoutMs: number): Promise<string> {
  const socket = dgram.createSocket(isIpv6Literal(host) ? "udp6" : "udp4");
  try {
    const connected = new Promise<void>((resolve, reject) => {
      socket.once("error", reject);
      socket.connect(port, host, () => {
        socket.off("error", reject);
        resolve();
      });
    });
    await withTimeout(connected, timeoutMs, () => new Error(`connect timeout after ${timeoutMs}ms`));
    const remote = socket.remoteAddress();
    return formatPeerAddress(remote.address, remote.port);
  } finally {
    closeBestEffort(socket);
  }
}

/**
 * Checks that `request` is reachable: dials it once (through the HTTP proxy when one is
 * given), prints a confirmation and closes the connection again. No payload is sent.
 */
export async function probeConnection(request: ConnectionRequest, opts: ProbeOptions): Promise<ProbeResult> {
  const address = joinHostPort(request.host, request.port);
  const createConnection = opts.createTcpConnection ?? net.createConnection;

  switch (request.protocol) {
    case "tcp": {
      if (request.proxyUrl) {
        const proxy = parseProxyUrl(request.proxyUrl);
        log("info", "dial_start", { proto: "tcp", address, proxy: proxy.display });
        const tunnel = await negotiateConnectTunnel(proxy, address, {
          timeoutMs: request.timeoutMs,
          createTcpConnection: createConnection
        });
        destroyBestEffort(tunnel.socket);
        printLine(opts.stdout, `Connected to ${address} through HTTP proxy ${proxy.display}`);
        return {
          address,
          protocol: "tcp",
          remoteAddress: joinHostPort(proxy.host, proxy.port),
          via: "http_proxy"
        };
      }

      log("info", "dial_start", { proto: "tcp", address });
      let socket: net.Socket;
      try {
        socket = await dialTcp(request.host, request.port, request.timeoutMs, createConnection);
      } catch (err) {
        log("warn", "dial_error", { proto: "tcp", address, err: formatError(err) });
        throw dialFailed("tcp", err);
      }
      const remoteAddress = formatPeerAddress(socket.remoteAddress, socket.remotePort);
      destroyBestEffort(socket);
      log("info", "dial_ok", { proto: "tcp", address, remoteAddress });
      printLine(opts.stdout, `Connected to ${address} (TCP)`);
      return { address, protocol: "tcp", remoteAddress, via: "direct" };
    }
    case "udp": {
      if (request.proxyUrl) {
        throw new NcError("ERR_NC_CONFIG", "--proxy is only supported for TCP connections");
      }
      log("info", "dial_start", { proto: "udp", address });
      let remoteAddress: string;
      try {
        remoteAddress = await dialUdp(request.host, request.port, request.timeoutMs);
      } catch (err) {
        log("warn", "dial_error", { proto: "udp", address, err: formatError(err) });
        throw dialFailed("udp", err);
      }
      log("info", "dial_ok", { proto: "udp", address, remoteAddress });
      printLine(opts.stdout, `Connected to ${address} (UDP)`);
      return { address, protocol: "udp", remoteAddress, via: "direct" };
    }
    default: {
      const unsupported: never = request.protocol;
      throw new NcError("ERR_NC_CONFIG", `unsupported protocol: ${String(unsupported)}`);
    }
  }
}
