import http from "node:http";
import net from "node:net";

import { NcError } from "./errors";
import { formatError, log } from "./logger";
import { destroyBestEffort } from "./socketSafe";
import type { ProxyEndpoint } from "./target";
import { formatOneLineError, formatOneLineUtf8 } from "./text";

const MAX_STATUS_LINE_BYTES = 256;

export type CreateTcpConnection = (options: net.TcpNetConnectOpts) => net.Socket;

export interface TunnelSession {
  socket: net.Socket;
  statusLine: string;
  // Bytes the proxy sent after the response head; they belong to the tunnel.
  head: Buffer;
}

export interface NegotiateOptions {
  timeoutMs: number;
  createTcpConnection?: CreateTcpConnection;
}

function proxyAuthorization(proxy: ProxyEndpoint): string | null {
  if (!proxy.auth) return null;
  const token = Buffer.from(`${proxy.auth.username}:${proxy.auth.password}`, "utf8").toString("base64");
  return `Basic ${token}`;
}

/**
 * Opens a CONNECT tunnel to `target` (`host:port`) through an HTTP proxy.
 *
 * Resolves once the proxy answers `200`; the returned socket is then a raw byte pipe to
 * the target and belongs to the caller. Anything other than `200` rejects with the
 * proxy's status line in the message.
 */
export async function negotiateConnectTunnel(
  proxy: ProxyEndpoint,
  target: string,
  opts: NegotiateOptions
): Promise<TunnelSession> {
  const createConnection = opts.createTcpConnection ?? net.createConnection;
  const headers: http.OutgoingHttpHeaders = { Host: target };
  const authorization = proxyAuthorization(proxy);
  if (authorization) headers["Proxy-Authorization"] = authorization;

  return await new Promise<TunnelSession>((resolve, reject) => {
    let settled = false;
    let proxyConnected = false;
    let timer: NodeJS.Timeout | null = null;

    const settle = () => {
      settled = true;
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
    };

    const fail = (err: NcError) => {
      if (settled) return;
      settle();
      log("warn", "tunnel_error", { proxy: proxy.display, target, err: formatError(err) });
      reject(err);
    };

    const req = http.request({
      method: "CONNECT",
      path: target,
      host: proxy.host,
      port: proxy.port,
      headers,
      setHost: false,
      createConnection: () => createConnection({ host: proxy.host, port: proxy.port })
    });

    req.once("socket", (socket) => {
      if (socket.connecting) {
        socket.once("connect", () => {
          proxyConnected = true;
        });
      } else {
        proxyConnected = true;
      }
    });

    if (opts.timeoutMs > 0) {
      timer = setTimeout(() => {
        const phase = proxyConnected ? "CONNECT handshake" : "proxy connection";
        req.destroy(new Error(`${phase} timed out after ${opts.timeoutMs}ms`));
      }, opts.timeoutMs);
    }

    req.once("connect", (res, socket, head) => {
      const statusLine = formatOneLineUtf8(`${res.statusCode ?? 0} ${res.statusMessage ?? ""}`, MAX_STATUS_LINE_BYTES);
      if (res.statusCode !== 200) {
        destroyBestEffort(socket);
        fail(new NcError("ERR_NC_HANDSHAKE", `proxy connection failed: ${statusLine}`));
        return;
      }
      if (settled) {
        destroyBestEffort(socket);
        return;
      }
      settle();
      log("info", "tunnel_ok", { proxy: proxy.display, target, status: statusLine });
      resolve({ socket, statusLine, head });
    });

    req.on("error", (err) => {
      const message = formatOneLineError(err, 512);
      if (proxyConnected) {
        fail(new NcError("ERR_NC_HANDSHAKE", `failed to read proxy response: ${message}`, { cause: err }));
      } else {
        fail(new NcError("ERR_NC_DIAL", `failed to connect to proxy: ${message}`, { cause: err }));
      }
    });

    req.end();
  });
}
