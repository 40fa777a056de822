import dgram from "node:dgram";
import type { Writable } from "node:stream";

import { tryGetErrorCode } from "./errorCode";
import { NcError } from "./errors";
import { formatPeerAddress, isIpv6Literal, joinHostPort } from "./ipUtils";
import type { RunningListener } from "./listener";
import { formatError, log } from "./logger";
import { closeBestEffort } from "./socketSafe";
import { formatOneLineError } from "./text";
import { printLine, type ListenRequest } from "./types";

export interface DatagramEchoOptions {
  stdout: Writable;
  // Datagrams longer than this are cut to this many bytes before they are printed.
  bufferBytes: number;
  ack: string;
}

export interface UdpListenOptions extends DatagramEchoOptions {
  host?: string;
}

/**
 * Serves `socket` until it fails: every datagram is printed with its sender and answered
 * with the acknowledgment payload. Senders are independent; nothing is kept between
 * datagrams. A receive or send error closes the socket and rejects.
 */
export async function runDatagramEcho(socket: dgram.Socket, opts: DatagramEchoOptions): Promise<void> {
  const ack = Buffer.from(opts.ack, "utf8");

  return await new Promise<void>((_resolve, reject) => {
    let stopped = false;

    const stop = (err: NcError, failed = true) => {
      if (stopped) return;
      stopped = true;
      socket.off("message", onMessage);
      if (failed) log("error", "udp_error", { err: formatError(err) });
      else log("info", "listen_stop", { proto: "udp" });
      closeBestEffort(socket);
      reject(err);
    };

    const onMessage = (msg: Buffer, rinfo: dgram.RemoteInfo) => {
      if (stopped) return;
      const from = formatPeerAddress(rinfo.address, rinfo.port);
      let payload = msg;
      if (msg.length > opts.bufferBytes) {
        payload = msg.subarray(0, opts.bufferBytes);
        log("warn", "udp_truncated", { from, size: msg.length, kept: payload.length });
      }

      log("debug", "udp_datagram", { from, bytes: payload.length });
      printLine(opts.stdout, `Received ${payload.length} bytes from ${from}: ${payload.toString("utf8").trim()}`);

      socket.send(ack, rinfo.port, rinfo.address, (err) => {
        if (err) {
          stop(new NcError("ERR_NC_LISTEN", `failed to send response: ${formatOneLineError(err, 512)}`, { cause: err }));
        }
      });
    };

    socket.on("message", onMessage);
    socket.on("error", (err) => {
      stop(
        new NcError("ERR_NC_LISTEN", `failed to read from UDP socket: ${formatOneLineError(err, 512)}`, { cause: err })
      );
    });
    socket.once("close", () => {
      stop(new NcError("ERR_NC_LISTEN", "UDP listener closed"), false);
    });
  });
}

async function bindDatagramSocket(
  options: dgram.SocketOptions,
  port: number,
  address: string | undefined
): Promise<dgram.Socket> {
  const socket = dgram.createSocket(options);
  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      closeBestEffort(socket);
      reject(err);
    };
    socket.once("error", onError);
    socket.bind(port, address, () => {
      socket.off("error", onError);
      resolve();
    });
  });
  return socket;
}

// Without a host the socket listens on every interface: a dual-stack `::` socket, or
// plain IPv4 where the host has no IPv6.
async function bindListenSocket(port: number, host: string | undefined): Promise<dgram.Socket> {
  if (host !== undefined) {
    return await bindDatagramSocket({ type: isIpv6Literal(host) ? "udp6" : "udp4" }, port, host);
  }
  try {
    return await bindDatagramSocket({ type: "udp6", ipv6Only: false }, port, "::");
  } catch (err) {
    const code = tryGetErrorCode(err);
    if (code !== "EAFNOSUPPORT" && code !== "EADDRNOTAVAIL") throw err;
    return await bindDatagramSocket({ type: "udp4" }, port, undefined);
  }
}

export async function startUdpEchoListener(
  request: ListenRequest,
  opts: UdpListenOptions
): Promise<RunningListener<dgram.Socket>> {
  let socket: dgram.Socket;
  try {
    socket = await bindListenSocket(request.port, opts.host);
  } catch (err) {
    log("error", "listen_stop", { proto: "udp", port: request.port, err: formatError(err) });
    throw new NcError("ERR_NC_LISTEN", `failed to start UDP listener: ${formatOneLineError(err, 512)}`, {
      cause: err
    });
  }

  const port = socket.address().port;
  const listenAddress = joinHostPort(opts.host ?? "", port);
  log("info", "listen_start", { proto: "udp", listenAddress });
  printLine(opts.stdout, `Listening on ${listenAddress} (UDP)`);

  const closed = runDatagramEcho(socket, opts);

  return {
    handle: socket,
    port,
    listenAddress,
    closed,
    close: async () => {
      closeBestEffort(socket);
      await closed.catch((err: unknown) => {
        if (!(err instanceof NcError)) throw err;
      });
    }
  };
}
