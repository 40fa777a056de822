import type net from "node:net";
import type { Readable, Writable } from "node:stream";

import { formatError, log } from "./logger";
import {
  destroyBestEffort,
  pauseBestEffort,
  resumeBestEffort,
  writeCaptureErrorBestEffort
} from "./socketSafe";

export type RelayEndReason = "peer_close" | "socket_error" | "output_error";

export interface RelayIo {
  // Local input for this connection only; the relay never ends or destroys it.
  input: Readable;
  // Shared local output; the relay never ends it.
  output: Writable;
}

export interface RelayStats {
  connId: number;
  bytesIn: number;
  bytesOut: number;
  why: RelayEndReason;
  inputEnded: boolean;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk;
}

/**
 * Pumps raw bytes between `socket` and the local streams until the socket side is done.
 *
 * Local input → socket runs from the moment the relay starts and stops on its own when
 * input ends or errors, without touching the socket. Socket → local output decides the
 * relay's lifetime: once the peer closes, the socket errors or output fails, the input
 * direction is detached and the socket destroyed, and the promise resolves. It never
 * rejects.
 */
export async function relayConnection(socket: net.Socket, io: RelayIo, connId: number): Promise<RelayStats> {
  const { input, output } = io;

  let bytesIn = 0;
  let bytesOut = 0;
  let inputDone = false;
  let inputEnded = false;
  let finished = false;
  let pausedInputForSocket = false;
  let pausedSocketForOutput = false;

  return await new Promise<RelayStats>((resolve) => {
    const onInputData = (chunk: Buffer | string) => {
      if (inputDone) return;
      const buf = toBuffer(chunk);
      const res = writeCaptureErrorBestEffort(socket, buf, onSocketWriteError);
      if (res.err) {
        onSocketWriteError(res.err);
        return;
      }
      bytesOut += buf.length;
      if (!res.ok && !pausedInputForSocket) {
        pausedInputForSocket = true;
        pauseBestEffort(input);
      }
    };

    const onSocketWriteError = (err: Error) => {
      if (inputDone) return;
      log("debug", "conn_close", { connId, direction: "input_to_socket", err: formatError(err) });
      stopInput();
    };

    const onSocketDrain = () => {
      if (!pausedInputForSocket || inputDone) return;
      pausedInputForSocket = false;
      resumeBestEffort(input);
    };

    const onInputEnd = () => {
      inputEnded = true;
      stopInput();
    };

    const onInputError = (err: Error) => {
      log("debug", "conn_close", { connId, direction: "input_to_socket", err: formatError(err) });
      stopInput();
    };

    function stopInput(): void {
      if (inputDone) return;
      inputDone = true;
      input.off("data", onInputData);
      input.off("end", onInputEnd);
      input.off("error", onInputError);
      socket.off("drain", onSocketDrain);
    }

    const onOutputDrain = () => {
      if (!pausedSocketForOutput || finished) return;
      pausedSocketForOutput = false;
      resumeBestEffort(socket);
    };

    const onOutputError = (err: Error) => {
      if (finished) return;
      log("warn", "conn_close", { connId, direction: "socket_to_output", err: formatError(err) });
      finish("output_error");
    };

    const onSocketData = (chunk: Buffer) => {
      if (finished) return;
      bytesIn += chunk.length;
      const res = writeCaptureErrorBestEffort(output, chunk, onOutputError);
      if (res.err) {
        onOutputError(res.err);
        return;
      }
      if (!res.ok && !pausedSocketForOutput) {
        pausedSocketForOutput = true;
        pauseBestEffort(socket);
      }
    };

    const onSocketError = (err: Error) => {
      log("debug", "conn_close", { connId, direction: "socket_to_output", err: formatError(err) });
      finish("socket_error");
    };

    const onSocketEnd = () => finish("peer_close");

    function finish(why: RelayEndReason): void {
      if (finished) return;
      finished = true;
      stopInput();
      socket.off("data", onSocketData);
      socket.off("end", onSocketEnd);
      socket.off("close", onSocketEnd);
      output.off("drain", onOutputDrain);
      output.off("error", onOutputError);
      // Keep a listener so a late error from the torn-down socket is not thrown.
      socket.on("error", () => undefined);
      socket.off("error", onSocketError);
      destroyBestEffort(socket);

      log("info", "conn_close", { connId, why, bytesIn, bytesOut, inputEnded });
      resolve({ connId, bytesIn, bytesOut, why, inputEnded });
    }

    socket.on("error", onSocketError);
    socket.once("end", onSocketEnd);
    socket.once("close", onSocketEnd);
    socket.on("data", onSocketData);
    output.on("drain", onOutputDrain);
    output.on("error", onOutputError);

    socket.on("drain", onSocketDrain);
    input.on("end", onInputEnd);
    input.on("error", onInputError);
    input.on("data", onInputData);
  });
}
