import { parseNcArgs, USAGE, type NcCommand } from "./cli";
import { loadConfig, type Env, type NcConfig } from "./config";
import { probeConnection } from "./dial";
import { InputDispatcher } from "./inputDispatcher";
import { setLogLevel } from "./logger";
import { startTcpListener } from "./tcpListener";
import { formatOneLineError } from "./text";
import { printLine, type ListenRequest, type NcIo } from "./types";
import { startUdpEchoListener } from "./udpEcho";

const MAX_PRINTED_ERROR_BYTES = 1024;

async function runListener(request: ListenRequest, io: NcIo, config: NcConfig): Promise<void> {
  if (request.protocol === "udp") {
    const listener = await startUdpEchoListener(request, {
      stdout: io.stdout,
      bufferBytes: config.UDP_BUFFER_BYTES,
      ack: config.UDP_ACK
    });
    await listener.closed;
    return;
  }

  // Relays are unbounded, and each one listens on the shared output.
  io.stdout.setMaxListeners(0);
  const input = new InputDispatcher(io.stdin);
  try {
    const listener = await startTcpListener(request, { stdout: io.stdout, input });
    await listener.closed;
  } finally {
    input.close();
  }
}

/**
 * Runs one `nc` invocation and returns its exit status. A listener only ever returns
 * because it stopped serving, which is a failure.
 */
export async function runNc(argv: readonly string[], io: NcIo, env: Env = process.env): Promise<number> {
  let config: NcConfig;
  let command: NcCommand;
  try {
    config = loadConfig(env);
    setLogLevel(config.LOG_LEVEL);
    command = parseNcArgs(argv, { timeoutMs: config.DEFAULT_TIMEOUT_MS });
  } catch (err) {
    printLine(io.stderr, `Error: ${formatOneLineError(err, MAX_PRINTED_ERROR_BYTES)}`);
    printLine(io.stderr, "Run 'nc --help' for usage.");
    return 1;
  }

  switch (command.kind) {
    case "help":
      io.stdout.write(USAGE);
      return 0;
    case "connect":
      try {
        await probeConnection(command.request, { stdout: io.stdout });
        return 0;
      } catch (err) {
        printLine(io.stderr, `Error executing nc: ${formatOneLineError(err, MAX_PRINTED_ERROR_BYTES)}`);
        return 1;
      }
    case "listen":
      try {
        await runListener(command.request, io, config);
      } catch (err) {
        printLine(io.stderr, `Error executing nc listen: ${formatOneLineError(err, MAX_PRINTED_ERROR_BYTES)}`);
      }
      return 1;
  }
}
