import { NcError } from "./errors";

const UNIT_NS: Record<string, number> = {
  ns: 1,
  us: 1e3,
  "µs": 1e3,
  "μs": 1e3,
  ms: 1e6,
  s: 1e9,
  m: 60e9,
  h: 3_600e9
};

const SEGMENT = /(\d+(?:\.\d*)?|\.\d+)(ns|us|µs|μs|ms|s|m|h)/gy;

/**
 * Parses a duration such as `5s`, `250ms`, `1m30s` or `1.5h` into whole milliseconds,
 * rounding sub-millisecond remainders up. `0` is accepted without a unit and means
 * "no timeout".
 */
export function parseDuration(raw: string): number {
  const input = raw.trim();
  if (input === "0") return 0;
  if (input === "") throw new NcError("ERR_NC_CONFIG", "invalid duration: empty");

  let total = 0;
  SEGMENT.lastIndex = 0;
  while (SEGMENT.lastIndex < input.length) {
    const start = SEGMENT.lastIndex;
    const match = SEGMENT.exec(input);
    if (!match || match.index !== start) {
      throw new NcError("ERR_NC_CONFIG", `invalid duration: ${input}`);
    }
    total += Math.round(Number.parseFloat(match[1]) * UNIT_NS[match[2]]);
  }

  if (!Number.isFinite(total)) throw new NcError("ERR_NC_CONFIG", `invalid duration: ${input}`);
  // Summed in whole nanoseconds so `1.1s` is 1100ms rather than 1101ms.
  return Math.ceil(total / 1e6);
}
