import { z } from "zod";

const logLevels = ["debug", "info", "warn", "error", "silent"] as const;

// Largest payload a single IPv4 UDP datagram can carry.
const MAX_UDP_PAYLOAD_BYTES = 65_507;

export type Env = Record<string, string | undefined>;

export type NcConfig = Readonly<{
  LOG_LEVEL: (typeof logLevels)[number];
  DEFAULT_TIMEOUT_MS: number;
  UDP_BUFFER_BYTES: number;
  UDP_ACK: string;
}>;

const envSchema = z.object({
  NC_RELAY_LOG_LEVEL: z.enum(logLevels).default("warn"),
  NC_RELAY_DEFAULT_TIMEOUT_MS: z.coerce.number().int().min(0).default(5_000),
  NC_RELAY_UDP_BUFFER_BYTES: z.coerce.number().int().min(1).max(MAX_UDP_PAYLOAD_BYTES).default(1024),
  NC_RELAY_UDP_ACK: z.string().min(1).default("Message received")
});

export function loadConfig(env: Env = process.env): NcConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new Error(`Invalid configuration:\n${parsed.error.message}`);
  }

  const raw = parsed.data;
  return {
    LOG_LEVEL: raw.NC_RELAY_LOG_LEVEL,
    DEFAULT_TIMEOUT_MS: raw.NC_RELAY_DEFAULT_TIMEOUT_MS,
    UDP_BUFFER_BYTES: raw.NC_RELAY_UDP_BUFFER_BYTES,
    UDP_ACK: raw.NC_RELAY_UDP_ACK
  };
}
