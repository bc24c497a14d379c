import { z } from "zod";

const int = (def: number, min: number) => z.coerce.number().int().min(min).default(def);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default("0.0.0.0"),
  DATABASE_PATH: z.string().min(1).default("sensorcast.db"),
  SNAPSHOT_LIMIT: int(100, 1),
  POLL_INTERVAL_MS: int(100, 1),
  SSE_HEARTBEAT_MS: int(15000, 1),
  MAX_BUFFERED_BYTES: int(1024 * 1024, 1),
});

export type Config = {
  port: number;
  host: string;
  databasePath: string;
  snapshotLimit: number;
  pollIntervalMs: number;
  sseHeartbeatMs: number;
  maxBufferedBytes: number;
};

export class ConfigError extends Error {
  override readonly name = "ConfigError";
}

/** Read settings from the environment. Empty strings count as unset. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ""));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigError(`invalid ${issue?.path.join(".") ?? "environment"}: ${issue?.message ?? "unknown error"}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    databasePath: e.DATABASE_PATH,
    snapshotLimit: e.SNAPSHOT_LIMIT,
    pollIntervalMs: e.POLL_INTERVAL_MS,
    sseHeartbeatMs: e.SSE_HEARTBEAT_MS,
    maxBufferedBytes: e.MAX_BUFFERED_BYTES,
  };
}
