import type { ChangeFeed, LogSink } from "@sensorcast/core";
import { LiveHost } from "../host/live-host";
import { metrics as defaultMetrics, type Metrics } from "../host/metrics";
import { SqliteReadingStore } from "../adapters/sqlite";
import { SqliteChangeFeed } from "../adapters/sqlite/change-feed";
import { WsTransport } from "../adapters/ws";
import { SseTransport } from "../adapters/sse";
import type { ObserverHandler } from "../adapters/types";
import type { DB } from "../adapters/sqlite/db";
import type { Config } from "./config";

export type BootstrapOptions = {
  /** Existing connection instead of `config.databasePath`. */
  db?: DB;
  /** Replaces the polling feed over the store. */
  feed?: ChangeFeed;
  log?: LogSink;
  metrics?: Metrics;
};

export function bootstrap(config: Config, opts: BootstrapOptions = {}) {
  const log = opts.log ?? console;
  const metrics = opts.metrics ?? defaultMetrics;
  const store = new SqliteReadingStore(opts.db ?? config.databasePath);
  const feed = opts.feed ?? new SqliteChangeFeed(store, { pollIntervalMs: config.pollIntervalMs });
  const attach: ObserverHandler = (deviceId, channel) => host.attach(deviceId, channel);
  const ws = new WsTransport(attach, { maxBufferedBytes: config.maxBufferedBytes });
  const sse = new SseTransport(attach, {
    heartbeatMs: config.sseHeartbeatMs,
    maxBufferedBytes: config.maxBufferedBytes,
  });
  // drained in order: transports before the database closes
  const host = new LiveHost(store, feed, [ws, sse, store], {
    snapshotLimit: config.snapshotLimit,
    log,
    metrics,
  });
  return { config, store, feed, host, ws, sse, log, metrics };
}

export type App = ReturnType<typeof bootstrap>;
