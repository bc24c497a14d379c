import {
  ChangeNotifier,
  ConnectionLifecycle,
  FanoutDispatcher,
  SubscriptionRegistry,
  errorMessage,
  sleep,
  type ChangeFeed,
  type DeviceId,
  type LogSink,
  type MetricsSink,
  type NotifierState,
  type ObserverChannel,
  type ObserverSession,
  type ReadingStore,
  type RetryOptions,
} from "@sensorcast/core";
import type { Adapter, DeviceReading } from "../adapters/types";
import { encodeMessage } from "../adapters/wire";
import { metrics as defaultMetrics } from "./metrics";

export type LiveHostOptions = {
  snapshotLimit?: number;
  snapshotRetry?: RetryOptions;
  feedBackoff?: RetryOptions;
  maxQueuedSends?: number;
  log?: LogSink;
  metrics?: MetricsSink;
};

export type LiveHostStats = {
  observers: number;
  devices: number;
  notifier: NotifierState;
  notifierRestarts: number;
  busyDevices: number;
};

/**
 * Owns the live-update pipeline for one store: registry, dispatcher, connection
 * lifecycle and the supervised change notifier. Transports hand observers to
 * `attach`.
 */
export class LiveHost {
  readonly registry = new SubscriptionRegistry<ObserverSession<DeviceReading>>();
  readonly dispatcher: FanoutDispatcher<DeviceReading>;
  readonly lifecycle: ConnectionLifecycle<DeviceReading>;
  readonly notifier: ChangeNotifier;
  private readonly attached = new Set<Promise<void>>();
  private readonly log: LogSink;
  private closing = false;

  constructor(
    store: ReadingStore<DeviceReading>,
    feed: ChangeFeed,
    private readonly adapters: Adapter[] = [],
    opts: LiveHostOptions = {},
  ) {
    this.log = opts.log ?? console;
    const metrics = opts.metrics ?? defaultMetrics;
    this.dispatcher = new FanoutDispatcher(this.registry, store, { encode: encodeMessage, log: this.log, metrics });
    this.lifecycle = new ConnectionLifecycle(this.registry, store, {
      encode: encodeMessage,
      snapshotLimit: opts.snapshotLimit,
      retry: opts.snapshotRetry,
      maxQueuedSends: opts.maxQueuedSends,
      log: this.log,
      metrics,
    });
    this.notifier = new ChangeNotifier(feed, id => this.dispatcher.onChange(id), {
      backoff: opts.feedBackoff,
      log: this.log,
      metrics,
    });
  }

  start(): void {
    this.notifier.start();
  }

  /** Serve an observer until it leaves. Refused once shutdown has begun. */
  attach = (deviceId: DeviceId, channel: ObserverChannel): Promise<void> => {
    if (this.closing) {
      channel.close(1001, "server shutting down");
      return Promise.resolve();
    }
    const served = this.lifecycle.onConnect(deviceId, channel).finally(() => {
      this.attached.delete(served);
    });
    this.attached.add(served);
    return served;
  };

  /** True while the change feed is being consumed. */
  get healthy(): boolean {
    return this.notifier.state === "running";
  }

  stats(): LiveHostStats {
    return {
      observers: this.registry.connectionCount,
      devices: this.registry.deviceCount,
      notifier: this.notifier.state,
      notifierRestarts: this.notifier.restarts,
      busyDevices: this.dispatcher.busyDevices,
    };
  }

  async shutdown(opts: { timeoutMs?: number } = {}): Promise<void> {
    const timeoutMs = opts.timeoutMs ?? 10_000;
    this.closing = true;
    // close sessions while the notifier stops: dispatches held for a pending
    // snapshot settle on close
    const stopping = this.notifier.stop();
    this.lifecycle.closeAll(1001, "server shutting down");
    await stopping;
    const timer = new AbortController();
    await Promise.race([Promise.allSettled(Array.from(this.attached)), sleep(timeoutMs, timer.signal)]);
    timer.abort();
    if (this.attached.size > 0) {
      this.log.warn(`[host] ${this.attached.size} observer(s) still open after ${timeoutMs}ms`);
    }
    for (const adapter of this.adapters) {
      try {
        await adapter.drain?.();
      } catch (err) {
        this.log.error(`[host] drain ${adapter.name} failed: ${errorMessage(err)}`);
      }
    }
  }
}
