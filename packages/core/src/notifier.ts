import { errorMessage } from './errors';
import { backoffDelay, sleep, type RetryOptions } from './retry';
import type { ChangeFeed, DeviceId, LogSink, MetricsSink } from './types';

export type NotifierState = 'idle' | 'running' | 'backoff' | 'stopped';

export type NotifierOptions = {
  /** Delay policy between feed restarts. `attempts` is ignored: restarts never give up. */
  backoff?: RetryOptions;
  log?: LogSink;
  metrics?: MetricsSink;
};

/**
 * Supervised consumer loop over a change feed.
 *
 * Each device id pulled from the feed is handed to `onChange` without waiting for
 * delivery. When the feed ends or throws it is reopened after a backoff, until
 * `stop()` is called.
 */
export class ChangeNotifier {
  private _state: NotifierState = 'idle';
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readonly inflight = new Set<Promise<void>>();
  private readonly backoff: RetryOptions;
  private readonly log: LogSink;
  private readonly metrics?: MetricsSink;
  private _restarts = 0;

  constructor(
    private readonly feed: ChangeFeed,
    private readonly onChange: (deviceId: DeviceId) => Promise<void>,
    opts: NotifierOptions = {},
  ) {
    this.backoff = { baseDelayMs: 250, maxDelayMs: 8000, factor: 2, ...opts.backoff };
    this.log = opts.log ?? console;
    this.metrics = opts.metrics;
  }

  get state(): NotifierState {
    return this._state;
  }

  get restarts(): number {
    return this._restarts;
  }

  start(): void {
    if (this.loop) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.supervise(controller.signal);
  }

  /** Stop consuming and wait for dispatches already started. */
  async stop(): Promise<void> {
    this.controller?.abort();
    await this.loop;
    await Promise.all(Array.from(this.inflight));
    this.loop = null;
    this.controller = null;
    this._state = 'stopped';
  }

  private async supervise(signal: AbortSignal): Promise<void> {
    let attempt = 0;
    while (!signal.aborted) {
      this._state = 'running';
      let received = 0;
      try {
        for await (const deviceId of this.feed.open(signal)) {
          received++;
          this.dispatch(deviceId);
        }
        if (signal.aborted) break;
        this.log.warn('[notifier] change feed ended; restarting');
      } catch (err) {
        if (signal.aborted) break;
        this.log.error(`[notifier] change feed failed; restarting: ${errorMessage(err)}`);
      }
      this._restarts++;
      this.metrics?.inc('notifier_restarts');
      if (received > 0) attempt = 0;
      this._state = 'backoff';
      await sleep(backoffDelay(attempt++, this.backoff), signal);
    }
    this._state = 'stopped';
  }

  private dispatch(deviceId: DeviceId): void {
    const tracked: Promise<void> = this.onChange(deviceId)
      .catch((err: unknown) => {
        this.metrics?.inc('dispatch_errors');
        this.log.error(`[notifier] dispatch for ${deviceId} failed: ${errorMessage(err)}`);
      })
      .finally(() => {
        this.inflight.delete(tracked);
      });
    this.inflight.add(tracked);
  }
}
