import { errorMessage } from './errors';
import type { SubscriptionRegistry } from './registry';
import type { ObserverSession } from './session';
import type { DeviceId, LogSink, MessageEncoder, MetricsSink, Reading, ReadingStore } from './types';

export type DispatcherOptions<R extends Reading> = {
  encode: MessageEncoder<R>;
  log?: LogSink;
  metrics?: MetricsSink;
};

/**
 * Resolves the latest reading for a changed device and hands it to every session
 * registered for that device.
 *
 * Lookups for one device run one after another, so a later event can never
 * overtake an earlier one; event payloads are never trusted, "latest" is re-read.
 * Each session writes on its own chain, so a slow observer holds up nobody else.
 */
export class FanoutDispatcher<R extends Reading = Reading> {
  private readonly chains = new Map<DeviceId, Promise<void>>();
  private readonly encode: MessageEncoder<R>;
  private readonly log: LogSink;
  private readonly metrics?: MetricsSink;

  constructor(
    private readonly registry: SubscriptionRegistry<ObserverSession<R>>,
    private readonly store: ReadingStore<R>,
    opts: DispatcherOptions<R>,
  ) {
    this.encode = opts.encode;
    this.log = opts.log ?? console;
    this.metrics = opts.metrics;
  }

  /** Settles once every delivery for this event has been written or abandoned. Never rejects. */
  async onChange(deviceId: DeviceId): Promise<void> {
    const deliveries = await this.serialize(deviceId, () => this.fanOut(deviceId));
    await Promise.all(deliveries);
  }

  /** Devices with a lookup queued or running. */
  get busyDevices(): number {
    return this.chains.size;
  }

  private serialize<T>(deviceId: DeviceId, task: () => Promise<T>): Promise<T> {
    const prev = this.chains.get(deviceId) ?? Promise.resolve();
    const run = prev.then(task);
    const tail: Promise<void> = run.then(
      () => this.release(deviceId, tail),
      () => this.release(deviceId, tail),
    );
    this.chains.set(deviceId, tail);
    return run;
  }

  private release(deviceId: DeviceId, tail: Promise<void>): void {
    if (this.chains.get(deviceId) === tail) this.chains.delete(deviceId);
  }

  private async fanOut(deviceId: DeviceId): Promise<Promise<void>[]> {
    let reading: R | null;
    try {
      reading = await this.store.latest(deviceId);
    } catch (err) {
      this.metrics?.inc('dispatch_errors');
      this.log.warn(`[dispatch] latest(${deviceId}) failed: ${errorMessage(err)}`);
      return [];
    }
    if (!reading) return [];

    const subscribers = this.registry.subscribersOf(deviceId);
    if (subscribers.length === 0) return [];

    let payload: string;
    try {
      payload = this.encode({ type: 'update', deviceId, reading });
    } catch (err) {
      this.metrics?.inc('dispatch_errors');
      this.log.error(`[dispatch] cannot encode reading ${reading.id} of ${deviceId}: ${errorMessage(err)}`);
      return [];
    }

    const latest = reading;
    return subscribers.map(session =>
      session
        .deliver(latest, payload, () => this.registry.has(deviceId, session))
        .then(
          sent => {
            if (sent) this.metrics?.inc('updates_sent');
          },
          err => {
            this.metrics?.inc('delivery_failures');
            this.log.warn(`[dispatch] dropping observer of ${deviceId}: ${errorMessage(err)}`);
            session.close(1011, 'delivery failed');
          },
        ),
    );
  }
}
