import { AsyncQueue } from './async-queue';
import type { ChangeFeed, DeviceId } from './types';

/**
 * In-process change feed: whatever is `publish`ed while a consumer has the feed
 * open is delivered to it. Events published while nobody listens are dropped.
 */
export class MemoryChangeFeed implements ChangeFeed {
  private current: AsyncQueue<DeviceId> | null = null;
  private failure: Error | null = null;
  private opens = 0;

  get openCount(): number {
    return this.opens;
  }

  get listening(): boolean {
    return this.current !== null && !this.current.closed;
  }

  publish(deviceId: DeviceId): boolean {
    return this.current?.push(deviceId) ?? false;
  }

  /** Terminate the open stream; with `err` the consumer sees a failure instead of an end. */
  disconnect(err?: Error): void {
    this.failure = err ?? null;
    this.current?.close();
  }

  open(signal: AbortSignal): AsyncIterable<DeviceId> {
    this.current?.close();
    const queue = new AsyncQueue<DeviceId>();
    this.current = queue;
    this.opens++;
    signal.addEventListener('abort', () => queue.close(), { once: true });
    return this.drain(queue);
  }

  private async *drain(queue: AsyncQueue<DeviceId>): AsyncGenerator<DeviceId> {
    for await (const id of queue) yield id;
    if (this.current === queue) this.current = null;
    const failure = this.failure;
    this.failure = null;
    if (failure) throw failure;
  }
}
