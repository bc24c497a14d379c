import { AsyncQueue } from '../async-queue';
import { compareReadings } from '../session';
import type { DeviceId, LogSink, ObserverChannel, ObserverMessage, Reading, ReadingStore, Received } from '../types';

export type TestReading = Reading & { value: number };

export const encodeJson = (m: ObserverMessage<TestReading>): string => JSON.stringify(m);

export const quietLog = (): LogSink => ({ info: () => undefined, warn: () => undefined, error: () => undefined });

/** Observer channel stand-in that records what the server sent. */
export class FakeChannel implements ObserverChannel {
  readonly sent: string[] = [];
  closeCalls = 0;
  closedWith: { code?: number; reason?: string } | null = null;
  failSends = false;
  private readonly inbox = new AsyncQueue<string>();
  private remoteEnd: { code?: number; reason?: string } | null = null;

  async send(message: string): Promise<void> {
    if (this.closedWith || this.remoteEnd) throw new Error('channel closed');
    if (this.failSends) throw new Error('simulated send failure');
    this.sent.push(message);
  }

  async receive(): Promise<Received> {
    const next = await this.inbox.next();
    if (!next.done) return { kind: 'message', data: next.value };
    const end = this.remoteEnd ?? this.closedWith ?? {};
    return { kind: 'closed', code: end.code, reason: end.reason };
  }

  close(code?: number, reason?: string): void {
    this.closeCalls++;
    if (this.closedWith) return;
    this.closedWith = { code, reason };
    this.inbox.close();
  }

  /** Observer sends a text frame. */
  fromClient(data: string): void {
    this.inbox.push(data);
  }

  /** Observer (or the network) drops the connection. */
  hangUp(code = 1001, reason = 'going away'): void {
    if (this.remoteEnd) return;
    this.remoteEnd = { code, reason };
    this.inbox.close();
  }

  messages(): Array<{ type: string; deviceId?: string; reading?: TestReading; readings?: TestReading[] }> {
    return this.sent.map(s => JSON.parse(s));
  }
}

/** Store stand-in. `gate` lets a test hold `latest()` calls open. */
export class FakeStore implements ReadingStore<TestReading> {
  readonly rows: TestReading[] = [];
  latestCalls = 0;
  recentCalls = 0;
  failLatest = 0;
  failRecent = 0;
  gate: (() => Promise<void>) | null = null;
  private seq = 0;

  insert(deviceId: DeviceId, recordedAt: string, value = 0): TestReading {
    const r: TestReading = { id: ++this.seq, deviceId, recordedAt, value };
    this.rows.push(r);
    return r;
  }

  async latest(deviceId: DeviceId): Promise<TestReading | null> {
    this.latestCalls++;
    const snapshot = this.newestFirst(deviceId)[0] ?? null;
    if (this.gate) await this.gate();
    if (this.failLatest > 0) {
      this.failLatest--;
      throw new Error('store unavailable');
    }
    return snapshot;
  }

  async recent(deviceId: DeviceId, limit: number): Promise<TestReading[]> {
    this.recentCalls++;
    if (this.failRecent > 0) {
      this.failRecent--;
      throw new Error('store unavailable');
    }
    return this.newestFirst(deviceId).slice(0, limit);
  }

  private newestFirst(deviceId: DeviceId): TestReading[] {
    return this.rows.filter(r => r.deviceId === deviceId).sort((a, b) => compareReadings(b, a));
  }
}

/** Let queued promise callbacks run. */
export async function flush(rounds = 10): Promise<void> {
  for (let i = 0; i < rounds; i++) await new Promise<void>(r => setImmediate(r));
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}
