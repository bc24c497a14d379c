import { DeliveryError } from './errors';
import type { DeviceId, ObserverChannel, Reading } from './types';

export type SessionState = 'pending' | 'live' | 'closed';

/** Orders readings of one device by recorded time, then insertion order. */
export function compareReadings(a: Reading, b: Reading): number {
  const dt = Date.parse(a.recordedAt) - Date.parse(b.recordedAt);
  if (dt !== 0 && !Number.isNaN(dt)) return dt;
  return a.id - b.id;
}

type Held<R> = {
  reading: R;
  payload: string;
  admit?: () => boolean;
  /** Settles the caller's `deliver` promise with the outcome of the real send. */
  settle: (outcome: Promise<boolean>) => void;
};

export type SessionOptions<R extends Reading> = {
  /** Sends allowed to wait behind a slow channel before the session is dropped. */
  maxQueued?: number;
  /** Runs once, on the first `close()`. */
  onClose: (session: ObserverSession<R>, code: number, reason: string) => void;
};

/**
 * One observer attached to one device.
 *
 * Starts `pending`: live updates are held (newest only) until the snapshot goes out.
 * Sends are chained so they reach the channel in the order they were accepted, and
 * an update is accepted only when it is strictly newer than the last one sent.
 */
export class ObserverSession<R extends Reading = Reading> {
  private _state: SessionState = 'pending';
  private last: Reading | null = null;
  private held: Held<R> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;
  private readonly maxQueued: number;
  private readonly onClose: SessionOptions<R>['onClose'];

  constructor(
    readonly deviceId: DeviceId,
    readonly channel: ObserverChannel,
    opts: SessionOptions<R>,
  ) {
    this.maxQueued = opts.maxQueued ?? 64;
    this.onClose = opts.onClose;
  }

  get state(): SessionState {
    return this._state;
  }

  get isClosed(): boolean {
    return this._state === 'closed';
  }

  /**
   * Send the snapshot, then go live. Resolves once the snapshot is written and
   * rejects only if that write fails. A held update newer than every snapshot
   * entry is queued behind it; its outcome goes to whoever delivered it.
   */
  async start(snapshotPayload: string, snapshot: readonly R[]): Promise<void> {
    if (this._state !== 'pending') return;
    await this.channel.send(snapshotPayload);
    if (this.isClosed) return;
    for (const r of snapshot) {
      if (!this.last || compareReadings(r, this.last) > 0) this.last = r;
    }
    this._state = 'live';
    const held = this.held;
    this.held = null;
    held?.settle(this.deliver(held.reading, held.payload, held.admit));
  }

  /**
   * Queue a live update. Resolves `true` once written, `false` when skipped
   * (stale, superseded while held, or the observer left first). Rejects with
   * `DeliveryError`. While pending, settles only after the snapshot is out.
   */
  deliver(reading: R, payload: string, admit?: () => boolean): Promise<boolean> {
    if (this._state === 'closed') return Promise.resolve(false);
    if (this._state === 'pending') return this.hold(reading, payload, admit);
    if (this.last && compareReadings(reading, this.last) <= 0) return Promise.resolve(false);
    this.last = reading;
    return this.enqueue(payload, admit);
  }

  /** Queue a control message (e.g. pong) behind pending updates. */
  sendControl(payload: string): Promise<boolean> {
    if (this._state !== 'live') return Promise.resolve(false);
    return this.enqueue(payload);
  }

  /** Latched: only the first call runs the close hook. */
  close(code = 1000, reason = 'closed'): boolean {
    if (this._state === 'closed') return false;
    this._state = 'closed';
    this.held?.settle(Promise.resolve(false));
    this.held = null;
    this.onClose(this, code, reason);
    return true;
  }

  private hold(reading: R, payload: string, admit?: () => boolean): Promise<boolean> {
    const prev = this.held;
    if (prev && compareReadings(reading, prev.reading) <= 0) return Promise.resolve(false);
    return new Promise<boolean>((resolve, reject) => {
      prev?.settle(Promise.resolve(false));
      this.held = {
        reading,
        payload,
        admit,
        settle: outcome => {
          void outcome.then(resolve, reject);
        },
      };
    });
  }

  private enqueue(payload: string, admit?: () => boolean): Promise<boolean> {
    if (this.queued >= this.maxQueued) {
      return Promise.reject(new DeliveryError(`observer of ${this.deviceId} is not keeping up`));
    }
    this.queued++;
    const run = this.tail
      .then(async () => {
        if (this.isClosed || (admit && !admit())) return false;
        try {
          await this.channel.send(payload);
        } catch (err) {
          throw new DeliveryError(`send to observer of ${this.deviceId} failed`, { cause: err });
        }
        return true;
      })
      .finally(() => {
        this.queued--;
      });
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
