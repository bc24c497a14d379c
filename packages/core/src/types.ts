/**
 * Opaque, case-sensitive key of one device's data stream.
 */
export type DeviceId = string;

/**
 * Minimum shape the core needs from a persisted reading.
 * `id` is the store's insertion sequence; `recordedAt` is ISO-8601 UTC text.
 */
export type Reading = {
  readonly id: number;
  readonly deviceId: DeviceId;
  readonly recordedAt: string;
};

/** Read side of the record store as seen by the core. */
export interface ReadingStore<R extends Reading = Reading> {
  latest(deviceId: DeviceId): Promise<R | null>;
  /** Newest first, at most `limit` entries. */
  recent(deviceId: DeviceId, limit: number): Promise<R[]>;
}

/**
 * Outcome of waiting on an observer channel.
 */
export type Received =
  | { kind: 'message'; data: string }
  | { kind: 'closed'; code?: number; reason?: string };

/**
 * Duplex channel to one observer. Transports (WebSocket, SSE) implement this.
 */
export interface ObserverChannel {
  /** Rejects when the channel is closed or cannot accept more data. */
  send(message: string): Promise<void>;
  /** Resolves with the next client message, or `closed` once the transport is gone. */
  receive(): Promise<Received>;
  /** Idempotent. A pending `receive()` resolves `closed`. */
  close(code?: number, reason?: string): void;
}

/**
 * Stream of change events. Each yielded value is the device whose data changed.
 * Ending or throwing means the underlying subscription broke.
 */
export interface ChangeFeed {
  open(signal: AbortSignal): AsyncIterable<DeviceId>;
}

export type ObserverMessage<R extends Reading = Reading> =
  | { type: 'snapshot'; deviceId: DeviceId; readings: readonly R[] }
  | { type: 'update'; deviceId: DeviceId; reading: R }
  | { type: 'pong' };

/** Serializes observer messages to the wire representation. */
export type MessageEncoder<R extends Reading = Reading> = (message: ObserverMessage<R>) => string;

export type LogSink = Pick<Console, 'info' | 'warn' | 'error'>;

/** Counter/gauge sink; the host passes its metrics registry. */
export interface MetricsSink {
  inc(name: string, by?: number): void;
  set(name: string, value: number): void;
}
