import { errorMessage } from './errors';
import type { SubscriptionRegistry } from './registry';
import { withRetry, type RetryOptions } from './retry';
import { ObserverSession } from './session';
import type {
  DeviceId,
  LogSink,
  MessageEncoder,
  MetricsSink,
  ObserverChannel,
  Reading,
  ReadingStore,
  Received,
} from './types';

export type LifecycleOptions<R extends Reading> = {
  encode: MessageEncoder<R>;
  /** Readings in the initial snapshot, newest first. */
  snapshotLimit?: number;
  /** Retry policy for the snapshot query. */
  retry?: RetryOptions;
  maxQueuedSends?: number;
  log?: LogSink;
  metrics?: MetricsSink;
};

/** Client → server commands understood on an observer channel. */
export type ObserverCommand = 'ping' | 'unsubscribe' | 'unknown';

export function parseCommand(data: string): ObserverCommand {
  try {
    const parsed: unknown = JSON.parse(data);
    if (parsed && typeof parsed === 'object' && 'type' in parsed) {
      if (parsed.type === 'ping') return 'ping';
      if (parsed.type === 'unsubscribe') return 'unsubscribe';
    }
  } catch {
    // not JSON; fall through
  }
  return 'unknown';
}

/**
 * Joins and leaves observers: register, snapshot, go live, wait for close,
 * deregister. Cleanup for a session runs once whatever ended it.
 */
export class ConnectionLifecycle<R extends Reading = Reading> {
  private readonly sessions = new Set<ObserverSession<R>>();
  private readonly encode: MessageEncoder<R>;
  private readonly snapshotLimit: number;
  private readonly retry: RetryOptions;
  private readonly maxQueuedSends?: number;
  private readonly log: LogSink;
  private readonly metrics?: MetricsSink;

  constructor(
    private readonly registry: SubscriptionRegistry<ObserverSession<R>>,
    private readonly store: ReadingStore<R>,
    opts: LifecycleOptions<R>,
  ) {
    this.encode = opts.encode;
    this.snapshotLimit = opts.snapshotLimit ?? 100;
    this.retry = opts.retry ?? { attempts: 3, baseDelayMs: 100, maxDelayMs: 2000 };
    this.maxQueuedSends = opts.maxQueuedSends;
    this.log = opts.log ?? console;
    this.metrics = opts.metrics;
  }

  /**
   * Serve one observer until it goes away. Resolves after cleanup; never rejects.
   */
  async onConnect(deviceId: DeviceId, channel: ObserverChannel): Promise<void> {
    const session = new ObserverSession<R>(deviceId, channel, {
      maxQueued: this.maxQueuedSends,
      onClose: (s, code, reason) => this.release(s, code, reason),
    });
    this.sessions.add(session);
    this.registry.register(deviceId, session);
    this.updateGauges();

    const receiving = this.receiveLoop(session);
    await this.sendSnapshot(session);
    await receiving;
  }

  /** Same cleanup path as a transport close; safe to call repeatedly. */
  onDisconnect(session: ObserverSession<R>, code = 1000, reason = 'closed'): void {
    session.close(code, reason);
  }

  /** Close every session, e.g. on shutdown. */
  closeAll(code = 1001, reason = 'server shutting down'): void {
    for (const s of Array.from(this.sessions)) s.close(code, reason);
  }

  get activeSessions(): number {
    return this.sessions.size;
  }

  private async sendSnapshot(session: ObserverSession<R>): Promise<void> {
    const { deviceId } = session;
    try {
      const readings = await withRetry(() => this.store.recent(deviceId, this.snapshotLimit), this.retry);
      if (session.isClosed) return;
      await session.start(this.encode({ type: 'snapshot', deviceId, readings }), readings);
      this.metrics?.inc('snapshots_sent');
    } catch (err) {
      if (session.isClosed) return;
      this.log.warn(`[lifecycle] snapshot for ${deviceId} failed: ${errorMessage(err)}`);
      session.close(1011, 'snapshot unavailable');
    }
  }

  private async receiveLoop(session: ObserverSession<R>): Promise<void> {
    for (;;) {
      let received: Received;
      try {
        received = await session.channel.receive();
      } catch (err) {
        session.close(1011, `receive failed: ${errorMessage(err)}`);
        return;
      }
      if (received.kind === 'closed') {
        session.close(received.code ?? 1000, received.reason ?? 'closed by observer');
        return;
      }
      switch (parseCommand(received.data)) {
        case 'unsubscribe':
          session.close(1000, 'unsubscribed');
          return;
        case 'ping':
          await session.sendControl(this.encode({ type: 'pong' })).catch((err: unknown) => {
            session.close(1011, `pong failed: ${errorMessage(err)}`);
          });
          break;
        default:
          break;
      }
      if (session.isClosed) return;
    }
  }

  private release(session: ObserverSession<R>, code: number, reason: string): void {
    this.registry.unregister(session.deviceId, session);
    this.sessions.delete(session);
    this.updateGauges();
    try {
      session.channel.close(code, reason);
    } catch (err) {
      this.log.warn(`[lifecycle] closing channel for ${session.deviceId} failed: ${errorMessage(err)}`);
    }
  }

  private updateGauges(): void {
    this.metrics?.set('observers_connected', this.registry.connectionCount);
    this.metrics?.set('devices_watched', this.registry.deviceCount);
  }
}
