export type {
  DeviceId,
  Reading,
  ReadingStore,
  Received,
  ObserverChannel,
  ChangeFeed,
  ObserverMessage,
  MessageEncoder,
  LogSink,
  MetricsSink,
} from './types';
export { SubscriptionRegistry } from './registry';
export { ObserverSession, compareReadings } from './session';
export type { SessionState, SessionOptions } from './session';
export { FanoutDispatcher } from './dispatcher';
export type { DispatcherOptions } from './dispatcher';
export { ConnectionLifecycle, parseCommand } from './lifecycle';
export type { LifecycleOptions, ObserverCommand } from './lifecycle';
export { ChangeNotifier } from './notifier';
export type { NotifierOptions, NotifierState } from './notifier';
export { AsyncQueue } from './async-queue';
export { MemoryChangeFeed } from './memory-feed';
export { withRetry, backoffDelay, sleep } from './retry';
export type { RetryOptions } from './retry';
export { StoreUnavailableError, DeliveryError, errorMessage } from './errors';
