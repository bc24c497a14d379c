import { describe, it, expect } from 'vitest';
import {
  ChangeNotifier,
  ConnectionLifecycle,
  FanoutDispatcher,
  MemoryChangeFeed,
  SubscriptionRegistry,
  type ObserverSession,
} from './index';
import { FakeChannel, FakeStore, encodeJson, flush, quietLog, type TestReading } from './testing/fakes';

describe('live update pipeline', () => {
  it('snapshot → change event → update, through the public exports', async () => {
    const registry = new SubscriptionRegistry<ObserverSession<TestReading>>();
    const store = new FakeStore();
    const log = quietLog();
    const lifecycle = new ConnectionLifecycle(registry, store, { encode: encodeJson, log });
    const dispatcher = new FanoutDispatcher(registry, store, { encode: encodeJson, log });
    const feed = new MemoryChangeFeed();
    const notifier = new ChangeNotifier(feed, id => dispatcher.onChange(id), { log });
    notifier.start();
    await flush();

    store.insert('sensor-1', '2024-01-01T00:00:00Z', 1);
    const channel = new FakeChannel();
    const served = lifecycle.onConnect('sensor-1', channel);
    await flush();

    store.insert('sensor-1', '2024-01-01T00:00:05Z', 2);
    feed.publish('sensor-1');
    await flush();

    expect(channel.messages().map(m => m.type)).toEqual(['snapshot', 'update']);
    expect(channel.messages()[0].readings?.map(r => r.value)).toEqual([1]);
    expect(channel.messages()[1].reading?.value).toBe(2);

    channel.hangUp();
    await served;
    expect(registry.deviceCount).toBe(0);
    await notifier.stop();
  });
});
