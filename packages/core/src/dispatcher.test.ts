import { describe, it, expect, vi } from 'vitest';
import { FanoutDispatcher } from './dispatcher';
import { SubscriptionRegistry } from './registry';
import { ObserverSession } from './session';
import { FakeChannel, FakeStore, deferred, encodeJson, flush, type TestReading } from './testing/fakes';

function setup() {
  const registry = new SubscriptionRegistry<ObserverSession<TestReading>>();
  const store = new FakeStore();
  const log = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
  const inc = vi.fn();
  const dispatcher = new FanoutDispatcher(registry, store, {
    encode: encodeJson,
    log,
    metrics: { inc, set: vi.fn() },
  });
  return { registry, store, dispatcher, log, inc };
}

async function liveSession(registry: SubscriptionRegistry<ObserverSession<TestReading>>, deviceId = 'sensor-1') {
  const channel = new FakeChannel();
  const session: ObserverSession<TestReading> = new ObserverSession<TestReading>(deviceId, channel, {
    onClose: s => {
      registry.unregister(s.deviceId, s);
      channel.close();
    },
  });
  registry.register(deviceId, session);
  await session.start(encodeJson({ type: 'snapshot', deviceId, readings: [] }), []);
  return { session, channel };
}

describe('FanoutDispatcher', () => {
  it('queries the store but sends nothing when nobody listens', async () => {
    const { store, dispatcher } = setup();
    store.insert('sensor-1', '2024-01-01T00:00:00Z');
    await expect(dispatcher.onChange('sensor-1')).resolves.toBeUndefined();
    expect(store.latestCalls).toBe(1);
  });

  it('is a no-op when the device has no readings', async () => {
    const { registry, store, dispatcher } = setup();
    const { channel } = await liveSession(registry);
    await dispatcher.onChange('sensor-1');
    expect(store.latestCalls).toBe(1);
    expect(channel.sent).toHaveLength(1);
  });

  it('delivers the identical latest reading to every subscriber', async () => {
    const { registry, store, dispatcher, inc } = setup();
    const a = await liveSession(registry);
    const b = await liveSession(registry);
    const other = await liveSession(registry, 'sensor-2');
    const r = store.insert('sensor-1', '2024-01-01T00:00:00Z', 42);

    await dispatcher.onChange('sensor-1');

    const expected = { type: 'update', deviceId: 'sensor-1', reading: r };
    expect(a.channel.messages()[1]).toEqual(expected);
    expect(b.channel.messages()[1]).toEqual(expected);
    expect(a.channel.sent[1]).toBe(b.channel.sent[1]);
    expect(other.channel.sent).toHaveLength(1);
    expect(inc).toHaveBeenCalledWith('updates_sent');
  });

  it('isolates a failing subscriber and unregisters it', async () => {
    const { registry, store, dispatcher, inc } = setup();
    const a = await liveSession(registry);
    const b = await liveSession(registry);
    a.channel.failSends = true;
    const r = store.insert('sensor-1', '2024-01-01T00:00:00Z');

    await dispatcher.onChange('sensor-1');

    expect(b.channel.messages()[1]).toEqual({ type: 'update', deviceId: 'sensor-1', reading: r });
    expect(registry.subscribersOf('sensor-1')).toEqual([b.session]);
    expect(a.session.isClosed).toBe(true);
    expect(inc).toHaveBeenCalledWith('delivery_failures');
  });

  it('collapses duplicate events into a single update', async () => {
    const { registry, store, dispatcher } = setup();
    const a = await liveSession(registry);
    store.insert('sensor-1', '2024-01-01T00:00:00Z');
    await Promise.all([dispatcher.onChange('sensor-1'), dispatcher.onChange('sensor-1'), dispatcher.onChange('sensor-1')]);
    expect(a.channel.sent).toHaveLength(2);
  });

  it('keeps per-device order even when an earlier lookup resolves late', async () => {
    const { registry, store, dispatcher } = setup();
    const a = await liveSession(registry);
    const first = store.insert('sensor-1', '2024-01-01T00:00:01Z', 1);

    const slow = deferred();
    store.gate = () => slow.promise;
    const p1 = dispatcher.onChange('sensor-1');
    await flush();
    expect(store.latestCalls).toBe(1);
    store.gate = null;
    const second = store.insert('sensor-1', '2024-01-01T00:00:02Z', 2);
    const p2 = dispatcher.onChange('sensor-1');
    slow.resolve();
    await Promise.all([p1, p2]);

    const stamps = a.channel.messages().slice(1).map(m => m.reading?.id);
    expect(stamps).toEqual([first.id, second.id]);
  });

  it('does not deliver to a connection unregistered while the lookup was running', async () => {
    const { registry, store, dispatcher } = setup();
    const a = await liveSession(registry);
    store.insert('sensor-1', '2024-01-01T00:00:00Z');
    const slow = deferred();
    store.gate = () => slow.promise;
    const p = dispatcher.onChange('sensor-1');
    await flush();
    registry.unregister('sensor-1', a.session);
    slow.resolve();
    await p;
    expect(a.channel.sent).toHaveLength(1);
  });

  it('survives a store failure and serves the next event', async () => {
    const { registry, store, dispatcher, log } = setup();
    const a = await liveSession(registry);
    store.insert('sensor-1', '2024-01-01T00:00:00Z');
    store.failLatest = 1;
    await expect(dispatcher.onChange('sensor-1')).resolves.toBeUndefined();
    expect(log.warn).toHaveBeenCalledTimes(1);
    await dispatcher.onChange('sensor-1');
    expect(a.channel.sent).toHaveLength(2);
    expect(dispatcher.busyDevices).toBe(0);
  });

  it('never throws while subscribers come and go during dispatch', async () => {
    const { registry, store, dispatcher } = setup();
    const sessions = await Promise.all(Array.from({ length: 5 }, () => liveSession(registry)));
    const work: Promise<void>[] = [];
    for (let i = 0; i < 20; i++) {
      store.insert('sensor-1', new Date(Date.UTC(2024, 0, 1, 0, 0, i)).toISOString(), i);
      work.push(dispatcher.onChange('sensor-1'));
      const s = sessions[i % sessions.length];
      if (i % 3 === 0) s.session.close();
    }
    await expect(Promise.all(work)).resolves.toBeDefined();
    for (const s of sessions) {
      const ids = s.channel.messages().slice(1).map(m => m.reading?.id ?? 0);
      expect([...ids].sort((x, y) => x - y)).toEqual(ids);
    }
  });
});
