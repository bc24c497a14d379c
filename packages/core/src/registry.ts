import type { DeviceId } from './types';

/**
 * Device → subscribers map. Entries exist only while non-empty.
 *
 * Every method runs to completion on the event loop, so mutations never interleave
 * with one another or with a `subscribersOf` snapshot.
 */
export class SubscriptionRegistry<C> {
  private readonly byDevice = new Map<DeviceId, Set<C>>();

  register(deviceId: DeviceId, conn: C): void {
    let set = this.byDevice.get(deviceId);
    if (!set) {
      set = new Set();
      this.byDevice.set(deviceId, set);
    }
    set.add(conn);
  }

  unregister(deviceId: DeviceId, conn: C): void {
    const set = this.byDevice.get(deviceId);
    if (!set) return;
    set.delete(conn);
    if (set.size === 0) this.byDevice.delete(deviceId);
  }

  /** Copy of the current subscribers; safe to iterate while the registry changes. */
  subscribersOf(deviceId: DeviceId): C[] {
    const set = this.byDevice.get(deviceId);
    return set ? Array.from(set) : [];
  }

  has(deviceId: DeviceId, conn: C): boolean {
    return this.byDevice.get(deviceId)?.has(conn) ?? false;
  }

  devices(): DeviceId[] {
    return Array.from(this.byDevice.keys());
  }

  get deviceCount(): number {
    return this.byDevice.size;
  }

  get connectionCount(): number {
    let total = 0;
    for (const set of this.byDevice.values()) total += set.size;
    return total;
  }
}
