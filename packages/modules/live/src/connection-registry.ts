/** Registry key of a live order feed: one per bar and one per customer. */
export type ChannelKey = `bar:${number}` | `user:${number}`;

export function barKey(barId: number): ChannelKey {
  return `bar:${barId}`;
}

export function userKey(userId: number): ChannelKey {
  return `user:${userId}`;
}

/** One order update as it travels to a channel. */
export interface OrderUpdate {
  orderId: number;
  version: number;
  /** Serialized `{ type: "order", order }` message. */
  payload: string;
}

/**
 * A subscriber that can receive order updates. `deliver` rejects when the
 * update could not be handed to the client.
 */
export interface LiveChannel {
  readonly id: string;
  deliver(update: OrderUpdate): Promise<void>;
  close(code: number, reason: string): void;
}

/**
 * In-memory map of live channels per key. Mutations run on the event loop
 * one at a time; readers always get a copy, so a channel may unregister
 * while a broadcast is iterating.
 */
export class ConnectionRegistry {
  private channels = new Map<ChannelKey, Set<LiveChannel>>();

  register(key: ChannelKey, channel: LiveChannel): void {
    const set = this.channels.get(key) ?? new Set<LiveChannel>();
    set.add(channel);
    this.channels.set(key, set);
  }

  /** Returns false when the channel was not registered under `key`. */
  unregister(key: ChannelKey, channel: LiveChannel): boolean {
    const set = this.channels.get(key);
    if (!set || !set.delete(channel)) return false;
    if (set.size === 0) this.channels.delete(key);
    return true;
  }

  channelsFor(key: ChannelKey): LiveChannel[] {
    return [...(this.channels.get(key) ?? [])];
  }

  keys(): ChannelKey[] {
    return [...this.channels.keys()];
  }

  /** Number of registered channels across all keys. */
  size(): number {
    let total = 0;
    for (const set of this.channels.values()) total += set.size;
    return total;
  }

  closeAll(code: number = 1001, reason: string = 'server shutting down'): void {
    const all = [...this.channels.values()].flatMap((set) => [...set]);
    this.channels.clear();
    for (const channel of all) {
      channel.close(code, reason);
    }
  }
}
