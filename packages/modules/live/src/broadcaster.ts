import { isOrderStatus, isTerminalStatus } from '@barflow/shared';
import { logger, errorFields } from '@barflow/core/observability/logger';
import { barKey, userKey } from './connection-registry';
import type { ChannelKey, ConnectionRegistry, LiveChannel, OrderUpdate } from './connection-registry';

export interface OrderChange {
  orderId: number;
  barId: number;
  customerId: number | null;
  status: string;
  version: number;
  /** Wire representation of the order. */
  order: unknown;
}

export interface BroadcastResult {
  delivered: number;
  failed: number;
}

export interface BroadcasterOptions {
  sendTimeoutMs: number;
  /** Terminal orders remembered to reject late updates. Oldest are forgotten first. */
  maxFinishedOrders?: number;
}

const DEFAULT_MAX_FINISHED_ORDERS = 10_000;

export class SendTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Send timed out after ${timeoutMs}ms`);
    this.name = 'SendTimeoutError';
  }
}

export function orderMessage(order: unknown): string {
  return JSON.stringify({ type: 'order', order });
}

/**
 * Fans order changes out to the bar feed and the customer's own feed.
 *
 * Changes for one order are delivered in version order: anything at or below
 * the last version already broadcast is skipped, including after the order
 * reached a terminal status. A channel whose send fails
 * or times out is unregistered and closed; the rest still get the update.
 */
export class Broadcaster {
  private lastVersion = new Map<number, number>();
  // Final versions of terminal orders, oldest first.
  private finishedVersion = new Map<number, number>();

  constructor(
    private readonly registry: ConnectionRegistry,
    private readonly options: BroadcasterOptions,
  ) {}

  async broadcastOrderUpdate(change: OrderChange): Promise<BroadcastResult> {
    const last = this.lastVersion.get(change.orderId) ?? this.finishedVersion.get(change.orderId);
    if (last !== undefined && change.version <= last) {
      logger.debug('Skipping stale order update', {
        orderId: change.orderId,
        version: change.version,
        lastVersion: last,
      });
      return { delivered: 0, failed: 0 };
    }

    const update: OrderUpdate = {
      orderId: change.orderId,
      version: change.version,
      payload: orderMessage(change.order),
    };

    const keys: ChannelKey[] = [barKey(change.barId)];
    if (change.customerId !== null) keys.push(userKey(change.customerId));

    const targets = keys.flatMap((key) =>
      this.registry.channelsFor(key).map((channel) => ({ key, channel })),
    );

    if (isOrderStatus(change.status) && isTerminalStatus(change.status)) {
      this.lastVersion.delete(change.orderId);
      this.rememberFinished(change.orderId, change.version);
    } else {
      this.lastVersion.set(change.orderId, change.version);
    }

    const outcomes = await Promise.all(
      targets.map(({ key, channel }) => this.sendOne(key, channel, update)),
    );

    const delivered = outcomes.filter(Boolean).length;
    return { delivered, failed: outcomes.length - delivered };
  }

  /** Orders currently tracked for version ordering. */
  trackedOrders(): number {
    return this.lastVersion.size;
  }

  /** Terminal orders still remembered. */
  finishedOrders(): number {
    return this.finishedVersion.size;
  }

  private rememberFinished(orderId: number, version: number): void {
    const limit = this.options.maxFinishedOrders ?? DEFAULT_MAX_FINISHED_ORDERS;
    this.finishedVersion.delete(orderId);
    this.finishedVersion.set(orderId, version);
    while (this.finishedVersion.size > limit) {
      const oldest = this.finishedVersion.keys().next();
      if (oldest.done) break;
      this.finishedVersion.delete(oldest.value);
    }
  }

  private async sendOne(key: ChannelKey, channel: LiveChannel, update: OrderUpdate): Promise<boolean> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        channel.deliver(update),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(
            () => reject(new SendTimeoutError(this.options.sendTimeoutMs)),
            this.options.sendTimeoutMs,
          );
        }),
      ]);
      return true;
    } catch (error) {
      logger.warn('Dropping live channel after failed send', {
        channelKey: key,
        channelId: channel.id,
        orderId: update.orderId,
        error: errorFields(error),
      });
      this.registry.unregister(key, channel);
      channel.close(1011, 'delivery failed');
      return false;
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }
}
