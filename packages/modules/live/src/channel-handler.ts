import { logger, errorFields } from '@barflow/core/observability/logger';
import { orderMessage, SendTimeoutError } from './broadcaster';
import type { ChannelKey, ConnectionRegistry, LiveChannel, OrderUpdate } from './connection-registry';

/** Raw client connection. `send` resolves once the frame is handed to the socket. */
export interface Transport {
  send(text: string): Promise<void>;
  close(code: number, reason: string): void;
}

export interface SnapshotEntry {
  orderId: number;
  version: number;
  order: unknown;
}

/** Current orders for a key, used for the full sync on connect. */
export type SnapshotLoader = (key: ChannelKey) => Promise<SnapshotEntry[]>;

export interface LiveSessionOptions {
  idleTimeoutMs: number;
  /** Limit for each snapshot and catch-up send. */
  sendTimeoutMs: number;
  /** Updates held while syncing before the channel is given up. */
  maxPendingUpdates: number;
}

/**
 * One connected client. On open it registers first, so nothing committed
 * during the sync is missed, then sends the snapshot and finally releases the
 * updates that arrived meanwhile, minus those the snapshot already covers.
 * A sync send that stalls, or a backlog past `maxPendingUpdates`, closes the
 * channel with 1011.
 */
export class LiveSession implements LiveChannel {
  private pending: OrderUpdate[] | null = [];
  private idleTimer: ReturnType<typeof setTimeout> | undefined;
  private closed = false;

  constructor(
    readonly id: string,
    readonly key: ChannelKey,
    private readonly transport: Transport,
    private readonly registry: ConnectionRegistry,
    private readonly options: LiveSessionOptions,
  ) {}

  async open(loadSnapshot: SnapshotLoader): Promise<void> {
    this.registry.register(this.key, this);
    this.touch();
    logger.info('Live channel opened', { channelKey: this.key, channelId: this.id });

    try {
      const snapshot = await loadSnapshot(this.key);
      const synced = new Map<number, number>();
      for (const entry of snapshot) {
        if (this.closed) return;
        await this.sendWithTimeout(orderMessage(entry.order));
        synced.set(entry.orderId, entry.version);
      }

      const queue = this.pending ?? [];
      while (queue.length > 0 && !this.closed) {
        const update = queue.shift();
        if (!update) break;
        const seen = synced.get(update.orderId);
        if (seen !== undefined && update.version <= seen) continue;
        await this.sendWithTimeout(update.payload);
      }
      this.pending = null;
    } catch (error) {
      logger.warn('Live channel sync failed', {
        channelKey: this.key,
        channelId: this.id,
        error: errorFields(error),
      });
      this.close(1011, 'sync failed');
    }
  }

  async deliver(update: OrderUpdate): Promise<void> {
    if (this.closed) throw new Error(`Channel ${this.id} is closed`);
    if (this.pending) {
      if (this.pending.length >= this.options.maxPendingUpdates) {
        logger.warn('Live channel sync backlog exceeded', {
          channelKey: this.key,
          channelId: this.id,
          pending: this.pending.length,
        });
        this.close(1011, 'sync backlog exceeded');
        throw new Error(`Channel ${this.id} fell behind during sync`);
      }
      this.pending.push(update);
      return;
    }
    await this.transport.send(update.payload);
  }

  /** Any inbound frame counts as a keep-alive. */
  received(): void {
    if (!this.closed) this.touch();
  }

  /** The client went away (close or error). */
  disconnected(): void {
    if (this.closed) return;
    this.closed = true;
    this.pending = null;
    this.stopTimer();
    this.registry.unregister(this.key, this);
    logger.info('Live channel closed', { channelKey: this.key, channelId: this.id });
  }

  close(code: number, reason: string): void {
    if (this.closed) return;
    this.closed = true;
    this.pending = null;
    this.stopTimer();
    this.registry.unregister(this.key, this);
    this.transport.close(code, reason);
  }

  isClosed(): boolean {
    return this.closed;
  }

  private async sendWithTimeout(text: string): Promise<void> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        this.transport.send(text),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(
            () => reject(new SendTimeoutError(this.options.sendTimeoutMs)),
            this.options.sendTimeoutMs,
          );
        }),
      ]);
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }

  private touch(): void {
    this.stopTimer();
    this.idleTimer = setTimeout(() => {
      logger.info('Closing idle live channel', { channelKey: this.key, channelId: this.id });
      this.close(1001, 'idle timeout');
    }, this.options.idleTimeoutMs);
    this.idleTimer.unref();
  }

  private stopTimer(): void {
    if (this.idleTimer) clearTimeout(this.idleTimer);
    this.idleTimer = undefined;
  }
}
