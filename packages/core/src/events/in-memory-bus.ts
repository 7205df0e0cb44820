import { EventEnvelopeSchema } from '@barflow/shared';
import type { EventEnvelope } from '@barflow/shared';
import { logger, errorFields } from '../observability/logger';
import type { EventBus, EventHandler } from './bus';

interface NamedHandler {
  handler: EventHandler;
  consumerName: string;
}

export interface DeadLetter {
  event: EventEnvelope;
  consumerName: string;
  error: Error;
  failedAt: string;
}

const DEFAULT_HANDLER_TIMEOUT_MS = 10_000;
const MAX_DEAD_LETTERS = 500;

/**
 * Single-process bus. Handlers for one event run one after another in
 * subscription order, and `publish` resolves only after all of them have
 * settled, so two events published in sequence reach every consumer in that
 * sequence. A failing handler is logged and dead-lettered; it never fails
 * the publisher.
 */
export class InMemoryEventBus implements EventBus {
  private handlers = new Map<string, NamedHandler[]>();
  private deadLetterQueue: DeadLetter[] = [];
  private running = false;

  constructor(private readonly handlerTimeoutMs: number = DEFAULT_HANDLER_TIMEOUT_MS) {}

  subscribe(eventType: string, handler: EventHandler, consumerName?: string): void {
    const existing = this.handlers.get(eventType) || [];
    const name = consumerName ?? `${eventType}:handler_${existing.length}`;
    existing.push({ handler, consumerName: name });
    this.handlers.set(eventType, existing);
  }

  async publish(event: EventEnvelope): Promise<void> {
    EventEnvelopeSchema.parse(event);

    if (!this.running) {
      logger.debug('Event dropped, bus not running', { eventType: event.eventType, eventId: event.eventId });
      return;
    }

    const handlers = [...(this.handlers.get(event.eventType) || [])];
    for (const { handler, consumerName } of handlers) {
      await this.dispatch(event, handler, consumerName);
    }
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
  }

  isRunning(): boolean {
    return this.running;
  }

  getDeadLetterQueue(): DeadLetter[] {
    return [...this.deadLetterQueue];
  }

  clearDeadLetterQueue(): void {
    this.deadLetterQueue = [];
  }

  private async dispatch(
    event: EventEnvelope,
    handler: EventHandler,
    consumerName: string,
  ): Promise<void> {
    let timeoutId: ReturnType<typeof setTimeout> | undefined;
    try {
      await Promise.race([
        handler(event),
        new Promise<never>((_, reject) => {
          timeoutId = setTimeout(
            () => reject(new Error(`Handler timeout after ${this.handlerTimeoutMs}ms`)),
            this.handlerTimeoutMs,
          );
        }),
      ]);
    } catch (error) {
      const err = error instanceof Error ? error : new Error(String(error));
      logger.error('Event handler failed', {
        eventType: event.eventType,
        eventId: event.eventId,
        consumerName,
        error: errorFields(err),
      });
      this.deadLetterQueue.push({ event, consumerName, error: err, failedAt: new Date().toISOString() });
      if (this.deadLetterQueue.length > MAX_DEAD_LETTERS) {
        this.deadLetterQueue.shift();
      }
    } finally {
      if (timeoutId) clearTimeout(timeoutId);
    }
  }
}
