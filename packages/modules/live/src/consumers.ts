import { z } from 'zod';
import type { EventEnvelope } from '@barflow/shared';
import type { EventBus } from '@barflow/core/events/bus';
import { logger } from '@barflow/core/observability/logger';
import type { Broadcaster } from './broadcaster';

// Event types published by the orders module.
export const LIVE_ORDER_EVENT_TYPES = [
  'orders.order.placed.v1',
  'orders.order.status_changed.v1',
] as const;

const orderChangeSchema = z.object({
  orderId: z.number().int().positive(),
  barId: z.number().int().positive(),
  customerId: z.number().int().positive().nullable(),
  status: z.string(),
  version: z.number().int().positive(),
  order: z.record(z.unknown()),
});

export function handleOrderEvent(broadcaster: Broadcaster) {
  return async (event: EventEnvelope): Promise<void> => {
    const parsed = orderChangeSchema.safeParse(event.data);
    if (!parsed.success) {
      logger.warn('Ignoring order event without a broadcastable payload', {
        eventType: event.eventType,
        eventId: event.eventId,
      });
      return;
    }

    const result = await broadcaster.broadcastOrderUpdate(parsed.data);
    logger.debug('Order update broadcast', {
      orderId: parsed.data.orderId,
      barId: parsed.data.barId,
      eventType: event.eventType,
      ...result,
    });
  };
}

export function registerLiveConsumers(bus: EventBus, broadcaster: Broadcaster): void {
  const handler = handleOrderEvent(broadcaster);
  for (const eventType of LIVE_ORDER_EVENT_TYPES) {
    bus.subscribe(eventType, handler, `live.broadcast:${eventType}`);
  }
}
