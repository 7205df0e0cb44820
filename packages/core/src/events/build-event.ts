import { generateUlid } from '@barflow/shared';
import type { EventEnvelope } from '@barflow/shared';
import type { RequestContext } from '../auth/context';

interface BuildEventInput {
  eventType: string;
  barId?: number;
  actorUserId?: number;
  correlationId?: string;
  data: Record<string, unknown>;
  idempotencyKey?: string;
}

export function buildEvent(input: BuildEventInput): EventEnvelope {
  const eventId = generateUlid();
  return {
    eventId,
    eventType: input.eventType,
    occurredAt: new Date().toISOString(),
    barId: input.barId,
    actorUserId: input.actorUserId,
    correlationId: input.correlationId,
    idempotencyKey: input.idempotencyKey ?? `${input.eventType}:${eventId}`,
    data: input.data,
  };
}

export function buildEventFromContext(
  ctx: RequestContext,
  eventType: string,
  barId: number,
  data: Record<string, unknown>,
): EventEnvelope {
  return buildEvent({
    eventType,
    barId,
    actorUserId: ctx.actor.userId,
    correlationId: ctx.requestId,
    data,
  });
}
