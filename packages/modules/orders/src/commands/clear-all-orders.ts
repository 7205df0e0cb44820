import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { isSuperAdmin } from '@barflow/core/auth/actor';
import { logger } from '@barflow/core/observability/logger';
import { orders, orderItems } from '@barflow/db';
import { AuthorizationError } from '@barflow/shared';
import type { RequestContext } from '@barflow/core/auth/context';

/** Removes every order and order item. Maintenance use only. */
export async function clearAllOrders(
  ctx: RequestContext,
): Promise<{ orders: number; items: number }> {
  if (!isSuperAdmin(ctx.actor)) {
    throw new AuthorizationError('Only super admins can clear orders');
  }

  const result = await publishWithEvents('clearAllOrders', async (tx) => {
    const items = await tx.delete(orderItems).returning({ id: orderItems.id });
    const removed = await tx.delete(orders).returning({ id: orders.id });
    return { result: { orders: removed.length, items: items.length }, events: [] };
  });

  logger.warn('All orders cleared', { requestId: ctx.requestId, userId: ctx.actor.userId, ...result });
  return result;
}
