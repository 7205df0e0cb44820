import { eq, and } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { buildEventFromContext } from '@barflow/core/events/build-event';
import { getWalletApi } from '@barflow/core/helpers/wallet-api';
import { logger } from '@barflow/core/observability/logger';
import { orders } from '@barflow/db';
import type { RequestContext } from '@barflow/core/auth/context';
import type { UpdateOrderStatusInput } from '../validation';
import { ORDER_EVENTS } from '../events/types';
import type { OrderEventData } from '../events/types';
import { OrderNotFoundError, InvalidTransitionError } from '../errors';
import { assertTransition, authorizeTransition, ENTERED_AT, refundOnCancel } from '../state-machine';
import { loadOrderItems } from '../helpers/load-orders';
import { orderTotalCents, serializeOrder } from '../helpers/serialize-order';
import type { SerializedOrder } from '../helpers/serialize-order';

type OrderPatch = Partial<typeof orders.$inferInsert>;

export async function updateOrderStatus(
  ctx: RequestContext,
  orderId: number,
  input: UpdateOrderStatusInput,
): Promise<SerializedOrder> {
  const result = await publishWithEvents('updateOrderStatus', async (tx) => {
    const [order] = await tx.select().from(orders).where(eq(orders.id, orderId)).limit(1);
    if (!order) throw new OrderNotFoundError(orderId);

    authorizeTransition(order, input.status, ctx.actor);
    assertTransition(order.id, order.status, input.status);

    const patch: OrderPatch = {
      status: input.status,
      version: order.version + 1,
    };
    const stamp = ENTERED_AT[input.status];
    if (stamp) patch[stamp] = new Date();

    const refundCents =
      input.status === 'CANCELED' ? refundOnCancel(order.paymentMethod, orderTotalCents(order)) : 0;
    if (refundCents > 0) patch.refundCents = refundCents;

    // Compare-and-set: only the request that still sees the loaded state wins.
    const [updated] = await tx
      .update(orders)
      .set(patch)
      .where(and(
        eq(orders.id, order.id),
        eq(orders.status, order.status),
        eq(orders.version, order.version),
      ))
      .returning();

    if (!updated) {
      const [current] = await tx
        .select({ status: orders.status })
        .from(orders)
        .where(eq(orders.id, order.id))
        .limit(1);
      throw new InvalidTransitionError(order.id, current?.status ?? order.status, input.status);
    }

    if (refundCents > 0 && updated.customerId !== null) {
      await getWalletApi().credit(tx, updated.customerId, refundCents);
    }

    const view = serializeOrder(updated, await loadOrderItems(tx, updated.id));
    const data: OrderEventData = {
      orderId: updated.id,
      barId: updated.barId,
      customerId: updated.customerId,
      status: updated.status,
      previousStatus: order.status,
      version: updated.version,
      order: view,
    };
    const event = buildEventFromContext(ctx, ORDER_EVENTS.ORDER_STATUS_CHANGED, updated.barId, data);

    return { result: view, events: [event] };
  });

  logger.info('Order status changed', {
    requestId: ctx.requestId,
    userId: ctx.actor.userId,
    barId: result.bar_id,
    orderId: result.id,
    status: result.status,
  });
  return result;
}
