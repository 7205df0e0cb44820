import { eq } from 'drizzle-orm';
import { db, guardedQuery, orders } from '@barflow/db';
import { AuthorizationError } from '@barflow/shared';
import { isStaffOf } from '@barflow/core/auth/actor';
import type { RequestContext } from '@barflow/core/auth/context';
import { OrderNotFoundError } from '../errors';
import { loadOrderItems } from '../helpers/load-orders';
import { serializeOrder } from '../helpers/serialize-order';
import type { SerializedOrder } from '../helpers/serialize-order';

export async function getOrder(ctx: RequestContext, orderId: number): Promise<SerializedOrder> {
  return guardedQuery('getOrder', async () => {
    const [order] = await db.select().from(orders).where(eq(orders.id, orderId)).limit(1);
    if (!order) throw new OrderNotFoundError(orderId);

    const isOwner = order.customerId !== null && order.customerId === ctx.actor.userId;
    if (!isOwner && !isStaffOf(ctx.actor, order.barId)) {
      throw new AuthorizationError(`Not allowed to view order ${orderId}`);
    }

    return serializeOrder(order, await loadOrderItems(db, order.id));
  });
}
