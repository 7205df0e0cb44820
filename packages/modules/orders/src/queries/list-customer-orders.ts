import { eq, and, desc, isNull, notInArray } from 'drizzle-orm';
import { db, guardedQuery, orders } from '@barflow/db';
import { isTerminalStatus, TERMINAL_ORDER_STATUSES } from '@barflow/shared';
import type { RequestContext } from '@barflow/core/auth/context';
import { withItems } from '../helpers/load-orders';
import type { OrderView } from '../helpers/load-orders';
import type { SerializedOrder } from '../helpers/serialize-order';

export interface CustomerOrderHistory {
  pending: SerializedOrder[];
  completed: SerializedOrder[];
}

export async function listCustomerOrders(ctx: RequestContext): Promise<CustomerOrderHistory> {
  const userId = ctx.actor.userId;
  const views = await guardedQuery('listCustomerOrders', async () => {
    const rows = await db
      .select()
      .from(orders)
      .where(eq(orders.customerId, userId))
      .orderBy(desc(orders.createdAt), desc(orders.id));
    return withItems(db, rows);
  });

  const history: CustomerOrderHistory = { pending: [], completed: [] };
  for (const { order } of views) {
    (isTerminalStatus(order.status) ? history.completed : history.pending).push(order);
  }
  return history;
}

/** A customer's orders still in progress, used to sync their live channel. */
export async function fetchCustomerCurrentOrders(userId: number): Promise<OrderView[]> {
  return guardedQuery('fetchCustomerCurrentOrders', async () => {
    const rows = await db
      .select()
      .from(orders)
      .where(and(
        eq(orders.customerId, userId),
        isNull(orders.closingId),
        notInArray(orders.status, [...TERMINAL_ORDER_STATUSES]),
      ))
      .orderBy(desc(orders.createdAt), desc(orders.id));
    return withItems(db, rows);
  });
}
