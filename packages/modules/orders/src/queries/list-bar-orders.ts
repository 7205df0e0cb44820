import { eq, and, desc, isNull, notInArray } from 'drizzle-orm';
import { db, guardedQuery, orders } from '@barflow/db';
import { AuthorizationError, TERMINAL_ORDER_STATUSES } from '@barflow/shared';
import { isStaffOf } from '@barflow/core/auth/actor';
import type { RequestContext } from '@barflow/core/auth/context';
import { listBarOrdersSchema } from '../validation';
import type { ListBarOrdersInput } from '../validation';
import { withItems } from '../helpers/load-orders';
import type { OrderView } from '../helpers/load-orders';
import type { SerializedOrder } from '../helpers/serialize-order';

export type BarOrderScope = 'current' | 'open';

/**
 * `current` is what a bartender still has to act on (non-terminal orders);
 * `open` adds finished orders not yet archived by a closing. Newest first.
 */
export async function fetchBarOrders(barId: number, scope: BarOrderScope): Promise<OrderView[]> {
  return guardedQuery('fetchBarOrders', async () => {
    const conditions = [eq(orders.barId, barId), isNull(orders.closingId)];
    if (scope === 'current') {
      conditions.push(notInArray(orders.status, [...TERMINAL_ORDER_STATUSES]));
    }

    const rows = await db
      .select()
      .from(orders)
      .where(and(...conditions))
      .orderBy(desc(orders.createdAt), desc(orders.id));

    return withItems(db, rows);
  });
}

export async function listBarOrders(
  ctx: RequestContext,
  barId: number,
  input: ListBarOrdersInput = {},
): Promise<SerializedOrder[]> {
  if (!isStaffOf(ctx.actor, barId)) {
    throw new AuthorizationError(`Not staff of bar ${barId}`);
  }
  const { scope } = listBarOrdersSchema.parse(input);
  const views = await fetchBarOrders(barId, scope);
  return views.map((v) => v.order);
}
