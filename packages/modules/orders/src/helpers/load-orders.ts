import { eq, asc, inArray } from 'drizzle-orm';
import { orderItems } from '@barflow/db';
import type { Executor, OrderRow, OrderItemRow } from '@barflow/db';
import { serializeOrder } from './serialize-order';
import type { SerializedOrder } from './serialize-order';

/** An order as read for display, with the version needed to order live updates. */
export interface OrderView {
  version: number;
  order: SerializedOrder;
}

export async function loadOrderItems(tx: Executor, orderId: number): Promise<OrderItemRow[]> {
  return tx
    .select()
    .from(orderItems)
    .where(eq(orderItems.orderId, orderId))
    .orderBy(asc(orderItems.id));
}

/** Attaches items to a page of orders with one extra query. Keeps input order. */
export async function withItems(tx: Executor, rows: OrderRow[]): Promise<OrderView[]> {
  if (rows.length === 0) return [];

  const items = await tx
    .select()
    .from(orderItems)
    .where(inArray(orderItems.orderId, rows.map((r) => r.id)))
    .orderBy(asc(orderItems.id));

  const byOrder = new Map<number, OrderItemRow[]>();
  for (const item of items) {
    const list = byOrder.get(item.orderId) ?? [];
    list.push(item);
    byOrder.set(item.orderId, list);
  }

  return rows.map((row) => ({
    version: row.version,
    order: serializeOrder(row, byOrder.get(row.id) ?? []),
  }));
}
