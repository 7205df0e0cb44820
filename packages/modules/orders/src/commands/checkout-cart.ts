import { eq, and, asc, inArray } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { buildEventFromContext } from '@barflow/core/events/build-event';
import { getFinanceApi } from '@barflow/core/helpers/finance-api';
import { getWalletApi } from '@barflow/core/helpers/wallet-api';
import { logger } from '@barflow/core/observability/logger';
import { carts, cartItems, bars, barTables, menuItems, orders, orderItems } from '@barflow/db';
import { NotFoundError, applyRate, multiplyMoney, generatePublicCode } from '@barflow/shared';
import type { RequestContext } from '@barflow/core/auth/context';
import type { CheckoutCartInput } from '../validation';
import { ORDER_EVENTS } from '../events/types';
import type { OrderEventData } from '../events/types';
import {
  EmptyCartError,
  InvalidTableError,
  OrderingPausedError,
  StaleCartItemError,
} from '../errors';
import { serializeOrder } from '../helpers/serialize-order';
import type { SerializedOrder } from '../helpers/serialize-order';

interface PricedLine {
  menuItemId: number;
  qty: number;
  unitPriceCents: number;
  menuItemName: string;
}

/**
 * Turns the caller's cart into a PLACED order.
 *
 * Everything happens in one transaction: the cart row is locked, prices are
 * read from the live menu, the wallet is debited for wallet payments, the
 * order and its items are inserted and the cart is emptied. Any failure
 * leaves both the cart and the order tables as they were.
 */
export async function checkoutCart(
  ctx: RequestContext,
  input: CheckoutCartInput,
): Promise<SerializedOrder> {
  const userId = ctx.actor.userId;

  const result = await publishWithEvents('checkoutCart', async (tx) => {
    // Serializes concurrent checkouts of the same cart; the loser finds it empty.
    const [cart] = await tx.select().from(carts).where(eq(carts.userId, userId)).for('update');
    const lines = cart
      ? await tx
          .select()
          .from(cartItems)
          .where(eq(cartItems.userId, userId))
          .orderBy(asc(cartItems.id))
      : [];
    if (!cart || cart.barId === null || lines.length === 0) throw new EmptyCartError();
    const barId = cart.barId;

    const [bar] = await tx
      .select({ id: bars.id, orderingPaused: bars.orderingPaused })
      .from(bars)
      .where(eq(bars.id, barId))
      .limit(1);
    if (!bar) throw new NotFoundError('Bar', barId);
    if (bar.orderingPaused) throw new OrderingPausedError(barId);

    const tableId = input.tableId ?? cart.tableId;
    if (tableId === null) throw new InvalidTableError('Select a table before checking out');
    const [table] = await tx
      .select({ id: barTables.id })
      .from(barTables)
      .where(and(eq(barTables.id, tableId), eq(barTables.barId, barId), eq(barTables.isActive, true)))
      .limit(1);
    if (!table) throw new InvalidTableError(`Table ${tableId} does not belong to bar ${barId}`);

    const menu = await tx
      .select({ id: menuItems.id, name: menuItems.name, priceCents: menuItems.priceCents })
      .from(menuItems)
      .where(and(
        inArray(menuItems.id, lines.map((l) => l.menuItemId)),
        eq(menuItems.barId, barId),
        eq(menuItems.isActive, true),
      ));
    const menuById = new Map(menu.map((m) => [m.id, m]));

    const priced: PricedLine[] = [];
    const stale: number[] = [];
    for (const line of lines) {
      const item = menuById.get(line.menuItemId);
      if (!item) {
        stale.push(line.menuItemId);
        continue;
      }
      priced.push({
        menuItemId: item.id,
        qty: line.qty,
        unitPriceCents: item.priceCents,
        menuItemName: item.name,
      });
    }
    if (stale.length > 0) throw new StaleCartItemError(stale);

    const subtotalCents = priced.reduce((sum, l) => sum + multiplyMoney(l.unitPriceCents, l.qty), 0);
    const vatRate = await getFinanceApi().getVatRate(tx, barId);
    const vatTotalCents = applyRate(subtotalCents, vatRate);

    if (input.paymentMethod === 'wallet') {
      await getWalletApi().debit(tx, userId, subtotalCents + vatTotalCents);
    }

    const [order] = await tx
      .insert(orders)
      .values({
        publicCode: generatePublicCode(),
        customerId: userId,
        barId,
        tableId,
        status: 'PLACED',
        paymentMethod: input.paymentMethod,
        subtotalCents,
        vatTotalCents,
        notes: input.notes || null,
      })
      .returning();
    if (!order) throw new Error('Order insert returned no row');

    const items = await tx
      .insert(orderItems)
      .values(priced.map((l) => ({ orderId: order.id, ...l })))
      .returning();

    await tx.delete(cartItems).where(eq(cartItems.userId, userId));
    await tx
      .update(carts)
      .set({ barId: null, tableId: null, updatedAt: new Date() })
      .where(eq(carts.userId, userId));

    const view = serializeOrder(order, items);
    const data: OrderEventData = {
      orderId: order.id,
      barId,
      customerId: userId,
      status: order.status,
      previousStatus: null,
      version: order.version,
      order: view,
    };
    const event = buildEventFromContext(ctx, ORDER_EVENTS.ORDER_PLACED, barId, data);

    return { result: view, events: [event] };
  });

  logger.info('Order placed', {
    requestId: ctx.requestId,
    userId,
    barId: result.bar_id,
    orderId: result.id,
    total: result.total,
  });
  return result;
}
