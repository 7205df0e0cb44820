import { eq, and, sql } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { carts, cartItems, bars, menuItems } from '@barflow/db';
import type { RequestContext } from '@barflow/core/auth/context';
import { addToCartSchema } from '../validation';
import type { AddToCartInput } from '../validation';
import { CartBarMismatchError, MenuItemNotFoundError, OrderingPausedError } from '../errors';
import { loadCart } from '../queries/get-cart';
import type { CartView } from '../queries/get-cart';

export async function addToCart(ctx: RequestContext, input: AddToCartInput): Promise<CartView> {
  const { menuItemId, qty, replaceExisting } = addToCartSchema.parse(input);
  const userId = ctx.actor.userId;

  return publishWithEvents('addToCart', async (tx) => {
    const [item] = await tx
      .select({ id: menuItems.id, barId: menuItems.barId })
      .from(menuItems)
      .where(and(eq(menuItems.id, menuItemId), eq(menuItems.isActive, true)))
      .limit(1);
    if (!item) throw new MenuItemNotFoundError(menuItemId);

    const [bar] = await tx
      .select({ orderingPaused: bars.orderingPaused })
      .from(bars)
      .where(eq(bars.id, item.barId))
      .limit(1);
    if (!bar) throw new MenuItemNotFoundError(menuItemId);
    if (bar.orderingPaused) throw new OrderingPausedError(item.barId);

    const [cart] = await tx.select().from(carts).where(eq(carts.userId, userId)).for('update');

    let tableId = cart?.tableId ?? null;
    if (cart && cart.barId !== null && cart.barId !== item.barId) {
      if (!replaceExisting) throw new CartBarMismatchError(cart.barId, item.barId);
      await tx.delete(cartItems).where(eq(cartItems.userId, userId));
      tableId = null;
    }

    const now = new Date();
    await tx
      .insert(carts)
      .values({ userId, barId: item.barId, tableId, updatedAt: now })
      .onConflictDoUpdate({
        target: carts.userId,
        set: { barId: item.barId, tableId, updatedAt: now },
      });

    await tx
      .insert(cartItems)
      .values({ userId, menuItemId, qty })
      .onConflictDoUpdate({
        target: [cartItems.userId, cartItems.menuItemId],
        set: { qty: sql`${cartItems.qty} + ${qty}` },
      });

    return { result: await loadCart(tx, userId), events: [] };
  });
}
