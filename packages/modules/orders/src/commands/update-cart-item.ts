import { eq, and } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { carts, cartItems } from '@barflow/db';
import type { RequestContext } from '@barflow/core/auth/context';
import type { UpdateCartItemInput } from '../validation';
import { CartItemNotFoundError } from '../errors';
import { loadCart } from '../queries/get-cart';
import type { CartView } from '../queries/get-cart';

/** Sets the quantity of one cart line. Zero or less removes it. */
export async function updateCartItem(
  ctx: RequestContext,
  menuItemId: number,
  input: UpdateCartItemInput,
): Promise<CartView> {
  const userId = ctx.actor.userId;
  const lineFilter = and(eq(cartItems.userId, userId), eq(cartItems.menuItemId, menuItemId));

  return publishWithEvents('updateCartItem', async (tx) => {
    if (input.qty <= 0) {
      const removed = await tx.delete(cartItems).where(lineFilter).returning({ id: cartItems.id });
      if (removed.length === 0) throw new CartItemNotFoundError(menuItemId);

      const remaining = await tx
        .select({ id: cartItems.id })
        .from(cartItems)
        .where(eq(cartItems.userId, userId))
        .limit(1);
      if (remaining.length === 0) {
        await tx
          .update(carts)
          .set({ barId: null, tableId: null, updatedAt: new Date() })
          .where(eq(carts.userId, userId));
      }
    } else {
      const updated = await tx
        .update(cartItems)
        .set({ qty: input.qty })
        .where(lineFilter)
        .returning({ id: cartItems.id });
      if (updated.length === 0) throw new CartItemNotFoundError(menuItemId);
    }

    return { result: await loadCart(tx, userId), events: [] };
  });
}
