import { eq } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { carts, cartItems } from '@barflow/db';
import type { RequestContext } from '@barflow/core/auth/context';

export async function clearCart(ctx: RequestContext): Promise<{ removed: number }> {
  const userId = ctx.actor.userId;

  return publishWithEvents('clearCart', async (tx) => {
    const removed = await tx
      .delete(cartItems)
      .where(eq(cartItems.userId, userId))
      .returning({ id: cartItems.id });
    await tx
      .update(carts)
      .set({ barId: null, tableId: null, updatedAt: new Date() })
      .where(eq(carts.userId, userId));

    return { result: { removed: removed.length }, events: [] };
  });
}
