import { eq, and } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { carts, barTables } from '@barflow/db';
import type { RequestContext } from '@barflow/core/auth/context';
import type { SelectCartTableInput } from '../validation';
import { EmptyCartError, InvalidTableError } from '../errors';
import { loadCart } from '../queries/get-cart';
import type { CartView } from '../queries/get-cart';

export async function selectCartTable(
  ctx: RequestContext,
  input: SelectCartTableInput,
): Promise<CartView> {
  const userId = ctx.actor.userId;

  return publishWithEvents('selectCartTable', async (tx) => {
    const [cart] = await tx.select().from(carts).where(eq(carts.userId, userId)).limit(1);
    if (!cart || cart.barId === null) throw new EmptyCartError();

    const [table] = await tx
      .select({ id: barTables.id })
      .from(barTables)
      .where(and(
        eq(barTables.id, input.tableId),
        eq(barTables.barId, cart.barId),
        eq(barTables.isActive, true),
      ))
      .limit(1);
    if (!table) throw new InvalidTableError(`Table ${input.tableId} does not belong to bar ${cart.barId}`);

    await tx
      .update(carts)
      .set({ tableId: table.id, updatedAt: new Date() })
      .where(eq(carts.userId, userId));

    return { result: await loadCart(tx, userId), events: [] };
  });
}
