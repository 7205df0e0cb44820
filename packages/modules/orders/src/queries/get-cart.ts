import { eq, asc } from 'drizzle-orm';
import { db, guardedQuery, carts, cartItems, menuItems } from '@barflow/db';
import type { Executor } from '@barflow/db';
import { multiplyMoney, toDecimal } from '@barflow/shared';
import type { RequestContext } from '@barflow/core/auth/context';

export interface CartLine {
  menu_item_id: number;
  name: string | null;
  qty: number;
  unit_price: number | null;
  line_total: number | null;
  /** False once the menu item is gone or inactive; checkout will refuse the cart. */
  available: boolean;
}

export interface CartView {
  bar_id: number | null;
  table_id: number | null;
  items: CartLine[];
  subtotal: number;
}

export async function loadCart(tx: Executor, userId: number): Promise<CartView> {
  const [cart] = await tx.select().from(carts).where(eq(carts.userId, userId)).limit(1);
  if (!cart) return { bar_id: null, table_id: null, items: [], subtotal: 0 };

  const rows = await tx
    .select({
      menuItemId: cartItems.menuItemId,
      qty: cartItems.qty,
      name: menuItems.name,
      priceCents: menuItems.priceCents,
      isActive: menuItems.isActive,
      itemBarId: menuItems.barId,
    })
    .from(cartItems)
    .leftJoin(menuItems, eq(menuItems.id, cartItems.menuItemId))
    .where(eq(cartItems.userId, userId))
    .orderBy(asc(cartItems.id));

  let subtotalCents = 0;
  const items = rows.map((row): CartLine => {
    const available = row.isActive === true && row.itemBarId === cart.barId;
    const lineCents = row.priceCents === null ? null : multiplyMoney(row.priceCents, row.qty);
    if (available && lineCents !== null) subtotalCents += lineCents;
    return {
      menu_item_id: row.menuItemId,
      name: row.name,
      qty: row.qty,
      unit_price: row.priceCents === null ? null : toDecimal(row.priceCents),
      line_total: lineCents === null ? null : toDecimal(lineCents),
      available,
    };
  });

  return {
    bar_id: cart.barId,
    table_id: cart.tableId,
    items,
    subtotal: toDecimal(subtotalCents),
  };
}

export async function getCart(ctx: RequestContext): Promise<CartView> {
  return guardedQuery('getCart', () => loadCart(db, ctx.actor.userId));
}
