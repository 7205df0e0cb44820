import { pgTable, serial, integer, timestamp, uniqueIndex, check } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import { users, bars, barTables } from './core';

// One cart per user. `bar_id` is null while the cart is empty.
export const carts = pgTable('carts', {
  userId: integer('user_id')
    .primaryKey()
    .references(() => users.id, { onDelete: 'cascade' }),
  barId: integer('bar_id').references(() => bars.id, { onDelete: 'set null' }),
  tableId: integer('table_id').references(() => barTables.id, { onDelete: 'set null' }),
  updatedAt: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
});

// menu_item_id is intentionally not cascaded: a deleted menu item leaves a
// stale line that checkout reports instead of silently dropping.
export const cartItems = pgTable(
  'cart_items',
  {
    id: serial('id').primaryKey(),
    userId: integer('user_id')
      .notNull()
      .references(() => carts.userId, { onDelete: 'cascade' }),
    menuItemId: integer('menu_item_id').notNull(),
    qty: integer('qty').notNull(),
    addedAt: timestamp('added_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    uniqueIndex('uq_cart_items_user_menu_item').on(table.userId, table.menuItemId),
    check('chk_cart_items_qty', sql`${table.qty} > 0`),
  ],
);
