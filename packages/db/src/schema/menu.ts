import { pgTable, serial, text, boolean, integer, index } from 'drizzle-orm/pg-core';
import { bars } from './core';

export const menuItems = pgTable(
  'menu_items',
  {
    id: serial('id').primaryKey(),
    barId: integer('bar_id')
      .notNull()
      .references(() => bars.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    description: text('description'),
    priceCents: integer('price_cents').notNull(),
    isActive: boolean('is_active').notNull().default(true),
    sortOrder: integer('sort_order').notNull().default(0),
  },
  (table) => [index('idx_menu_items_bar_active').on(table.barId, table.isActive)],
);
