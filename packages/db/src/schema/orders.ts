import {
  pgTable,
  serial,
  text,
  integer,
  timestamp,
  index,
  uniqueIndex,
  check,
} from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import type { OrderStatus, PaymentMethod } from '@barflow/shared';
import { users, bars, barTables } from './core';
import { menuItems } from './menu';

// ── Bar Closings ──────────────────────────────────────────────────
// One row per automatic (or manual) close; finished orders point at it.
export const barClosings = pgTable(
  'bar_closings',
  {
    id: serial('id').primaryKey(),
    barId: integer('bar_id')
      .notNull()
      .references(() => bars.id, { onDelete: 'cascade' }),
    closedAt: timestamp('closed_at', { withTimezone: true }).notNull(),
    totalRevenueCents: integer('total_revenue_cents').notNull().default(0),
    orderCount: integer('order_count').notNull().default(0),
  },
  (table) => [index('idx_bar_closings_bar_closed').on(table.barId, table.closedAt)],
);

// ── Orders ────────────────────────────────────────────────────────
export const orders = pgTable(
  'orders',
  {
    id: serial('id').primaryKey(),
    publicCode: text('public_code').notNull(),
    customerId: integer('customer_id').references(() => users.id, { onDelete: 'set null' }),
    barId: integer('bar_id')
      .notNull()
      .references(() => bars.id),
    tableId: integer('table_id').references(() => barTables.id, { onDelete: 'set null' }),
    status: text('status').$type<OrderStatus>().notNull().default('PLACED'),
    paymentMethod: text('payment_method').$type<PaymentMethod>().notNull(),
    subtotalCents: integer('subtotal_cents').notNull(),
    vatTotalCents: integer('vat_total_cents').notNull().default(0),
    refundCents: integer('refund_cents').notNull().default(0),
    notes: text('notes'),
    version: integer('version').notNull().default(1),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
    acceptedAt: timestamp('accepted_at', { withTimezone: true }),
    readyAt: timestamp('ready_at', { withTimezone: true }),
    completedAt: timestamp('completed_at', { withTimezone: true }),
    canceledAt: timestamp('canceled_at', { withTimezone: true }),
    closingId: integer('closing_id').references(() => barClosings.id, { onDelete: 'set null' }),
  },
  (table) => [
    uniqueIndex('uq_orders_public_code').on(table.publicCode),
    index('idx_orders_bar_live')
      .on(table.barId, table.createdAt)
      .where(sql`closing_id IS NULL`),
    index('idx_orders_customer_created').on(table.customerId, table.createdAt),
    check(
      'chk_orders_status',
      sql`${table.status} IN ('PLACED', 'ACCEPTED', 'READY', 'COMPLETED', 'CANCELED', 'REJECTED')`,
    ),
    check('chk_orders_payment_method', sql`${table.paymentMethod} IN ('card', 'wallet', 'pay_at_bar')`),
  ],
);

// ── Order Items ───────────────────────────────────────────────────
// Name and unit price are captured at order time so history survives menu edits.
export const orderItems = pgTable(
  'order_items',
  {
    id: serial('id').primaryKey(),
    orderId: integer('order_id')
      .notNull()
      .references(() => orders.id, { onDelete: 'cascade' }),
    menuItemId: integer('menu_item_id').references(() => menuItems.id, { onDelete: 'set null' }),
    qty: integer('qty').notNull(),
    unitPriceCents: integer('unit_price_cents').notNull(),
    menuItemName: text('menu_item_name'),
  },
  (table) => [
    index('idx_order_items_order').on(table.orderId),
    check('chk_order_items_qty', sql`${table.qty} > 0`),
  ],
);

export type OrderRow = typeof orders.$inferSelect;
export type OrderItemRow = typeof orderItems.$inferSelect;
export type BarClosingRow = typeof barClosings.$inferSelect;
