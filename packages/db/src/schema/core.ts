import {
  pgTable,
  serial,
  text,
  boolean,
  timestamp,
  integer,
  jsonb,
  index,
  uniqueIndex,
} from 'drizzle-orm/pg-core';

// ── Users ─────────────────────────────────────────────────────────
// Owned by the auth/session layer. The ordering core reads `role` and
// moves `credit_cents` (wallet balance) on checkout and refunds.
export const users = pgTable(
  'users',
  {
    id: serial('id').primaryKey(),
    email: text('email').notNull(),
    displayName: text('display_name').notNull(),
    phone: text('phone'),
    role: text('role').notNull().default('customer'),
    creditCents: integer('credit_cents').notNull().default(0),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_users_email').on(table.email)],
);

// ── Bars ──────────────────────────────────────────────────────────
export const bars = pgTable(
  'bars',
  {
    id: serial('id').primaryKey(),
    name: text('name').notNull(),
    slug: text('slug').notNull(),
    // VAT in basis points (810 = 8.1%), applied on top of menu prices.
    vatRateBps: integer('vat_rate_bps').notNull().default(0),
    orderingPaused: boolean('ordering_paused').notNull().default(false),
    // { "0": { "open": "17:00", "close": "02:00" }, ... } with Monday = "0"
    openingHours: jsonb('opening_hours').$type<Record<string, { open?: string; close?: string }>>(),
    timezone: text('timezone'),
    isActive: boolean('is_active').notNull().default(true),
    createdAt: timestamp('created_at', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [uniqueIndex('uq_bars_slug').on(table.slug)],
);

export const barTables = pgTable(
  'bar_tables',
  {
    id: serial('id').primaryKey(),
    barId: integer('bar_id')
      .notNull()
      .references(() => bars.id, { onDelete: 'cascade' }),
    name: text('name').notNull(),
    isActive: boolean('is_active').notNull().default(true),
  },
  (table) => [index('idx_bar_tables_bar').on(table.barId)],
);
