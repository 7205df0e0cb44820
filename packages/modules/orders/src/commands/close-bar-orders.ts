import { eq, and, inArray, isNull } from 'drizzle-orm';
import { publishWithEvents } from '@barflow/core/events/publish-with-events';
import { logger, errorFields } from '@barflow/core/observability/logger';
import { db, guardedQuery, bars, orders, barClosings } from '@barflow/db';
import type { BarClosingRow } from '@barflow/db';
import { TERMINAL_ORDER_STATUSES } from '@barflow/shared';
import { isPastClosingTime } from '../helpers/opening-hours';
import { orderTotalCents } from '../helpers/serialize-order';

/**
 * Archives a bar's finished orders under a new closing. Returns null when
 * there is nothing to close. Live orders are left alone.
 */
export async function closeBarOrders(barId: number, now: Date = new Date()): Promise<BarClosingRow | null> {
  return publishWithEvents('closeBarOrders', async (tx) => {
    const finished = await tx
      .select({
        id: orders.id,
        status: orders.status,
        subtotalCents: orders.subtotalCents,
        vatTotalCents: orders.vatTotalCents,
      })
      .from(orders)
      .where(and(
        eq(orders.barId, barId),
        inArray(orders.status, [...TERMINAL_ORDER_STATUSES]),
        isNull(orders.closingId),
      ))
      .for('update');

    if (finished.length === 0) return { result: null, events: [] };

    const revenueCents = finished
      .filter((o) => o.status === 'COMPLETED')
      .reduce((sum, o) => sum + orderTotalCents(o), 0);

    const [closing] = await tx
      .insert(barClosings)
      .values({
        barId,
        closedAt: now,
        totalRevenueCents: revenueCents,
        orderCount: finished.length,
      })
      .returning();
    if (!closing) throw new Error('Bar closing insert returned no row');

    await tx
      .update(orders)
      .set({ closingId: closing.id })
      .where(inArray(orders.id, finished.map((o) => o.id)));

    return { result: closing, events: [] };
  });
}

export interface AutoCloseSummary {
  checked: number;
  closed: BarClosingRow[];
  failed: number[];
}

/**
 * Closes every bar whose closing time for today has passed in its own
 * timezone. A failure on one bar is logged and does not stop the others.
 */
export async function runAutoClose(
  now: Date = new Date(),
  defaultTimezone: string = 'UTC',
): Promise<AutoCloseSummary> {
  const candidates = await guardedQuery('runAutoClose', async () =>
    db
      .select({ id: bars.id, openingHours: bars.openingHours, timezone: bars.timezone })
      .from(bars)
      .where(eq(bars.isActive, true)),
  );

  const summary: AutoCloseSummary = { checked: candidates.length, closed: [], failed: [] };

  for (const bar of candidates) {
    try {
      if (!isPastClosingTime(bar.openingHours, bar.timezone ?? defaultTimezone, now)) continue;
      const closing = await closeBarOrders(bar.id, now);
      if (closing) {
        summary.closed.push(closing);
        logger.info('Bar closed', {
          barId: bar.id,
          closingId: closing.id,
          orderCount: closing.orderCount,
          totalRevenueCents: closing.totalRevenueCents,
        });
      }
    } catch (error) {
      summary.failed.push(bar.id);
      logger.error('Auto-close failed for bar', { barId: bar.id, error: errorFields(error) });
    }
  }

  return summary;
}
