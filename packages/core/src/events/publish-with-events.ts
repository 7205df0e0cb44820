import type { EventEnvelope } from '@barflow/shared';
import { AppError, PersistenceFailureError } from '@barflow/shared';
import { db, sql, guardedTransaction, getPoolGuardSettings } from '@barflow/db';
import type { Transaction } from '@barflow/db';
import { getEventBus } from './index';

/**
 * Runs `operation` as one database transaction and, once it has committed,
 * hands the events it returned to the bus in order.
 *
 * Postgres bounds the unit with `statement_timeout` and
 * `idle_in_transaction_session_timeout`; the caller waits for the real
 * commit or rollback, so a reported failure never hides a committed write.
 *
 * Anything the operation throws rolls the transaction back. Domain errors
 * (AppError) pass through untouched; driver and connection failures surface
 * as PersistenceFailureError. Events are never published for a rolled-back
 * unit, and a failing consumer never fails the caller.
 */
export async function publishWithEvents<T>(
  operationName: string,
  operation: (tx: Transaction) => Promise<{
    result: T;
    events: EventEnvelope[];
  }>,
): Promise<T> {
  const timeoutMs = sql.raw(String(getPoolGuardSettings().queryTimeoutMs));
  let outcome: { result: T; events: EventEnvelope[] };
  try {
    outcome = await guardedTransaction(operationName, () =>
      db.transaction(async (tx) => {
        await tx.execute(sql`SET LOCAL statement_timeout = ${timeoutMs}`);
        await tx.execute(sql`SET LOCAL idle_in_transaction_session_timeout = ${timeoutMs}`);
        return operation(tx);
      }),
    );
  } catch (error) {
    if (error instanceof AppError) throw error;
    throw new PersistenceFailureError(operationName, error);
  }

  const bus = getEventBus();
  for (const event of outcome.events) {
    await bus.publish(event);
  }

  return outcome.result;
}
