import { eq, and, gte, sql } from 'drizzle-orm';
import { users } from '@barflow/db';
import type { Executor } from '@barflow/db';
import { InsufficientCreditError, NotFoundError } from '@barflow/shared';

// ── Interface ────────────────────────────────────────────────────

/**
 * Customer wallet (prepaid credit). Both calls must run inside the caller's
 * transaction so the balance moves together with the order it pays for.
 */
export interface WalletApi {
  /** Adds `cents` to the balance and returns the new balance. */
  credit(tx: Executor, userId: number, cents: number): Promise<number>;
  /** Removes `cents`, failing with InsufficientCreditError when the balance is short. */
  debit(tx: Executor, userId: number, cents: number): Promise<number>;
}

// ── Default Implementation ──────────────────────────────────────

class DrizzleWalletApi implements WalletApi {
  async credit(tx: Executor, userId: number, cents: number): Promise<number> {
    const [row] = await tx
      .update(users)
      .set({ creditCents: sql`${users.creditCents} + ${cents}` })
      .where(eq(users.id, userId))
      .returning({ creditCents: users.creditCents });

    if (!row) throw new NotFoundError('User', userId);
    return row.creditCents;
  }

  async debit(tx: Executor, userId: number, cents: number): Promise<number> {
    // Guarded decrement: the balance check and the write are one statement.
    const [row] = await tx
      .update(users)
      .set({ creditCents: sql`${users.creditCents} - ${cents}` })
      .where(and(eq(users.id, userId), gte(users.creditCents, cents)))
      .returning({ creditCents: users.creditCents });

    if (!row) throw new InsufficientCreditError(userId, cents);
    return row.creditCents;
  }
}

// ── Singleton ───────────────────────────────────────────────────

let _walletApi: WalletApi | null = null;

export function getWalletApi(): WalletApi {
  if (!_walletApi) {
    _walletApi = new DrizzleWalletApi();
  }
  return _walletApi;
}

export function setWalletApi(api: WalletApi): void {
  _walletApi = api;
}
