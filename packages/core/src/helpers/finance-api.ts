import { eq } from 'drizzle-orm';
import { bars } from '@barflow/db';
import type { Executor } from '@barflow/db';
import { NotFoundError, basisPointsToRate } from '@barflow/shared';

// ── Interface ────────────────────────────────────────────────────

export interface FinanceApi {
  /** VAT for a bar as a decimal fraction (0.1 = 10%), applied on top of menu prices. */
  getVatRate(tx: Executor, barId: number): Promise<number>;
}

// ── Default Implementation ──────────────────────────────────────

class DrizzleFinanceApi implements FinanceApi {
  async getVatRate(tx: Executor, barId: number): Promise<number> {
    const [bar] = await tx
      .select({ vatRateBps: bars.vatRateBps })
      .from(bars)
      .where(eq(bars.id, barId))
      .limit(1);

    if (!bar) throw new NotFoundError('Bar', barId);
    return basisPointsToRate(bar.vatRateBps);
  }
}

// ── Singleton ───────────────────────────────────────────────────

let _financeApi: FinanceApi | null = null;

export function getFinanceApi(): FinanceApi {
  if (!_financeApi) {
    _financeApi = new DrizzleFinanceApi();
  }
  return _financeApi;
}

export function setFinanceApi(api: FinanceApi): void {
  _financeApi = api;
}
