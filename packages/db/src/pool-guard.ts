/**
 * Pool guard: DB concurrency limiter with per-operation timeouts.
 *
 * Turns bursts of concurrent requests into a bounded queue in front of the
 * postgres.js pool, and guarantees no caller waits on the database forever:
 * 1. Limits concurrent DB operations to the pool size
 * 2. Fails queued operations that cannot get a slot in time (QUEUE_TIMEOUT)
 * 3. Fails reads that run past the per-query limit (QUERY_TIMEOUT)
 *
 * Transactions only take a slot. Their time limit is enforced by Postgres
 * (`SET LOCAL statement_timeout` / `idle_in_transaction_session_timeout`),
 * so the caller always sees the real commit or rollback.
 *
 * Settings are read on first use, or set explicitly with `configurePoolGuard`.
 *
 * @module
 */

const SLOW_QUERY_THRESHOLD_MS = 2_000;

export interface PoolGuardSettings {
  concurrency: number;
  queryTimeoutMs: number;
  queueTimeoutMs: number;
}

export class PoolGuardError extends Error {
  constructor(
    public code: 'QUEUE_TIMEOUT' | 'QUERY_TIMEOUT',
    message: string,
  ) {
    super(message);
    this.name = 'PoolGuardError';
  }
}

interface QueueEntry {
  resolve: () => void;
  reject: (err: Error) => void;
  timer?: ReturnType<typeof setTimeout>;
}

class Semaphore {
  private queue: QueueEntry[] = [];
  private current = 0;

  constructor(private max: number) {}

  async acquire(timeoutMs: number): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }
    return new Promise<void>((resolve, reject) => {
      const entry: QueueEntry = { resolve, reject };
      entry.timer = setTimeout(() => {
        const idx = this.queue.indexOf(entry);
        if (idx >= 0) {
          this.queue.splice(idx, 1);
          reject(
            new PoolGuardError(
              'QUEUE_TIMEOUT',
              `[pool-guard] Queue timeout: waited ${timeoutMs}ms for DB slot ` +
                `(${this.current} active, ${this.queue.length} queued)`,
            ),
          );
        }
      }, timeoutMs);
      this.queue.push(entry);
    });
  }

  release(): void {
    this.current--;
    const next = this.queue.shift();
    if (next) {
      this.current++;
      if (next.timer) clearTimeout(next.timer);
      next.resolve();
    }
  }

  get pending() {
    return this.queue.length;
  }

  get active() {
    return this.current;
  }
}

interface GuardState {
  settings: PoolGuardSettings;
  semaphore: Semaphore;
}

let _state: GuardState | null = null;

function settingsFromEnv(): PoolGuardSettings {
  const poolMax = parseInt(process.env.DB_POOL_MAX || '10', 10);
  return {
    concurrency: parseInt(process.env.DB_CONCURRENCY || String(poolMax), 10),
    queryTimeoutMs: parseInt(process.env.DB_QUERY_TIMEOUT || '15000', 10),
    queueTimeoutMs: parseInt(process.env.DB_QUEUE_TIMEOUT || '5000', 10),
  };
}

function getState(): GuardState {
  if (!_state) {
    const settings = settingsFromEnv();
    _state = { settings, semaphore: new Semaphore(settings.concurrency) };
  }
  return _state;
}

/** Replaces the guard settings. Unset fields fall back to the environment. */
export function configurePoolGuard(overrides: Partial<PoolGuardSettings> = {}): void {
  if (_state && (_state.semaphore.active > 0 || _state.semaphore.pending > 0)) {
    throw new Error('[pool-guard] Cannot reconfigure while DB operations are in flight');
  }
  const settings = { ...settingsFromEnv(), ...overrides };
  _state = { settings, semaphore: new Semaphore(settings.concurrency) };
}

export function getPoolGuardSettings(): PoolGuardSettings {
  return { ...getState().settings };
}

function warnIfSlow(opName: string, start: number): void {
  const duration = Date.now() - start;
  if (duration > SLOW_QUERY_THRESHOLD_MS) {
    console.warn(`[pool-guard] Slow DB op: ${opName} took ${duration}ms`);
  }
}

/** Runs a read under the concurrency limit and the per-query timeout. */
export async function guardedQuery<T>(opName: string, fn: () => Promise<T>): Promise<T> {
  const { settings, semaphore } = getState();
  await semaphore.acquire(settings.queueTimeoutMs);
  const start = Date.now();
  let timeoutId: ReturnType<typeof setTimeout> | undefined;
  try {
    const result = await Promise.race([
      fn(),
      new Promise<never>((_, reject) => {
        timeoutId = setTimeout(() => {
          reject(
            new PoolGuardError(
              'QUERY_TIMEOUT',
              `[pool-guard] Query timeout: ${opName} exceeded ${settings.queryTimeoutMs}ms`,
            ),
          );
        }, settings.queryTimeoutMs);
      }),
    ]);
    warnIfSlow(opName, start);
    return result;
  } finally {
    if (timeoutId) clearTimeout(timeoutId);
    semaphore.release();
  }
}

/**
 * Runs a transaction under the concurrency limit, without a client-side
 * timeout: the result is whatever the database decided.
 */
export async function guardedTransaction<T>(opName: string, fn: () => Promise<T>): Promise<T> {
  const { settings, semaphore } = getState();
  await semaphore.acquire(settings.queueTimeoutMs);
  const start = Date.now();
  try {
    const result = await fn();
    warnIfSlow(opName, start);
    return result;
  } finally {
    semaphore.release();
  }
}

export function getPoolGuardStats() {
  const { settings, semaphore } = getState();
  return {
    active: semaphore.active,
    pending: semaphore.pending,
    concurrencyLimit: settings.concurrency,
    queryTimeoutMs: settings.queryTimeoutMs,
  };
}
