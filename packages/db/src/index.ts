export { db, closeDb, configureDatabase, sql, schema } from './client';
export type { Database, Transaction, Executor, DatabaseSettings } from './client';
export {
  guardedQuery,
  guardedTransaction,
  configurePoolGuard,
  getPoolGuardSettings,
  getPoolGuardStats,
  PoolGuardError,
} from './pool-guard';
export type { PoolGuardSettings } from './pool-guard';
export * from './schema';
