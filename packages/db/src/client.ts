import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsQueryResultHKT } from 'drizzle-orm/postgres-js';
import type { PgDatabase } from 'drizzle-orm/pg-core';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

type DrizzleDB = ReturnType<typeof drizzle<typeof schema>>;

export interface DatabaseSettings {
  url: string;
  poolSize: number;
}

let _client: postgres.Sql | null = null;
let _db: DrizzleDB | null = null;
let _settings: DatabaseSettings | null = null;

/** Sets the connection used on first access. Without it the environment is read. */
export function configureDatabase(settings: DatabaseSettings): void {
  if (_client) {
    throw new Error('Database is already connected; configure it before first use');
  }
  _settings = settings;
}

function getDb(): DrizzleDB {
  if (!_db) {
    const connectionString = _settings?.url ?? process.env.DATABASE_URL;
    if (!connectionString) {
      throw new Error('DATABASE_URL environment variable is required');
    }
    // Long-lived single process: the pool is shared by HTTP handlers, live
    // channel syncs and the auto-close job.
    _client = postgres(connectionString, {
      max: _settings?.poolSize ?? parseInt(process.env.DB_POOL_MAX || '10', 10),
      idle_timeout: 20,
      max_lifetime: 300,
      connect_timeout: 10,
      onnotice: (notice) => {
        console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
      },
    });
    _db = drizzle(_client, { schema });
  }
  return _db;
}

export const db: DrizzleDB = new Proxy({} as DrizzleDB, {
  get(_target, prop, receiver) {
    const instance = getDb();
    const value = Reflect.get(instance, prop, receiver);
    if (typeof value === 'function') {
      return value.bind(instance);
    }
    return value;
  },
});

export type Database = DrizzleDB;

/** The handle a transaction callback receives. */
export type Transaction = Parameters<Parameters<DrizzleDB['transaction']>[0]>[0];

/** Anything that can run queries: the pool or an open transaction. */
export type Executor = PgDatabase<PostgresJsQueryResultHKT, typeof schema>;

export async function closeDb(): Promise<void> {
  if (_client) {
    await _client.end({ timeout: 5 });
    _client = null;
    _db = null;
  }
}

export { sql, schema };
