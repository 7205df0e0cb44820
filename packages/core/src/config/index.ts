import { z } from 'zod';

/**
 * Process configuration, read once from the environment.
 * Values come from `.env.local` / `.env` (loaded by the entry point) or the
 * real environment.
 */
const ServerConfigSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
  DB_POOL_MAX: z.coerce.number().int().positive().default(10),
  DB_CONCURRENCY: z.coerce.number().int().positive().optional(),
  DB_QUERY_TIMEOUT: z.coerce.number().int().positive().default(15_000),
  DB_QUEUE_TIMEOUT: z.coerce.number().int().positive().default(5_000),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  AUTH_JWT_SECRET: z.string().min(8, 'AUTH_JWT_SECRET must be at least 8 characters'),
  LIVE_SEND_TIMEOUT_MS: z.coerce.number().int().positive().default(2_000),
  LIVE_IDLE_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),
  LIVE_MAX_BUFFERED_BYTES: z.coerce.number().int().positive().default(1024 * 1024),
  LIVE_MAX_PENDING_UPDATES: z.coerce.number().int().positive().default(1_000),
  AUTO_CLOSE_INTERVAL_MS: z.coerce.number().int().nonnegative().default(60_000),
  BAR_TIMEZONE: z.string().default('UTC'),
});

export type ServerConfigEnv = z.infer<typeof ServerConfigSchema>;

export interface ServerConfig {
  env: ServerConfigEnv['NODE_ENV'];
  isProduction: boolean;
  port: number;
  logLevel: ServerConfigEnv['LOG_LEVEL'];
  database: {
    url: string;
    poolSize: number;
    concurrency: number;
    queryTimeoutMs: number;
    queueTimeoutMs: number;
  };
  auth: {
    jwtSecret: string;
  };
  live: {
    sendTimeoutMs: number;
    idleTimeoutMs: number;
    maxBufferedBytes: number;
    maxPendingUpdates: number;
  };
  closing: {
    intervalMs: number;
    defaultTimezone: string;
  };
}

export class ConfigError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = ServerConfigSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
    );
  }
  const e = parsed.data;
  return {
    env: e.NODE_ENV,
    isProduction: e.NODE_ENV === 'production',
    port: e.PORT,
    logLevel: e.LOG_LEVEL,
    database: {
      url: e.DATABASE_URL,
      poolSize: e.DB_POOL_MAX,
      concurrency: e.DB_CONCURRENCY ?? e.DB_POOL_MAX,
      queryTimeoutMs: e.DB_QUERY_TIMEOUT,
      queueTimeoutMs: e.DB_QUEUE_TIMEOUT,
    },
    auth: { jwtSecret: e.AUTH_JWT_SECRET },
    live: {
      sendTimeoutMs: e.LIVE_SEND_TIMEOUT_MS,
      idleTimeoutMs: e.LIVE_IDLE_TIMEOUT_MS,
      maxBufferedBytes: e.LIVE_MAX_BUFFERED_BYTES,
      maxPendingUpdates: e.LIVE_MAX_PENDING_UPDATES,
    },
    closing: {
      intervalMs: e.AUTO_CLOSE_INTERVAL_MS,
      defaultTimezone: e.BAR_TIMEZONE,
    },
  };
}

let _config: ServerConfig | null = null;

export function getServerConfig(): ServerConfig {
  if (!_config) {
    _config = loadServerConfig();
  }
  return _config;
}
