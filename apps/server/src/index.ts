/**
 * Server entry point: HTTP API, live order channels and the auto-close job
 * in one process.
 *
 * Usage: node --import tsx apps/server/src/index.ts
 */

import './load-env';
import { createServer } from 'node:http';
import {
  getServerConfig,
  ConfigError,
  initializeEventSystem,
  shutdownEventSystem,
  logger,
  setLogLevel,
  errorFields,
} from '@barflow/core';
import { closeDb, configureDatabase, configurePoolGuard } from '@barflow/db';
import { ConnectionRegistry, Broadcaster, registerLiveConsumers } from '@barflow/module-live';
import { createApp } from './app';
import { attachLiveChannels } from './live/upgrade';
import { snapshotLoaderFor } from './live/snapshot';
import { startAutoCloseJob } from './jobs/auto-close';

async function main() {
  const config = getServerConfig();
  setLogLevel(config.logLevel);
  logger.info('Server starting', { pid: process.pid, env: config.env });

  configureDatabase({ url: config.database.url, poolSize: config.database.poolSize });
  configurePoolGuard({
    concurrency: config.database.concurrency,
    queryTimeoutMs: config.database.queryTimeoutMs,
    queueTimeoutMs: config.database.queueTimeoutMs,
  });

  const bus = await initializeEventSystem();
  const registry = new ConnectionRegistry();
  registerLiveConsumers(bus, new Broadcaster(registry, { sendTimeoutMs: config.live.sendTimeoutMs }));

  const app = createApp({
    jwtSecret: config.auth.jwtSecret,
    exposeInternalErrors: config.env === 'development',
    registry,
  });
  const server = createServer(app);
  const wss = attachLiveChannels(
    server,
    { registry, snapshotLoaderFor },
    {
      jwtSecret: config.auth.jwtSecret,
      idleTimeoutMs: config.live.idleTimeoutMs,
      sendTimeoutMs: config.live.sendTimeoutMs,
      maxPendingUpdates: config.live.maxPendingUpdates,
      maxBufferedBytes: config.live.maxBufferedBytes,
    },
  );
  const autoClose = startAutoCloseJob({
    intervalMs: config.closing.intervalMs,
    defaultTimezone: config.closing.defaultTimezone,
  });

  await new Promise<void>((resolve) => server.listen(config.port, resolve));
  logger.info('Server ready', { port: config.port });

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Server shutting down (${signal})`);
    autoClose.stop();
    registry.closeAll();
    wss.close();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await shutdownEventSystem();
    await closeDb();
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error('Shutdown failed', { error: errorFields(error) });
      process.exit(1);
    });
  };
  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    logger.error(error.message);
  } else {
    logger.error('Server failed to start', { error: errorFields(error) });
  }
  process.exit(1);
});
