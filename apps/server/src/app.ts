import express from 'express';
import type { Express } from 'express';
import { NotFoundError } from '@barflow/shared';
import { getPoolGuardStats } from '@barflow/db';
import type { ConnectionRegistry } from '@barflow/module-live';
import { createRouteWrapper } from './http/with-route';
import { requestLogger } from './http/request-logger';
import { errorHandler } from './http/error-handler';
import { apiRouter, apiRoutes } from './routes';
import type { ApiRoute } from './routes';

export interface AppOptions {
  jwtSecret: string;
  /** Show internal error messages in 500 responses. */
  exposeInternalErrors: boolean;
  registry: ConnectionRegistry;
  routes?: ApiRoute[];
}

export function createApp(options: AppOptions): Express {
  const app = express();
  app.disable('x-powered-by');
  app.use(requestLogger());
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
      liveChannels: options.registry.size(),
      database: getPoolGuardStats(),
    });
  });

  app.use(apiRouter(createRouteWrapper(options.jwtSecret), options.routes ?? apiRoutes));

  app.use((req, _res, next) => {
    next(new NotFoundError('Route', `${req.method} ${req.path}`));
  });
  app.use(errorHandler({ exposeInternal: options.exposeInternalErrors }));

  return app;
}
