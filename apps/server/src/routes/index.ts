import { Router } from 'express';
import type { WithRoute } from '../http/with-route';
import { cartRoutes } from './cart';
import { orderRoutes, barRoutes, adminRoutes } from './orders';
import type { ApiRoute } from './types';

export const apiRoutes: ApiRoute[] = [...cartRoutes, ...orderRoutes, ...barRoutes, ...adminRoutes];

export function apiRouter(withRoute: WithRoute, routes: ApiRoute[] = apiRoutes): Router {
  const router = Router();
  for (const route of routes) {
    router[route.method](route.path, withRoute(route.handler, route.options));
  }
  return router;
}

export type { ApiRoute, HttpMethod } from './types';
