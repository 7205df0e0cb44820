import {
  listCustomerOrders,
  getOrder,
  updateOrderStatus,
  listBarOrders,
  setOrderingPaused,
  clearAllOrders,
  updateOrderStatusSchema,
  listBarOrdersSchema,
  setOrderingPausedSchema,
} from '@barflow/module-orders';
import { parseInput } from '../http/with-route';
import { idParam } from './types';
import type { ApiRoute } from './types';

export const orderRoutes: ApiRoute[] = [
  {
    method: 'get',
    path: '/api/orders',
    handler: (_req, ctx) => listCustomerOrders(ctx),
  },
  {
    method: 'get',
    path: '/api/orders/:orderId',
    handler: (req, ctx) => getOrder(ctx, idParam(req, 'orderId')),
  },
  {
    method: 'post',
    path: '/api/orders/:orderId/status',
    handler: (req, ctx) =>
      updateOrderStatus(ctx, idParam(req, 'orderId'), parseInput(updateOrderStatusSchema, req.body)),
  },
];

export const barRoutes: ApiRoute[] = [
  {
    method: 'get',
    path: '/api/bars/:barId/orders',
    handler: (req, ctx) =>
      listBarOrders(ctx, idParam(req, 'barId'), parseInput(listBarOrdersSchema, req.query)),
  },
  {
    method: 'post',
    path: '/api/bars/:barId/ordering-paused',
    handler: (req, ctx) =>
      setOrderingPaused(ctx, idParam(req, 'barId'), parseInput(setOrderingPausedSchema, req.body)),
  },
];

export const adminRoutes: ApiRoute[] = [
  {
    method: 'post',
    path: '/api/admin/orders/clear',
    handler: (_req, ctx) => clearAllOrders(ctx),
  },
];
