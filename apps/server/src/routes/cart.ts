import {
  getCart,
  addToCart,
  updateCartItem,
  selectCartTable,
  clearCart,
  checkoutCart,
  addToCartSchema,
  updateCartItemSchema,
  selectCartTableSchema,
  checkoutCartSchema,
} from '@barflow/module-orders';
import { parseInput } from '../http/with-route';
import { idParam } from './types';
import type { ApiRoute } from './types';

export const cartRoutes: ApiRoute[] = [
  {
    method: 'get',
    path: '/api/cart',
    handler: (_req, ctx) => getCart(ctx),
  },
  {
    method: 'post',
    path: '/api/cart/items',
    handler: (req, ctx) => addToCart(ctx, parseInput(addToCartSchema, req.body)),
  },
  {
    method: 'patch',
    path: '/api/cart/items/:menuItemId',
    handler: (req, ctx) =>
      updateCartItem(ctx, idParam(req, 'menuItemId'), parseInput(updateCartItemSchema, req.body)),
  },
  {
    method: 'put',
    path: '/api/cart/table',
    handler: (req, ctx) => selectCartTable(ctx, parseInput(selectCartTableSchema, req.body)),
  },
  {
    method: 'delete',
    path: '/api/cart',
    handler: (_req, ctx) => clearCart(ctx),
  },
  {
    method: 'post',
    path: '/api/cart/checkout',
    handler: (req, ctx) => checkoutCart(ctx, parseInput(checkoutCartSchema, req.body)),
    options: { successStatus: 201 },
  },
];
