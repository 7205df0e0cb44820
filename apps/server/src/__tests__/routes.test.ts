import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ValidationError } from '@barflow/shared';
import { makeCtx, fakeRequest } from './helpers';

const mocks = vi.hoisted(() => ({
  getCart: vi.fn(),
  addToCart: vi.fn(),
  updateCartItem: vi.fn(),
  selectCartTable: vi.fn(),
  clearCart: vi.fn(),
  checkoutCart: vi.fn(),
  listCustomerOrders: vi.fn(),
  getOrder: vi.fn(),
  updateOrderStatus: vi.fn(),
  listBarOrders: vi.fn(),
  setOrderingPaused: vi.fn(),
  clearAllOrders: vi.fn(),
}));

vi.mock('@barflow/module-orders', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@barflow/module-orders')>()),
  ...mocks,
}));

const { apiRoutes } = await import('../routes');

function route(method: string, path: string) {
  const found = apiRoutes.find((r) => r.method === method && r.path === path);
  if (!found) throw new Error(`No route ${method} ${path}`);
  return found;
}

describe('api routes', () => {
  const ctx = makeCtx();

  beforeEach(() => {
    vi.clearAllMocks();
    for (const mock of Object.values(mocks)) mock.mockResolvedValue({ ok: true });
  });

  it('exposes every endpoint', () => {
    expect(apiRoutes.map((r) => `${r.method.toUpperCase()} ${r.path}`)).toEqual([
      'GET /api/cart',
      'POST /api/cart/items',
      'PATCH /api/cart/items/:menuItemId',
      'PUT /api/cart/table',
      'DELETE /api/cart',
      'POST /api/cart/checkout',
      'GET /api/orders',
      'GET /api/orders/:orderId',
      'POST /api/orders/:orderId/status',
      'GET /api/bars/:barId/orders',
      'POST /api/bars/:barId/ordering-paused',
      'POST /api/admin/orders/clear',
    ]);
  });

  it('fills cart defaults before adding', async () => {
    await route('post', '/api/cart/items').handler(fakeRequest({ body: { menuItemId: 3 } }), ctx);

    expect(mocks.addToCart).toHaveBeenCalledWith(ctx, { menuItemId: 3, qty: 1, replaceExisting: false });
  });

  it('rejects an invalid quantity with field details', async () => {
    const result = route('post', '/api/cart/items').handler(
      fakeRequest({ body: { menuItemId: 3, qty: 0 } }),
      ctx,
    );

    await expect(result).rejects.toBeInstanceOf(ValidationError);
    await expect(result).rejects.toMatchObject({ details: [{ field: 'qty' }] });
    expect(mocks.addToCart).not.toHaveBeenCalled();
  });

  it('parses the menu item id from the path', async () => {
    await route('patch', '/api/cart/items/:menuItemId').handler(
      fakeRequest({ params: { menuItemId: '12' }, body: { qty: 0 } }),
      ctx,
    );

    expect(mocks.updateCartItem).toHaveBeenCalledWith(ctx, 12, { qty: 0 });
  });

  it('rejects a non-numeric path id', async () => {
    await expect(
      route('get', '/api/orders/:orderId').handler(fakeRequest({ params: { orderId: 'abc' } }), ctx),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: [{ field: 'orderId' }] });
    expect(mocks.getOrder).not.toHaveBeenCalled();
  });

  it('rejects a path id past the integer column range', async () => {
    await expect(
      route('get', '/api/orders/:orderId').handler(
        fakeRequest({ params: { orderId: '3000000000' } }),
        ctx,
      ),
    ).rejects.toMatchObject({ code: 'VALIDATION_ERROR', details: [{ field: 'orderId' }] });
    expect(mocks.getOrder).not.toHaveBeenCalled();
  });

  it('answers checkout with 201', async () => {
    const checkout = route('post', '/api/cart/checkout');

    await checkout.handler(fakeRequest({ body: { paymentMethod: 'card', notes: '  no ice ' } }), ctx);

    expect(checkout.options).toEqual({ successStatus: 201 });
    expect(mocks.checkoutCart).toHaveBeenCalledWith(ctx, { paymentMethod: 'card', notes: 'no ice' });
  });

  it('normalizes the requested status', async () => {
    await route('post', '/api/orders/:orderId/status').handler(
      fakeRequest({ params: { orderId: '100' }, body: { status: ' accepted ' } }),
      ctx,
    );

    expect(mocks.updateOrderStatus).toHaveBeenCalledWith(ctx, 100, { status: 'ACCEPTED' });
  });

  it('defaults the bar order scope to current', async () => {
    const list = route('get', '/api/bars/:barId/orders');

    await list.handler(fakeRequest({ params: { barId: '1' } }), ctx);
    await list.handler(fakeRequest({ params: { barId: '1' }, query: { scope: 'open' } }), ctx);

    expect(mocks.listBarOrders).toHaveBeenNthCalledWith(1, ctx, 1, { scope: 'current' });
    expect(mocks.listBarOrders).toHaveBeenNthCalledWith(2, ctx, 1, { scope: 'open' });
  });

  it('passes the pause flag for the bar', async () => {
    await route('post', '/api/bars/:barId/ordering-paused').handler(
      fakeRequest({ params: { barId: '4' }, body: { paused: true } }),
      ctx,
    );

    expect(mocks.setOrderingPaused).toHaveBeenCalledWith(ctx, 4, { paused: true });
  });
});
