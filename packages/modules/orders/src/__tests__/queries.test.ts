import { describe, it, expect, vi, beforeEach } from 'vitest';
import { AuthorizationError } from '@barflow/shared';
import { createMockTx } from './helpers/mock-tx';
import { makeCtx, bartenderCtx, makeOrder, makeItems } from './helpers/fixtures';
import { OrderNotFoundError } from '../errors';

// ── Mock Setup ──────────────────────────────────────────────────

const mock = createMockTx();

vi.mock('@barflow/db', async (importOriginal) => ({
  ...(await importOriginal<typeof import('@barflow/db')>()),
  db: mock.tx,
  guardedQuery: (_op: string, fn: () => Promise<unknown>) => fn(),
}));

// ── Tests ────────────────────────────────────────────────────────

describe('order queries', () => {
  beforeEach(() => {
    mock.reset();
  });

  describe('listBarOrders', () => {
    it('returns orders with their own items, newest first as stored', async () => {
      const { listBarOrders } = await import('../queries/list-bar-orders');
      mock.queue(
        [makeOrder({ id: 101 }), makeOrder({ id: 100 })],
        [...makeItems(100), { id: 3, orderId: 101, menuItemId: 13, qty: 1, unitPriceCents: 600, menuItemName: 'Cider' }],
      );

      const list = await listBarOrders(bartenderCtx(), 1);

      expect(list.map((o) => o.id)).toEqual([101, 100]);
      expect(list[0]?.items.map((i) => i.menu_item_name)).toEqual(['Cider']);
      expect(list[1]?.items).toHaveLength(2);
    });

    it('skips the item query for an empty bar', async () => {
      const { listBarOrders } = await import('../queries/list-bar-orders');
      mock.queue([]);

      await expect(listBarOrders(bartenderCtx(), 1, { scope: 'open' })).resolves.toEqual([]);
      expect(mock.queries).toHaveLength(1);
    });

    it('is for staff of the bar only', async () => {
      const { listBarOrders } = await import('../queries/list-bar-orders');

      await expect(listBarOrders(makeCtx(), 1)).rejects.toBeInstanceOf(AuthorizationError);
      await expect(listBarOrders(bartenderCtx(), 2)).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('exposes versions for live sync', async () => {
      const { fetchBarOrders } = await import('../queries/list-bar-orders');
      mock.queue([makeOrder({ status: 'ACCEPTED', version: 2 })], makeItems());

      const views = await fetchBarOrders(1, 'current');

      expect(views).toHaveLength(1);
      expect(views[0]?.version).toBe(2);
      expect(views[0]?.order.status).toBe('ACCEPTED');
    });
  });

  describe('listCustomerOrders', () => {
    it('splits pending from finished orders', async () => {
      const { listCustomerOrders } = await import('../queries/list-customer-orders');
      mock.queue(
        [
          makeOrder({ id: 103, status: 'READY' }),
          makeOrder({ id: 102, status: 'COMPLETED' }),
          makeOrder({ id: 101, status: 'PLACED' }),
          makeOrder({ id: 100, status: 'CANCELED' }),
        ],
        [],
      );

      const history = await listCustomerOrders(makeCtx());

      expect(history.pending.map((o) => o.id)).toEqual([103, 101]);
      expect(history.completed.map((o) => o.id)).toEqual([102, 100]);
    });
  });

  describe('getOrder', () => {
    it('returns the order to its customer', async () => {
      const { getOrder } = await import('../queries/get-order');
      mock.queue([makeOrder()], makeItems());

      const order = await getOrder(makeCtx(), 100);
      expect(order.total).toBe(14.3);
    });

    it('returns the order to staff of its bar', async () => {
      const { getOrder } = await import('../queries/get-order');
      mock.queue([makeOrder()], makeItems());

      await expect(getOrder(bartenderCtx(), 100)).resolves.toMatchObject({ id: 100 });
    });

    it('hides other customers orders', async () => {
      const { getOrder } = await import('../queries/get-order');
      mock.queue([makeOrder({ customerId: 99 })]);

      await expect(getOrder(makeCtx(), 100)).rejects.toBeInstanceOf(AuthorizationError);
    });

    it('fails for unknown ids', async () => {
      const { getOrder } = await import('../queries/get-order');
      mock.queue([]);

      await expect(getOrder(makeCtx(), 404)).rejects.toBeInstanceOf(OrderNotFoundError);
    });
  });
});
