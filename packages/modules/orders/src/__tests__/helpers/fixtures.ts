import type { OrderRow, OrderItemRow } from '@barflow/db';
import type { RequestContext } from '@barflow/core/auth/context';
import type { Actor } from '@barflow/core/auth/actor';

export function makeCtx(actor: Partial<Actor> = {}): RequestContext {
  return {
    requestId: 'req-1',
    actor: { userId: 42, role: 'customer', barIds: [], ...actor },
  };
}

export const bartenderCtx = () => makeCtx({ userId: 7, role: 'bartender', barIds: [1] });

export function makeOrder(overrides: Partial<OrderRow> = {}): OrderRow {
  return {
    id: 100,
    publicCode: '7K3M9Q2X',
    customerId: 42,
    barId: 1,
    tableId: 5,
    status: 'PLACED',
    paymentMethod: 'card',
    subtotalCents: 1300,
    vatTotalCents: 130,
    refundCents: 0,
    notes: null,
    version: 1,
    createdAt: new Date('2026-03-06T20:00:00.000Z'),
    acceptedAt: null,
    readyAt: null,
    completedAt: null,
    canceledAt: null,
    closingId: null,
    ...overrides,
  };
}

export function makeItems(orderId: number = 100): OrderItemRow[] {
  return [
    { id: 1, orderId, menuItemId: 11, qty: 2, unitPriceCents: 500, menuItemName: 'Lager' },
    { id: 2, orderId, menuItemId: 12, qty: 1, unitPriceCents: 300, menuItemName: 'Crisps' },
  ];
}
