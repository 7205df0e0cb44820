import { toDecimal } from '@barflow/shared';
import type { OrderStatus, PaymentMethod } from '@barflow/shared';
import type { OrderRow, OrderItemRow } from '@barflow/db';

export interface SerializedOrderItem {
  id: number;
  menu_item_id: number | null;
  qty: number;
  unit_price: number;
  menu_item_name: string | null;
}

/** Wire shape of an order, shared by the HTTP API and live channels. */
export interface SerializedOrder {
  id: number;
  public_code: string;
  status: OrderStatus;
  bar_id: number;
  customer_id: number | null;
  table_id: number | null;
  payment_method: PaymentMethod;
  subtotal: number;
  vat_total: number;
  total: number;
  refund_amount: number;
  notes: string | null;
  created_at: string;
  accepted_at: string | null;
  ready_at: string | null;
  items: SerializedOrderItem[];
}

export function orderTotalCents(order: Pick<OrderRow, 'subtotalCents' | 'vatTotalCents'>): number {
  return order.subtotalCents + order.vatTotalCents;
}

function iso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export function serializeOrder(order: OrderRow, items: OrderItemRow[]): SerializedOrder {
  return {
    id: order.id,
    public_code: order.publicCode,
    status: order.status,
    bar_id: order.barId,
    customer_id: order.customerId,
    table_id: order.tableId,
    payment_method: order.paymentMethod,
    subtotal: toDecimal(order.subtotalCents),
    vat_total: toDecimal(order.vatTotalCents),
    total: toDecimal(orderTotalCents(order)),
    refund_amount: toDecimal(order.refundCents),
    notes: order.notes,
    created_at: order.createdAt.toISOString(),
    accepted_at: iso(order.acceptedAt),
    ready_at: iso(order.readyAt),
    items: items.map((item) => ({
      id: item.id,
      menu_item_id: item.menuItemId,
      qty: item.qty,
      unit_price: toDecimal(item.unitPriceCents),
      menu_item_name: item.menuItemName,
    })),
  };
}
