import type { OrderStatus } from '@barflow/shared';
import type { SerializedOrder } from '../helpers/serialize-order';

export const ORDER_EVENTS = {
  ORDER_PLACED: 'orders.order.placed.v1',
  ORDER_STATUS_CHANGED: 'orders.order.status_changed.v1',
} as const;

/**
 * Payload of both order events. `order` is the wire shape pushed to live
 * channels; `version` orders updates for the same order.
 */
export interface OrderEventData {
  orderId: number;
  barId: number;
  customerId: number | null;
  status: OrderStatus;
  previousStatus: OrderStatus | null;
  version: number;
  order: SerializedOrder;
  [key: string]: unknown;
}
