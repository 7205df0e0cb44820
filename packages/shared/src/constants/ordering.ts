/**
 * Ordering Constants
 *
 * Canonical enumerations shared by the order store, the HTTP layer and the
 * live channel wire format. Status strings are always uppercase on the wire.
 */

export const ORDER_STATUSES = [
  'PLACED',
  'ACCEPTED',
  'READY',
  'COMPLETED',
  'CANCELED',
  'REJECTED',
] as const;

export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const TERMINAL_ORDER_STATUSES: readonly OrderStatus[] = ['COMPLETED', 'CANCELED', 'REJECTED'];

export function isOrderStatus(value: string): value is OrderStatus {
  return (ORDER_STATUSES as readonly string[]).includes(value);
}

export function isTerminalStatus(status: OrderStatus): boolean {
  return TERMINAL_ORDER_STATUSES.includes(status);
}

export const PAYMENT_METHODS = ['card', 'wallet', 'pay_at_bar'] as const;

export type PaymentMethod = (typeof PAYMENT_METHODS)[number];

/** Payment methods whose cancellation is credited back to the customer wallet. */
export const REFUNDABLE_PAYMENT_METHODS: readonly PaymentMethod[] = ['card', 'wallet'];

export const USER_ROLES = ['customer', 'bartender', 'bar_admin', 'super_admin'] as const;

export type UserRole = (typeof USER_ROLES)[number];
