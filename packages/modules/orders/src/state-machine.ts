import { AuthorizationError, REFUNDABLE_PAYMENT_METHODS } from '@barflow/shared';
import type { OrderStatus, PaymentMethod } from '@barflow/shared';
import { isStaffOf } from '@barflow/core/auth/actor';
import type { Actor } from '@barflow/core/auth/actor';
import type { OrderRow } from '@barflow/db';
import { InvalidTransitionError } from './errors';

/** Every edge an order may take. Anything not listed is rejected. */
export const ORDER_TRANSITIONS: Record<OrderStatus, readonly OrderStatus[]> = {
  PLACED: ['ACCEPTED', 'REJECTED', 'CANCELED'],
  ACCEPTED: ['READY', 'CANCELED'],
  READY: ['COMPLETED'],
  COMPLETED: [],
  CANCELED: [],
  REJECTED: [],
};

type LifecycleTimestamp = 'acceptedAt' | 'readyAt' | 'completedAt' | 'canceledAt';

/** Column stamped when an order enters a state. */
export const ENTERED_AT: Partial<Record<OrderStatus, LifecycleTimestamp>> = {
  ACCEPTED: 'acceptedAt',
  READY: 'readyAt',
  COMPLETED: 'completedAt',
  CANCELED: 'canceledAt',
};

export function canTransition(from: OrderStatus, to: OrderStatus): boolean {
  return ORDER_TRANSITIONS[from].includes(to);
}

export function assertTransition(orderId: number, from: OrderStatus, to: OrderStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(orderId, from, to);
  }
}

/**
 * Staff of the order's bar may request any edge. The customer who placed the
 * order may only cancel it while it is still PLACED.
 */
export function authorizeTransition(
  order: Pick<OrderRow, 'id' | 'barId' | 'customerId' | 'status'>,
  to: OrderStatus,
  actor: Actor,
): void {
  if (isStaffOf(actor, order.barId)) return;

  const isOwner = order.customerId !== null && order.customerId === actor.userId;
  if (isOwner && to === 'CANCELED' && order.status === 'PLACED') return;

  throw new AuthorizationError(`Not allowed to move order ${order.id} to ${to}`);
}

/** Amount credited back when an order is canceled. */
export function refundOnCancel(paymentMethod: PaymentMethod, totalCents: number): number {
  return REFUNDABLE_PAYMENT_METHODS.includes(paymentMethod) ? totalCents : 0;
}
