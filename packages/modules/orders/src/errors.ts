import { AppError } from '@barflow/shared';

export class OrderNotFoundError extends AppError {
  constructor(orderId: number) {
    super('ORDER_NOT_FOUND', `Order ${orderId} not found`, 404);
  }
}

export class InvalidTransitionError extends AppError {
  constructor(orderId: number, from: string, to: string) {
    super('INVALID_TRANSITION', `Order ${orderId} cannot move from ${from} to ${to}`, 409);
  }
}

export class EmptyCartError extends AppError {
  constructor() {
    super('EMPTY_CART', 'Cart is empty', 400);
  }
}

export class StaleCartItemError extends AppError {
  constructor(public menuItemIds: number[]) {
    super(
      'STALE_CART_ITEM',
      `Menu items no longer available: ${menuItemIds.join(', ')}`,
      409,
      menuItemIds.map((id) => ({ field: 'menuItemId', message: String(id) })),
    );
  }
}

export class InvalidTableError extends AppError {
  constructor(message: string) {
    super('INVALID_TABLE', message, 400);
  }
}

export class CartBarMismatchError extends AppError {
  constructor(cartBarId: number, itemBarId: number) {
    super(
      'CART_BAR_MISMATCH',
      `Cart holds items from bar ${cartBarId}; clear it before ordering from bar ${itemBarId}`,
      409,
    );
  }
}

export class OrderingPausedError extends AppError {
  constructor(barId: number) {
    super('ORDERING_PAUSED', `Bar ${barId} is not taking orders right now`, 409);
  }
}

export class MenuItemNotFoundError extends AppError {
  constructor(menuItemId: number) {
    super('MENU_ITEM_NOT_FOUND', `Menu item ${menuItemId} not found`, 404);
  }
}

export class CartItemNotFoundError extends AppError {
  constructor(menuItemId: number) {
    super('CART_ITEM_NOT_FOUND', `Menu item ${menuItemId} is not in the cart`, 404);
  }
}
