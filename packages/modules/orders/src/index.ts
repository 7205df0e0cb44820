// Commands
export { addToCart } from './commands/add-to-cart';
export { updateCartItem } from './commands/update-cart-item';
export { selectCartTable } from './commands/select-cart-table';
export { clearCart } from './commands/clear-cart';
export { checkoutCart } from './commands/checkout-cart';
export { updateOrderStatus } from './commands/update-order-status';
export { setOrderingPaused } from './commands/set-ordering-paused';
export { clearAllOrders } from './commands/clear-all-orders';
export { closeBarOrders, runAutoClose } from './commands/close-bar-orders';
export type { AutoCloseSummary } from './commands/close-bar-orders';

// Queries
export { getCart, loadCart } from './queries/get-cart';
export type { CartView, CartLine } from './queries/get-cart';
export { getOrder } from './queries/get-order';
export { listBarOrders, fetchBarOrders } from './queries/list-bar-orders';
export type { BarOrderScope } from './queries/list-bar-orders';
export { listCustomerOrders, fetchCustomerCurrentOrders } from './queries/list-customer-orders';
export type { CustomerOrderHistory } from './queries/list-customer-orders';

// State machine
export {
  ORDER_TRANSITIONS,
  ENTERED_AT,
  canTransition,
  assertTransition,
  authorizeTransition,
  refundOnCancel,
} from './state-machine';

// Helpers
export { serializeOrder, orderTotalCents } from './helpers/serialize-order';
export type { SerializedOrder, SerializedOrderItem } from './helpers/serialize-order';
export type { OrderView } from './helpers/load-orders';
export { isPastClosingTime, localClock } from './helpers/opening-hours';
export type { OpeningHours } from './helpers/opening-hours';

// Events
export { ORDER_EVENTS } from './events/types';
export type { OrderEventData } from './events/types';

// Errors
export {
  OrderNotFoundError,
  InvalidTransitionError,
  EmptyCartError,
  StaleCartItemError,
  InvalidTableError,
  CartBarMismatchError,
  OrderingPausedError,
  MenuItemNotFoundError,
  CartItemNotFoundError,
} from './errors';

// Validation
export {
  idParamSchema,
  addToCartSchema,
  updateCartItemSchema,
  selectCartTableSchema,
  checkoutCartSchema,
  updateOrderStatusSchema,
  listBarOrdersSchema,
  setOrderingPausedSchema,
} from './validation';
export type {
  AddToCartInput,
  UpdateCartItemInput,
  SelectCartTableInput,
  CheckoutCartInput,
  UpdateOrderStatusInput,
  ListBarOrdersInput,
  SetOrderingPausedInput,
} from './validation';
