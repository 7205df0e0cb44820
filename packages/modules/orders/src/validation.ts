import { z } from 'zod';
import { ORDER_STATUSES, PAYMENT_METHODS } from '@barflow/shared';

// Row ids are Postgres `integer`.
const MAX_ID = 2_147_483_647;

const id = z.coerce.number().int().positive().max(MAX_ID);

export const idParamSchema = id;

export const addToCartSchema = z.object({
  menuItemId: id,
  qty: z.number().int().positive().max(99).default(1),
  replaceExisting: z.boolean().default(false),
});
export type AddToCartInput = z.input<typeof addToCartSchema>;

export const updateCartItemSchema = z.object({
  // Zero or less removes the line.
  qty: z.number().int().max(99),
});
export type UpdateCartItemInput = z.infer<typeof updateCartItemSchema>;

export const selectCartTableSchema = z.object({
  tableId: id,
});
export type SelectCartTableInput = z.infer<typeof selectCartTableSchema>;

export const checkoutCartSchema = z.object({
  tableId: id.optional(),
  paymentMethod: z.enum(PAYMENT_METHODS),
  notes: z.string().trim().max(500).optional(),
});
export type CheckoutCartInput = z.infer<typeof checkoutCartSchema>;

export const updateOrderStatusSchema = z.object({
  status: z
    .string()
    .transform((s) => s.trim().toUpperCase())
    .pipe(z.enum(ORDER_STATUSES)),
});
export type UpdateOrderStatusInput = z.infer<typeof updateOrderStatusSchema>;

export const listBarOrdersSchema = z.object({
  scope: z.enum(['current', 'open']).default('current'),
});
export type ListBarOrdersInput = z.input<typeof listBarOrdersSchema>;

export const setOrderingPausedSchema = z.object({
  paused: z.boolean(),
});
export type SetOrderingPausedInput = z.infer<typeof setOrderingPausedSchema>;
