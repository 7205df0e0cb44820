import { describe, it, expect } from 'vitest';
import {
  addToCartSchema,
  checkoutCartSchema,
  updateOrderStatusSchema,
  listBarOrdersSchema,
  idParamSchema,
} from '../validation';

describe('idParamSchema', () => {
  it('coerces a numeric path segment', () => {
    expect(idParamSchema.parse('42')).toBe(42);
    expect(idParamSchema.parse('2147483647')).toBe(2_147_483_647);
  });

  it('rejects ids outside the integer column range', () => {
    expect(idParamSchema.safeParse('2147483648').success).toBe(false);
    expect(idParamSchema.safeParse('3000000000').success).toBe(false);
    expect(idParamSchema.safeParse('0').success).toBe(false);
  });
});

describe('updateOrderStatusSchema', () => {
  it('upper-cases the requested status', () => {
    expect(updateOrderStatusSchema.parse({ status: 'accepted' })).toEqual({ status: 'ACCEPTED' });
    expect(updateOrderStatusSchema.parse({ status: ' Ready ' })).toEqual({ status: 'READY' });
  });

  it('rejects unknown statuses', () => {
    expect(updateOrderStatusSchema.safeParse({ status: 'served' }).success).toBe(false);
  });
});

describe('checkoutCartSchema', () => {
  it('accepts the three payment methods', () => {
    for (const paymentMethod of ['card', 'wallet', 'pay_at_bar']) {
      expect(checkoutCartSchema.safeParse({ paymentMethod }).success).toBe(true);
    }
  });

  it('rejects other payment methods', () => {
    expect(checkoutCartSchema.safeParse({ paymentMethod: 'cash' }).success).toBe(false);
  });

  it('coerces a string table id', () => {
    expect(checkoutCartSchema.parse({ paymentMethod: 'card', tableId: '5' })).toEqual({
      paymentMethod: 'card',
      tableId: 5,
    });
  });
});

describe('addToCartSchema', () => {
  it('defaults quantity and replace flag', () => {
    expect(addToCartSchema.parse({ menuItemId: 11 })).toEqual({
      menuItemId: 11,
      qty: 1,
      replaceExisting: false,
    });
  });

  it('rejects a zero quantity', () => {
    expect(addToCartSchema.safeParse({ menuItemId: 11, qty: 0 }).success).toBe(false);
  });
});

describe('listBarOrdersSchema', () => {
  it('defaults to current orders', () => {
    expect(listBarOrdersSchema.parse({})).toEqual({ scope: 'current' });
  });
});
