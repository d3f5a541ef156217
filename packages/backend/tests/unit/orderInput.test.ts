import { describe, it, expect } from 'vitest';
import { PaymentMethod, PaymentStatus } from '@orderdesk/shared';
import { DEFAULT_MONEY_POLICY } from '../../src/domain/money';
import { type OrderRules, validateCreateOrder, validateUpdateOrder } from '../../src/domain/orderInput';
import { sanitizeText } from '../../src/domain/sanitize';
import type { StepResult } from '../../src/domain/validation';
import { billingAddress, buildItem, buildOrderInput, twoItemOrderInput } from '../helpers/fixtures';

const rules: OrderRules = {
  policy: DEFAULT_MONEY_POLICY,
  maxItems: 100,
  defaultCurrency: 'USD',
  sanitize: sanitizeText,
};

function failure<T>(result: StepResult<T>) {
  if (result.ok) throw new Error('Expected validation to fail');
  return { field: result.error.field, reason: result.error.reason, message: result.error.message };
}

describe('validateCreateOrder', () => {
  it('normalizes a valid order and fills defaults', () => {
    const result = validateCreateOrder(twoItemOrderInput(), rules);
    expect(result).toEqual({
      ok: true,
      value: {
        customerId: 'cust-1',
        customerEmail: 'cust-1@example.com',
        items: [
          { productId: 'SKU-A', productName: 'Widget', quantity: 2, unitPrice: 29.99, lineTotal: 59.98 },
          { productId: 'SKU-B', productName: 'Gadget', quantity: 1, unitPrice: 10, lineTotal: 10 },
        ],
        tax: 5.99,
        shipping: 9.99,
        discount: 0,
        billingAddress,
        shippingAddress: billingAddress,
        payment: { method: PaymentMethod.CREDIT_CARD, status: PaymentStatus.PENDING, lastFourDigits: '4242' },
        currency: 'USD',
        source: 'api',
      },
    });
  });

  it('sanitizes free text and uppercases codes', () => {
    const result = validateCreateOrder(
      buildOrderInput({
        items: [buildItem({ productName: '<b>Deluxe</b> Widget' })],
        billingAddress: { ...billingAddress, country: 'ca' },
        notes: '<script>steal()</script>Leave at door',
        currency: 'eur',
        source: 'w'.repeat(60),
      }),
      rules
    );
    if (!result.ok) throw result.error;
    expect(result.value.items[0].productName).toBe('Deluxe Widget');
    expect(result.value.billingAddress.country).toBe('CA');
    expect(result.value.notes).toBe('Leave at door');
    expect(result.value.currency).toBe('EUR');
    expect(result.value.source).toBe('w'.repeat(50));
  });

  it('defaults the country to US', () => {
    const { country: _country, ...withoutCountry } = billingAddress;
    const result = validateCreateOrder(buildOrderInput({ billingAddress: withoutCountry }), rules);
    if (!result.ok) throw result.error;
    expect(result.value.billingAddress.country).toBe('US');
  });

  it('rejects a country or currency that is not text instead of defaulting it', () => {
    const numericCountry = buildOrderInput({ billingAddress: Object.assign({ ...billingAddress }, { country: 42 }) });
    expect(failure(validateCreateOrder(numericCountry, rules))).toEqual({
      field: 'billingAddress.country',
      reason: 'INVALID_FORMAT',
      message: 'billingAddress.country must be a string',
    });
    expect(failure(validateCreateOrder(Object.assign(buildOrderInput(), { currency: 840 }), rules))).toEqual({
      field: 'currency',
      reason: 'INVALID_FORMAT',
      message: 'currency must be a string',
    });
  });

  it('reports each field under its own name', () => {
    expect(failure(validateCreateOrder(buildOrderInput({ tax: 'abc' }), rules))).toEqual({
      field: 'tax',
      reason: 'INVALID_AMOUNT',
      message: 'tax must be a valid decimal number',
    });
    expect(failure(validateCreateOrder(buildOrderInput({ shipping: -1 }), rules))).toEqual({
      field: 'shipping',
      reason: 'INVALID_AMOUNT',
      message: 'shipping cannot be negative',
    });
    expect(
      failure(validateCreateOrder(buildOrderInput({ items: [buildItem(), buildItem({ quantity: 0 })] }), rules))
    ).toEqual({ field: 'items[1].quantity', reason: 'INVALID_QUANTITY', message: 'items[1].quantity must be at least 1' });
    expect(failure(validateCreateOrder(buildOrderInput({ items: [buildItem({ unitPrice: '-1' })] }), rules))).toEqual({
      field: 'items[0].unitPrice',
      reason: 'INVALID_AMOUNT',
      message: 'items[0].unitPrice cannot be negative',
    });
  });

  it('rejects line totals beyond the bound', () => {
    const input = buildOrderInput({ items: [buildItem({ quantity: 10000, unitPrice: '9999999999.99' })] });
    expect(failure(validateCreateOrder(input, rules))).toEqual({
      field: 'items[0].lineTotal',
      reason: 'AMOUNT_OVERFLOW',
      message: 'items[0].lineTotal cannot exceed 9999999999.99',
    });
  });

  it('requires between one and maxItems items', () => {
    expect(failure(validateCreateOrder(buildOrderInput({ items: [] }), rules))).toEqual({
      field: 'items',
      reason: 'EMPTY_ITEMS',
      message: 'Order must contain at least one item',
    });
    const tooMany = Array.from({ length: 3 }, () => buildItem());
    expect(failure(validateCreateOrder(buildOrderInput({ items: tooMany }), { ...rules, maxItems: 2 }))).toEqual({
      field: 'items',
      reason: 'TOO_MANY_ITEMS',
      message: 'Order cannot contain more than 2 items',
    });
  });

  it('checks identity, address and payment fields', () => {
    expect(failure(validateCreateOrder(buildOrderInput({ customerId: '   ' }), rules))).toEqual({
      field: 'customerId',
      reason: 'REQUIRED',
      message: 'customerId is required',
    });
    expect(failure(validateCreateOrder(buildOrderInput({ customerEmail: 'not-an-email' }), rules))).toEqual({
      field: 'customerEmail',
      reason: 'INVALID_FORMAT',
      message: 'customerEmail must be a valid email address',
    });
    expect(
      failure(validateCreateOrder(buildOrderInput({ shippingAddress: { ...billingAddress, postalCode: '123' } }), rules))
    ).toEqual({
      field: 'shippingAddress.postalCode',
      reason: 'TOO_SHORT',
      message: 'shippingAddress.postalCode must be at least 5 characters',
    });
    expect(failure(validateCreateOrder(buildOrderInput({ billingAddress: { ...billingAddress, country: 'u1' } }), rules))).toEqual({
      field: 'billingAddress.country',
      reason: 'INVALID_FORMAT',
      message: 'billingAddress.country has an invalid format',
    });
    expect(
      failure(validateCreateOrder(buildOrderInput({ payment: { method: PaymentMethod.PAYPAL, lastFourDigits: '42a4' } }), rules))
    ).toEqual({
      field: 'payment.lastFourDigits',
      reason: 'INVALID_FORMAT',
      message: 'payment.lastFourDigits has an invalid format',
    });
  });

  it('treats markup-only text as missing', () => {
    expect(failure(validateCreateOrder(buildOrderInput({ items: [buildItem({ productName: '<script>x()</script>' })] }), rules))).toEqual({
      field: 'items[0].productName',
      reason: 'REQUIRED',
      message: 'items[0].productName is required',
    });
  });

  it('reports the first failing stage', () => {
    const result = validateCreateOrder(buildOrderInput({ customerEmail: 'broken', items: [] }), rules);
    expect(failure(result).field).toBe('customerEmail');
  });
});

describe('validateUpdateOrder', () => {
  it('validates only what is present', () => {
    expect(validateUpdateOrder({}, rules)).toEqual({ ok: true, value: {} });
    expect(validateUpdateOrder({ discount: '5', notes: 'Gift wrap' }, rules)).toEqual({
      ok: true,
      value: { discount: 5, notes: 'Gift wrap' },
    });
  });

  it('rejects a bad field the same way creation does', () => {
    expect(failure(validateUpdateOrder({ items: [] }, rules)).reason).toBe('EMPTY_ITEMS');
    expect(failure(validateUpdateOrder({ tax: 'ten' }, rules))).toEqual({
      field: 'tax',
      reason: 'INVALID_AMOUNT',
      message: 'tax must be a valid decimal number',
    });
  });
});
