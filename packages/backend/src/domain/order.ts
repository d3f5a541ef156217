import { type Order, type OrderItem, OrderStatus } from '@orderdesk/shared';
import { ValidationError } from './errors';
import { type Money, type MoneyPolicy, DEFAULT_MONEY_POLICY, addMoney, subtractMoney, sumMoney } from './money';
import type { Adjustments, ValidatedOrderInput, ValidatedOrderUpdate } from './orderInput';

export interface OrderTotals extends Adjustments {
  subtotal: Money;
  total: Money;
}

/**
 * subtotal = sum of line totals; total = subtotal + tax + shipping - discount.
 * Totals are only ever produced here.
 */
export function computeTotals(
  items: readonly OrderItem[],
  adjustments: Adjustments,
  policy: MoneyPolicy = DEFAULT_MONEY_POLICY
): OrderTotals {
  const subtotal = sumMoney(
    items.map((item) => item.lineTotal),
    'subtotal',
    policy
  );
  const gross = addMoney(addMoney(subtotal, adjustments.tax, 'total', policy), adjustments.shipping, 'total', policy);
  const total = subtractMoney(gross, adjustments.discount, 'total', policy);
  if (total < 0) {
    throw new ValidationError('discount', 'NEGATIVE_TOTAL', 'discount cannot exceed subtotal + tax + shipping');
  }
  return { subtotal, tax: adjustments.tax, shipping: adjustments.shipping, discount: adjustments.discount, total };
}

export interface OrderIdentity {
  id: string;
  orderNumber: string;
  createdAt: Date;
}

/** A fresh, unsaved order (version 0) in the initial status. */
export function buildOrder(input: ValidatedOrderInput, identity: OrderIdentity, policy?: MoneyPolicy): Order {
  const totals = computeTotals(input.items, input, policy);
  const order: Order = {
    id: identity.id,
    orderNumber: identity.orderNumber,
    customerId: input.customerId,
    customerEmail: input.customerEmail,
    status: OrderStatus.PENDING,
    items: input.items,
    ...totals,
    currency: input.currency,
    billingAddress: input.billingAddress,
    shippingAddress: input.shippingAddress,
    payment: input.payment,
    source: input.source,
    createdAt: identity.createdAt,
    updatedAt: null,
    version: 0,
  };
  if (input.notes !== undefined) order.notes = input.notes;
  return order;
}

export function applyUpdate(order: Order, update: ValidatedOrderUpdate, at: Date, policy?: MoneyPolicy): Order {
  const items = update.items ?? order.items;
  const totals = computeTotals(
    items,
    {
      tax: update.tax ?? order.tax,
      shipping: update.shipping ?? order.shipping,
      discount: update.discount ?? order.discount,
    },
    policy
  );

  return {
    ...order,
    customerEmail: update.customerEmail ?? order.customerEmail,
    billingAddress: update.billingAddress ?? order.billingAddress,
    shippingAddress: update.shippingAddress ?? order.shippingAddress,
    ...(update.notes !== undefined ? { notes: update.notes } : {}),
    items,
    ...totals,
    updatedAt: at,
  };
}

export function withStatus(order: Order, status: OrderStatus, at: Date): Order {
  return { ...order, status, updatedAt: at };
}
