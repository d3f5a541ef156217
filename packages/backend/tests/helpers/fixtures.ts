import { type CreateOrderInput, type Order, type OrderItemInput, OrderStatus, PaymentMethod, PaymentStatus } from '@orderdesk/shared';

export const billingAddress = {
  street: '1 Test Street',
  city: 'Springfield',
  state: 'IL',
  postalCode: '62701',
  country: 'US',
};

export function buildItem(overrides: Partial<OrderItemInput> = {}): OrderItemInput {
  return { productId: 'SKU-A', productName: 'Widget', quantity: 1, unitPrice: 10, ...overrides };
}

export function buildOrderInput(overrides: Partial<CreateOrderInput> = {}): CreateOrderInput {
  return {
    customerId: 'cust-1',
    customerEmail: 'cust-1@example.com',
    items: [buildItem()],
    billingAddress,
    payment: { method: PaymentMethod.CREDIT_CARD, lastFourDigits: '4242' },
    ...overrides,
  };
}

/** The two-item order: 2 x 29.99 + 1 x 10.00, tax 5.99, shipping 9.99. */
export function twoItemOrderInput(overrides: Partial<CreateOrderInput> = {}): CreateOrderInput {
  return buildOrderInput({
    items: [
      buildItem({ productId: 'SKU-A', productName: 'Widget', quantity: 2, unitPrice: 29.99 }),
      buildItem({ productId: 'SKU-B', productName: 'Gadget', quantity: 1, unitPrice: '10.00' }),
    ],
    tax: 5.99,
    shipping: 9.99,
    discount: 0,
    ...overrides,
  });
}

let sequence = 0;

/** A stored-shape order for seeding repositories directly. */
export function buildStoredOrder(overrides: Partial<Order> & Pick<Order, 'createdAt'>): Order {
  sequence += 1;
  const total = overrides.total ?? 100;
  return {
    id: `order-${sequence}`,
    orderNumber: `ORD-20260101-${String(sequence).padStart(8, '0')}`,
    customerId: 'cust-1',
    customerEmail: 'cust-1@example.com',
    status: OrderStatus.CONFIRMED,
    items: [{ productId: 'SKU-A', productName: 'Widget', quantity: 1, unitPrice: total, lineTotal: total }],
    subtotal: total,
    tax: 0,
    shipping: 0,
    discount: 0,
    total,
    currency: 'USD',
    billingAddress,
    shippingAddress: billingAddress,
    payment: { method: PaymentMethod.CREDIT_CARD, status: PaymentStatus.PENDING },
    source: 'api',
    updatedAt: null,
    version: 0,
    ...overrides,
  };
}
