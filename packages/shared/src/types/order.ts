export enum OrderStatus {
  PENDING = 'pending',
  CONFIRMED = 'confirmed',
  PROCESSING = 'processing',
  SHIPPED = 'shipped',
  DELIVERED = 'delivered',
  CANCELLED = 'cancelled'
}

export enum PaymentStatus {
  PENDING = 'pending',
  AUTHORIZED = 'authorized',
  CAPTURED = 'captured',
  FAILED = 'failed',
  REFUNDED = 'refunded'
}

export enum PaymentMethod {
  CREDIT_CARD = 'credit_card',
  DEBIT_CARD = 'debit_card',
  PAYPAL = 'paypal',
  APPLE_PAY = 'apple_pay',
  GOOGLE_PAY = 'google_pay'
}

export interface Address {
  street: string;
  city: string;
  state: string;
  postalCode: string;
  country: string; // ISO 3166-1 alpha-2
}

export interface OrderItem {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number; // quantity * unitPrice, rounded half-up to cents
}

export interface PaymentReference {
  method: PaymentMethod;
  status: PaymentStatus;
  transactionId?: string;
  lastFourDigits?: string;
  processor?: string; // e.g. "stripe", "paypal"
}

export interface Order {
  id: string;
  orderNumber: string; // ORD-YYYYMMDD-XXXXXXXX
  customerId: string;
  customerEmail: string;
  status: OrderStatus;
  items: OrderItem[];
  subtotal: number;
  tax: number;
  shipping: number;
  discount: number;
  total: number; // subtotal + tax + shipping - discount, never set directly
  currency: string;
  billingAddress: Address;
  shippingAddress: Address;
  payment: PaymentReference;
  notes?: string;
  source: string; // web, mobile, api ...
  createdAt: Date;
  updatedAt: Date | null;
  version: number; // optimistic concurrency stamp
}

export interface AddressInput {
  street: string;
  city: string;
  state: string;
  postalCode: string;
  country?: string; // defaults to US
}

export interface OrderItemInput {
  productId: string;
  productName: string;
  quantity: number;
  unitPrice: number | string;
}

export interface PaymentInput {
  method: PaymentMethod;
  lastFourDigits?: string;
  transactionId?: string;
  processor?: string;
}

export interface CreateOrderInput {
  customerId: string;
  customerEmail: string;
  items: OrderItemInput[];
  billingAddress: AddressInput;
  shippingAddress?: AddressInput;
  payment: PaymentInput;
  tax?: number | string;
  shipping?: number | string;
  discount?: number | string;
  currency?: string;
  notes?: string;
  source?: string;
}

export interface UpdateOrderInput {
  customerEmail?: string;
  items?: OrderItemInput[];
  billingAddress?: AddressInput;
  shippingAddress?: AddressInput;
  tax?: number | string;
  shipping?: number | string;
  discount?: number | string;
  notes?: string;
}
