import {
  type Address,
  type CreateOrderInput,
  type OrderItem,
  type PaymentReference,
  type UpdateOrderInput,
  PaymentMethod,
  PaymentStatus,
} from '@orderdesk/shared';
import { ValidationError } from './errors';
import { type Money, type MoneyPolicy, multiplyMoney, ZERO } from './money';
import type { TextSanitizer } from './sanitize';
import {
  type StepResult,
  type ValidationStep,
  ValidationPipeline,
  attempt,
  each,
  email,
  fail,
  money,
  ok,
  oneOf,
  optional,
  quantity,
  text,
} from './validation';

export interface OrderRules {
  policy: MoneyPolicy;
  maxItems: number;
  defaultCurrency: string;
  sanitize: TextSanitizer;
}

export interface Adjustments {
  tax: Money;
  shipping: Money;
  discount: Money;
}

export interface ValidatedOrderInput extends Adjustments {
  customerId: string;
  customerEmail: string;
  items: OrderItem[];
  billingAddress: Address;
  shippingAddress: Address;
  payment: PaymentReference;
  currency: string;
  notes?: string;
  source: string;
}

export type ValidatedOrderUpdate = Partial<Omit<ValidatedOrderInput, 'customerId' | 'payment' | 'currency' | 'source'>>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Upper-cases strings; the fallback applies only when the value is absent. */
function upperCasedOr(raw: unknown, fallback: string): unknown {
  if (raw === undefined) return fallback;
  return typeof raw === 'string' ? raw.toUpperCase() : raw;
}

function record(field: string, raw: unknown): StepResult<Record<string, unknown>> {
  return isRecord(raw) ? ok(raw) : fail(new ValidationError(field, 'REQUIRED', `${field} is required`));
}

export function validateItems(raw: unknown, rules: OrderRules): StepResult<OrderItem[]> {
  if (!Array.isArray(raw) || raw.length === 0) {
    return fail(new ValidationError('items', 'EMPTY_ITEMS', 'Order must contain at least one item'));
  }
  if (raw.length > rules.maxItems) {
    return fail(new ValidationError('items', 'TOO_MANY_ITEMS', `Order cannot contain more than ${rules.maxItems} items`));
  }

  return each<unknown, OrderItem>(raw, (entry, index) => {
    const field = `items[${index}]`;
    const item = record(field, entry);
    if (!item.ok) return item;

    const productId = text(`${field}.productId`, rules.sanitize, { max: 100 })(item.value.productId);
    if (!productId.ok) return productId;
    const productName = text(`${field}.productName`, rules.sanitize, { max: 255 })(item.value.productName);
    if (!productName.ok) return productName;
    const qty = quantity(`${field}.quantity`, rules.policy)(item.value.quantity);
    if (!qty.ok) return qty;
    const unitPrice = money(`${field}.unitPrice`, rules.policy)(item.value.unitPrice);
    if (!unitPrice.ok) return unitPrice;
    const lineTotal = attempt(() => multiplyMoney(unitPrice.value, qty.value, `${field}.lineTotal`, rules.policy));
    if (!lineTotal.ok) return lineTotal;

    return ok({
      productId: productId.value,
      productName: productName.value,
      quantity: qty.value,
      unitPrice: unitPrice.value,
      lineTotal: lineTotal.value,
    });
  });
}

export function validateAddress(field: string, raw: unknown, rules: OrderRules): StepResult<Address> {
  const address = record(field, raw);
  if (!address.ok) return address;
  const { sanitize } = rules;

  const street = text(`${field}.street`, sanitize, { max: 255 })(address.value.street);
  if (!street.ok) return street;
  const city = text(`${field}.city`, sanitize, { max: 100 })(address.value.city);
  if (!city.ok) return city;
  const state = text(`${field}.state`, sanitize, { min: 2, max: 50 })(address.value.state);
  if (!state.ok) return state;
  const postalCode = text(`${field}.postalCode`, sanitize, { min: 5, max: 20 })(address.value.postalCode);
  if (!postalCode.ok) return postalCode;
  const country = text(`${field}.country`, sanitize, { min: 2, max: 2, pattern: /^[A-Z]{2}$/ })(
    upperCasedOr(address.value.country, 'US')
  );
  if (!country.ok) return country;

  return ok({
    street: street.value,
    city: city.value,
    state: state.value,
    postalCode: postalCode.value,
    country: country.value,
  });
}

function validatePayment(raw: unknown, rules: OrderRules): StepResult<PaymentReference> {
  const payment = record('payment', raw);
  if (!payment.ok) return payment;

  const method = oneOf('payment.method', Object.values(PaymentMethod))(payment.value.method);
  if (!method.ok) return method;
  const lastFourDigits = optional(text('payment.lastFourDigits', rules.sanitize, { min: 4, max: 4, pattern: /^\d{4}$/ }))(
    payment.value.lastFourDigits
  );
  if (!lastFourDigits.ok) return lastFourDigits;
  const transactionId = optional(text('payment.transactionId', rules.sanitize, { max: 100 }))(payment.value.transactionId);
  if (!transactionId.ok) return transactionId;
  const processor = optional(text('payment.processor', rules.sanitize, { max: 50 }))(payment.value.processor);
  if (!processor.ok) return processor;

  const reference: PaymentReference = { method: method.value, status: PaymentStatus.PENDING };
  if (lastFourDigits.value !== undefined) reference.lastFourDigits = lastFourDigits.value;
  if (transactionId.value !== undefined) reference.transactionId = transactionId.value;
  if (processor.value !== undefined) reference.processor = processor.value;
  return ok(reference);
}

function adjustment(field: keyof Adjustments, rules: OrderRules, fallback?: Money): ValidationStep<unknown, Money> {
  return money(field, rules.policy, fallback);
}

const notesRule = { max: 1000 };
const currencyPattern = /^[A-Z]{3}$/;

type Identity = Pick<ValidatedOrderInput, 'customerId' | 'customerEmail'>;
type Addresses = Pick<ValidatedOrderInput, 'billingAddress' | 'shippingAddress'>;
type Metadata = Pick<ValidatedOrderInput, 'currency' | 'notes' | 'source'>;

function identityStage(input: CreateOrderInput, rules: OrderRules): StepResult<Identity> {
  const customerId = text('customerId', rules.sanitize, { max: 100 })(input.customerId);
  if (!customerId.ok) return customerId;
  const customerEmail = email('customerEmail')(input.customerEmail);
  if (!customerEmail.ok) return customerEmail;
  return ok({ customerId: customerId.value, customerEmail: customerEmail.value });
}

function itemsStage(input: CreateOrderInput, rules: OrderRules): StepResult<{ items: OrderItem[] }> {
  const items = validateItems(input.items, rules);
  return items.ok ? ok({ items: items.value }) : items;
}

function adjustmentsStage(input: CreateOrderInput, rules: OrderRules): StepResult<Adjustments> {
  const tax = adjustment('tax', rules, ZERO)(input.tax);
  if (!tax.ok) return tax;
  const shipping = adjustment('shipping', rules, ZERO)(input.shipping);
  if (!shipping.ok) return shipping;
  const discount = adjustment('discount', rules, ZERO)(input.discount);
  if (!discount.ok) return discount;
  return ok({ tax: tax.value, shipping: shipping.value, discount: discount.value });
}

function addressesStage(input: CreateOrderInput, rules: OrderRules): StepResult<Addresses> {
  const billingAddress = validateAddress('billingAddress', input.billingAddress, rules);
  if (!billingAddress.ok) return billingAddress;
  if (input.shippingAddress === undefined) {
    return ok({ billingAddress: billingAddress.value, shippingAddress: billingAddress.value });
  }
  const shippingAddress = validateAddress('shippingAddress', input.shippingAddress, rules);
  if (!shippingAddress.ok) return shippingAddress;
  return ok({ billingAddress: billingAddress.value, shippingAddress: shippingAddress.value });
}

function paymentStage(input: CreateOrderInput, rules: OrderRules): StepResult<{ payment: PaymentReference }> {
  const payment = validatePayment(input.payment, rules);
  return payment.ok ? ok({ payment: payment.value }) : payment;
}

function metadataStage(input: CreateOrderInput, rules: OrderRules): StepResult<Metadata> {
  const currency = text('currency', rules.sanitize, { min: 3, max: 3, pattern: currencyPattern })(
    upperCasedOr(input.currency, rules.defaultCurrency)
  );
  if (!currency.ok) return currency;
  const notes = optional(text('notes', rules.sanitize, notesRule))(input.notes);
  if (!notes.ok) return notes;
  const source = text('source', rules.sanitize, { max: 50, truncate: true })(input.source ?? 'api');
  if (!source.ok) return source;

  const metadata: Metadata = { currency: currency.value, source: source.value };
  if (notes.value !== undefined) metadata.notes = notes.value;
  return ok(metadata);
}

/**
 * Creation pipeline. Order matters: identity, items, adjustments, addresses,
 * payment, then metadata; the first failure is reported.
 */
export function createOrderPipeline(rules: OrderRules) {
  return ValidationPipeline.start<CreateOrderInput>()
    .step((input) => identityStage(input, rules))
    .step((input) => itemsStage(input, rules))
    .step((input) => adjustmentsStage(input, rules))
    .step((input) => addressesStage(input, rules))
    .step((input) => paymentStage(input, rules))
    .step((input) => metadataStage(input, rules));
}

export function validateCreateOrder(input: CreateOrderInput, rules: OrderRules): StepResult<ValidatedOrderInput> {
  return createOrderPipeline(rules).run(input);
}

/** Validates only the fields present on the update; absent fields stay untouched. */
export function validateUpdateOrder(input: UpdateOrderInput, rules: OrderRules): StepResult<ValidatedOrderUpdate> {
  const update: ValidatedOrderUpdate = {};

  if (input.customerEmail !== undefined) {
    const customerEmail = email('customerEmail')(input.customerEmail);
    if (!customerEmail.ok) return customerEmail;
    update.customerEmail = customerEmail.value;
  }
  if (input.items !== undefined) {
    const items = validateItems(input.items, rules);
    if (!items.ok) return items;
    update.items = items.value;
  }
  for (const field of ['tax', 'shipping', 'discount'] as const) {
    if (input[field] === undefined) continue;
    const value = adjustment(field, rules)(input[field]);
    if (!value.ok) return value;
    update[field] = value.value;
  }
  if (input.billingAddress !== undefined) {
    const billingAddress = validateAddress('billingAddress', input.billingAddress, rules);
    if (!billingAddress.ok) return billingAddress;
    update.billingAddress = billingAddress.value;
  }
  if (input.shippingAddress !== undefined) {
    const shippingAddress = validateAddress('shippingAddress', input.shippingAddress, rules);
    if (!shippingAddress.ok) return shippingAddress;
    update.shippingAddress = shippingAddress.value;
  }
  if (input.notes !== undefined) {
    const notes = text('notes', rules.sanitize, notesRule)(input.notes);
    if (!notes.ok) return notes;
    update.notes = notes.value;
  }
  return ok(update);
}
