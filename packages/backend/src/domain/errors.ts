import type { OrderStatus } from '@orderdesk/shared';

export type ErrorDetails = Record<string, unknown>;

/**
 * Base class for every failure the order core reports. `code` is stable and
 * safe to hand to clients; `details` names the offending field or state.
 */
export class OrderDomainError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details: ErrorDetails;

  constructor(message: string, code: string, statusCode: number, details: ErrorDetails = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
  }

  toJSON(): Record<string, unknown> {
    return { error: this.message, code: this.code, details: this.details };
  }
}

export type ValidationReason =
  | 'REQUIRED'
  | 'INVALID_FORMAT'
  | 'TOO_LONG'
  | 'TOO_SHORT'
  | 'INVALID_AMOUNT'
  | 'AMOUNT_OVERFLOW'
  | 'INVALID_QUANTITY'
  | 'EMPTY_ITEMS'
  | 'TOO_MANY_ITEMS'
  | 'NEGATIVE_TOTAL';

export class ValidationError extends OrderDomainError {
  public readonly field: string;
  public readonly reason: ValidationReason;

  constructor(field: string, reason: ValidationReason, message: string) {
    super(message, 'VALIDATION_ERROR', 400, { field, reason });
    this.field = field;
    this.reason = reason;
  }
}

export class InvalidAmountError extends ValidationError {
  constructor(field: string, message: string) {
    super(field, 'INVALID_AMOUNT', message);
  }
}

export class AmountOverflowError extends ValidationError {
  constructor(field: string, max: number) {
    super(field, 'AMOUNT_OVERFLOW', `${field} cannot exceed ${max.toFixed(2)}`);
  }
}

export class InvalidQuantityError extends ValidationError {
  constructor(field: string, message: string) {
    super(field, 'INVALID_QUANTITY', message);
  }
}

export class InvalidTransitionError extends OrderDomainError {
  constructor(orderId: string, from: OrderStatus, to: OrderStatus, message?: string) {
    super(message ?? `Cannot move order ${orderId} from ${from} to ${to}`, 'INVALID_TRANSITION', 409, { orderId, from, to });
  }
}

export class NotFoundError extends OrderDomainError {
  constructor(resource: 'order' | 'customer', key: string, field = 'id') {
    super(
      `${resource === 'order' ? 'Order' : 'Customer'} ${key} not found`,
      resource === 'order' ? 'ORDER_NOT_FOUND' : 'CUSTOMER_NOT_FOUND',
      404,
      { resource, field, key }
    );
  }
}

export class DuplicateOrderNumberError extends OrderDomainError {
  constructor(orderNumber: string) {
    super(`Order number ${orderNumber} is already in use`, 'DUPLICATE_ORDER_NUMBER', 409, { field: 'orderNumber', orderNumber });
  }
}

/** Raised when a save races another writer. Callers may reload and retry. */
export class ConcurrencyConflictError extends OrderDomainError {
  constructor(orderId: string, expectedVersion: number, actualVersion: number | null) {
    super(
      `Order ${orderId} was modified concurrently (expected version ${expectedVersion}, found ${actualVersion ?? 'none'})`,
      'CONCURRENCY_CONFLICT',
      409,
      { orderId, expectedVersion, actualVersion, retryable: true }
    );
  }
}

export class InvalidArgumentError extends OrderDomainError {
  constructor(argument: string, message: string) {
    super(message, 'INVALID_ARGUMENT', 400, { field: argument });
  }
}

export function isOrderDomainError(error: unknown): error is OrderDomainError {
  return error instanceof OrderDomainError;
}
