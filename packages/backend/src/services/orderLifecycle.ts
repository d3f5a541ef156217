import { randomUUID } from 'crypto';
import { type CreateOrderInput, type Order, type UpdateOrderInput, OrderStatus } from '@orderdesk/shared';
import { dayRangeBounds, daysInRange } from '../domain/calendar';
import { type Clock, systemClock } from '../domain/clock';
import { InvalidArgumentError, InvalidTransitionError, NotFoundError, ValidationError } from '../domain/errors';
import { DEFAULT_MONEY_POLICY, type MoneyPolicy } from '../domain/money';
import { applyUpdate, buildOrder, withStatus } from '../domain/order';
import { type OrderRules, validateCreateOrder, validateUpdateOrder } from '../domain/orderInput';
import { type OrderNumberGenerator, generateOrderNumber } from '../domain/orderNumber';
import { canTransition, isEditable, isOrderStatus } from '../domain/orderStatus';
import { type TextSanitizer, sanitizeText } from '../domain/sanitize';
import { unwrap } from '../domain/validation';
import { type CreatedAtRange, type OrderFilter, type OrderRepository, type Page, assertPageRequest } from '../repositories/orderRepository';

export const DEFAULT_MAX_ITEMS = 100;
export const DEFAULT_CURRENCY = 'USD';

export interface OrderLifecycleOptions {
  repository: OrderRepository;
  clock?: Clock;
  sanitize?: TextSanitizer;
  orderNumbers?: OrderNumberGenerator;
  ids?: () => string;
  policy?: MoneyPolicy;
  maxItems?: number;
  defaultCurrency?: string;
}

export interface OrderListFilter {
  customerId?: string;
  status?: OrderStatus;
  startDate?: string; // YYYY-MM-DD, inclusive
  endDate?: string;
}

/**
 * Creates and mutates orders. Every mutation is validated, stamped with the
 * injected clock and persisted through the repository; storage errors
 * (duplicate number, stale version) reach the caller unchanged.
 */
export class OrderLifecycleManager {
  private readonly repository: OrderRepository;
  private readonly clock: Clock;
  private readonly orderNumbers: OrderNumberGenerator;
  private readonly ids: () => string;
  private readonly rules: OrderRules;

  constructor(options: OrderLifecycleOptions) {
    this.repository = options.repository;
    this.clock = options.clock ?? systemClock;
    this.orderNumbers = options.orderNumbers ?? generateOrderNumber;
    this.ids = options.ids ?? randomUUID;
    this.rules = {
      policy: options.policy ?? DEFAULT_MONEY_POLICY,
      maxItems: options.maxItems ?? DEFAULT_MAX_ITEMS,
      defaultCurrency: options.defaultCurrency ?? DEFAULT_CURRENCY,
      sanitize: options.sanitize ?? sanitizeText,
    };
  }

  async create(input: CreateOrderInput): Promise<Order> {
    const validated = unwrap(validateCreateOrder(input, this.rules));
    const createdAt = this.clock.now();
    const order = buildOrder(
      validated,
      { id: this.ids(), orderNumber: this.orderNumbers(createdAt), createdAt },
      this.rules.policy
    );
    return this.repository.save(order);
  }

  async update(orderId: string, input: UpdateOrderInput): Promise<Order> {
    const order = await this.getById(orderId);
    if (!isEditable(order.status)) {
      throw new InvalidTransitionError(
        order.id,
        order.status,
        order.status,
        `Order ${order.id} can no longer be edited in status ${order.status}`
      );
    }
    const update = unwrap(validateUpdateOrder(input, this.rules));
    return this.repository.save(applyUpdate(order, update, this.clock.now(), this.rules.policy));
  }

  async transition(orderId: string, target: OrderStatus): Promise<Order> {
    if (!isOrderStatus(target)) {
      throw new ValidationError('status', 'INVALID_FORMAT', `Unknown order status: ${String(target)}`);
    }
    const order = await this.getById(orderId);
    if (!canTransition(order.status, target)) {
      throw new InvalidTransitionError(order.id, order.status, target);
    }
    return this.repository.save(withStatus(order, target, this.clock.now()));
  }

  async cancel(orderId: string): Promise<Order> {
    return this.transition(orderId, OrderStatus.CANCELLED);
  }

  async getById(orderId: string): Promise<Order> {
    const order = await this.repository.getById(orderId);
    if (!order) throw new NotFoundError('order', orderId);
    return order;
  }

  async getByOrderNumber(orderNumber: string): Promise<Order> {
    const order = await this.repository.getByOrderNumber(orderNumber);
    if (!order) throw new NotFoundError('order', orderNumber, 'orderNumber');
    return order;
  }

  /** Newest first. */
  async list(filter: OrderListFilter, page: number, pageSize: number): Promise<Page<Order>> {
    const request = { page, pageSize, direction: 'desc' as const };
    assertPageRequest(request);
    return this.repository.query(toRepositoryFilter(filter), request);
  }

  async delete(orderId: string): Promise<void> {
    const deleted = await this.repository.delete(orderId);
    if (!deleted) throw new NotFoundError('order', orderId);
  }
}

function toRepositoryFilter(filter: OrderListFilter): OrderFilter {
  const result: OrderFilter = {};
  if (filter.customerId !== undefined) result.customerId = filter.customerId;
  if (filter.status !== undefined) result.status = filter.status;

  if (filter.startDate !== undefined || filter.endDate !== undefined) {
    const createdAt: CreatedAtRange = {};
    if (filter.startDate !== undefined) {
      createdAt.from = dayRangeBounds(filter.startDate, filter.startDate).from;
    }
    if (filter.endDate !== undefined) {
      createdAt.to = dayRangeBounds(filter.endDate, filter.endDate).to;
    }
    if (filter.startDate !== undefined && filter.endDate !== undefined && daysInRange(filter.startDate, filter.endDate) < 1) {
      throw new InvalidArgumentError('endDate', 'endDate must be on or after startDate');
    }
    result.createdAt = createdAt;
  }
  return result;
}
