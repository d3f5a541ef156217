import type { Order } from '@orderdesk/shared';
import { ConcurrencyConflictError, DuplicateOrderNumberError } from '../domain/errors';
import {
  type OrderCursor,
  type OrderFilter,
  type OrderRepository,
  type Page,
  type PageRequest,
  type ScanBatch,
  type ScanRequest,
  assertPageRequest,
  assertScanLimit,
  nextCursorOf,
} from './orderRepository';

function matches(order: Order, filter: OrderFilter): boolean {
  if (filter.customerId !== undefined && order.customerId !== filter.customerId) return false;
  if (filter.status !== undefined && order.status !== filter.status) return false;
  if (filter.currency !== undefined && order.currency !== filter.currency) return false;
  const created = order.createdAt.getTime();
  if (filter.createdAt?.from && created < filter.createdAt.from.getTime()) return false;
  if (filter.createdAt?.to && created > filter.createdAt.to.getTime()) return false;
  return true;
}

function compareByPosition(a: OrderCursor, b: OrderCursor): number {
  const created = a.createdAt.getTime() - b.createdAt.getTime();
  if (created !== 0) return created;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/** Process-local store with the same contract as the Firestore repository. */
export class InMemoryOrderRepository implements OrderRepository {
  private readonly orders = new Map<string, Order>();
  private readonly orderNumbers = new Map<string, string>();

  async getById(id: string): Promise<Order | null> {
    const order = this.orders.get(id);
    return order ? structuredClone(order) : null;
  }

  async getByOrderNumber(orderNumber: string): Promise<Order | null> {
    const id = this.orderNumbers.get(orderNumber);
    return id === undefined ? null : this.getById(id);
  }

  async query(filter: OrderFilter, request: PageRequest): Promise<Page<Order>> {
    assertPageRequest(request);
    const sign = request.direction === 'desc' ? -1 : 1;
    const matched = this.matching(filter).sort((a, b) => sign * compareByPosition(a, b));

    const offset = (request.page - 1) * request.pageSize;
    return {
      items: matched.slice(offset, offset + request.pageSize).map((order) => structuredClone(order)),
      totalCount: matched.length,
      page: request.page,
      pageSize: request.pageSize,
    };
  }

  async scan(filter: OrderFilter, request: ScanRequest): Promise<ScanBatch> {
    assertScanLimit(request.limit);
    const { after } = request;
    const items = this.matching(filter)
      .filter((order) => after === null || compareByPosition(order, after) > 0)
      .sort(compareByPosition)
      .slice(0, request.limit)
      .map((order) => structuredClone(order));
    return { items, nextCursor: nextCursorOf(items, request.limit) };
  }

  async save(order: Order): Promise<Order> {
    const existing = this.orders.get(order.id);
    const currentVersion = existing?.version ?? 0;
    if (order.version !== currentVersion) {
      throw new ConcurrencyConflictError(order.id, order.version, existing ? existing.version : null);
    }
    const owner = this.orderNumbers.get(order.orderNumber);
    if (owner !== undefined && owner !== order.id) {
      throw new DuplicateOrderNumberError(order.orderNumber);
    }

    const saved: Order = { ...structuredClone(order), version: currentVersion + 1 };
    this.orders.set(saved.id, saved);
    this.orderNumbers.set(saved.orderNumber, saved.id);
    return structuredClone(saved);
  }

  async delete(id: string): Promise<boolean> {
    const existing = this.orders.get(id);
    if (!existing) return false;
    this.orders.delete(id);
    this.orderNumbers.delete(existing.orderNumber);
    return true;
  }

  get size(): number {
    return this.orders.size;
  }

  private matching(filter: OrderFilter): Order[] {
    return Array.from(this.orders.values()).filter((order) => matches(order, filter));
  }
}
