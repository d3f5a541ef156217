import type { Order, OrderStatus } from '@orderdesk/shared';
import { InvalidArgumentError } from '../domain/errors';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 200;

/** Inclusive bounds on `createdAt`; either side may be open. */
export interface CreatedAtRange {
  from?: Date;
  to?: Date;
}

export interface OrderFilter {
  customerId?: string;
  status?: OrderStatus;
  currency?: string;
  createdAt?: CreatedAtRange;
}

export interface PageRequest {
  page: number; // 1-based
  pageSize: number;
  direction?: 'asc' | 'desc'; // by createdAt, default asc
}

export interface Page<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
}

/** Position of the last order handed out: orders sort by createdAt, then id. */
export interface OrderCursor {
  createdAt: Date;
  id: string;
}

export interface ScanRequest {
  after: OrderCursor | null;
  limit: number;
}

export interface ScanBatch {
  items: Order[];
  nextCursor: OrderCursor | null; // null once the filter is exhausted
}

/**
 * What the order core needs from the document store.
 *
 * `save` is insert-or-replace keyed by id with an optimistic check: the
 * order's `version` must equal the stored version (0 when absent). The stored
 * and returned copy carries `version + 1`. A clash on the order number raises
 * DuplicateOrderNumberError; a stale version raises ConcurrencyConflictError.
 */
export interface OrderRepository {
  getById(id: string): Promise<Order | null>;
  getByOrderNumber(orderNumber: string): Promise<Order | null>;
  query(filter: OrderFilter, page: PageRequest): Promise<Page<Order>>;
  /** Ascending walk for full scans; each batch resumes after the cursor. */
  scan(filter: OrderFilter, request: ScanRequest): Promise<ScanBatch>;
  save(order: Order): Promise<Order>;
  delete(id: string): Promise<boolean>;
}

export function assertScanLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError('limit', `limit must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
}

export function nextCursorOf(items: readonly Order[], limit: number): OrderCursor | null {
  const last = items[items.length - 1];
  return last && items.length === limit ? { createdAt: last.createdAt, id: last.id } : null;
}

export function assertPageRequest(request: PageRequest): void {
  if (!Number.isInteger(request.page) || request.page < 1) {
    throw new InvalidArgumentError('page', 'page must be a positive integer');
  }
  if (!Number.isInteger(request.pageSize) || request.pageSize < 1 || request.pageSize > MAX_PAGE_SIZE) {
    throw new InvalidArgumentError('pageSize', `pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
  }
}
