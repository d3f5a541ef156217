import {
  type AnalyticsSummary,
  type CustomerAnalytics,
  type DailyMetric,
  type Order,
  type PeriodSummary,
  type StatusMetric,
  OrderStatus,
} from '@orderdesk/shared';
import { type Day, addDaysToDay, dayRangeBounds, daysInRange, eachDayInRange, firstDayOfMonth, formatDay } from '../domain/calendar';
import { type Clock, systemClock } from '../domain/clock';
import { InvalidArgumentError, NotFoundError } from '../domain/errors';
import { type Money, ZERO, divideCentsHalfUp, fromCents, toCents } from '../domain/money';
import {
  type OrderCursor,
  type OrderFilter,
  type OrderRepository,
  type ScanBatch,
  MAX_PAGE_SIZE,
} from '../repositories/orderRepository';
import { DEFAULT_CURRENCY } from './orderLifecycle';

/** Statuses whose orders never count toward revenue, customer value or trends. */
export const DEFAULT_REVENUE_EXCLUDED_STATUSES: readonly OrderStatus[] = Object.freeze([OrderStatus.CANCELLED]);

export const TOP_CUSTOMERS_IN_SUMMARY = 5;

export interface PeriodComparison {
  current: PeriodSummary;
  previous: PeriodSummary;
  growthRate: number;
}

export interface AnalyticsOptions {
  repository: OrderRepository;
  clock?: Clock;
  excludedStatuses?: readonly OrderStatus[];
  pageSize?: number;
  defaultCurrency?: string;
}

export interface DateWindow {
  startDate?: Day;
  endDate?: Day;
}

export interface CurrencyOption {
  currency?: string;
}

const STATUS_ORDER: readonly OrderStatus[] = Object.values(OrderStatus);

interface Bucket {
  count: number;
  cents: number;
}

function average(cents: number, count: number): Money {
  return count > 0 ? fromCents(divideCentsHalfUp(cents, count)) : ZERO;
}

/** Per-day buckets for every day of `days`, zero-filled, in the given order. */
export function bucketDaily(days: readonly Day[], orders: readonly Order[], currency: string): DailyMetric[] {
  const buckets = new Map<Day, Bucket>();
  for (const order of orders) {
    const day = formatDay(order.createdAt);
    const bucket = buckets.get(day) ?? { count: 0, cents: 0 };
    bucket.count += 1;
    bucket.cents += toCents(order.total);
    buckets.set(day, bucket);
  }

  return days.map((date) => {
    const bucket = buckets.get(date) ?? { count: 0, cents: 0 };
    return {
      date,
      orderCount: bucket.count,
      totalRevenue: fromCents(bucket.cents),
      averageOrderValue: average(bucket.cents, bucket.count),
      currency,
    };
  });
}

/** Folds daily metrics into one summary. Revenue is summed in cents, so it equals the sum of the days. */
export function foldDailyMetrics(startDate: Day, endDate: Day, metrics: readonly DailyMetric[], currency: string): PeriodSummary {
  let cents = 0;
  let totalOrders = 0;
  for (const metric of metrics) {
    cents += toCents(metric.totalRevenue);
    totalOrders += metric.orderCount;
  }
  return {
    startDate,
    endDate,
    totalRevenue: fromCents(cents),
    totalOrders,
    averageOrderValue: average(cents, totalOrders),
    currency,
  };
}

/**
 * Percentage change of revenue, rounded half-up to two decimals.
 * A previous revenue of zero yields 0 rather than an error.
 */
export function computeGrowthRate(
  current: Pick<PeriodSummary, 'totalRevenue'>,
  previous: Pick<PeriodSummary, 'totalRevenue'>
): number {
  const previousCents = BigInt(toCents(previous.totalRevenue));
  if (previousCents === 0n) return 0;
  // Hundredths of a percent: delta / previous * 100 * 100, kept in bigint past 2^53.
  const scaled = (BigInt(toCents(current.totalRevenue)) - previousCents) * 10_000n;
  const negative = (scaled < 0n) !== (previousCents < 0n);
  const numerator = scaled < 0n ? -scaled : scaled;
  const divisor = previousCents < 0n ? -previousCents : previousCents;
  const magnitude = (2n * numerator + divisor) / (2n * divisor);
  return fromCents(Number(negative ? -magnitude : magnitude));
}

/** One customer's orders, folded in creation order. The most recent email wins. */
export function foldCustomer(customerId: string, orders: readonly Order[]): CustomerAnalytics {
  const sorted = [...orders].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  const cents = sorted.reduce((sum, order) => sum + toCents(order.total), 0);
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  return {
    customerId,
    customerEmail: last ? last.customerEmail : '',
    totalOrders: sorted.length,
    totalSpent: fromCents(cents),
    averageOrderValue: average(cents, sorted.length),
    firstOrderDate: first ? first.createdAt : null,
    lastOrderDate: last ? last.createdAt : null,
  };
}

/** Descending by total spent; ties go to the earlier first order, then the customer id. */
export function rankCustomers(orders: readonly Order[], limit: number): CustomerAnalytics[] {
  const byCustomer = new Map<string, Order[]>();
  for (const order of orders) {
    const list = byCustomer.get(order.customerId) ?? [];
    list.push(order);
    byCustomer.set(order.customerId, list);
  }

  const ranked = [...byCustomer].map(([customerId, list]) => foldCustomer(customerId, list));
  ranked.sort((a, b) => {
    const spent = toCents(b.totalSpent) - toCents(a.totalSpent);
    if (spent !== 0) return spent;
    const first = (a.firstOrderDate?.getTime() ?? 0) - (b.firstOrderDate?.getTime() ?? 0);
    if (first !== 0) return first;
    return a.customerId < b.customerId ? -1 : a.customerId > b.customerId ? 1 : 0;
  });
  return ranked.slice(0, limit);
}

export function breakdownByStatus(orders: readonly Order[]): StatusMetric[] {
  const buckets = new Map<OrderStatus, Bucket>();
  for (const order of orders) {
    const bucket = buckets.get(order.status) ?? { count: 0, cents: 0 };
    bucket.count += 1;
    bucket.cents += toCents(order.total);
    buckets.set(order.status, bucket);
  }

  return [...buckets]
    .map(([status, bucket]) => ({
      status,
      count: bucket.count,
      totalValue: fromCents(bucket.cents),
      percentage: fromCents(divideCentsHalfUp(bucket.count * 10_000, orders.length)),
    }))
    .sort((a, b) => b.count - a.count || STATUS_ORDER.indexOf(a.status) - STATUS_ORDER.indexOf(b.status));
}

function peakDay(metrics: readonly DailyMetric[], score: (metric: DailyMetric) => number): Day | null {
  let best: DailyMetric | null = null;
  for (const metric of metrics) {
    if (score(metric) > 0 && (best === null || score(metric) > score(best))) best = metric;
  }
  return best ? best.date : null;
}

/**
 * Read-only analytics over the order repository. Every query walks the
 * repository by cursor until the window is exhausted; nothing is cached.
 */
export class AnalyticsAggregator {
  private readonly repository: OrderRepository;
  private readonly clock: Clock;
  private readonly excluded: ReadonlySet<OrderStatus>;
  private readonly pageSize: number;
  private readonly defaultCurrency: string;

  constructor(options: AnalyticsOptions) {
    this.repository = options.repository;
    this.clock = options.clock ?? systemClock;
    this.excluded = new Set(options.excludedStatuses ?? DEFAULT_REVENUE_EXCLUDED_STATUSES);
    const pageSize = options.pageSize ?? MAX_PAGE_SIZE;
    if (!Number.isInteger(pageSize) || pageSize < 1 || pageSize > MAX_PAGE_SIZE) {
      throw new InvalidArgumentError('pageSize', `pageSize must be an integer between 1 and ${MAX_PAGE_SIZE}`);
    }
    this.pageSize = pageSize;
    this.defaultCurrency = options.defaultCurrency ?? DEFAULT_CURRENCY;
  }

  get excludedStatuses(): OrderStatus[] {
    return STATUS_ORDER.filter((status) => this.excluded.has(status));
  }

  async dailyMetrics(startDate: Day, endDate: Day, options: CurrencyOption = {}): Promise<DailyMetric[]> {
    const orders = this.revenueBearing(await this.ordersBetween(startDate, endDate, options));
    return bucketDaily(eachDayInRange(startDate, endDate), orders, this.currencyOf(orders, options));
  }

  async periodSummary(startDate: Day, endDate: Day, options: CurrencyOption = {}): Promise<PeriodSummary> {
    const orders = this.revenueBearing(await this.ordersBetween(startDate, endDate, options));
    const currency = this.currencyOf(orders, options);
    return foldDailyMetrics(startDate, endDate, bucketDaily(eachDayInRange(startDate, endDate), orders, currency), currency);
  }

  /** The last `days` days, today included. */
  async revenueTrend(days: number, options: CurrencyOption = {}): Promise<DailyMetric[]> {
    if (!Number.isInteger(days) || days < 1) {
      throw new InvalidArgumentError('days', 'days must be a positive integer');
    }
    const today = formatDay(this.clock.now());
    return this.dailyMetrics(addDaysToDay(today, 1 - days, 'days'), today, options);
  }

  async topCustomers(limit: number, window: DateWindow = {}, options: CurrencyOption = {}): Promise<CustomerAnalytics[]> {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new InvalidArgumentError('limit', 'limit must be a positive integer');
    }
    const orders = this.revenueBearing(await this.ordersInWindow(window, {}, options));
    this.currencyOf(orders, options);
    return rankCustomers(orders, limit);
  }

  /**
   * Fails with NotFound when the customer has no orders in the window. A
   * customer whose only orders are excluded (cancelled) folds to zeros.
   */
  async customerAnalytics(customerId: string, window: DateWindow = {}, options: CurrencyOption = {}): Promise<CustomerAnalytics> {
    const orders = await this.ordersInWindow(window, { customerId }, options);
    if (orders.length === 0) {
      throw new NotFoundError('customer', customerId, 'customerId');
    }
    const counted = this.revenueBearing(orders);
    this.currencyOf(counted, options);
    if (counted.length > 0) return foldCustomer(customerId, counted);

    const latest = foldCustomer(customerId, orders);
    return { ...foldCustomer(customerId, []), customerEmail: latest.customerEmail };
  }

  growthRate(current: Pick<PeriodSummary, 'totalRevenue'>, previous: Pick<PeriodSummary, 'totalRevenue'>): number {
    return computeGrowthRate(current, previous);
  }

  /** The window against the one of the same length just before it. */
  async comparePeriods(startDate: Day, endDate: Day, options: CurrencyOption = {}): Promise<PeriodComparison> {
    const current = await this.periodSummary(startDate, endDate, options);
    const previous = await this.previousPeriod(startDate, endDate, options.currency ?? current.currency);
    return { current, previous, growthRate: computeGrowthRate(current, previous) };
  }

  /** Counts every status, excluded ones included. */
  async statusBreakdown(startDate: Day, endDate: Day, options: CurrencyOption = {}): Promise<StatusMetric[]> {
    const orders = await this.ordersBetween(startDate, endDate, options);
    this.currencyOf(orders, options);
    return breakdownByStatus(orders);
  }

  /** Everything a dashboard needs for one window, compared with the window just before it. */
  async summary(startDate: Day, endDate: Day, options: CurrencyOption = {}): Promise<AnalyticsSummary> {
    const all = await this.ordersBetween(startDate, endDate, options);
    const orders = this.revenueBearing(all);
    const currency = this.currencyOf(orders, options);
    const dailyTrend = bucketDaily(eachDayInRange(startDate, endDate), orders, currency);
    const revenue = foldDailyMetrics(startDate, endDate, dailyTrend, currency);
    const previous = await this.previousPeriod(startDate, endDate, options.currency ?? currency);

    return {
      period: { startDate, endDate },
      revenue,
      statusBreakdown: breakdownByStatus(all),
      dailyTrend,
      topCustomers: rankCustomers(orders, TOP_CUSTOMERS_IN_SUMMARY),
      growthRate: computeGrowthRate(revenue, previous),
      busiestDay: peakDay(dailyTrend, (metric) => metric.orderCount),
      highestRevenueDay: peakDay(dailyTrend, (metric) => toCents(metric.totalRevenue)),
    };
  }

  async quickToday(options: CurrencyOption = {}): Promise<AnalyticsSummary> {
    const today = formatDay(this.clock.now());
    return this.summary(today, today, options);
  }

  async quickWeek(options: CurrencyOption = {}): Promise<AnalyticsSummary> {
    const today = formatDay(this.clock.now());
    return this.summary(addDaysToDay(today, -6), today, options);
  }

  async quickMonth(options: CurrencyOption = {}): Promise<AnalyticsSummary> {
    const today = formatDay(this.clock.now());
    return this.summary(firstDayOfMonth(today), today, options);
  }

  private async previousPeriod(startDate: Day, endDate: Day, currency: string): Promise<PeriodSummary> {
    const length = daysInRange(startDate, endDate);
    return this.periodSummary(addDaysToDay(startDate, -length, 'startDate'), addDaysToDay(startDate, -1, 'startDate'), {
      currency,
    });
  }

  private revenueBearing(orders: readonly Order[]): Order[] {
    return orders.filter((order) => !this.excluded.has(order.status));
  }

  /** The requested currency, or the single currency the orders share. */
  private currencyOf(orders: readonly Order[], options: CurrencyOption): string {
    if (options.currency !== undefined) return options.currency;
    const currencies = [...new Set(orders.map((order) => order.currency))].sort();
    if (currencies.length > 1) {
      throw new InvalidArgumentError(
        'currency',
        `Orders in this window use several currencies (${currencies.join(', ')}); pass a currency to aggregate one of them`
      );
    }
    return currencies[0] ?? this.defaultCurrency;
  }

  private async ordersBetween(startDate: Day, endDate: Day, options: CurrencyOption): Promise<Order[]> {
    return this.ordersInWindow({ startDate, endDate }, {}, options);
  }

  private async ordersInWindow(window: DateWindow, base: OrderFilter, options: CurrencyOption): Promise<Order[]> {
    const filter: OrderFilter = { ...base };
    if (options.currency !== undefined) filter.currency = options.currency;

    const { startDate, endDate } = window;
    if (startDate !== undefined && endDate !== undefined) {
      if (daysInRange(startDate, endDate) < 1) {
        throw new InvalidArgumentError('endDate', 'endDate must be on or after startDate');
      }
      filter.createdAt = dayRangeBounds(startDate, endDate);
    } else if (startDate !== undefined) {
      filter.createdAt = { from: dayRangeBounds(startDate, startDate).from };
    } else if (endDate !== undefined) {
      filter.createdAt = { to: dayRangeBounds(endDate, endDate).to };
    }
    return this.collect(filter);
  }

  private async collect(filter: OrderFilter): Promise<Order[]> {
    const orders: Order[] = [];
    let after: OrderCursor | null = null;
    do {
      const batch: ScanBatch = await this.repository.scan(filter, { after, limit: this.pageSize });
      orders.push(...batch.items);
      after = batch.nextCursor;
    } while (after !== null);
    return orders;
  }
}
