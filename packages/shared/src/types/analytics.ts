import type { OrderStatus } from './order';

export interface DailyMetric {
  date: string; // YYYY-MM-DD
  orderCount: number;
  totalRevenue: number;
  averageOrderValue: number;
  currency: string;
}

export interface PeriodSummary {
  startDate: string;
  endDate: string;
  totalRevenue: number;
  totalOrders: number;
  averageOrderValue: number;
  currency: string;
}

export interface CustomerAnalytics {
  customerId: string;
  customerEmail: string;
  totalOrders: number;
  totalSpent: number;
  averageOrderValue: number;
  firstOrderDate: Date | null;
  lastOrderDate: Date | null;
}

export interface StatusMetric {
  status: OrderStatus;
  count: number;
  totalValue: number;
  percentage: number;
}

export interface AnalyticsSummary {
  period: { startDate: string; endDate: string };
  revenue: PeriodSummary;
  statusBreakdown: StatusMetric[];
  dailyTrend: DailyMetric[];
  topCustomers: CustomerAnalytics[];
  growthRate: number;
  busiestDay: string | null;
  highestRevenueDay: string | null;
}
