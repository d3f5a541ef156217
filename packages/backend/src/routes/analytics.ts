import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import type { AnalyticsAggregator } from '../services/analytics';
import { sendError } from './errors';

export const MAX_RANGE_DAYS = 366;
const DAY_MS = 24 * 60 * 60 * 1000;

const day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'must be a YYYY-MM-DD date');
const currency = z
  .string()
  .regex(/^[A-Za-z]{3}$/, 'must be a 3-letter currency code')
  .transform((value) => value.toUpperCase())
  .optional();

// Inverted or impossible dates are left to the aggregator, which reports them as INVALID_ARGUMENT.
const withinCap = (range: { startDate?: string; endDate?: string }) => {
  if (range.startDate === undefined || range.endDate === undefined) return true;
  const span = (Date.parse(range.endDate) - Date.parse(range.startDate)) / DAY_MS + 1;
  return !(span > MAX_RANGE_DAYS);
};
const capMessage = { message: `Date range cannot exceed ${MAX_RANGE_DAYS} days`, path: ['endDate'] };

const rangeQuerySchema = z.object({ startDate: day, endDate: day, currency }).refine(withinCap, capMessage);

const optionalRangeQuerySchema = z
  .object({ startDate: day.optional(), endDate: day.optional(), currency })
  .refine(withinCap, capMessage);

const trendQuerySchema = z.object({
  days: z.coerce.number().int().min(1).max(MAX_RANGE_DAYS).default(30),
  currency,
});

const topCustomersQuerySchema = z
  .object({
    limit: z.coerce.number().int().min(1).max(100).default(10),
    startDate: day.optional(),
    endDate: day.optional(),
    currency,
  })
  .refine(withinCap, capMessage);

const currencyQuerySchema = z.object({ currency });

export function createAnalyticsRouter(analytics: AnalyticsAggregator): Router {
  const router = Router();

  router.get('/daily', async (req: Request, res: Response) => {
    try {
      const { startDate, endDate, ...options } = rangeQuerySchema.parse(req.query);
      const metrics = await analytics.dailyMetrics(startDate, endDate, options);
      res.json({ success: true, count: metrics.length, metrics });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_DAILY_ERROR', 'Failed to compute daily metrics');
    }
  });

  router.get('/summary', async (req: Request, res: Response) => {
    try {
      const { startDate, endDate, ...options } = rangeQuerySchema.parse(req.query);
      const summary = await analytics.summary(startDate, endDate, options);
      res.json({ success: true, summary });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_SUMMARY_ERROR', 'Failed to compute analytics summary');
    }
  });

  router.get('/revenue/trends', async (req: Request, res: Response) => {
    try {
      const { days, ...options } = trendQuerySchema.parse(req.query);
      const trend = await analytics.revenueTrend(days, options);
      res.json({ success: true, days, trend });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_TREND_ERROR', 'Failed to compute revenue trend');
    }
  });

  router.get('/orders/status', async (req: Request, res: Response) => {
    try {
      const { startDate, endDate, ...options } = rangeQuerySchema.parse(req.query);
      const breakdown = await analytics.statusBreakdown(startDate, endDate, options);
      res.json({ success: true, breakdown });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_STATUS_ERROR', 'Failed to compute status breakdown');
    }
  });

  router.get('/customers/top', async (req: Request, res: Response) => {
    try {
      const { limit, startDate, endDate, ...options } = topCustomersQuerySchema.parse(req.query);
      const customers = await analytics.topCustomers(limit, { startDate, endDate }, options);
      res.json({ success: true, count: customers.length, customers });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_TOP_CUSTOMERS_ERROR', 'Failed to compute top customers');
    }
  });

  router.get('/customers/:customerId', async (req: Request, res: Response) => {
    try {
      const customerId = z.string().trim().min(1).parse(req.params.customerId);
      const { startDate, endDate, ...options } = optionalRangeQuerySchema.parse(req.query);
      const customer = await analytics.customerAnalytics(customerId, { startDate, endDate }, options);
      res.json({ success: true, customer });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_CUSTOMER_ERROR', 'Failed to compute customer analytics');
    }
  });

  router.get('/growth', async (req: Request, res: Response) => {
    try {
      const { startDate, endDate, ...options } = rangeQuerySchema.parse(req.query);
      const comparison = await analytics.comparePeriods(startDate, endDate, options);
      res.json({ success: true, ...comparison });
    } catch (error) {
      sendError(res, error, 'ANALYTICS_GROWTH_ERROR', 'Failed to compute growth rate');
    }
  });

  const quickViews = {
    today: (options: z.infer<typeof currencyQuerySchema>) => analytics.quickToday(options),
    week: (options: z.infer<typeof currencyQuerySchema>) => analytics.quickWeek(options),
    month: (options: z.infer<typeof currencyQuerySchema>) => analytics.quickMonth(options),
  };

  for (const [view, load] of Object.entries(quickViews)) {
    router.get(`/quick/${view}`, async (req: Request, res: Response) => {
      try {
        const summary = await load(currencyQuerySchema.parse(req.query));
        res.json({ success: true, view, summary });
      } catch (error) {
        sendError(res, error, 'ANALYTICS_QUICK_ERROR', `Failed to compute ${view} analytics`);
      }
    });
  }

  return router;
}
