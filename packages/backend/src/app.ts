import express, { type Express } from 'express';
import cors from 'cors';
import { type Clock, systemClock } from './domain/clock';
import { createAnalyticsRouter } from './routes/analytics';
import { createOrdersRouter } from './routes/orders';
import type { AnalyticsAggregator } from './services/analytics';
import type { OrderLifecycleManager } from './services/orderLifecycle';

export interface AppDependencies {
  lifecycle: OrderLifecycleManager;
  analytics: AnalyticsAggregator;
  corsOrigins?: string[];
  clock?: Clock;
}

export function createApp({ lifecycle, analytics, corsOrigins = [], clock = systemClock }: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: corsOrigins, credentials: true }));
  app.use(express.json());

  app.get('/api/health', (_req, res) => {
    res.json({
      status: 'OK',
      message: 'Backend API is running',
      timestamp: clock.now().toISOString(),
    });
  });

  app.use('/api/orders', createOrdersRouter(lifecycle));
  app.use('/api/analytics', createAnalyticsRouter(analytics));

  return app;
}
