import { createApp } from './app';
import { connectFirestore } from './config/firebase';
import { loadSettings } from './config/settings';
import { FirestoreOrderRepository } from './repositories/firestoreOrderRepository';
import { AnalyticsAggregator } from './services/analytics';
import { OrderLifecycleManager } from './services/orderLifecycle';

const startServer = () => {
  try {
    const settings = loadSettings();
    const repository = new FirestoreOrderRepository(connectFirestore(settings));

    const lifecycle = new OrderLifecycleManager({
      repository,
      policy: settings.moneyPolicy,
      maxItems: settings.maxItems,
      defaultCurrency: settings.defaultCurrency,
    });
    const analytics = new AnalyticsAggregator({
      repository,
      excludedStatuses: settings.revenueExcludedStatuses,
      pageSize: settings.analyticsPageSize,
      defaultCurrency: settings.defaultCurrency,
    });

    const app = createApp({ lifecycle, analytics, corsOrigins: settings.corsOrigins });
    app.listen(settings.port, () => {
      console.log(`Backend server running on http://localhost:${settings.port}`);
      console.log(`Health check: http://localhost:${settings.port}/api/health`);
      console.log(`Orders API: http://localhost:${settings.port}/api/orders`);
      console.log(`Analytics API: http://localhost:${settings.port}/api/analytics`);
      console.log(`Revenue excludes: ${settings.revenueExcludedStatuses.join(', ') || 'nothing'}`);
    });
  } catch (error) {
    console.error('Failed to start server:', error);
    process.exit(1);
  }
};

startServer();
