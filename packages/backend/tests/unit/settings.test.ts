import { describe, it, expect } from 'vitest';
import { OrderStatus } from '@orderdesk/shared';
import { loadSettings } from '../../src/config/settings';

describe('loadSettings', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadSettings({})).toEqual({
      nodeEnv: 'development',
      port: 5000,
      corsOrigins: ['http://localhost:3000', 'http://localhost:3001', 'http://localhost:3002'],
      moneyPolicy: { maxAmount: 9999999999.99, maxQuantity: 10000 },
      maxItems: 100,
      defaultCurrency: 'USD',
      revenueExcludedStatuses: [OrderStatus.CANCELLED],
      analyticsPageSize: 200,
      firebase: { projectId: 'demo-test', emulatorHost: 'localhost:8080' },
    });
  });

  it('reads overrides', () => {
    const settings = loadSettings({
      NODE_ENV: 'production',
      PORT: '8081',
      CORS_ORIGINS: 'http://a.test, http://b.test',
      ORDER_MAX_AMOUNT: '5000.50',
      ORDER_MAX_QUANTITY: '25',
      ORDER_MAX_ITEMS: '10',
      DEFAULT_CURRENCY: 'eur',
      REVENUE_EXCLUDED_STATUSES: 'cancelled, pending',
      ANALYTICS_PAGE_SIZE: '50',
      FIREBASE_PROJECT_ID: 'orders-prod',
      FIREBASE_PRIVATE_KEY: 'line1\\nline2',
      FIREBASE_CLIENT_EMAIL: 'svc@example.com',
    });
    expect(settings.nodeEnv).toBe('production');
    expect(settings.port).toBe(8081);
    expect(settings.corsOrigins).toEqual(['http://a.test', 'http://b.test']);
    expect(settings.moneyPolicy).toEqual({ maxAmount: 5000.5, maxQuantity: 25 });
    expect(settings.maxItems).toBe(10);
    expect(settings.defaultCurrency).toBe('EUR');
    expect(settings.revenueExcludedStatuses).toEqual([OrderStatus.CANCELLED, OrderStatus.PENDING]);
    expect(settings.analyticsPageSize).toBe(50);
    expect(settings.firebase).toEqual({
      projectId: 'orders-prod',
      privateKey: 'line1\nline2',
      clientEmail: 'svc@example.com',
      emulatorHost: 'localhost:8080',
    });
  });

  it('ignores values it cannot use', () => {
    const settings = loadSettings({
      PORT: 'abc',
      ORDER_MAX_AMOUNT: '-1',
      ORDER_MAX_QUANTITY: '2.5',
      DEFAULT_CURRENCY: 'dollars',
      REVENUE_EXCLUDED_STATUSES: 'cancelled,bogus',
      ANALYTICS_PAGE_SIZE: '500',
    });
    expect(settings.port).toBe(5000);
    expect(settings.moneyPolicy).toEqual({ maxAmount: 9999999999.99, maxQuantity: 10000 });
    expect(settings.defaultCurrency).toBe('USD');
    expect(settings.revenueExcludedStatuses).toEqual([OrderStatus.CANCELLED]);
    expect(settings.analyticsPageSize).toBe(200);
  });
});
