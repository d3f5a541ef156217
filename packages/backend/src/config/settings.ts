import dotenv from 'dotenv';
import { z } from 'zod';
import { OrderStatus } from '@orderdesk/shared';
import { DEFAULT_MONEY_POLICY, type MoneyPolicy } from '../domain/money';
import { MAX_PAGE_SIZE } from '../repositories/orderRepository';
import { DEFAULT_REVENUE_EXCLUDED_STATUSES } from '../services/analytics';
import { DEFAULT_CURRENCY, DEFAULT_MAX_ITEMS } from '../services/orderLifecycle';

dotenv.config();

export interface FirebaseSettings {
  projectId: string;
  privateKey?: string;
  clientEmail?: string;
  emulatorHost: string;
}

export interface Settings {
  nodeEnv: string;
  port: number;
  corsOrigins: string[];
  moneyPolicy: MoneyPolicy;
  maxItems: number;
  defaultCurrency: string;
  revenueExcludedStatuses: OrderStatus[];
  analyticsPageSize: number;
  firebase: FirebaseSettings;
}

// A value that does not parse falls back to its default instead of failing boot.
const positiveNumber = (fallback: number) => z.coerce.number().positive().finite().catch(fallback);
const positiveInt = (fallback: number, max = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(1).max(max).catch(fallback);

const csv = (fallback: string[]) =>
  z
    .string()
    .transform((value) =>
      value
        .split(',')
        .map((part) => part.trim())
        .filter((part) => part.length > 0)
    )
    .catch(fallback);

const envSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: positiveInt(5000, 65535),
  CORS_ORIGINS: csv(['http://localhost:3000', 'http://localhost:3001', 'http://localhost:3002']),
  ORDER_MAX_AMOUNT: positiveNumber(DEFAULT_MONEY_POLICY.maxAmount),
  ORDER_MAX_QUANTITY: positiveInt(DEFAULT_MONEY_POLICY.maxQuantity),
  ORDER_MAX_ITEMS: positiveInt(DEFAULT_MAX_ITEMS),
  DEFAULT_CURRENCY: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.string().regex(/^[A-Z]{3}$/))
    .catch(DEFAULT_CURRENCY),
  REVENUE_EXCLUDED_STATUSES: csv([...DEFAULT_REVENUE_EXCLUDED_STATUSES])
    .pipe(z.array(z.nativeEnum(OrderStatus)))
    .catch([...DEFAULT_REVENUE_EXCLUDED_STATUSES]),
  ANALYTICS_PAGE_SIZE: positiveInt(MAX_PAGE_SIZE, MAX_PAGE_SIZE),
  FIREBASE_PROJECT_ID: z.string().min(1).default('demo-test'),
  FIREBASE_PRIVATE_KEY: z.string().optional(),
  FIREBASE_CLIENT_EMAIL: z.string().optional(),
  FIRESTORE_EMULATOR_HOST: z.string().min(1).default('localhost:8080'),
});

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const parsed = envSchema.parse(env);
  const firebase: FirebaseSettings = {
    projectId: parsed.FIREBASE_PROJECT_ID,
    emulatorHost: parsed.FIRESTORE_EMULATOR_HOST,
  };
  if (parsed.FIREBASE_PRIVATE_KEY) firebase.privateKey = parsed.FIREBASE_PRIVATE_KEY.replace(/\\n/g, '\n');
  if (parsed.FIREBASE_CLIENT_EMAIL) firebase.clientEmail = parsed.FIREBASE_CLIENT_EMAIL;

  return {
    nodeEnv: parsed.NODE_ENV,
    port: parsed.PORT,
    corsOrigins: parsed.CORS_ORIGINS,
    moneyPolicy: { maxAmount: parsed.ORDER_MAX_AMOUNT, maxQuantity: parsed.ORDER_MAX_QUANTITY },
    maxItems: parsed.ORDER_MAX_ITEMS,
    defaultCurrency: parsed.DEFAULT_CURRENCY,
    revenueExcludedStatuses: parsed.REVENUE_EXCLUDED_STATUSES,
    analyticsPageSize: parsed.ANALYTICS_PAGE_SIZE,
    firebase,
  };
}
