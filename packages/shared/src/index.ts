export * from './types/order';
export * from './types/analytics';
