import { AmountOverflowError, InvalidAmountError, InvalidQuantityError } from './errors';

/**
 * Money is carried as a plain number holding exactly two fractional digits.
 * Every arithmetic step happens on integer cents so totals reconcile with the
 * sum of their rounded parts.
 */
export type Money = number;

export interface MoneyPolicy {
  maxAmount: number;
  maxQuantity: number;
}

// Inherited bounds (~10 billion, 10,000 units). Override through settings, not here.
export const DEFAULT_MONEY_POLICY: Readonly<MoneyPolicy> = Object.freeze({
  maxAmount: 9_999_999_999.99,
  maxQuantity: 10_000,
});

export interface NormalizeOptions {
  allowNegative?: boolean;
  policy?: MoneyPolicy;
}

const DECIMAL_PATTERN = /^([+-])?(\d+)(?:\.(\d+))?$/;
const MAX_WHOLE_DIGITS = 15;

export const ZERO: Money = 0;

export function toCents(amount: Money): number {
  return Math.round(amount * 100);
}

export function fromCents(cents: number): Money {
  return cents === 0 ? 0 : cents / 100;
}

/** Half-up (away from zero) integer division, used for averages. */
export function divideCentsHalfUp(cents: number, divisor: number): number {
  const magnitude = Math.floor((2 * Math.abs(cents) + divisor) / (2 * divisor));
  return cents < 0 ? -magnitude : magnitude;
}

function decimalTextToCents(text: string, field: string, policy: MoneyPolicy): number {
  const match = DECIMAL_PATTERN.exec(text);
  if (!match) {
    throw new InvalidAmountError(field, `${field} must be a valid decimal number`);
  }
  const sign = match[1];
  const whole = match[2].replace(/^0+(?=\d)/, '');
  const fraction = (match[3] ?? '').padEnd(3, '0');

  if (whole.length > MAX_WHOLE_DIGITS) {
    throw new InvalidAmountError(field, `${field} cannot exceed ${policy.maxAmount.toFixed(2)}`);
  }

  let cents = Number(whole) * 100 + Number(fraction.slice(0, 2));
  if (Number(fraction[2]) >= 5) cents += 1;
  return sign === '-' && cents !== 0 ? -cents : cents;
}

function numberToText(raw: number, field: string, policy: MoneyPolicy): string {
  if (!Number.isFinite(raw)) {
    throw new InvalidAmountError(field, `${field} cannot be NaN or infinite`);
  }
  const text = String(raw);
  if (!/e/i.test(text)) return text;
  // Exponent notation only appears below 1e-6 or from 1e21 up.
  if (Math.abs(raw) >= 1) {
    throw new InvalidAmountError(field, `${field} cannot exceed ${policy.maxAmount.toFixed(2)}`);
  }
  return '0';
}

/**
 * Parses a number or decimal string into Money, rounding half-up to cents.
 * Rejects NaN, infinities, negatives (unless allowed) and anything beyond the
 * policy bound; never clamps.
 */
export function normalizeMoney(raw: unknown, field: string, options: NormalizeOptions = {}): Money {
  const policy = options.policy ?? DEFAULT_MONEY_POLICY;

  let text: string;
  if (typeof raw === 'number') {
    text = numberToText(raw, field, policy);
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    text = raw.trim();
  } else {
    throw new InvalidAmountError(field, `${field} must be a valid decimal number`);
  }

  const cents = decimalTextToCents(text, field, policy);
  if (cents < 0 && !options.allowNegative) {
    throw new InvalidAmountError(field, `${field} cannot be negative`);
  }
  if (Math.abs(cents) > toCents(policy.maxAmount)) {
    throw new InvalidAmountError(field, `${field} cannot exceed ${policy.maxAmount.toFixed(2)}`);
  }
  return fromCents(cents);
}

function checkBound(cents: number, field: string, policy: MoneyPolicy): Money {
  if (!Number.isSafeInteger(cents) || Math.abs(cents) > toCents(policy.maxAmount)) {
    throw new AmountOverflowError(field, policy.maxAmount);
  }
  return fromCents(cents);
}

export function addMoney(a: Money, b: Money, field: string, policy: MoneyPolicy = DEFAULT_MONEY_POLICY): Money {
  return checkBound(toCents(a) + toCents(b), field, policy);
}

export function subtractMoney(a: Money, b: Money, field: string, policy: MoneyPolicy = DEFAULT_MONEY_POLICY): Money {
  return checkBound(toCents(a) - toCents(b), field, policy);
}

export function multiplyMoney(amount: Money, quantity: number, field: string, policy: MoneyPolicy = DEFAULT_MONEY_POLICY): Money {
  if (!Number.isInteger(quantity)) {
    throw new InvalidQuantityError(field, `${field} multiplier must be an integer`);
  }
  return checkBound(toCents(amount) * quantity, field, policy);
}

export function sumMoney(values: readonly Money[], field: string, policy: MoneyPolicy = DEFAULT_MONEY_POLICY): Money {
  const cents = values.reduce((sum, value) => sum + toCents(value), 0);
  return checkBound(cents, field, policy);
}

export function averageMoney(total: Money, count: number): Money {
  if (count <= 0) return ZERO;
  return fromCents(divideCentsHalfUp(toCents(total), count));
}

export function validateQuantity(raw: unknown, field: string, policy: MoneyPolicy = DEFAULT_MONEY_POLICY): number {
  if (typeof raw !== 'number' || !Number.isInteger(raw)) {
    throw new InvalidQuantityError(field, `${field} must be an integer`);
  }
  if (raw < 1) {
    throw new InvalidQuantityError(field, `${field} must be at least 1`);
  }
  if (raw > policy.maxQuantity) {
    throw new InvalidQuantityError(field, `${field} cannot exceed ${policy.maxQuantity.toLocaleString('en-US')}`);
  }
  return raw;
}
