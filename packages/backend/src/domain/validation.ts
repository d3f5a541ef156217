import { ValidationError } from './errors';
import { type Money, type MoneyPolicy, normalizeMoney, validateQuantity } from './money';
import type { TextSanitizer } from './sanitize';

export type StepResult<T> = { ok: true; value: T } | { ok: false; error: ValidationError };

export type ValidationStep<In, Out> = (input: In) => StepResult<Out>;

export const ok = <T>(value: T): StepResult<T> => ({ ok: true, value });

export const fail = (error: ValidationError): StepResult<never> => ({ ok: false, error });

/** Runs a throwing check and turns its ValidationError into a failed result. */
export function attempt<T>(check: () => T): StepResult<T> {
  try {
    return ok(check());
  } catch (error) {
    if (error instanceof ValidationError) return fail(error);
    throw error;
  }
}

export function unwrap<T>(result: StepResult<T>): T {
  if (!result.ok) throw result.error;
  return result.value;
}

/**
 * An ordered chain of pure steps over one input. Each step sees the raw input
 * and the draft built so far and contributes new fields; the first failing
 * step stops the chain and its error is the result.
 */
export class ValidationPipeline<I, D extends object> {
  private constructor(private readonly execute: (input: I) => StepResult<D>) {}

  static start<I>(): ValidationPipeline<I, Record<never, never>> {
    return new ValidationPipeline<I, Record<never, never>>(() => ok({}));
  }

  step<X extends object>(build: (input: I, draft: D) => StepResult<X>): ValidationPipeline<I, D & X> {
    return new ValidationPipeline<I, D & X>((input) => {
      const previous = this.execute(input);
      if (!previous.ok) return previous;
      const next = build(input, previous.value);
      return next.ok ? ok({ ...previous.value, ...next.value }) : next;
    });
  }

  run(input: I): StepResult<D> {
    return this.execute(input);
  }
}

/** Runs a step for each element and stops at the first failure. */
export function each<T, U>(values: readonly T[], step: (value: T, index: number) => StepResult<U>): StepResult<U[]> {
  const out: U[] = [];
  for (let i = 0; i < values.length; i++) {
    const result = step(values[i], i);
    if (!result.ok) return result;
    out.push(result.value);
  }
  return ok(out);
}

export interface TextRule {
  min?: number;
  max: number;
  pattern?: RegExp;
  truncate?: boolean;
}

export function text(field: string, sanitize: TextSanitizer, rule: TextRule): ValidationStep<unknown, string> {
  return (raw) => {
    if (raw === undefined || raw === null) {
      return fail(new ValidationError(field, 'REQUIRED', `${field} is required`));
    }
    if (typeof raw !== 'string') {
      return fail(new ValidationError(field, 'INVALID_FORMAT', `${field} must be a string`));
    }
    const value = sanitize(raw, rule.truncate ? rule.max : undefined);
    const min = rule.min ?? 1;
    if (value.length < min) {
      return fail(new ValidationError(field, min === 1 ? 'REQUIRED' : 'TOO_SHORT', min === 1 ? `${field} is required` : `${field} must be at least ${min} characters`));
    }
    if (value.length > rule.max) {
      return fail(new ValidationError(field, 'TOO_LONG', `${field} must be at most ${rule.max} characters`));
    }
    if (rule.pattern && !rule.pattern.test(value)) {
      return fail(new ValidationError(field, 'INVALID_FORMAT', `${field} has an invalid format`));
    }
    return ok(value);
  };
}

export function optional<T>(step: ValidationStep<unknown, T>): ValidationStep<unknown, T | undefined> {
  return (raw) => (raw === undefined || raw === null ? ok(undefined) : step(raw));
}

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+\.[^@\s]+$/;

export function email(field: string): ValidationStep<unknown, string> {
  return (raw) => {
    if (typeof raw !== 'string' || raw.trim() === '') {
      return fail(new ValidationError(field, 'REQUIRED', `${field} is required`));
    }
    const value = raw.trim();
    if (value.length > 254 || !EMAIL_PATTERN.test(value)) {
      return fail(new ValidationError(field, 'INVALID_FORMAT', `${field} must be a valid email address`));
    }
    return ok(value);
  };
}

export function money(field: string, policy: MoneyPolicy, fallback?: Money): ValidationStep<unknown, Money> {
  return (raw) => {
    if ((raw === undefined || raw === null) && fallback !== undefined) return ok(fallback);
    return attempt(() => normalizeMoney(raw, field, { policy }));
  };
}

export function quantity(field: string, policy: MoneyPolicy): ValidationStep<unknown, number> {
  return (raw) => attempt(() => validateQuantity(raw, field, policy));
}

export function oneOf<T extends string>(field: string, allowed: readonly T[]): ValidationStep<unknown, T> {
  return (raw) => {
    const match = allowed.find((candidate) => candidate === raw);
    return match !== undefined
      ? ok(match)
      : fail(new ValidationError(field, 'INVALID_FORMAT', `${field} must be one of: ${allowed.join(', ')}`));
  };
}
