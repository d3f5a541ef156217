import { UTCDate } from '@date-fns/utc';
import { addDays, differenceInCalendarDays, eachDayOfInterval, endOfDay, format, isValid, startOfDay, startOfMonth } from 'date-fns';
import { InvalidArgumentError } from './errors';

/** A UTC calendar day rendered as YYYY-MM-DD. */
export type Day = string;

const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export function formatDay(date: Date): Day {
  return format(new UTCDate(date.getTime()), 'yyyy-MM-dd');
}

export function parseDay(value: string, field = 'date'): UTCDate {
  if (!DAY_PATTERN.test(value)) {
    throw new InvalidArgumentError(field, `${field} must be a YYYY-MM-DD date`);
  }
  const day = new UTCDate(value);
  // Rejects roll-overs such as 2026-02-30.
  if (!isValid(day) || formatDay(day) !== value) {
    throw new InvalidArgumentError(field, `${field} is not a valid calendar date`);
  }
  return day;
}

const MIN_YEAR = 1;
const MAX_YEAR = 9999;

/** Fails under `field` when the shifted day leaves years 0001-9999. */
export function addDaysToDay(day: Day, amount: number, field = 'date'): Day {
  const shifted = addDays(parseDay(day), amount);
  if (!isValid(shifted) || shifted.getFullYear() < MIN_YEAR || shifted.getFullYear() > MAX_YEAR) {
    throw new InvalidArgumentError(field, `${field} reaches past the supported calendar range`);
  }
  return formatDay(shifted);
}

export function daysInRange(start: Day, end: Day): number {
  return differenceInCalendarDays(parseDay(end, 'endDate'), parseDay(start, 'startDate')) + 1;
}

export function eachDayInRange(start: Day, end: Day): Day[] {
  return eachDayOfInterval({ start: parseDay(start, 'startDate'), end: parseDay(end, 'endDate') }).map(formatDay);
}

export function firstDayOfMonth(day: Day): Day {
  return formatDay(startOfMonth(parseDay(day)));
}

/** First and last instant (inclusive) covered by [start, end]. */
export function dayRangeBounds(start: Day, end: Day): { from: Date; to: Date } {
  return {
    from: new Date(startOfDay(parseDay(start, 'startDate')).getTime()),
    to: new Date(endOfDay(parseDay(end, 'endDate')).getTime()),
  };
}
