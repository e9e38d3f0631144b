/**
 * Anchor periods: UTC calendar days, written YYYY-MM-DD.
 */

import { PayloadValidationError } from './errors';

const PERIOD_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

export interface PeriodBounds {
  start: string; // inclusive, ISO-8601
  end: string; // exclusive, ISO-8601
}

export function isValidPeriod(period: string): boolean {
  const match = PERIOD_PATTERN.exec(period);
  if (!match) return false;
  const date = new Date(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])));
  return date.toISOString().startsWith(period);
}

export function assertPeriod(period: string): void {
  if (!isValidPeriod(period)) {
    throw new PayloadValidationError(`Invalid period "${period}" (expected a UTC date YYYY-MM-DD)`);
  }
}

export function periodOf(timestamp: string | Date): string {
  const date = typeof timestamp === 'string' ? new Date(timestamp) : timestamp;
  if (Number.isNaN(date.getTime())) {
    throw new PayloadValidationError(`Invalid timestamp: ${String(timestamp)}`);
  }
  return date.toISOString().slice(0, 10);
}

export function periodBounds(period: string): PeriodBounds {
  assertPeriod(period);
  const start = new Date(`${period}T00:00:00.000Z`);
  return {
    start: start.toISOString(),
    end: new Date(start.getTime() + DAY_MS).toISOString()
  };
}

/**
 * A period is closed once its exclusive end is not after `now`.
 */
export function isPeriodClosed(period: string, now: Date): boolean {
  return new Date(periodBounds(period).end).getTime() <= now.getTime();
}
