/**
 * Date Proximity Scoring for Reconciliation
 *
 * Ledger postings and bank value dates drift by a few days (weekends,
 * clearing delays). Within the tolerance window the score decays
 * linearly with the distance:
 *
 *   dateScore = 1 - daysApart / (toleranceDays + 1)
 *
 * so the same day scores 1 and the edge of the window stays above 0.
 */

import { MS_PER_DAY } from './constants';

/**
 * Calculates the number of whole days between two dates.
 * Returns absolute value (always positive).
 *
 * Both dates are expected at UTC midnight; the UTC calendar day is
 * used either way so a stray time component cannot shift the result.
 */
export function daysBetween(date1: Date, date2: Date): number {
  const utc1 = Date.UTC(date1.getUTCFullYear(), date1.getUTCMonth(), date1.getUTCDate());
  const utc2 = Date.UTC(date2.getUTCFullYear(), date2.getUTCMonth(), date2.getUTCDate());

  return Math.abs(Math.round((utc2 - utc1) / MS_PER_DAY));
}

/**
 * Builds the canonical UTC-midnight date, or null when the
 * components do not form a real calendar day (e.g. 2024-02-30).
 */
export function utcDate(year: number, month: number, day: number): Date | null {
  if (!Number.isInteger(year) || !Number.isInteger(month) || !Number.isInteger(day)) {
    return null;
  }

  const date = new Date(Date.UTC(year, month - 1, day));
  date.setUTCFullYear(year); // Date.UTC maps years 0-99 to 1900-1999

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

/**
 * True when the date carries no time component in UTC.
 */
export function isUtcMidnight(date: Date): boolean {
  return !isNaN(date.getTime()) && date.getTime() % MS_PER_DAY === 0;
}

/**
 * Score in [0, 1] for a pair already known to be inside the window.
 *
 * @example
 * calculateDateScore(0, 3) // 1
 * calculateDateScore(2, 3) // 0.5
 */
export function calculateDateScore(daysApart: number, toleranceDays: number): number {
  if (daysApart <= 0) {
    return 1;
  }

  return Math.max(0, 1 - daysApart / (toleranceDays + 1));
}

export default calculateDateScore;
