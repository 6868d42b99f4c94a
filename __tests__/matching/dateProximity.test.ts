/**
 * Tests for Date Proximity Scoring
 */

import {
  calculateDateScore,
  daysBetween,
  isUtcMidnight,
  utcDate,
} from '../../src/matching/dateProximity';

describe('daysBetween', () => {
  it('should return 0 for same date', () => {
    const date = new Date('2024-01-15');
    expect(daysBetween(date, date)).toBe(0);
  });

  it('should return positive for different dates', () => {
    const date1 = new Date('2024-01-10');
    const date2 = new Date('2024-01-15');
    expect(daysBetween(date1, date2)).toBe(5);
  });

  it('should be symmetric (order independent)', () => {
    const date1 = new Date('2024-01-10');
    const date2 = new Date('2024-01-15');
    expect(daysBetween(date1, date2)).toBe(daysBetween(date2, date1));
  });

  it('should handle month boundaries', () => {
    const date1 = new Date('2024-01-30');
    const date2 = new Date('2024-02-05');
    expect(daysBetween(date1, date2)).toBe(6);
  });

  it('should handle year boundaries', () => {
    const date1 = new Date('2023-12-30');
    const date2 = new Date('2024-01-05');
    expect(daysBetween(date1, date2)).toBe(6);
  });

  it('should count UTC calendar days regardless of time of day', () => {
    const late = new Date('2024-01-10T23:59:00.000Z');
    const early = new Date('2024-01-11T00:01:00.000Z');
    expect(daysBetween(late, early)).toBe(1);
  });
});

describe('utcDate', () => {
  it('should build a UTC midnight date', () => {
    expect(utcDate(2024, 1, 5)?.toISOString()).toBe('2024-01-05T00:00:00.000Z');
  });

  it('should accept February 29 in a leap year', () => {
    expect(utcDate(2024, 2, 29)?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('should reject impossible calendar dates', () => {
    expect(utcDate(2023, 2, 29)).toBeNull();
    expect(utcDate(2024, 2, 30)).toBeNull();
    expect(utcDate(2024, 13, 1)).toBeNull();
    expect(utcDate(2024, 0, 10)).toBeNull();
  });

  it('should keep two-digit years as they are', () => {
    expect(utcDate(50, 6, 1)?.getUTCFullYear()).toBe(50);
  });
});

describe('isUtcMidnight', () => {
  it('should accept a date without time component', () => {
    expect(isUtcMidnight(new Date('2024-01-05T00:00:00.000Z'))).toBe(true);
  });

  it('should reject a date with a time component', () => {
    expect(isUtcMidnight(new Date('2024-01-05T12:30:00.000Z'))).toBe(false);
  });

  it('should reject an invalid date', () => {
    expect(isUtcMidnight(new Date('not a date'))).toBe(false);
  });
});

describe('calculateDateScore', () => {
  it('should return 1 for the same day', () => {
    expect(calculateDateScore(0, 3)).toBe(1);
  });

  it('should decay linearly inside the window', () => {
    expect(calculateDateScore(1, 3)).toBe(0.75);
    expect(calculateDateScore(2, 3)).toBe(0.5);
    expect(calculateDateScore(3, 3)).toBe(0.25);
  });

  it('should stay above 0 at the edge of the window', () => {
    expect(calculateDateScore(1, 1)).toBe(0.5);
  });

  it('should never go below 0', () => {
    expect(calculateDateScore(10, 3)).toBe(0);
  });
});
