/**
 * Record Normalization for Reconciliation
 *
 * Upstream parsers hand over loosely-typed rows straight from CSV/Excel.
 * This module is the only place that sees that shape: every row either
 * becomes a canonical TransactionRecord or a MalformedRowError that the
 * caller can report. Nothing is dropped silently.
 *
 * Example transformations:
 * - "$1,234.50"    → 123450
 * - "(45.00)"      → -4500
 * - "01/05/2024"   → 2024-01-05T00:00:00.000Z
 * - "5 Jan 2024"   → 2024-01-05T00:00:00.000Z
 */

import { randomUUID } from 'crypto';
import { z } from 'zod';
import { CURRENCY_SYMBOLS, MINOR_UNIT_DIGITS, MONTHS } from './constants';
import { utcDate } from './dateProximity';
import { MalformedRowError } from '../utils/errors';
import type { NormalizeOptions, RawRow, RecordSource, TransactionRecord } from './types';

// ============================================
// Raw row shape
// ============================================

export const rawRowSchema = z.object({
  date: z.string(),
  amount: z.string(),
  description: z.string().default(''),
  reference: z.string().nullish(),
});

// ============================================
// Date parsing
// ============================================

const ISO_DATE = /^(\d{4})[-/](\d{1,2})[-/](\d{1,2})(?:[T\s].*)?$/;
const NUMERIC_DATE = /^(\d{1,2})[/-](\d{1,2})[/-](\d{4})$/;
const DAY_MONTH_NAME = /^(\d{1,2})[\s-]+([A-Za-z]+)\.?,?[\s-]+(\d{4})$/;
const MONTH_NAME_DAY = /^([A-Za-z]+)\.?\s+(\d{1,2}),?\s+(\d{4})$/;

function monthNumber(name: string): number | undefined {
  return MONTHS[name.toUpperCase()];
}

/**
 * Parses a date string to UTC midnight.
 * Supports: YYYY-MM-DD, YYYY/MM/DD, ISO timestamps (date part kept),
 * MM/DD/YYYY and MM-DD-YYYY (DD/MM/YYYY when the first field exceeds 12),
 * "5 Jan 2024", "January 5, 2024".
 *
 * @returns Date at UTC midnight, or null when unparseable or impossible
 */
export function parseRecordDate(value: string): Date | null {
  const trimmed = value.trim();
  if (!trimmed) {
    return null;
  }

  let match = ISO_DATE.exec(trimmed);
  if (match) {
    return utcDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  match = NUMERIC_DATE.exec(trimmed);
  if (match) {
    const first = Number(match[1]);
    const second = Number(match[2]);
    const year = Number(match[3]);
    return first > 12 ? utcDate(year, second, first) : utcDate(year, first, second);
  }

  match = DAY_MONTH_NAME.exec(trimmed);
  if (match) {
    const month = monthNumber(match[2]);
    return month ? utcDate(Number(match[3]), month, Number(match[1])) : null;
  }

  match = MONTH_NAME_DAY.exec(trimmed);
  if (match) {
    const month = monthNumber(match[1]);
    return month ? utcDate(Number(match[3]), month, Number(match[2])) : null;
  }

  return null;
}

// ============================================
// Amount parsing
// ============================================

/**
 * Parses a money string into signed minor units without going through
 * floating point.
 * Handles: "1234.56", "$1,234.56", "-500", "(500.00)", "€ 12.5"
 *
 * @returns Integer minor units, or null when unparseable
 */
export function parseMinorUnits(value: string): number | null {
  let text = value.replace(CURRENCY_SYMBOLS, '').replace(/[,\s]/g, '');
  let negative = false;

  // Accounting notation: (45.00) is a debit
  if (text.startsWith('(') && text.endsWith(')')) {
    negative = true;
    text = text.slice(1, -1);
  }

  if (text.startsWith('-') || text.startsWith('+')) {
    if (negative) {
      return null;
    }
    negative = text.startsWith('-');
    text = text.slice(1);
  }

  const match = /^(\d*)(?:\.(\d*))?$/.exec(text);
  if (!match) {
    return null;
  }

  const whole = match[1];
  const fraction = match[2] ?? '';
  if (whole === '' && fraction === '') {
    return null;
  }
  if (fraction.length > MINOR_UNIT_DIGITS) {
    return null;
  }

  const minor = Number(`${whole}${fraction.padEnd(MINOR_UNIT_DIGITS, '0')}`);
  if (!Number.isSafeInteger(minor)) {
    return null;
  }

  return negative && minor !== 0 ? -minor : minor;
}

// ============================================
// Row normalization
// ============================================

/**
 * Normalizes a single raw row.
 *
 * @throws MalformedRowError when the row is not a row, or its date or
 * amount cannot be parsed
 */
export function normalizeRow(
  row: unknown,
  source: RecordSource,
  rowNumber: number,
  options: NormalizeOptions
): TransactionRecord {
  const parsed = rawRowSchema.safeParse(row);
  if (!parsed.success) {
    throw new MalformedRowError({
      rowNumber,
      field: 'row',
      value: row,
      reason: `Invalid row shape: ${parsed.error.errors.map((issue) => `${issue.path.join('.') || 'row'} ${issue.message}`).join(', ')}`,
    });
  }

  const { date: rawDate, amount: rawAmount, description, reference } = parsed.data;

  const date = parseRecordDate(rawDate);
  if (!date) {
    throw new MalformedRowError({
      rowNumber,
      field: 'date',
      value: rawDate,
      reason: `Invalid date: "${rawDate}"`,
    });
  }

  const amount = parseMinorUnits(rawAmount);
  if (amount === null) {
    throw new MalformedRowError({
      rowNumber,
      field: 'amount',
      value: rawAmount,
      reason: `Invalid amount: "${rawAmount}"`,
    });
  }

  const externalReference = reference?.trim() || undefined;
  const idFactory = options.idFactory ?? randomUUID;

  return {
    id: idFactory(),
    sessionId: options.sessionId,
    source,
    date,
    amount,
    description: description.trim(),
    ...(externalReference ? { externalReference } : {}),
    rowNumber,
  };
}

export interface NormalizeResult {
  records: TransactionRecord[];
  errors: MalformedRowError[];
}

/**
 * Normalizes every row, collecting failures instead of stopping at the
 * first one. The caller decides whether a partial set is acceptable.
 */
export function normalizeRecords(
  rows: readonly (RawRow | unknown)[],
  source: RecordSource,
  options: NormalizeOptions
): NormalizeResult {
  const firstRowNumber = options.firstRowNumber ?? 1;
  const records: TransactionRecord[] = [];
  const errors: MalformedRowError[] = [];

  rows.forEach((row, index) => {
    try {
      records.push(normalizeRow(row, source, firstRowNumber + index, options));
    } catch (error) {
      if (error instanceof MalformedRowError) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  });

  return { records, errors };
}

export default normalizeRecords;
