/**
 * Test fixtures for records and sessions
 */

import type { RecordSource, TransactionRecord } from '../../src/matching/types';
import type { EntityContext } from '../../src/reconciliation/types';

export const SESSION_ID = 'session-1';

/**
 * Builds a normalized record. Dates are given as YYYY-MM-DD.
 */
export function makeRecord(
  id: string,
  source: RecordSource,
  date: string,
  amount: number,
  description = '',
  rowNumber = 1
): TransactionRecord {
  return {
    id,
    sessionId: SESSION_ID,
    source,
    date: new Date(`${date}T00:00:00.000Z`),
    amount,
    description,
    rowNumber,
  };
}

export const ledger = (id: string, date: string, amount: number, description = ''): TransactionRecord =>
  makeRecord(id, 'LEDGER', date, amount, description);

export const bank = (id: string, date: string, amount: number, description = ''): TransactionRecord =>
  makeRecord(id, 'BANK', date, amount, description);

/**
 * Id factory yielding prefix-1, prefix-2, ...
 */
export function sequentialIds(prefix = 'id'): () => string {
  let next = 0;
  return () => {
    next += 1;
    return `${prefix}-${next}`;
  };
}

export const FIXED_NOW = new Date('2024-02-01T10:00:00.000Z');

export function fixedContext(prefix = 'id', now: Date = FIXED_NOW): EntityContext {
  return { now, newId: sequentialIds(prefix) };
}

/**
 * Deterministic UUIDs for code paths that validate id format.
 */
export function uuid(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

export function sequentialUuids(): () => string {
  let next = 0;
  return () => uuid(++next);
}
