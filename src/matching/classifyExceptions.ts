/**
 * Exception Classification for Reconciliation
 *
 * Every record left without a match gets exactly one exception:
 *
 * - DUPLICATE_CANDIDATE: another record on the same side has the same
 *   date and amount (likely double entry). Takes precedence.
 * - AMOUNT_MISMATCH: a counterpart failed exactly one tolerance; the
 *   nearest one is referenced so the reviewer can link it by hand.
 * - UNMATCHED_LEDGER / UNMATCHED_BANK: nothing came close.
 */

import { compareIds } from './matchRecords';
import type {
  ClassifyInput,
  ExceptionDraft,
  ExceptionKind,
  NearMiss,
  RecordSource,
  TransactionRecord,
} from './types';

function duplicateKey(record: TransactionRecord): string {
  return `${record.date.getTime()}|${record.amount}`;
}

/**
 * Groups record ids by (date, amount).
 */
function indexByDateAndAmount(population: readonly TransactionRecord[]): Map<string, string[]> {
  const index = new Map<string, string[]>();

  for (const record of population) {
    const key = duplicateKey(record);
    const ids = index.get(key);
    if (ids) {
      ids.push(record.id);
    } else {
      index.set(key, [record.id]);
    }
  }

  return index;
}

function unmatchedKind(source: RecordSource): ExceptionKind {
  return source === 'LEDGER' ? 'UNMATCHED_LEDGER' : 'UNMATCHED_BANK';
}

function classifySide(
  records: readonly TransactionRecord[],
  population: readonly TransactionRecord[],
  nearMisses: ReadonlyMap<string, NearMiss>
): ExceptionDraft[] {
  const index = indexByDateAndAmount(population);

  return records.map((record): ExceptionDraft => {
    const twins = (index.get(duplicateKey(record)) ?? [])
      .filter((id) => id !== record.id)
      .sort(compareIds);

    if (twins.length > 0) {
      return {
        recordId: record.id,
        source: record.source,
        kind: 'DUPLICATE_CANDIDATE',
        duplicateOfRecordIds: twins,
      };
    }

    const nearMiss = nearMisses.get(record.id);
    if (nearMiss) {
      return {
        recordId: record.id,
        source: record.source,
        kind: 'AMOUNT_MISMATCH',
        nearMiss: {
          counterpartRecordId: nearMiss.counterpartRecordId,
          dateDifferenceDays: nearMiss.dateDifferenceDays,
          amountDifference: nearMiss.amountDifference,
          failedTolerance: nearMiss.failedTolerance,
        },
      };
    }

    return { recordId: record.id, source: record.source, kind: unmatchedKind(record.source) };
  });
}

/**
 * Classifies uncovered records. One draft per input record, ledger side
 * first, each side in input order.
 */
export function classifyExceptions(input: ClassifyInput): ExceptionDraft[] {
  const {
    unmatchedLedger,
    unmatchedBank,
    nearMisses,
    ledgerPopulation = unmatchedLedger,
    bankPopulation = unmatchedBank,
  } = input;

  return [
    ...classifySide(unmatchedLedger, ledgerPopulation, nearMisses),
    ...classifySide(unmatchedBank, bankPopulation, nearMisses),
  ];
}

export default classifyExceptions;
