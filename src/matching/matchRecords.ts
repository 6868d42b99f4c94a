/**
 * Ledger/Bank Matching for Reconciliation
 *
 * Flow:
 * 1. Generate every (ledger, bank) pair inside both tolerance windows - O(n·m)
 * 2. Sort candidates by score, breaking exact ties deterministically - O(k log k)
 * 3. Greedily assign the best remaining pair whose records are both free
 * 4. Look for near misses among the records left over
 *
 * `matchRecordsAsync` runs the same steps in slices, yielding to the event
 * loop in between so a long pass can be cancelled.
 *
 * Greedy assignment is not globally optimal, but it is deterministic and
 * explainable to a reviewer: every pair was the best one available when
 * it was taken.
 */

import { setImmediate } from 'timers/promises';
import { ABORT_CHECK_INTERVAL } from './constants';
import { daysBetween } from './dateProximity';
import { scoreCandidate } from './scoreCandidate';
import { MatchingCancelledError } from '../utils/errors';
import { AppError } from '../utils/AppError';
import type {
  Candidate,
  MatchOptions,
  MatchResult,
  NearMiss,
  Tolerances,
  TransactionRecord,
} from './types';

/**
 * Plain code-unit comparison. localeCompare would make the outcome
 * depend on the host's collation settings.
 */
export function compareIds(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Total order over candidates: higher score first, then closest date,
 * then closest amount, then lower ledger id, then lower bank id.
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  return (
    b.score - a.score ||
    a.dateDifferenceDays - b.dateDifferenceDays ||
    a.amountDifference - b.amountDifference ||
    compareIds(a.ledgerRecordId, b.ledgerRecordId) ||
    compareIds(a.bankRecordId, b.bankRecordId)
  );
}

/**
 * Near misses satisfying the date window (amount missed) rank ahead of
 * those satisfying the amount window, then by the smallest excess over the
 * failed tolerance, then by the other distance, then by counterpart id.
 */
export function compareNearMisses(a: NearMiss, b: NearMiss): number {
  if (a.failedTolerance !== b.failedTolerance) {
    return a.failedTolerance === 'AMOUNT' ? -1 : 1;
  }

  const otherDistance = (nearMiss: NearMiss): number =>
    nearMiss.failedTolerance === 'AMOUNT' ? nearMiss.dateDifferenceDays : nearMiss.amountDifference;

  return (
    a.excess - b.excess ||
    otherDistance(a) - otherDistance(b) ||
    compareIds(a.counterpartRecordId, b.counterpartRecordId)
  );
}

export function assertValidTolerances(tolerances: Tolerances): void {
  const { dateToleranceDays, amountTolerance } = tolerances;

  if (!Number.isSafeInteger(dateToleranceDays) || dateToleranceDays < 0) {
    throw AppError.badRequest(`dateToleranceDays must be a non-negative integer, got ${dateToleranceDays}`);
  }
  if (!Number.isSafeInteger(amountTolerance) || amountTolerance < 0) {
    throw AppError.badRequest(`amountTolerance must be a non-negative integer, got ${amountTolerance}`);
  }
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new MatchingCancelledError();
  }
}

/**
 * Lets timers and I/O run, then stops if the pass was cancelled meanwhile.
 */
async function yieldToEventLoop(signal: AbortSignal | undefined): Promise<void> {
  await setImmediate();
  throwIfAborted(signal);
}

function collectCandidates(
  ledgerRecord: TransactionRecord,
  bank: readonly TransactionRecord[],
  tolerances: Tolerances,
  into: Candidate[]
): void {
  for (const bankRecord of bank) {
    const candidate = scoreCandidate(ledgerRecord, bankRecord, tolerances);
    if (candidate) {
      into.push(candidate);
    }
  }
}

/**
 * Generates all candidate pairs inside both tolerance windows.
 */
export function generateCandidates(
  ledger: readonly TransactionRecord[],
  bank: readonly TransactionRecord[],
  tolerances: Tolerances,
  signal?: AbortSignal
): Candidate[] {
  const candidates: Candidate[] = [];

  ledger.forEach((ledgerRecord, index) => {
    if (index % ABORT_CHECK_INTERVAL === 0) {
      throwIfAborted(signal);
    }
    collectCandidates(ledgerRecord, bank, tolerances, candidates);
  });

  return candidates;
}

type NearMissTable = Map<string, NearMiss>;

function offerNearMiss(best: NearMissTable, nearMiss: NearMiss): void {
  const current = best.get(nearMiss.recordId);
  if (!current || compareNearMisses(nearMiss, current) < 0) {
    best.set(nearMiss.recordId, nearMiss);
  }
}

function collectNearMisses(
  ledgerRecord: TransactionRecord,
  bank: readonly TransactionRecord[],
  tolerances: Tolerances,
  best: NearMissTable
): void {
  for (const bankRecord of bank) {
    const dateDifferenceDays = daysBetween(ledgerRecord.date, bankRecord.date);
    const amountDifference = Math.abs(ledgerRecord.amount - bankRecord.amount);
    const dateOk = dateDifferenceDays <= tolerances.dateToleranceDays;
    const amountOk = amountDifference <= tolerances.amountTolerance;

    if (dateOk === amountOk) {
      continue;
    }

    const failedTolerance = dateOk ? 'AMOUNT' : 'DATE';
    const excess = dateOk
      ? amountDifference - tolerances.amountTolerance
      : dateDifferenceDays - tolerances.dateToleranceDays;
    const shared = { dateDifferenceDays, amountDifference, failedTolerance, excess } as const;

    offerNearMiss(best, { recordId: ledgerRecord.id, counterpartRecordId: bankRecord.id, ...shared });
    offerNearMiss(best, { recordId: bankRecord.id, counterpartRecordId: ledgerRecord.id, ...shared });
  }
}

/**
 * For every record on either side, the nearest counterpart failing exactly
 * one tolerance. Pairs passing both tolerances or failing both are ignored.
 *
 * @returns Map keyed by record id (ledger and bank ids share the map)
 */
export function findNearMisses(
  ledger: readonly TransactionRecord[],
  bank: readonly TransactionRecord[],
  tolerances: Tolerances
): Map<string, NearMiss> {
  const best: NearMissTable = new Map();

  for (const ledgerRecord of ledger) {
    collectNearMisses(ledgerRecord, bank, tolerances, best);
  }

  return best;
}

interface Assignment {
  matches: Candidate[];
  assignedLedger: Set<string>;
  assignedBank: Set<string>;
}

/**
 * Takes candidates best first, skipping any whose records are already taken.
 */
function assignGreedily(candidates: Candidate[]): Assignment {
  candidates.sort(compareCandidates);

  const assignedLedger = new Set<string>();
  const assignedBank = new Set<string>();
  const matches: Candidate[] = [];

  for (const candidate of candidates) {
    if (assignedLedger.has(candidate.ledgerRecordId) || assignedBank.has(candidate.bankRecordId)) {
      continue;
    }

    assignedLedger.add(candidate.ledgerRecordId);
    assignedBank.add(candidate.bankRecordId);
    matches.push(candidate);
  }

  return { matches, assignedLedger, assignedBank };
}

/**
 * Matches ledger records to bank records.
 *
 * Pure and deterministic: identical inputs and tolerances always produce
 * the same pairs, in the same order, with the same scores.
 *
 * @example
 * const result = matchRecords(ledger, bank, { dateToleranceDays: 3, amountTolerance: 0 });
 * result.matches;          // proposed pairs, best first
 * result.unmatchedLedger;  // input order preserved
 */
export function matchRecords(
  ledger: readonly TransactionRecord[],
  bank: readonly TransactionRecord[],
  options: MatchOptions
): MatchResult {
  const { signal, ...tolerances } = options;
  assertValidTolerances(tolerances);

  // ============================================
  // Phase 1: candidate generation
  // ============================================
  const candidates = generateCandidates(ledger, bank, tolerances, signal);

  // Last point at which a cancelled pass can stop without publishing anything
  throwIfAborted(signal);

  // ============================================
  // Phase 2: greedy assignment
  // ============================================
  const { matches, assignedLedger, assignedBank } = assignGreedily(candidates);

  // ============================================
  // Phase 3: leftovers and near misses
  // ============================================
  const unmatchedLedger = ledger.filter((record) => !assignedLedger.has(record.id));
  const unmatchedBank = bank.filter((record) => !assignedBank.has(record.id));

  return {
    matches,
    unmatchedLedger,
    unmatchedBank,
    nearMisses: findNearMisses(unmatchedLedger, unmatchedBank, tolerances),
    candidateCount: candidates.length,
  };
}

/**
 * Same result as `matchRecords`, computed in slices of ABORT_CHECK_INTERVAL
 * ledger rows with a turn of the event loop between slices and phases, so
 * an abort signal fired mid-pass stops it and the process stays responsive.
 *
 * @throws MatchingCancelledError when the signal is aborted at any yield
 */
export async function matchRecordsAsync(
  ledger: readonly TransactionRecord[],
  bank: readonly TransactionRecord[],
  options: MatchOptions
): Promise<MatchResult> {
  const { signal, ...tolerances } = options;
  assertValidTolerances(tolerances);
  throwIfAborted(signal);

  const candidates: Candidate[] = [];
  for (const [index, ledgerRecord] of ledger.entries()) {
    if (index > 0 && index % ABORT_CHECK_INTERVAL === 0) {
      await yieldToEventLoop(signal);
    }
    collectCandidates(ledgerRecord, bank, tolerances, candidates);
  }
  await yieldToEventLoop(signal);

  const { matches, assignedLedger, assignedBank } = assignGreedily(candidates);
  await yieldToEventLoop(signal);

  const unmatchedLedger = ledger.filter((record) => !assignedLedger.has(record.id));
  const unmatchedBank = bank.filter((record) => !assignedBank.has(record.id));

  const nearMisses: NearMissTable = new Map();
  for (const [index, ledgerRecord] of unmatchedLedger.entries()) {
    if (index > 0 && index % ABORT_CHECK_INTERVAL === 0) {
      await yieldToEventLoop(signal);
    }
    collectNearMisses(ledgerRecord, unmatchedBank, tolerances, nearMisses);
  }

  return {
    matches,
    unmatchedLedger,
    unmatchedBank,
    nearMisses,
    candidateCount: candidates.length,
  };
}

export default matchRecords;
