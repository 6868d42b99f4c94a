/**
 * Reconciliation Matching Engine
 *
 * Pure, deterministic functions that turn two raw record sets into
 * proposed matches and classified exceptions:
 * - Record normalization (minor units, UTC dates)
 * - Candidate scoring (date proximity, amount distance, description overlap)
 * - Greedy assignment with a total tie-break order
 * - Exception classification
 *
 * Usage:
 * ```typescript
 * import { matchRecords, classifyExceptions } from './matching';
 *
 * const result = matchRecords(ledger, bank, { dateToleranceDays: 3, amountTolerance: 0 });
 * const drafts = classifyExceptions({ ...result, ledgerPopulation: ledger, bankPopulation: bank });
 * ```
 */

// Main functions
export { matchRecords, matchRecordsAsync, generateCandidates, findNearMisses } from './matchRecords';
export { classifyExceptions } from './classifyExceptions';
export { normalizeRecords, normalizeRow, parseMinorUnits, parseRecordDate, rawRowSchema } from './normalizeRecord';

// Individual scoring functions (for testing/debugging)
export { scoreCandidate, calculateAmountScore, combineScore, roundScore } from './scoreCandidate';
export { calculateDateScore, daysBetween, utcDate, isUtcMidnight } from './dateProximity';
export { calculateDescriptionSimilarity, tokenize } from './descriptionSimilarity';
export { compareIds, compareCandidates, compareNearMisses, assertValidTolerances } from './matchRecords';

// Constants
export { SCORE_WEIGHTS, SCORE_DECIMALS, MANUAL_LINK_SCORE } from './constants';

// Types
export type {
  RecordSource,
  RawRow,
  TransactionRecord,
  Tolerances,
  ScoreBreakdown,
  Candidate,
  ProposedMatch,
  FailedTolerance,
  NearMiss,
  NearMissReference,
  MatchResult,
  MatchOptions,
  ExceptionKind,
  ExceptionDraft,
  ClassifyInput,
  NormalizeOptions,
} from './types';
export type { NormalizeResult } from './normalizeRecord';
