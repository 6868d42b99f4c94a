/**
 * Type Definitions for the Reconciliation Matching Engine
 *
 * These types define the input/output contracts for the normalizer,
 * the matcher and the exception classifier. All three are pure:
 * no database, no clock, no id generation beyond the injected factory.
 */

// ============================================
// INPUT TYPES
// ============================================

/**
 * Which of the two independently-sourced sets a record came from.
 */
export type RecordSource = 'LEDGER' | 'BANK';

/**
 * A row as produced by the external ledger/bank file parsers.
 * The normalizer is the only code that ever sees this shape.
 */
export interface RawRow {
  date: string;
  amount: string;
  description: string;
  reference?: string;
}

/**
 * Canonical, immutable record.
 */
export interface TransactionRecord {
  readonly id: string;
  readonly sessionId: string;
  readonly source: RecordSource;
  /** UTC midnight, no time component */
  readonly date: Date;
  /** Signed amount in minor units (cents) */
  readonly amount: number;
  readonly description: string;
  readonly externalReference?: string;
  /** 1-based position in the uploaded file */
  readonly rowNumber: number;
}

export interface Tolerances {
  /** Maximum absolute date difference, in whole days */
  dateToleranceDays: number;
  /** Maximum absolute amount difference, in minor units */
  amountTolerance: number;
}

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Per-signal contribution to a candidate's score.
 */
export interface ScoreBreakdown {
  dateScore: number;
  amountScore: number;
  descriptionSimilarity: number;
}

/**
 * A (ledger, bank) pair that satisfies both tolerances.
 */
export interface Candidate {
  ledgerRecordId: string;
  bankRecordId: string;
  score: number;
  dateDifferenceDays: number;
  amountDifference: number;
  breakdown: ScoreBreakdown;
}

/**
 * A pair chosen by the assignment step. Entity ids and statuses are
 * attached later by the session state machine.
 */
export type ProposedMatch = Candidate;

/**
 * The tolerance a near-miss pair failed. A pair failing both is not a near miss.
 */
export type FailedTolerance = 'DATE' | 'AMOUNT';

/**
 * The nearest non-qualifying counterpart of a record.
 */
export interface NearMiss {
  recordId: string;
  counterpartRecordId: string;
  dateDifferenceDays: number;
  amountDifference: number;
  failedTolerance: FailedTolerance;
  /** How far past the failed tolerance the pair landed (days or minor units) */
  excess: number;
}

export interface MatchResult {
  matches: ProposedMatch[];
  unmatchedLedger: TransactionRecord[];
  unmatchedBank: TransactionRecord[];
  /** Keyed by record id; only records left unmatched appear */
  nearMisses: Map<string, NearMiss>;
  /** Number of candidate pairs generated before assignment */
  candidateCount: number;
}

export interface MatchOptions extends Tolerances {
  /** Checked every ABORT_CHECK_INTERVAL ledger rows and between phases */
  signal?: AbortSignal;
}

// ============================================
// EXCEPTION CLASSIFICATION
// ============================================

export type ExceptionKind =
  | 'UNMATCHED_LEDGER'
  | 'UNMATCHED_BANK'
  | 'AMOUNT_MISMATCH'
  | 'DUPLICATE_CANDIDATE';

export interface NearMissReference {
  counterpartRecordId: string;
  dateDifferenceDays: number;
  amountDifference: number;
  failedTolerance: FailedTolerance;
}

/**
 * Classifier output for one uncovered record, before it becomes an entity.
 */
export interface ExceptionDraft {
  recordId: string;
  source: RecordSource;
  kind: ExceptionKind;
  nearMiss?: NearMissReference;
  duplicateOfRecordIds?: string[];
}

export interface ClassifyInput {
  unmatchedLedger: TransactionRecord[];
  unmatchedBank: TransactionRecord[];
  nearMisses: ReadonlyMap<string, NearMiss>;
  /** Records checked for same-side duplicates; defaults to the unmatched sets */
  ledgerPopulation?: TransactionRecord[];
  bankPopulation?: TransactionRecord[];
}

// ============================================
// NORMALIZATION
// ============================================

export interface NormalizeOptions {
  sessionId: string;
  /** Injected so tests can produce stable ids */
  idFactory?: () => string;
  /** Row number of the first row, defaults to 1 */
  firstRowNumber?: number;
}
