/**
 * Session, match and exception entities
 *
 * A session owns everything produced while reconciling one ledger
 * against one bank statement. Entities are plain data so they can be
 * cloned, persisted and sent over the wire as they are.
 */

import type {
  ExceptionKind,
  NearMissReference,
  RecordSource,
  Tolerances,
  TransactionRecord,
} from '../matching/types';

// ============================================
// Statuses
// ============================================

export type SessionStatus = 'CREATED' | 'MATCHING' | 'REVIEW' | 'COMPLETED' | 'FAILED';

export type MatchStatus = 'PROPOSED' | 'CONFIRMED' | 'REJECTED';

/** AUTO comes from the matcher, MANUAL from a reviewer's link */
export type MatchKind = 'AUTO' | 'MANUAL';

export type ExceptionStatus = 'OPEN' | 'RESOLVED';

export type AuditAction =
  | 'MATCHING_RUN'
  | 'MATCH_CONFIRMED'
  | 'MATCH_REJECTED'
  | 'EXCEPTION_RESOLVED'
  | 'MANUAL_LINK'
  | 'SESSION_COMPLETED'
  | 'SESSION_FAILED';

// ============================================
// Entities
// ============================================

export interface Match {
  id: string;
  ledgerRecordId: string;
  bankRecordId: string;
  score: number;
  dateDifferenceDays: number;
  amountDifference: number;
  kind: MatchKind;
  status: MatchStatus;
  confirmedBy?: string;
  confirmedAt?: Date;
  rejectedBy?: string;
  rejectedAt?: Date;
  rejectionReason?: string;
  createdAt: Date;
}

export interface ReconciliationException {
  id: string;
  recordId: string;
  source: RecordSource;
  kind: ExceptionKind;
  status: ExceptionStatus;
  nearMiss?: NearMissReference;
  duplicateOfRecordIds?: string[];
  resolutionNote?: string;
  resolvedBy?: string;
  resolvedAt?: Date;
  /** Set when a manual link closed this exception */
  closedByMatchId?: string;
  createdAt: Date;
}

/**
 * Immutable record of a human or system decision.
 * "system" for matching passes, the reviewer's identity otherwise.
 */
export interface AuditEntry {
  id: string;
  action: AuditAction;
  performedBy: string;
  targetId?: string;
  note?: string;
  at: Date;
}

export interface Session extends Tolerances {
  id: string;
  name: string;
  description?: string;
  status: SessionStatus;
  createdAt: Date;
  updatedAt: Date;
  processedAt?: Date;
  failureReason?: string;
  /** Incremented by the repository on every save */
  version: number;
  ledgerRecords: TransactionRecord[];
  bankRecords: TransactionRecord[];
  matches: Match[];
  exceptions: ReconciliationException[];
  auditTrail: AuditEntry[];
}

// ============================================
// Summary
// ============================================

export interface SessionSummary {
  sessionId: string;
  status: SessionStatus;
  totalRecords: number;
  ledgerRecordCount: number;
  bankRecordCount: number;
  /** Non-rejected matches */
  matchedCount: number;
  confirmedCount: number;
  proposedCount: number;
  /** Standing exceptions by kind, every kind present */
  exceptionCountByKind: Record<ExceptionKind, number>;
  openExceptionCount: number;
  resolvedExceptionCount: number;
  /** Share of records covered by a confirmed match or resolved exception */
  coverageRatio: number;
  /** Share of records in a non-rejected match */
  matchRate: number;
  /** Minor units */
  matchedAmount: number;
  unmatchedLedgerAmount: number;
  unmatchedBankAmount: number;
}

/**
 * Time and identity for one transition, injected so that state
 * transitions stay deterministic under test.
 */
export interface EntityContext {
  now: Date;
  newId: () => string;
}
