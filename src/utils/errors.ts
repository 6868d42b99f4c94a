/**
 * Reconciliation error taxonomy
 *
 * - Bad input data (recoverable, the caller may skip or report the row):
 *   MalformedRowError, MalformedRowsError
 * - Records that bypassed the normalizer (fails the matching pass):
 *   InvalidRecordsError
 * - State machine contract violations (always surfaced, never retried):
 *   EmptyRecordSetError, IncompleteReconciliationError, IrreversibleStateError,
 *   InvalidTransitionError, ResolutionNoteRequiredError
 * - Lock contention (retried by the caller with backoff, never by the core):
 *   ConcurrentModificationError
 */

import { AppError, ErrorCode } from './AppError';

export interface RowErrorDetail {
  rowNumber: number;
  field: 'date' | 'amount' | 'row';
  value: unknown;
  reason: string;
}

export class MalformedRowError extends AppError {
  public readonly rowNumber: number;
  public readonly field: RowErrorDetail['field'];
  public readonly detail: RowErrorDetail;

  constructor(detail: RowErrorDetail) {
    super(
      `Row ${detail.rowNumber}: ${detail.reason}`,
      422,
      true,
      ErrorCode.MALFORMED_ROW,
      detail
    );
    this.name = 'MalformedRowError';
    this.rowNumber = detail.rowNumber;
    this.field = detail.field;
    this.detail = detail;
  }
}

/**
 * A row error tagged with the side it came from.
 */
export interface SourcedRowError extends RowErrorDetail {
  source: 'LEDGER' | 'BANK';
}

export class MalformedRowsError extends AppError {
  public readonly rowErrors: SourcedRowError[];

  constructor(rowErrors: SourcedRowError[]) {
    super(
      `${rowErrors.length} malformed row(s): ${rowErrors
        .slice(0, 3)
        .map((error) => `${error.source.toLowerCase()} row ${error.rowNumber} ${error.field}`)
        .join(', ')}`,
      422,
      true,
      ErrorCode.MALFORMED_ROWS,
      rowErrors
    );
    this.name = 'MalformedRowsError';
    this.rowErrors = rowErrors;
  }
}

export class InvalidRecordsError extends AppError {
  public readonly problems: string[];

  constructor(sessionId: string, problems: string[]) {
    super(
      `Session ${sessionId} holds ${problems.length} record(s) that are not normalized: ${problems.slice(0, 3).join('; ')}`,
      422,
      true,
      ErrorCode.INVALID_RECORDS,
      { problems }
    );
    this.name = 'InvalidRecordsError';
    this.problems = problems;
  }
}

export class EmptyRecordSetError extends AppError {
  constructor(sessionId: string, emptySides: string[]) {
    super(
      `Session ${sessionId} has no ${emptySides.join(' or ')} records to reconcile`,
      409,
      true,
      ErrorCode.EMPTY_RECORD_SET,
      { emptySides }
    );
    this.name = 'EmptyRecordSetError';
  }
}

export class IncompleteReconciliationError extends AppError {
  public readonly uncoveredRecordIds: string[];

  constructor(sessionId: string, uncoveredRecordIds: string[]) {
    super(
      `Session ${sessionId} still has ${uncoveredRecordIds.length} record(s) without a confirmed match or resolved exception`,
      409,
      true,
      ErrorCode.INCOMPLETE_RECONCILIATION,
      { uncoveredRecordIds }
    );
    this.name = 'IncompleteReconciliationError';
    this.uncoveredRecordIds = uncoveredRecordIds;
  }
}

export class IrreversibleStateError extends AppError {
  constructor(message: string) {
    super(message, 409, true, ErrorCode.IRREVERSIBLE_STATE);
    this.name = 'IrreversibleStateError';
  }
}

export class InvalidTransitionError extends AppError {
  constructor(message: string) {
    super(message, 409, true, ErrorCode.INVALID_TRANSITION);
    this.name = 'InvalidTransitionError';
  }
}

export class ResolutionNoteRequiredError extends AppError {
  constructor(exceptionId: string, kind: string) {
    super(
      `Exception ${exceptionId} of kind ${kind} requires a resolution note`,
      422,
      true,
      ErrorCode.RESOLUTION_NOTE_REQUIRED
    );
    this.name = 'ResolutionNoteRequiredError';
  }
}

export class ConcurrentModificationError extends AppError {
  constructor(sessionId: string, reason = 'is being modified by another operation') {
    super(`Session ${sessionId} ${reason}`, 409, true, ErrorCode.CONCURRENT_MODIFICATION);
    this.name = 'ConcurrentModificationError';
  }
}

export class MatchingCancelledError extends AppError {
  constructor() {
    super('Matching pass was cancelled', 409, true, ErrorCode.MATCHING_CANCELLED);
    this.name = 'MatchingCancelledError';
  }
}

export class CoverageInvariantError extends AppError {
  constructor(violations: string[]) {
    super(
      `Coverage invariant violated: ${violations.slice(0, 5).join('; ')}`,
      500,
      false,
      ErrorCode.COVERAGE_INVARIANT,
      { violations }
    );
    this.name = 'CoverageInvariantError';
  }
}
