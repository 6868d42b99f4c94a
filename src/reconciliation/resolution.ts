/**
 * Resolution Workflow
 *
 * Reviewer decisions on a session in REVIEW, expressed as tagged
 * operations so the service, the HTTP layer and the audit trail all
 * speak the same vocabulary.
 *
 * BUSINESS RULES:
 * - Every check runs before anything changes, and changes happen on a copy
 * - Rejecting a match puts both records back in the exception pool
 * - Amount mismatches and duplicates need a note to be resolved
 * - A manual link closes the exceptions of both records it joins
 */

import { classifyExceptions } from '../matching/classifyExceptions';
import { MANUAL_LINK_SCORE } from '../matching/constants';
import { daysBetween } from '../matching/dateProximity';
import { findNearMisses } from '../matching/matchRecords';
import type { ExceptionKind, RecordSource, TransactionRecord } from '../matching/types';
import { AppError } from '../utils/AppError';
import { InvalidTransitionError, ResolutionNoteRequiredError } from '../utils/errors';
import { auditEntry } from './audit';
import { activeMatchesByRecord, assertCoverage, findActiveMatch, findOpenException } from './coverage';
import { cloneSession, exceptionFromDraft } from './sessionMachine';
import type { EntityContext, Match, ReconciliationException, Session } from './types';

// ============================================
// Operations
// ============================================

export interface ConfirmMatchOperation {
  type: 'CONFIRM_MATCH';
  matchId: string;
  performedBy: string;
}

export interface RejectMatchOperation {
  type: 'REJECT_MATCH';
  matchId: string;
  performedBy: string;
  reason?: string;
}

export interface ResolveExceptionOperation {
  type: 'RESOLVE_EXCEPTION';
  exceptionId: string;
  performedBy: string;
  note?: string;
}

export interface ManualLinkOperation {
  type: 'MANUAL_LINK';
  ledgerRecordId: string;
  bankRecordId: string;
  performedBy: string;
  note?: string;
}

export type ResolutionOperation =
  | ConfirmMatchOperation
  | RejectMatchOperation
  | ResolveExceptionOperation
  | ManualLinkOperation;

/** Kinds a reviewer may only close with an explanation */
export const NOTE_REQUIRED_KINDS: ReadonlySet<ExceptionKind> = new Set<ExceptionKind>([
  'AMOUNT_MISMATCH',
  'DUPLICATE_CANDIDATE',
]);

// ============================================
// Lookups
// ============================================

function findMatch(session: Session, matchId: string): Match {
  const match = session.matches.find((candidate) => candidate.id === matchId);
  if (!match) {
    throw AppError.notFound(`Match ${matchId} not found in session ${session.id}`);
  }
  return match;
}

function findException(session: Session, exceptionId: string): ReconciliationException {
  const exception = session.exceptions.find((candidate) => candidate.id === exceptionId);
  if (!exception) {
    throw AppError.notFound(`Exception ${exceptionId} not found in session ${session.id}`);
  }
  return exception;
}

function findRecord(session: Session, recordId: string, side: RecordSource): TransactionRecord {
  const ownSide = side === 'LEDGER' ? session.ledgerRecords : session.bankRecords;
  const record = ownSide.find((candidate) => candidate.id === recordId);
  if (record) {
    return record;
  }

  const otherSide = side === 'LEDGER' ? session.bankRecords : session.ledgerRecords;
  if (otherSide.some((candidate) => candidate.id === recordId)) {
    throw new InvalidTransitionError(
      `Record ${recordId} is not a ${side.toLowerCase()} record of session ${session.id}`
    );
  }

  throw AppError.notFound(`Record ${recordId} not found in session ${session.id}`);
}

const trimmed = (note: string | undefined): string | undefined => note?.trim() || undefined;

// ============================================
// Operation handlers
// ============================================

function confirmMatch(session: Session, op: ConfirmMatchOperation, ctx: EntityContext): Session {
  const match = findMatch(session, op.matchId);

  if (match.status === 'CONFIRMED') {
    return session;
  }
  if (match.status === 'REJECTED') {
    throw new InvalidTransitionError(`Match ${match.id} was rejected and cannot be confirmed`);
  }

  const next = cloneSession(session);
  const target = findMatch(next, op.matchId);
  target.status = 'CONFIRMED';
  target.confirmedBy = op.performedBy;
  target.confirmedAt = ctx.now;
  next.auditTrail.push(auditEntry('MATCH_CONFIRMED', op.performedBy, ctx, { targetId: match.id }));

  return next;
}

function rejectMatch(session: Session, op: RejectMatchOperation, ctx: EntityContext): Session {
  const match = findMatch(session, op.matchId);

  if (match.status === 'REJECTED') {
    throw new InvalidTransitionError(`Match ${match.id} is already rejected`);
  }

  const next = cloneSession(session);
  const target = findMatch(next, op.matchId);
  target.status = 'REJECTED';
  target.rejectedBy = op.performedBy;
  target.rejectedAt = ctx.now;
  const reason = trimmed(op.reason);
  if (reason) {
    target.rejectionReason = reason;
  }

  // Near misses are looked for among records nobody covers with a match
  const matched = activeMatchesByRecord(next);
  const freeLedger = next.ledgerRecords.filter((record) => !matched.has(record.id));
  const freeBank = next.bankRecords.filter((record) => !matched.has(record.id));
  const nearMisses = findNearMisses(freeLedger, freeBank, {
    dateToleranceDays: next.dateToleranceDays,
    amountTolerance: next.amountTolerance,
  });

  const drafts = classifyExceptions({
    unmatchedLedger: freeLedger.filter((record) => record.id === target.ledgerRecordId),
    unmatchedBank: freeBank.filter((record) => record.id === target.bankRecordId),
    nearMisses,
    ledgerPopulation: next.ledgerRecords,
    bankPopulation: next.bankRecords,
  });
  next.exceptions.push(...drafts.map((draft) => exceptionFromDraft(draft, ctx)));

  next.auditTrail.push(
    auditEntry('MATCH_REJECTED', op.performedBy, ctx, {
      targetId: match.id,
      ...(reason ? { note: reason } : {}),
    })
  );

  return next;
}

function resolveException(session: Session, op: ResolveExceptionOperation, ctx: EntityContext): Session {
  const exception = findException(session, op.exceptionId);

  if (exception.status === 'RESOLVED') {
    throw new InvalidTransitionError(`Exception ${exception.id} is already resolved`);
  }

  const note = trimmed(op.note);
  if (!note && NOTE_REQUIRED_KINDS.has(exception.kind)) {
    throw new ResolutionNoteRequiredError(exception.id, exception.kind);
  }

  const next = cloneSession(session);
  const target = findException(next, op.exceptionId);
  target.status = 'RESOLVED';
  target.resolvedBy = op.performedBy;
  target.resolvedAt = ctx.now;
  if (note) {
    target.resolutionNote = note;
  }
  next.auditTrail.push(
    auditEntry('EXCEPTION_RESOLVED', op.performedBy, ctx, {
      targetId: exception.id,
      ...(note ? { note } : {}),
    })
  );

  return next;
}

function manualLink(session: Session, op: ManualLinkOperation, ctx: EntityContext): Session {
  const ledger = findRecord(session, op.ledgerRecordId, 'LEDGER');
  const bank = findRecord(session, op.bankRecordId, 'BANK');

  for (const record of [ledger, bank]) {
    const active = findActiveMatch(session, record.id);
    if (active) {
      throw new InvalidTransitionError(
        `Record ${record.id} is already in match ${active.id}; reject it before linking`
      );
    }
    if (!findOpenException(session, record.id)) {
      throw new InvalidTransitionError(`Record ${record.id} has no open exception to link`);
    }
  }

  const note = trimmed(op.note);
  const match: Match = {
    id: ctx.newId(),
    ledgerRecordId: ledger.id,
    bankRecordId: bank.id,
    score: MANUAL_LINK_SCORE,
    dateDifferenceDays: daysBetween(ledger.date, bank.date),
    amountDifference: Math.abs(ledger.amount - bank.amount),
    kind: 'MANUAL',
    status: 'CONFIRMED',
    confirmedBy: op.performedBy,
    confirmedAt: ctx.now,
    createdAt: ctx.now,
  };

  const next = cloneSession(session);
  next.matches.push(match);

  for (const recordId of [ledger.id, bank.id]) {
    const exception = findOpenException(next, recordId);
    if (exception) {
      exception.status = 'RESOLVED';
      exception.resolvedBy = op.performedBy;
      exception.resolvedAt = ctx.now;
      exception.closedByMatchId = match.id;
      if (note) {
        exception.resolutionNote = note;
      }
    }
  }

  next.auditTrail.push(
    auditEntry('MANUAL_LINK', op.performedBy, ctx, {
      targetId: match.id,
      ...(note ? { note } : {}),
    })
  );

  return next;
}

function dispatch(session: Session, operation: ResolutionOperation, ctx: EntityContext): Session {
  switch (operation.type) {
    case 'CONFIRM_MATCH':
      return confirmMatch(session, operation, ctx);
    case 'REJECT_MATCH':
      return rejectMatch(session, operation, ctx);
    case 'RESOLVE_EXCEPTION':
      return resolveException(session, operation, ctx);
    case 'MANUAL_LINK':
      return manualLink(session, operation, ctx);
    default: {
      const unknown: never = operation;
      throw AppError.badRequest(`Unknown operation ${JSON.stringify(unknown)}`);
    }
  }
}

// ============================================
// Entry point
// ============================================

/**
 * Applies one reviewer decision and returns the resulting session.
 * Confirming an already confirmed match returns the input unchanged.
 *
 * @throws InvalidTransitionError outside REVIEW or for an illegal move
 * @throws ResolutionNoteRequiredError when a required note is missing
 * @throws AppError (404) for an unknown match, exception or record
 */
export function applyOperation(
  session: Session,
  operation: ResolutionOperation,
  ctx: EntityContext
): Session {
  if (session.status !== 'REVIEW') {
    throw new InvalidTransitionError(
      `Session ${session.id} is ${session.status}; decisions are only accepted in REVIEW`
    );
  }

  const next = dispatch(session, operation, ctx);

  if (next !== session) {
    next.updatedAt = ctx.now;
    assertCoverage(next);
  }

  return next;
}
