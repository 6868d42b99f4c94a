/**
 * Session State Machine
 *
 *   CREATED ──▶ MATCHING ──▶ REVIEW ──▶ COMPLETED
 *                  │  ▲         │
 *                  ▼  └─────────┘ (re-run, only while nothing is confirmed)
 *                FAILED
 *
 * Every transition takes a session and returns a new one; the input is
 * never mutated, so a failed transition leaves nothing half-applied.
 */

import { types } from 'util';
import { classifyExceptions, matchRecords, matchRecordsAsync } from '../matching';
import { assertValidTolerances } from '../matching/matchRecords';
import { isUtcMidnight } from '../matching/dateProximity';
import type { ExceptionDraft, MatchResult, Tolerances, TransactionRecord } from '../matching/types';
import {
  EmptyRecordSetError,
  IncompleteReconciliationError,
  InvalidRecordsError,
  InvalidTransitionError,
  IrreversibleStateError,
} from '../utils/errors';
import { auditEntry, SYSTEM_ACTOR } from './audit';
import { assertCoverage, uncoveredRecordIds } from './coverage';
import type {
  EntityContext,
  Match,
  ReconciliationException,
  Session,
  SessionStatus,
} from './types';

export interface CreateSessionParams {
  id: string;
  name: string;
  description?: string;
  ledgerRecords: TransactionRecord[];
  bankRecords: TransactionRecord[];
  tolerances: Tolerances;
}

export function cloneSession(session: Session): Session {
  return structuredClone(session);
}

function assertStatus(session: Session, allowed: SessionStatus[], action: string): void {
  if (!allowed.includes(session.status)) {
    throw new InvalidTransitionError(
      `Cannot ${action} session ${session.id} in status ${session.status}`
    );
  }
}

export function createSessionEntity(params: CreateSessionParams, ctx: EntityContext): Session {
  assertValidTolerances(params.tolerances);

  return {
    id: params.id,
    name: params.name,
    ...(params.description ? { description: params.description } : {}),
    status: 'CREATED',
    dateToleranceDays: params.tolerances.dateToleranceDays,
    amountTolerance: params.tolerances.amountTolerance,
    createdAt: ctx.now,
    updatedAt: ctx.now,
    version: 0,
    ledgerRecords: params.ledgerRecords,
    bankRecords: params.bankRecords,
    matches: [],
    exceptions: [],
    auditTrail: [],
  };
}

/**
 * CREATED | REVIEW → MATCHING. Repeating the call on a session already in
 * MATCHING only updates its tolerances.
 *
 * @throws InvalidTransitionError from COMPLETED or FAILED
 * @throws IrreversibleStateError when re-running over confirmed matches
 * @throws EmptyRecordSetError when either side has no records
 */
export function beginMatching(
  session: Session,
  tolerances: Tolerances | undefined,
  ctx: EntityContext
): Session {
  assertStatus(session, ['CREATED', 'REVIEW', 'MATCHING'], 'start matching for');

  if (session.status === 'REVIEW' && session.matches.some((match) => match.status === 'CONFIRMED')) {
    throw new IrreversibleStateError(
      `Session ${session.id} has confirmed matches; matching cannot be re-run`
    );
  }

  const emptySides = [
    ...(session.ledgerRecords.length === 0 ? ['ledger'] : []),
    ...(session.bankRecords.length === 0 ? ['bank'] : []),
  ];
  if (emptySides.length > 0) {
    throw new EmptyRecordSetError(session.id, emptySides);
  }

  if (tolerances) {
    assertValidTolerances(tolerances);
  }

  const next = cloneSession(session);
  next.status = 'MATCHING';
  next.updatedAt = ctx.now;
  delete next.failureReason;
  if (tolerances) {
    next.dateToleranceDays = tolerances.dateToleranceDays;
    next.amountTolerance = tolerances.amountTolerance;
  }

  return next;
}

/**
 * Rejects records that did not come through the normalizer: non-integer
 * amounts, dates carrying a time, records filed under the wrong side or
 * sharing an id.
 *
 * @throws InvalidRecordsError
 */
export function assertRecordsNormalized(session: Session): void {
  const problems: string[] = [];
  const seen = new Set<string>();

  const check = (record: TransactionRecord, side: TransactionRecord['source']): void => {
    if (seen.has(record.id)) {
      problems.push(`duplicate record id ${record.id}`);
    }
    seen.add(record.id);

    if (record.source !== side) {
      problems.push(`record ${record.id} is filed under ${side} but came from ${record.source}`);
    }
    if (!Number.isSafeInteger(record.amount)) {
      problems.push(`record ${record.id} amount ${record.amount} is not an integer in minor units`);
    }
    if (!types.isDate(record.date) || !isUtcMidnight(record.date)) {
      problems.push(`record ${record.id} date is not a UTC calendar day`);
    }
  };

  session.ledgerRecords.forEach((record) => check(record, 'LEDGER'));
  session.bankRecords.forEach((record) => check(record, 'BANK'));

  if (problems.length > 0) {
    throw new InvalidRecordsError(session.id, problems);
  }
}

export function exceptionFromDraft(draft: ExceptionDraft, ctx: EntityContext): ReconciliationException {
  return {
    id: ctx.newId(),
    recordId: draft.recordId,
    source: draft.source,
    kind: draft.kind,
    status: 'OPEN',
    ...(draft.nearMiss ? { nearMiss: draft.nearMiss } : {}),
    ...(draft.duplicateOfRecordIds ? { duplicateOfRecordIds: draft.duplicateOfRecordIds } : {}),
    createdAt: ctx.now,
  };
}

/**
 * MATCHING → REVIEW. Replaces whatever an earlier pass produced; records
 * from rejected matches are ordinary input again.
 *
 * @throws CoverageInvariantError when the pass leaves a record uncovered
 */
export function completeMatching(session: Session, result: MatchResult, ctx: EntityContext): Session {
  assertStatus(session, ['MATCHING'], 'complete matching for');

  const matches: Match[] = result.matches.map((candidate) => ({
    id: ctx.newId(),
    ledgerRecordId: candidate.ledgerRecordId,
    bankRecordId: candidate.bankRecordId,
    score: candidate.score,
    dateDifferenceDays: candidate.dateDifferenceDays,
    amountDifference: candidate.amountDifference,
    kind: 'AUTO',
    status: 'PROPOSED',
    createdAt: ctx.now,
  }));

  const exceptions = classifyExceptions({
    unmatchedLedger: result.unmatchedLedger,
    unmatchedBank: result.unmatchedBank,
    nearMisses: result.nearMisses,
    ledgerPopulation: session.ledgerRecords,
    bankPopulation: session.bankRecords,
  }).map((draft) => exceptionFromDraft(draft, ctx));

  const next = cloneSession(session);
  next.matches = matches;
  next.exceptions = exceptions;
  next.status = 'REVIEW';
  next.processedAt = ctx.now;
  next.updatedAt = ctx.now;
  next.auditTrail.push(
    auditEntry('MATCHING_RUN', SYSTEM_ACTOR, ctx, {
      note: `${matches.length} match(es) proposed from ${result.candidateCount} candidate(s), ${exceptions.length} exception(s)`,
    })
  );

  assertCoverage(next);
  return next;
}

/**
 * Runs the matcher over the session's records and publishes the result.
 * A cancelled signal throws MatchingCancelledError before anything is
 * published.
 */
export function runMatchingPass(session: Session, ctx: EntityContext, signal?: AbortSignal): Session {
  assertStatus(session, ['MATCHING'], 'run matching for');
  assertRecordsNormalized(session);

  const result = matchRecords(session.ledgerRecords, session.bankRecords, {
    dateToleranceDays: session.dateToleranceDays,
    amountTolerance: session.amountTolerance,
    signal,
  });

  return completeMatching(session, result, ctx);
}

/**
 * `runMatchingPass` for long passes: the matcher yields to the event loop
 * between slices, so a signal aborted while the pass is running stops it.
 */
export async function runMatchingPassAsync(
  session: Session,
  ctx: EntityContext,
  signal?: AbortSignal
): Promise<Session> {
  assertStatus(session, ['MATCHING'], 'run matching for');
  assertRecordsNormalized(session);

  const result = await matchRecordsAsync(session.ledgerRecords, session.bankRecords, {
    dateToleranceDays: session.dateToleranceDays,
    amountTolerance: session.amountTolerance,
    signal,
  });

  return completeMatching(session, result, ctx);
}

/**
 * MATCHING → FAILED.
 */
export function failMatching(session: Session, reason: string, ctx: EntityContext): Session {
  assertStatus(session, ['MATCHING'], 'fail');

  const next = cloneSession(session);
  next.status = 'FAILED';
  next.failureReason = reason;
  next.updatedAt = ctx.now;
  next.auditTrail.push(auditEntry('SESSION_FAILED', SYSTEM_ACTOR, ctx, { note: reason }));

  return next;
}

/**
 * REVIEW → COMPLETED, once every record is settled.
 *
 * @throws IncompleteReconciliationError listing the unsettled records
 */
export function completeSession(session: Session, performedBy: string, ctx: EntityContext): Session {
  assertStatus(session, ['REVIEW'], 'complete');

  const uncovered = uncoveredRecordIds(session);
  if (uncovered.length > 0) {
    throw new IncompleteReconciliationError(session.id, uncovered);
  }

  const next = cloneSession(session);
  next.status = 'COMPLETED';
  next.updatedAt = ctx.now;
  next.auditTrail.push(auditEntry('SESSION_COMPLETED', performedBy, ctx));

  return next;
}
