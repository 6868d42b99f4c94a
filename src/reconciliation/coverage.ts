/**
 * Coverage bookkeeping
 *
 * Every record in a session must be accounted for exactly once: by one
 * non-rejected match, or by one exception that still stands (one not
 * closed by a manual link). These helpers answer "who covers this
 * record" and report every record for which that answer is wrong.
 */

import { CoverageInvariantError } from '../utils/errors';
import type { TransactionRecord } from '../matching/types';
import type { Match, ReconciliationException, Session } from './types';

export function isActiveMatch(match: Match): boolean {
  return match.status !== 'REJECTED';
}

export function isStandingException(exception: ReconciliationException): boolean {
  return exception.closedByMatchId === undefined;
}

export function allRecords(session: Session): TransactionRecord[] {
  return [...session.ledgerRecords, ...session.bankRecords];
}

/**
 * Active matches per record id. Records without a match are absent.
 */
export function activeMatchesByRecord(session: Session): Map<string, Match[]> {
  const byRecord = new Map<string, Match[]>();

  for (const match of session.matches) {
    if (!isActiveMatch(match)) continue;

    for (const recordId of [match.ledgerRecordId, match.bankRecordId]) {
      const list = byRecord.get(recordId);
      if (list) {
        list.push(match);
      } else {
        byRecord.set(recordId, [match]);
      }
    }
  }

  return byRecord;
}

function exceptionsByRecord(session: Session): Map<string, ReconciliationException[]> {
  const byRecord = new Map<string, ReconciliationException[]>();

  for (const exception of session.exceptions) {
    const list = byRecord.get(exception.recordId);
    if (list) {
      list.push(exception);
    } else {
      byRecord.set(exception.recordId, [exception]);
    }
  }

  return byRecord;
}

export function findActiveMatch(session: Session, recordId: string): Match | undefined {
  return session.matches.find(
    (match) =>
      isActiveMatch(match) && (match.ledgerRecordId === recordId || match.bankRecordId === recordId)
  );
}

export function findOpenException(
  session: Session,
  recordId: string
): ReconciliationException | undefined {
  return session.exceptions.find(
    (exception) => exception.recordId === recordId && exception.status === 'OPEN'
  );
}

/**
 * Describes every coverage violation; an empty list means the invariant holds.
 */
export function findCoverageViolations(session: Session): string[] {
  const violations: string[] = [];
  const matches = activeMatchesByRecord(session);
  const exceptions = exceptionsByRecord(session);
  const knownIds = new Set<string>();

  for (const record of allRecords(session)) {
    knownIds.add(record.id);

    const active = matches.get(record.id)?.length ?? 0;
    const own = exceptions.get(record.id) ?? [];
    const open = own.filter((exception) => exception.status === 'OPEN').length;
    const standing = own.filter(isStandingException).length;

    if (active > 1) {
      violations.push(`record ${record.id} is in ${active} active matches`);
    }
    if (open > 1) {
      violations.push(`record ${record.id} has ${open} open exceptions`);
    }
    if (active + standing !== 1) {
      violations.push(
        `record ${record.id} is covered ${active + standing} times (${active} match, ${standing} exception)`
      );
    }
  }

  for (const recordId of [...matches.keys(), ...exceptions.keys()]) {
    if (!knownIds.has(recordId)) {
      violations.push(`unknown record ${recordId} is referenced`);
    }
  }

  return violations;
}

/**
 * @throws CoverageInvariantError listing every violation
 */
export function assertCoverage(session: Session): void {
  const violations = findCoverageViolations(session);
  if (violations.length > 0) {
    throw new CoverageInvariantError(violations);
  }
}

/**
 * Ids of records that still block completion, ledger first, in record order.
 * A record is settled when it is in a confirmed match, or carries a
 * resolved exception that still stands.
 */
export function uncoveredRecordIds(session: Session): string[] {
  const matches = activeMatchesByRecord(session);
  const exceptions = exceptionsByRecord(session);

  const isSettled = (recordId: string): boolean => {
    const match = matches.get(recordId)?.[0];
    if (match) {
      return match.status === 'CONFIRMED';
    }

    return (exceptions.get(recordId) ?? []).some(
      (exception) => exception.status === 'RESOLVED' && isStandingException(exception)
    );
  };

  return allRecords(session)
    .filter((record) => !isSettled(record.id))
    .map((record) => record.id);
}
