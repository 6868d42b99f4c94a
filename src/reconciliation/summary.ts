/**
 * Session summary aggregate
 *
 * Counts and amounts a reviewer needs to judge progress at a glance.
 * Ratios are rounded to 4 decimals; amounts are minor units.
 */

import type { ExceptionKind } from '../matching/types';
import { activeMatchesByRecord, allRecords, isActiveMatch, isStandingException, uncoveredRecordIds } from './coverage';
import type { Session, SessionSummary } from './types';

const RATIO_DECIMALS = 4;

function ratio(part: number, total: number): number {
  if (total === 0) {
    return 0;
  }
  const factor = 10 ** RATIO_DECIMALS;
  return Math.round((part / total) * factor) / factor;
}

function emptyKindCounts(): Record<ExceptionKind, number> {
  return {
    UNMATCHED_LEDGER: 0,
    UNMATCHED_BANK: 0,
    AMOUNT_MISMATCH: 0,
    DUPLICATE_CANDIDATE: 0,
  };
}

export function summarize(session: Session): SessionSummary {
  const totalRecords = session.ledgerRecords.length + session.bankRecords.length;
  const activeMatches = session.matches.filter(isActiveMatch);
  const confirmed = activeMatches.filter((match) => match.status === 'CONFIRMED');
  const standing = session.exceptions.filter(isStandingException);

  const exceptionCountByKind = emptyKindCounts();
  for (const exception of standing) {
    exceptionCountByKind[exception.kind] += 1;
  }

  const ledgerAmounts = new Map(session.ledgerRecords.map((record) => [record.id, record.amount]));
  const matchedAmount = confirmed.reduce(
    (sum, match) => sum + (ledgerAmounts.get(match.ledgerRecordId) ?? 0),
    0
  );

  const matched = activeMatchesByRecord(session);
  const unmatchedAmount = (records: Session['ledgerRecords']): number =>
    records.filter((record) => !matched.has(record.id)).reduce((sum, record) => sum + record.amount, 0);

  const settledCount = allRecords(session).length - uncoveredRecordIds(session).length;

  return {
    sessionId: session.id,
    status: session.status,
    totalRecords,
    ledgerRecordCount: session.ledgerRecords.length,
    bankRecordCount: session.bankRecords.length,
    matchedCount: activeMatches.length,
    confirmedCount: confirmed.length,
    proposedCount: activeMatches.length - confirmed.length,
    exceptionCountByKind,
    openExceptionCount: standing.filter((exception) => exception.status === 'OPEN').length,
    resolvedExceptionCount: standing.filter((exception) => exception.status === 'RESOLVED').length,
    coverageRatio: ratio(settledCount, totalRecords),
    matchRate: ratio(activeMatches.length * 2, totalRecords),
    matchedAmount,
    unmatchedLedgerAmount: unmatchedAmount(session.ledgerRecords),
    unmatchedBankAmount: unmatchedAmount(session.bankRecords),
  };
}

export default summarize;
