/**
 * Candidate Score Calculator for Reconciliation
 *
 * Combines three signals into a single score in [0, 1]:
 * 1. Date proximity        (30%)
 * 2. Amount proximity      (40%)
 * 3. Description overlap   (30%)
 *
 * Formula: score = 0.3 * dateScore + 0.4 * amountScore + 0.3 * descriptionSimilarity
 */

import { SCORE_DECIMALS, SCORE_WEIGHTS } from './constants';
import { calculateDateScore, daysBetween } from './dateProximity';
import { calculateDescriptionSimilarity } from './descriptionSimilarity';
import type { Candidate, ScoreBreakdown, Tolerances, TransactionRecord } from './types';

/**
 * Score in [0, 1] for an amount difference already known to be in tolerance.
 *
 * @example
 * calculateAmountScore(0, 0)    // 1
 * calculateAmountScore(50, 99)  // 0.5
 */
export function calculateAmountScore(amountDifference: number, amountTolerance: number): number {
  if (amountDifference <= 0) {
    return 1;
  }

  return Math.max(0, 1 - amountDifference / (amountTolerance + 1));
}

export function roundScore(value: number): number {
  const factor = 10 ** SCORE_DECIMALS;
  return Math.round(value * factor) / factor;
}

/**
 * Weighted total of a breakdown, rounded.
 */
export function combineScore(breakdown: ScoreBreakdown): number {
  return roundScore(
    SCORE_WEIGHTS.DATE * breakdown.dateScore +
      SCORE_WEIGHTS.AMOUNT * breakdown.amountScore +
      SCORE_WEIGHTS.DESCRIPTION * breakdown.descriptionSimilarity
  );
}

/**
 * Scores a ledger/bank pair, or returns null when either tolerance fails.
 */
export function scoreCandidate(
  ledger: TransactionRecord,
  bank: TransactionRecord,
  tolerances: Tolerances
): Candidate | null {
  const dateDifferenceDays = daysBetween(ledger.date, bank.date);
  if (dateDifferenceDays > tolerances.dateToleranceDays) {
    return null;
  }

  const amountDifference = Math.abs(ledger.amount - bank.amount);
  if (amountDifference > tolerances.amountTolerance) {
    return null;
  }

  const breakdown: ScoreBreakdown = {
    dateScore: calculateDateScore(dateDifferenceDays, tolerances.dateToleranceDays),
    amountScore: calculateAmountScore(amountDifference, tolerances.amountTolerance),
    descriptionSimilarity: calculateDescriptionSimilarity(ledger.description, bank.description),
  };

  return {
    ledgerRecordId: ledger.id,
    bankRecordId: bank.id,
    score: combineScore(breakdown),
    dateDifferenceDays,
    amountDifference,
    breakdown,
  };
}

export default scoreCandidate;
