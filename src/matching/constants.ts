/**
 * Constants for the Reconciliation Matching Engine
 *
 * These values define the behavior of the matching algorithm.
 * Amount is the strongest signal; date and description contribute equally.
 */

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Weights of the three candidate signals. They sum to 1, so an exact
 * match on date, amount and description scores 1.0.
 *
 * Examples (tolerance 3 days / 0 cents):
 * - same day, same amount, identical text   → 0.3 + 0.4 + 0.3 = 1.0
 * - 2 days apart, same amount, no shared word → 0.15 + 0.4 + 0 = 0.55
 */
export const SCORE_WEIGHTS = {
  DATE: 0.3,
  AMOUNT: 0.4,
  DESCRIPTION: 0.3,
} as const;

/**
 * Scores are rounded to this many decimals so that equal inputs compare
 * equal and the tie-break rule decides, not floating point noise.
 */
export const SCORE_DECIMALS = 4;

/**
 * Score given to a manual link, which bypasses scoring.
 */
export const MANUAL_LINK_SCORE = 1;

// ============================================
// CANCELLATION
// ============================================

/**
 * Rows of the ledger side processed between two checks of the abort
 * signal. The asynchronous pass also yields to the event loop at each check.
 */
export const ABORT_CHECK_INTERVAL = 256;

// ============================================
// AMOUNTS
// ============================================

/**
 * Digits after the decimal point in the statement currency.
 */
export const MINOR_UNIT_DIGITS = 2;

/**
 * Symbols stripped from amount strings before parsing.
 */
export const CURRENCY_SYMBOLS = /[$£€¥]/g;

// ============================================
// DATES
// ============================================

export const MS_PER_DAY = 24 * 60 * 60 * 1000;

/**
 * English month names accepted by the date parser, full or abbreviated.
 */
export const MONTHS: Readonly<Record<string, number>> = {
  JAN: 1,
  JANUARY: 1,
  FEB: 2,
  FEBRUARY: 2,
  MAR: 3,
  MARCH: 3,
  APR: 4,
  APRIL: 4,
  MAY: 5,
  JUN: 6,
  JUNE: 6,
  JUL: 7,
  JULY: 7,
  AUG: 8,
  AUGUST: 8,
  SEP: 9,
  SEPT: 9,
  SEPTEMBER: 9,
  OCT: 10,
  OCTOBER: 10,
  NOV: 11,
  NOVEMBER: 11,
  DEC: 12,
  DECEMBER: 12,
};
