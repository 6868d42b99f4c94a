/**
 * Tests for Ledger/Bank Matching
 */

import {
  compareCandidates,
  compareNearMisses,
  findNearMisses,
  matchRecords,
  matchRecordsAsync,
} from '../../src/matching/matchRecords';
import { ABORT_CHECK_INTERVAL } from '../../src/matching/constants';
import { AppError } from '../../src/utils/AppError';
import { MatchingCancelledError } from '../../src/utils/errors';
import type { Candidate, NearMiss } from '../../src/matching/types';
import { bank, ledger } from '../helpers/fixtures';

const DEFAULT_TOLERANCES = { dateToleranceDays: 3, amountTolerance: 0 };

const pairs = (result: ReturnType<typeof matchRecords>): string[][] =>
  result.matches.map((match) => [match.ledgerRecordId, match.bankRecordId]);

describe('matchRecords', () => {
  // ============================================
  // Basic matching
  // ============================================

  describe('basic matching', () => {
    it('should match a pair two days apart', () => {
      const result = matchRecords(
        [ledger('A', '2024-01-05', 10000)],
        [bank('B', '2024-01-07', 10000)],
        DEFAULT_TOLERANCES
      );

      expect(pairs(result)).toEqual([['A', 'B']]);
      expect(result.matches[0].score).toBe(0.55);
      expect(result.matches[0].dateDifferenceDays).toBe(2);
      expect(result.unmatchedLedger).toEqual([]);
      expect(result.unmatchedBank).toEqual([]);
      expect(result.nearMisses.size).toBe(0);
      expect(result.candidateCount).toBe(1);
    });

    it('should leave everything unmatched when one side is empty', () => {
      const result = matchRecords([ledger('A', '2024-01-05', 10000)], [], DEFAULT_TOLERANCES);

      expect(result.matches).toEqual([]);
      expect(result.unmatchedLedger.map((record) => record.id)).toEqual(['A']);
      expect(result.candidateCount).toBe(0);
    });

    it('should preserve input order in the unmatched lists', () => {
      const result = matchRecords(
        [ledger('L3', '2024-01-05', 300), ledger('L1', '2024-01-05', 100), ledger('L2', '2024-01-05', 200)],
        [bank('B1', '2024-01-05', 100)],
        DEFAULT_TOLERANCES
      );

      expect(result.unmatchedLedger.map((record) => record.id)).toEqual(['L3', 'L2']);
    });
  });

  // ============================================
  // Greedy assignment
  // ============================================

  describe('greedy assignment', () => {
    it('should take the best pair first and never reuse a record', () => {
      const result = matchRecords(
        [ledger('L1', '2024-01-05', 10000, 'Acme rent'), ledger('L2', '2024-01-06', 10000, 'other')],
        [bank('B1', '2024-01-05', 10000, 'Acme rent'), bank('B2', '2024-01-06', 10000, 'Acme rent')],
        DEFAULT_TOLERANCES
      );

      // L1-B1 scores 1, L1-B2 0.925, L2-B2 0.7, L2-B1 0.625
      expect(pairs(result)).toEqual([
        ['L1', 'B1'],
        ['L2', 'B2'],
      ]);
      expect(result.candidateCount).toBe(4);
    });

    it('should break score ties by date distance', () => {
      // Both pairs score 0.7: same day with no shared word, or one day apart sharing 1 of 4 words
      const result = matchRecords(
        [ledger('L1', '2024-01-05', 10000, 'alpha beta gamma delta')],
        [bank('B1', '2024-01-05', 10000, 'zeta'), bank('B2', '2024-01-06', 10000, 'alpha')],
        DEFAULT_TOLERANCES
      );

      expect(result.matches[0].score).toBe(0.7);
      expect(pairs(result)).toEqual([['L1', 'B1']]);
    });

    it('should break full ties by ledger id using code-unit order', () => {
      const result = matchRecords(
        [ledger('L2', '2024-01-05', 10000), ledger('L10', '2024-01-05', 10000)],
        [bank('B1', '2024-01-05', 10000)],
        DEFAULT_TOLERANCES
      );

      expect(pairs(result)).toEqual([['L10', 'B1']]);
    });

    it('should break full ties by bank id after ledger id', () => {
      const result = matchRecords(
        [ledger('L1', '2024-01-05', 10000)],
        [bank('B2', '2024-01-05', 10000), bank('B10', '2024-01-05', 10000)],
        DEFAULT_TOLERANCES
      );

      expect(pairs(result)).toEqual([['L1', 'B10']]);
    });

    it('should be deterministic across runs', () => {
      const ledgerRecords = [
        ledger('L1', '2024-01-05', 10000, 'Acme'),
        ledger('L2', '2024-01-06', 5000, 'Globex'),
        ledger('L3', '2024-01-06', 10000),
      ];
      const bankRecords = [
        bank('B1', '2024-01-06', 10000, 'ACME'),
        bank('B2', '2024-01-07', 5000),
        bank('B3', '2024-01-05', 10000),
      ];

      const first = matchRecords(ledgerRecords, bankRecords, DEFAULT_TOLERANCES);
      const second = matchRecords([...ledgerRecords], [...bankRecords], DEFAULT_TOLERANCES);

      expect(second).toEqual(first);
    });
  });

  // ============================================
  // Near misses
  // ============================================

  describe('near misses', () => {
    it('should record an amount near miss for both records', () => {
      const result = matchRecords(
        [ledger('A', '2024-01-05', 10000)],
        [bank('B', '2024-01-05', 10050)],
        { dateToleranceDays: 0, amountTolerance: 0 }
      );

      expect(result.matches).toEqual([]);
      expect(result.nearMisses.get('A')).toEqual({
        recordId: 'A',
        counterpartRecordId: 'B',
        dateDifferenceDays: 0,
        amountDifference: 50,
        failedTolerance: 'AMOUNT',
        excess: 50,
      });
      expect(result.nearMisses.get('B')?.counterpartRecordId).toBe('A');
    });

    it('should prefer an amount miss over a closer date miss', () => {
      const nearMisses = findNearMisses(
        [ledger('L1', '2024-01-05', 10000)],
        [bank('B1', '2024-01-05', 10500), bank('B2', '2024-01-09', 10000)],
        DEFAULT_TOLERANCES
      );

      expect(nearMisses.get('L1')?.counterpartRecordId).toBe('B1');
      expect(nearMisses.get('B2')).toEqual({
        recordId: 'B2',
        counterpartRecordId: 'L1',
        dateDifferenceDays: 4,
        amountDifference: 0,
        failedTolerance: 'DATE',
        excess: 1,
      });
    });

    it('should prefer the smallest excess among amount misses', () => {
      const nearMisses = findNearMisses(
        [ledger('L1', '2024-01-05', 10000)],
        [bank('B1', '2024-01-05', 10500), bank('B3', '2024-01-06', 10100)],
        DEFAULT_TOLERANCES
      );

      expect(nearMisses.get('L1')?.counterpartRecordId).toBe('B3');
    });

    it('should ignore pairs failing both tolerances', () => {
      const nearMisses = findNearMisses(
        [ledger('L1', '2024-01-05', 10000)],
        [bank('B1', '2024-03-01', 20000)],
        DEFAULT_TOLERANCES
      );

      expect(nearMisses.size).toBe(0);
    });

    it('should only look at records left unmatched', () => {
      const result = matchRecords(
        [ledger('L1', '2024-01-05', 10000)],
        [bank('B1', '2024-01-05', 10000), bank('B2', '2024-01-05', 10001)],
        DEFAULT_TOLERANCES
      );

      expect(pairs(result)).toEqual([['L1', 'B1']]);
      expect(result.nearMisses.size).toBe(0);
    });
  });

  // ============================================
  // Validation and cancellation
  // ============================================

  describe('validation and cancellation', () => {
    it('should reject negative tolerances', () => {
      expect(() => matchRecords([], [], { dateToleranceDays: -1, amountTolerance: 0 })).toThrow(AppError);
    });

    it('should reject fractional tolerances', () => {
      expect(() => matchRecords([], [], { dateToleranceDays: 1, amountTolerance: 0.5 })).toThrow(
        'amountTolerance must be a non-negative integer, got 0.5'
      );
    });

    it('should stop when the signal is already aborted', () => {
      const controller = new AbortController();
      controller.abort();

      expect(() =>
        matchRecords([ledger('A', '2024-01-05', 10000)], [bank('B', '2024-01-05', 10000)], {
          ...DEFAULT_TOLERANCES,
          signal: controller.signal,
        })
      ).toThrow(MatchingCancelledError);
    });
  });
});

describe('matchRecordsAsync', () => {
  it('should produce the same result as the synchronous pass', async () => {
    const ledgerRecords = [
      ledger('L1', '2024-01-05', 10000, 'Acme rent'),
      ledger('L2', '2024-01-10', 5000, 'Payroll'),
      ledger('L3', '2024-02-20', 700),
    ];
    const bankRecords = [
      bank('B1', '2024-01-06', 10000, 'ACME RENT'),
      bank('B2', '2024-01-10', 5075, 'Payroll'),
    ];

    await expect(matchRecordsAsync(ledgerRecords, bankRecords, DEFAULT_TOLERANCES)).resolves.toEqual(
      matchRecords(ledgerRecords, bankRecords, DEFAULT_TOLERANCES)
    );
  });

  it('should stop a pass aborted while it is running', async () => {
    const ledgerRecords = Array.from({ length: ABORT_CHECK_INTERVAL * 2 }, (_, index) =>
      ledger(`L${index}`, '2024-01-05', 10000 + index)
    );
    const controller = new AbortController();

    const pass = matchRecordsAsync(ledgerRecords, [bank('B1', '2024-01-05', 10000)], {
      ...DEFAULT_TOLERANCES,
      signal: controller.signal,
    });
    controller.abort();

    await expect(pass).rejects.toThrow(MatchingCancelledError);
  });

  it('should not start when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(
      matchRecordsAsync([ledger('A', '2024-01-05', 10000)], [bank('B', '2024-01-05', 10000)], {
        ...DEFAULT_TOLERANCES,
        signal: controller.signal,
      })
    ).rejects.toThrow(MatchingCancelledError);
  });
});

describe('compareCandidates', () => {
  const base: Candidate = {
    ledgerRecordId: 'L1',
    bankRecordId: 'B1',
    score: 0.8,
    dateDifferenceDays: 1,
    amountDifference: 0,
    breakdown: { dateScore: 0.75, amountScore: 1, descriptionSimilarity: 0 },
  };

  it('should order by score descending', () => {
    expect(compareCandidates({ ...base, score: 0.9 }, base)).toBeLessThan(0);
  });

  it('should order by amount distance when score and date tie', () => {
    expect(compareCandidates({ ...base, amountDifference: 5 }, base)).toBeGreaterThan(0);
  });

  it('should return 0 for identical candidates', () => {
    expect(compareCandidates(base, { ...base })).toBe(0);
  });
});

describe('compareNearMisses', () => {
  const base: NearMiss = {
    recordId: 'L1',
    counterpartRecordId: 'B1',
    dateDifferenceDays: 0,
    amountDifference: 50,
    failedTolerance: 'AMOUNT',
    excess: 50,
  };

  it('should order by the other distance when excess ties', () => {
    expect(compareNearMisses({ ...base, dateDifferenceDays: 2 }, base)).toBeGreaterThan(0);
  });

  it('should fall back to the counterpart id', () => {
    expect(compareNearMisses({ ...base, counterpartRecordId: 'B0' }, base)).toBeLessThan(0);
  });
});
