/**
 * Tests for the Resolution Workflow
 */

import { applyOperation } from '../../src/reconciliation/resolution';
import { findCoverageViolations } from '../../src/reconciliation/coverage';
import { AppError } from '../../src/utils/AppError';
import { InvalidTransitionError, ResolutionNoteRequiredError } from '../../src/utils/errors';
import { FIXED_NOW, fixedContext } from '../helpers/fixtures';
import { matchingSession, reviewSession } from '../helpers/sessions';

describe('applyOperation', () => {
  // ============================================
  // CONFIRM_MATCH
  // ============================================

  describe('CONFIRM_MATCH', () => {
    it('should confirm a proposed match and audit it', () => {
      const session = reviewSession();
      const next = applyOperation(
        session,
        { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext('c')
      );

      expect(next.matches[0]).toMatchObject({ status: 'CONFIRMED', confirmedBy: 'alice', confirmedAt: FIXED_NOW });
      expect(next.auditTrail[1]).toEqual({
        id: 'c-1',
        action: 'MATCH_CONFIRMED',
        performedBy: 'alice',
        targetId: 'id-1',
        at: FIXED_NOW,
      });
      expect(session.matches[0].status).toBe('PROPOSED');
    });

    it('should return the same session when confirming twice', () => {
      const confirmed = applyOperation(
        reviewSession(),
        { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext('c')
      );
      const again = applyOperation(
        confirmed,
        { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'bob' },
        fixedContext('d')
      );

      expect(again).toBe(confirmed);
      expect(again.auditTrail).toHaveLength(2);
    });

    it('should refuse to confirm a rejected match', () => {
      const rejected = applyOperation(
        reviewSession(),
        { type: 'REJECT_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext('r')
      );

      expect(() =>
        applyOperation(rejected, { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'alice' }, fixedContext())
      ).toThrow('Match id-1 was rejected and cannot be confirmed');
    });

    it('should report an unknown match as not found', () => {
      expect.assertions(2);
      try {
        applyOperation(reviewSession(), { type: 'CONFIRM_MATCH', matchId: 'nope', performedBy: 'alice' }, fixedContext());
      } catch (error) {
        expect(error).toBeInstanceOf(AppError);
        if (error instanceof AppError) {
          expect(error.statusCode).toBe(404);
        }
      }
    });
  });

  // ============================================
  // REJECT_MATCH
  // ============================================

  describe('REJECT_MATCH', () => {
    it('should reject the match and open an exception for each record', () => {
      const next = applyOperation(
        reviewSession(),
        { type: 'REJECT_MATCH', matchId: 'id-1', performedBy: 'alice', reason: '  wrong payee ' },
        fixedContext('r')
      );

      expect(next.matches[0]).toMatchObject({
        status: 'REJECTED',
        rejectedBy: 'alice',
        rejectedAt: FIXED_NOW,
        rejectionReason: 'wrong payee',
      });
      expect(next.exceptions.slice(2)).toEqual([
        { id: 'r-1', recordId: 'L1', source: 'LEDGER', kind: 'UNMATCHED_LEDGER', status: 'OPEN', createdAt: FIXED_NOW },
        { id: 'r-2', recordId: 'B1', source: 'BANK', kind: 'UNMATCHED_BANK', status: 'OPEN', createdAt: FIXED_NOW },
      ]);
      expect(next.auditTrail[1]).toEqual({
        id: 'r-3',
        action: 'MATCH_REJECTED',
        performedBy: 'alice',
        targetId: 'id-1',
        note: 'wrong payee',
        at: FIXED_NOW,
      });
      expect(findCoverageViolations(next)).toEqual([]);
    });

    it('should reject a confirmed match', () => {
      const confirmed = applyOperation(
        reviewSession(),
        { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext('c')
      );
      const next = applyOperation(
        confirmed,
        { type: 'REJECT_MATCH', matchId: 'id-1', performedBy: 'bob' },
        fixedContext('r')
      );

      expect(next.matches[0].status).toBe('REJECTED');
      expect(next.matches[0]).not.toHaveProperty('rejectionReason');
    });

    it('should refuse to reject twice', () => {
      const rejected = applyOperation(
        reviewSession(),
        { type: 'REJECT_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext('r')
      );

      expect(() =>
        applyOperation(rejected, { type: 'REJECT_MATCH', matchId: 'id-1', performedBy: 'alice' }, fixedContext())
      ).toThrow('Match id-1 is already rejected');
    });
  });

  // ============================================
  // RESOLVE_EXCEPTION
  // ============================================

  describe('RESOLVE_EXCEPTION', () => {
    it('should require a note for an amount mismatch', () => {
      expect(() =>
        applyOperation(
          reviewSession(),
          { type: 'RESOLVE_EXCEPTION', exceptionId: 'id-2', performedBy: 'alice', note: '   ' },
          fixedContext()
        )
      ).toThrow(ResolutionNoteRequiredError);
    });

    it('should resolve with a trimmed note', () => {
      const next = applyOperation(
        reviewSession(),
        { type: 'RESOLVE_EXCEPTION', exceptionId: 'id-2', performedBy: 'alice', note: ' Bank fee ' },
        fixedContext('x')
      );

      expect(next.exceptions[0]).toMatchObject({
        status: 'RESOLVED',
        resolvedBy: 'alice',
        resolvedAt: FIXED_NOW,
        resolutionNote: 'Bank fee',
      });
      expect(next.auditTrail[1]).toMatchObject({ id: 'x-1', action: 'EXCEPTION_RESOLVED', targetId: 'id-2', note: 'Bank fee' });
    });

    it('should resolve a plain unmatched record without a note', () => {
      const rejected = applyOperation(
        reviewSession(),
        { type: 'REJECT_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext('r')
      );
      const next = applyOperation(
        rejected,
        { type: 'RESOLVE_EXCEPTION', exceptionId: 'r-1', performedBy: 'alice' },
        fixedContext('x')
      );

      expect(next.exceptions[2].status).toBe('RESOLVED');
      expect(next.exceptions[2]).not.toHaveProperty('resolutionNote');
    });

    it('should refuse to resolve twice', () => {
      const resolved = applyOperation(
        reviewSession(),
        { type: 'RESOLVE_EXCEPTION', exceptionId: 'id-2', performedBy: 'alice', note: 'Bank fee' },
        fixedContext('x')
      );

      expect(() =>
        applyOperation(
          resolved,
          { type: 'RESOLVE_EXCEPTION', exceptionId: 'id-2', performedBy: 'alice', note: 'Again' },
          fixedContext()
        )
      ).toThrow('Exception id-2 is already resolved');
    });
  });

  // ============================================
  // MANUAL_LINK
  // ============================================

  describe('MANUAL_LINK', () => {
    it('should link two records and close their exceptions', () => {
      const next = applyOperation(
        reviewSession(),
        { type: 'MANUAL_LINK', ledgerRecordId: 'L2', bankRecordId: 'B2', performedBy: 'alice', note: 'Bank fee' },
        fixedContext('m')
      );

      expect(next.matches[1]).toEqual({
        id: 'm-1',
        ledgerRecordId: 'L2',
        bankRecordId: 'B2',
        score: 1,
        dateDifferenceDays: 0,
        amountDifference: 75,
        kind: 'MANUAL',
        status: 'CONFIRMED',
        confirmedBy: 'alice',
        confirmedAt: FIXED_NOW,
        createdAt: FIXED_NOW,
      });
      expect(next.exceptions.map((exception) => [exception.id, exception.status, exception.closedByMatchId])).toEqual([
        ['id-2', 'RESOLVED', 'm-1'],
        ['id-3', 'RESOLVED', 'm-1'],
      ]);
      expect(next.auditTrail[1]).toMatchObject({ id: 'm-2', action: 'MANUAL_LINK', targetId: 'm-1', note: 'Bank fee' });
      expect(findCoverageViolations(next)).toEqual([]);
    });

    it('should refuse a record that is already matched', () => {
      expect(() =>
        applyOperation(
          reviewSession(),
          { type: 'MANUAL_LINK', ledgerRecordId: 'L1', bankRecordId: 'B2', performedBy: 'alice' },
          fixedContext()
        )
      ).toThrow('Record L1 is already in match id-1; reject it before linking');
    });

    it('should refuse records given on the wrong side', () => {
      expect(() =>
        applyOperation(
          reviewSession(),
          { type: 'MANUAL_LINK', ledgerRecordId: 'B2', bankRecordId: 'L2', performedBy: 'alice' },
          fixedContext()
        )
      ).toThrow('Record B2 is not a ledger record of session session-1');
    });

    it('should refuse a record whose exception is already resolved', () => {
      const resolved = applyOperation(
        reviewSession(),
        { type: 'RESOLVE_EXCEPTION', exceptionId: 'id-2', performedBy: 'alice', note: 'Written off' },
        fixedContext('x')
      );

      expect(() =>
        applyOperation(
          resolved,
          { type: 'MANUAL_LINK', ledgerRecordId: 'L2', bankRecordId: 'B2', performedBy: 'alice' },
          fixedContext()
        )
      ).toThrow('Record L2 has no open exception to link');
    });

    it('should report an unknown record as not found', () => {
      expect(() =>
        applyOperation(
          reviewSession(),
          { type: 'MANUAL_LINK', ledgerRecordId: 'L404', bankRecordId: 'B2', performedBy: 'alice' },
          fixedContext()
        )
      ).toThrow('Record L404 not found in session session-1');
    });
  });

  // ============================================
  // Session status
  // ============================================

  it('should only accept decisions in REVIEW', () => {
    expect(() =>
      applyOperation(
        matchingSession(),
        { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'alice' },
        fixedContext()
      )
    ).toThrow(InvalidTransitionError);
  });

  it('should stamp updatedAt on a changed session', () => {
    const later = new Date('2024-02-02T09:00:00.000Z');
    const next = applyOperation(
      reviewSession(),
      { type: 'CONFIRM_MATCH', matchId: 'id-1', performedBy: 'alice' },
      fixedContext('c', later)
    );

    expect(next.updatedAt).toEqual(later);
  });
});
