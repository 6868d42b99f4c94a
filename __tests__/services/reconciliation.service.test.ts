/**
 * Tests for the Reconciliation Service
 *
 * Runs the whole lifecycle against the in-memory repository and lock.
 */

import { InMemorySessionLock } from '../../src/locks/sessionLock';
import { InMemorySessionRepository } from '../../src/repositories/inMemorySessionRepository';
import { ReconciliationService, type CreateSessionInput } from '../../src/services/reconciliation.service';
import { AppError } from '../../src/utils/AppError';
import {
  ConcurrentModificationError,
  IncompleteReconciliationError,
  InvalidRecordsError,
  InvalidTransitionError,
  MalformedRowsError,
  MatchingCancelledError,
} from '../../src/utils/errors';
import { FIXED_NOW, ledger, sequentialIds, bank } from '../helpers/fixtures';
import { matchingSession } from '../helpers/sessions';
import { MemorySummaryCache } from '../helpers/summaryCache';

const INPUT: CreateSessionInput = {
  name: 'January close',
  ledgerRows: [
    { date: '2024-01-05', amount: '100.00', description: 'Acme rent' },
    { date: '2024-01-10', amount: '50.00', description: 'Payroll' },
  ],
  bankRows: [
    { date: '01/06/2024', amount: '$100.00', description: 'ACME RENT' },
    { date: '2024-01-10', amount: '50.75', description: 'Payroll' },
  ],
};

/*
 * Ids handed out by the service, in order:
 * id-1 session, id-2/id-3 ledger records, id-4/id-5 bank records,
 * then id-6 match, id-7/id-8 exceptions and id-9 audit entry after matching.
 */
function setup() {
  const repository = new InMemorySessionRepository();
  const lock = new InMemorySessionLock();
  const summaryCache = new MemorySummaryCache();
  const service = new ReconciliationService({
    repository,
    lock,
    summaryCache,
    clock: () => FIXED_NOW,
    idFactory: sequentialIds('id'),
    defaultTolerances: { dateToleranceDays: 3, amountTolerance: 0 },
  });

  return { repository, lock, summaryCache, service };
}

async function reviewed(service: ReconciliationService): Promise<void> {
  await service.createSession(INPUT);
  await service.start('id-1');
  await service.runMatching('id-1');
}

describe('ReconciliationService', () => {
  // ============================================
  // createSession
  // ============================================

  describe('createSession', () => {
    it('should normalize both uploads into a new session', async () => {
      const { service } = setup();

      const { session, rowErrors } = await service.createSession(INPUT);

      expect(rowErrors).toEqual([]);
      expect(session).toMatchObject({ id: 'id-1', status: 'CREATED', version: 1, dateToleranceDays: 3 });
      expect(session.ledgerRecords.map((record) => [record.id, record.amount])).toEqual([
        ['id-2', 10000],
        ['id-3', 5000],
      ]);
      expect(session.bankRecords.map((record) => [record.id, record.date.toISOString()])).toEqual([
        ['id-4', '2024-01-06T00:00:00.000Z'],
        ['id-5', '2024-01-10T00:00:00.000Z'],
      ]);
    });

    it('should merge partial tolerances with the defaults', async () => {
      const { service } = setup();

      const { session } = await service.createSession({ ...INPUT, tolerances: { amountTolerance: 100 } });

      expect(session.dateToleranceDays).toBe(3);
      expect(session.amountTolerance).toBe(100);
    });

    it('should reject an upload with malformed rows', async () => {
      const { service, repository } = setup();
      const input = { ...INPUT, bankRows: [...INPUT.bankRows, { date: '2024-01-11', amount: 'abc' }] };

      await expect(service.createSession(input)).rejects.toThrow(MalformedRowsError);
      expect(repository.size).toBe(0);
    });

    it('should keep the valid rows when partial uploads are allowed', async () => {
      const { service } = setup();
      const input = {
        ...INPUT,
        bankRows: [...INPUT.bankRows, { date: '2024-01-11', amount: 'abc' }],
        allowPartial: true,
      };

      const { session, rowErrors } = await service.createSession(input);

      expect(session.bankRecords).toHaveLength(2);
      expect(rowErrors).toEqual([
        { rowNumber: 3, field: 'amount', value: 'abc', reason: 'Invalid amount: "abc"', source: 'BANK' },
      ]);
    });
  });

  // ============================================
  // Matching
  // ============================================

  describe('start and runMatching', () => {
    it('should move the session to MATCHING', async () => {
      const { service } = setup();
      await service.createSession(INPUT);

      const started = await service.start('id-1', { dateToleranceDays: 2, amountTolerance: 0 });

      expect(started.status).toBe('MATCHING');
      expect(started.dateToleranceDays).toBe(2);
      expect(started.version).toBe(2);
    });

    it('should publish matches and exceptions and cache the summary', async () => {
      const { service, summaryCache } = setup();

      await reviewed(service);
      const session = await service.getSession('id-1');

      expect(session.status).toBe('REVIEW');
      expect(session.version).toBe(3);
      expect(session.matches.map((match) => [match.id, match.ledgerRecordId, match.bankRecordId])).toEqual([
        ['id-6', 'id-2', 'id-4'],
      ]);
      expect(session.exceptions.map((exception) => [exception.id, exception.recordId, exception.kind])).toEqual([
        ['id-7', 'id-3', 'AMOUNT_MISMATCH'],
        ['id-8', 'id-5', 'AMOUNT_MISMATCH'],
      ]);
      expect(summaryCache.entries.get('id-1')?.version).toBe(3);
    });

    it('should return a session already in REVIEW unchanged', async () => {
      const { service } = setup();
      await reviewed(service);

      const again = await service.runMatching('id-1');

      expect(again.version).toBe(3);
    });

    it('should refuse to run a session that was never started', async () => {
      const { service } = setup();
      await service.createSession(INPUT);

      await expect(service.runMatching('id-1')).rejects.toThrow(InvalidTransitionError);
      expect((await service.getSession('id-1')).status).toBe('CREATED');
    });

    it('should leave a cancelled session in MATCHING', async () => {
      const { service } = setup();
      await service.createSession(INPUT);
      await service.start('id-1');
      const controller = new AbortController();
      controller.abort();

      await expect(service.runMatching('id-1', { signal: controller.signal })).rejects.toThrow(
        MatchingCancelledError
      );

      const session = await service.getSession('id-1');
      expect(session.status).toBe('MATCHING');
      expect(session.version).toBe(2);
    });

    it('should stop a pass cancelled while it runs', async () => {
      const { service } = setup();
      await service.createSession(INPUT);
      await service.start('id-1');
      const controller = new AbortController();
      setImmediate(() => controller.abort());

      await expect(service.runMatching('id-1', { signal: controller.signal })).rejects.toThrow(
        MatchingCancelledError
      );
      expect((await service.getSession('id-1')).status).toBe('MATCHING');
    });

    it('should fail the session when the pass throws', async () => {
      const { service, repository } = setup();
      await repository.create(
        matchingSession({
          ledgerRecords: [{ ...ledger('L1', '2024-01-05', 100), amount: 1.5 }],
          bankRecords: [bank('B1', '2024-01-05', 100)],
        })
      );

      await expect(service.runMatching('session-1')).rejects.toThrow(InvalidRecordsError);

      const session = await service.getSession('session-1');
      expect(session.status).toBe('FAILED');
      expect(session.failureReason).toBe(
        'Session session-1 holds 1 record(s) that are not normalized: record L1 amount 1.5 is not an integer in minor units'
      );
      expect(session.auditTrail.map((entry) => entry.action)).toEqual(['SESSION_FAILED']);
    });
  });

  // ============================================
  // Review
  // ============================================

  describe('review decisions', () => {
    it('should save a confirmation once', async () => {
      const { service } = setup();
      await reviewed(service);

      const confirmed = await service.confirmMatch('id-1', 'id-6', 'alice');
      const again = await service.confirmMatch('id-1', 'id-6', 'alice');

      expect(confirmed.version).toBe(4);
      expect(again.version).toBe(4);
      expect(again.auditTrail).toHaveLength(2);
    });

    it('should reopen both records when a match is rejected', async () => {
      const { service } = setup();
      await reviewed(service);

      const session = await service.rejectMatch('id-1', 'id-6', 'alice', 'Different payee');

      expect(session.matches[0]).toMatchObject({ status: 'REJECTED', rejectionReason: 'Different payee' });
      expect(session.exceptions.slice(2).map((exception) => [exception.recordId, exception.kind])).toEqual([
        ['id-2', 'UNMATCHED_LEDGER'],
        ['id-4', 'UNMATCHED_BANK'],
      ]);
    });

    it('should complete after every record is settled', async () => {
      const { service } = setup();
      await reviewed(service);

      await expect(service.complete('id-1', 'bob')).rejects.toThrow(IncompleteReconciliationError);

      await service.confirmMatch('id-1', 'id-6', 'alice');
      await service.manualLink('id-1', 'id-3', 'id-5', 'alice', 'Bank fee of 0.75');
      const completed = await service.complete('id-1', 'bob');

      expect(completed.status).toBe('COMPLETED');
      expect(completed.matches.map((match) => [match.kind, match.status])).toEqual([
        ['AUTO', 'CONFIRMED'],
        ['MANUAL', 'CONFIRMED'],
      ]);
    });

    it('should resolve an exception with a note', async () => {
      const { service } = setup();
      await reviewed(service);

      const session = await service.resolveException('id-1', 'id-7', 'alice', 'Bank fee');

      expect(session.exceptions[0]).toMatchObject({ status: 'RESOLVED', resolutionNote: 'Bank fee' });
    });

    it('should refuse a decision while the session is locked', async () => {
      const { service, lock } = setup();
      await reviewed(service);

      await lock.runExclusive('id-1', async () => {
        await expect(service.confirmMatch('id-1', 'id-6', 'alice')).rejects.toThrow(ConcurrentModificationError);
      });
    });
  });

  // ============================================
  // Reads
  // ============================================

  describe('reads', () => {
    it('should report an unknown session as not found', async () => {
      const { service } = setup();

      await expect(service.getSession('missing')).rejects.toThrow('Session missing not found');
    });

    it('should serve the summary from cache for the current version', async () => {
      const { service, summaryCache } = setup();
      await reviewed(service);
      const cached = summaryCache.entries.get('id-1');
      if (!cached) throw new Error('summary was not cached');
      summaryCache.entries.set('id-1', { ...cached, summary: { ...cached.summary, matchedCount: 99 } });

      const summary = await service.summary('id-1');

      expect(summary.matchedCount).toBe(99);
    });

    it('should recompute the summary on a miss', async () => {
      const { service, summaryCache } = setup();
      await reviewed(service);
      summaryCache.entries.clear();

      const summary = await service.summary('id-1');

      expect(summary.matchedCount).toBe(1);
      expect(summary.exceptionCountByKind.AMOUNT_MISMATCH).toBe(2);
      expect(summaryCache.entries.get('id-1')?.version).toBe(3);
    });

    it('should filter the audit trail by action', async () => {
      const { service } = setup();
      await reviewed(service);
      await service.confirmMatch('id-1', 'id-6', 'alice');

      const entries = await service.auditTrail('id-1', 'MATCH_CONFIRMED');

      expect(entries.map((entry) => [entry.performedBy, entry.targetId])).toEqual([['alice', 'id-6']]);
    });

    it('should list sessions by status', async () => {
      const { service } = setup();
      await reviewed(service);

      await expect(service.listSessions({ status: 'CREATED' })).resolves.toEqual([]);
      expect((await service.listSessions({ status: 'REVIEW' })).map((header) => header.id)).toEqual(['id-1']);
    });
  });

  // ============================================
  // deleteSession
  // ============================================

  describe('deleteSession', () => {
    it('should remove the session and its cached summary', async () => {
      const { service, summaryCache } = setup();
      await reviewed(service);

      await service.deleteSession('id-1');

      expect(summaryCache.entries.has('id-1')).toBe(false);
      await expect(service.getSession('id-1')).rejects.toThrow(AppError);
    });

    it('should report a missing session', async () => {
      const { service } = setup();

      await expect(service.deleteSession('missing')).rejects.toThrow('Session missing not found');
    });
  });
});
