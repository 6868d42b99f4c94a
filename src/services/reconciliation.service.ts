/**
 * Reconciliation Service
 *
 * Orchestration layer between routes, workers and the session repository.
 * Every mutating call is one unit of work:
 *
 *   lock session → load → pure transition → save (version-checked) → unlock
 *
 * A failed transition throws before save, so the stored session never
 * sees a partial change.
 *
 * REDIS INTEGRATION:
 * - Session locks go through Redis when enabled, in-process otherwise
 * - Summaries are mirrored to Redis for UI polling
 * - The repository remains the SOURCE OF TRUTH
 */

import { randomUUID } from 'crypto';
import { env } from '../config';
import { normalizeRecords } from '../matching/normalizeRecord';
import type { RawRow, RecordSource, Tolerances } from '../matching/types';
import { InMemorySessionLock, type SessionLock } from '../locks';
import {
  applyOperation,
  beginMatching,
  completeSession,
  createSessionEntity,
  failMatching,
  runMatchingPassAsync,
  summarize,
  type ResolutionOperation,
} from '../reconciliation';
import type { AuditAction, AuditEntry, EntityContext, Session, SessionSummary } from '../reconciliation/types';
import { clearCachedSummary, getCachedSummary, setCachedSummary } from '../redis/summaryCache';
import type { ListSessionsFilter, SessionHeader, SessionRepository } from '../repositories';
import { AppError } from '../utils/AppError';
import {
  MalformedRowsError,
  MatchingCancelledError,
  type MalformedRowError,
  type SourcedRowError,
} from '../utils/errors';
import { sessionLogger } from '../utils/logger';

// ============================================
// Types
// ============================================

export interface CreateSessionInput {
  name: string;
  description?: string;
  ledgerRows: readonly unknown[];
  bankRows: readonly unknown[];
  tolerances?: Partial<Tolerances>;
  /** Keep the valid rows when some are malformed, instead of rejecting the upload */
  allowPartial?: boolean;
}

export interface CreateSessionResult {
  session: Session;
  rowErrors: SourcedRowError[];
}

export interface RunMatchingOptions {
  signal?: AbortSignal;
}

/**
 * Summary mirror. The default is the Redis cache, which is a no-op while
 * Redis is disabled.
 */
export interface SummaryCache {
  get(sessionId: string, version: number): Promise<SessionSummary | null>;
  set(sessionId: string, version: number, summary: SessionSummary): Promise<void>;
  clear(sessionId: string): Promise<void>;
}

export const redisSummaryCache: SummaryCache = {
  get: getCachedSummary,
  set: setCachedSummary,
  clear: clearCachedSummary,
};

export interface ReconciliationServiceDeps {
  repository: SessionRepository;
  lock?: SessionLock;
  summaryCache?: SummaryCache;
  clock?: () => Date;
  idFactory?: () => string;
  defaultTolerances?: Tolerances;
}

// Re-exported for callers that only know the service
export type { RawRow, ResolutionOperation };

// ============================================
// Service
// ============================================

export class ReconciliationService {
  private readonly repository: SessionRepository;
  private readonly lock: SessionLock;
  private readonly summaryCache: SummaryCache;
  private readonly clock: () => Date;
  private readonly idFactory: () => string;
  private readonly defaultTolerances: Tolerances;

  constructor(deps: ReconciliationServiceDeps) {
    this.repository = deps.repository;
    this.lock = deps.lock ?? new InMemorySessionLock();
    this.summaryCache = deps.summaryCache ?? redisSummaryCache;
    this.clock = deps.clock ?? (() => new Date());
    this.idFactory = deps.idFactory ?? randomUUID;
    this.defaultTolerances = deps.defaultTolerances ?? {
      dateToleranceDays: env.DEFAULT_DATE_TOLERANCE_DAYS,
      amountTolerance: env.DEFAULT_AMOUNT_TOLERANCE,
    };
  }

  // ============================================
  // Session lifecycle
  // ============================================

  /**
   * Normalizes both uploads and stores a new session in CREATED.
   *
   * @throws MalformedRowsError when any row is malformed and allowPartial is not set
   */
  async createSession(input: CreateSessionInput): Promise<CreateSessionResult> {
    const sessionId = this.idFactory();
    const normalizeOptions = { sessionId, idFactory: this.idFactory };

    const ledger = normalizeRecords(input.ledgerRows, 'LEDGER', normalizeOptions);
    const bank = normalizeRecords(input.bankRows, 'BANK', normalizeOptions);

    const tag =
      (source: RecordSource) =>
      (error: MalformedRowError): SourcedRowError => ({ ...error.detail, source });
    const rowErrors = [...ledger.errors.map(tag('LEDGER')), ...bank.errors.map(tag('BANK'))];

    if (rowErrors.length > 0 && !input.allowPartial) {
      throw new MalformedRowsError(rowErrors);
    }

    const session = createSessionEntity(
      {
        id: sessionId,
        name: input.name,
        ...(input.description ? { description: input.description } : {}),
        ledgerRecords: ledger.records,
        bankRecords: bank.records,
        tolerances: { ...this.defaultTolerances, ...input.tolerances },
      },
      this.context()
    );

    const created = await this.repository.create(session);

    const log = sessionLogger(created.id);
    log.info(
      `Session "${created.name}" created: ${created.ledgerRecords.length} ledger / ${created.bankRecords.length} bank record(s)`
    );
    if (rowErrors.length > 0) {
      log.warn(`${rowErrors.length} malformed row(s) skipped`);
    }

    return { session: created, rowErrors };
  }

  /**
   * Moves the session to MATCHING. The caller then dispatches runMatching.
   */
  async start(sessionId: string, tolerances?: Tolerances): Promise<Session> {
    return this.lock.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      const saved = await this.persist(beginMatching(session, tolerances, this.context()));

      sessionLogger(sessionId).info(
        `Matching started (tolerance ${saved.dateToleranceDays} day(s) / ${saved.amountTolerance} minor unit(s))`
      );
      return saved;
    });
  }

  /**
   * Runs the matching pass for a session in MATCHING.
   *
   * - REVIEW: already done, returned unchanged
   * - Cancelled: nothing is saved, the session stays in MATCHING
   * - Any other failure: the session moves to FAILED and the error is rethrown
   */
  async runMatching(sessionId: string, options: RunMatchingOptions = {}): Promise<Session> {
    return this.lock.runExclusive(sessionId, async () => {
      const log = sessionLogger(sessionId);
      const session = await this.load(sessionId);

      if (session.status === 'REVIEW') {
        log.debug('Matching already completed, nothing to do');
        return session;
      }

      const ctx = this.context();
      let next: Session;
      try {
        next = await runMatchingPassAsync(session, ctx, options.signal);
      } catch (error) {
        if (error instanceof MatchingCancelledError) {
          log.warn('Matching pass cancelled; session left in MATCHING');
          throw error;
        }
        if (session.status !== 'MATCHING') {
          throw error;
        }

        const reason = error instanceof Error ? error.message : String(error);
        log.error(`Matching pass failed: ${reason}`);
        await this.persist(failMatching(session, reason, ctx));
        throw error;
      }

      const saved = await this.persist(next);
      log.info(
        `Matching completed: ${saved.matches.length} match(es), ${saved.exceptions.length} exception(s)`
      );
      return saved;
    });
  }

  /**
   * Applies one reviewer decision.
   */
  async mutate(sessionId: string, operation: ResolutionOperation): Promise<Session> {
    return this.lock.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      const next = applyOperation(session, operation, this.context());

      if (next === session) {
        return session;
      }

      const saved = await this.persist(next);
      sessionLogger(sessionId).info(`${operation.type} applied by ${operation.performedBy}`);
      return saved;
    });
  }

  async confirmMatch(sessionId: string, matchId: string, performedBy: string): Promise<Session> {
    return this.mutate(sessionId, { type: 'CONFIRM_MATCH', matchId, performedBy });
  }

  async rejectMatch(
    sessionId: string,
    matchId: string,
    performedBy: string,
    reason?: string
  ): Promise<Session> {
    return this.mutate(sessionId, {
      type: 'REJECT_MATCH',
      matchId,
      performedBy,
      ...(reason !== undefined ? { reason } : {}),
    });
  }

  async resolveException(
    sessionId: string,
    exceptionId: string,
    performedBy: string,
    note?: string
  ): Promise<Session> {
    return this.mutate(sessionId, {
      type: 'RESOLVE_EXCEPTION',
      exceptionId,
      performedBy,
      ...(note !== undefined ? { note } : {}),
    });
  }

  async manualLink(
    sessionId: string,
    ledgerRecordId: string,
    bankRecordId: string,
    performedBy: string,
    note?: string
  ): Promise<Session> {
    return this.mutate(sessionId, {
      type: 'MANUAL_LINK',
      ledgerRecordId,
      bankRecordId,
      performedBy,
      ...(note !== undefined ? { note } : {}),
    });
  }

  /**
   * REVIEW → COMPLETED.
   *
   * @throws IncompleteReconciliationError while any record is unsettled
   */
  async complete(sessionId: string, performedBy: string): Promise<Session> {
    return this.lock.runExclusive(sessionId, async () => {
      const session = await this.load(sessionId);
      const saved = await this.persist(completeSession(session, performedBy, this.context()));

      sessionLogger(sessionId).info(`Session completed by ${performedBy}`);
      return saved;
    });
  }

  // ============================================
  // Reads
  // ============================================

  async getSession(sessionId: string): Promise<Session> {
    return this.load(sessionId);
  }

  async listSessions(filter: ListSessionsFilter = {}): Promise<SessionHeader[]> {
    return this.repository.list(filter);
  }

  /**
   * Summary of the current session version, from cache when possible.
   */
  async summary(sessionId: string): Promise<SessionSummary> {
    const session = await this.load(sessionId);

    const cached = await this.summaryCache.get(session.id, session.version);
    if (cached) {
      return cached;
    }

    const summary = summarize(session);
    await this.summaryCache.set(session.id, session.version, summary);
    return summary;
  }

  async auditTrail(sessionId: string, action?: AuditAction): Promise<AuditEntry[]> {
    const session = await this.load(sessionId);
    return action ? session.auditTrail.filter((entry) => entry.action === action) : session.auditTrail;
  }

  async deleteSession(sessionId: string): Promise<void> {
    await this.lock.runExclusive(sessionId, async () => {
      const deleted = await this.repository.delete(sessionId);
      if (!deleted) {
        throw AppError.notFound(`Session ${sessionId} not found`);
      }

      await this.summaryCache.clear(sessionId);
      sessionLogger(sessionId).info('Session deleted');
    });
  }

  // ============================================
  // Helpers
  // ============================================

  private context(): EntityContext {
    return { now: this.clock(), newId: this.idFactory };
  }

  private async load(sessionId: string): Promise<Session> {
    const session = await this.repository.findById(sessionId);
    if (!session) {
      throw AppError.notFound(`Session ${sessionId} not found`);
    }
    return session;
  }

  private async persist(session: Session): Promise<Session> {
    const saved = await this.repository.save(session);
    await this.summaryCache.set(saved.id, saved.version, summarize(saved));
    return saved;
  }
}
