/**
 * Postgres-backed session repository (Drizzle ORM over node-postgres)
 *
 * Records are written once, when the session is created. Matches and
 * exceptions are replaced wholesale on every save; the audit trail is
 * append-only. Each save runs in one transaction guarded by the
 * session's version column.
 */

import { and, asc, desc, eq, sql } from 'drizzle-orm';
import type { TransactionRecord } from '../matching/types';
import type { AuditEntry, Match, ReconciliationException, Session } from '../reconciliation/types';
import { AppError } from '../utils/AppError';
import type { Database } from '../utils/db';
import { ConcurrentModificationError } from '../utils/errors';
import {
  auditEntries,
  exceptions,
  matches,
  records,
  sessions,
  type AuditEntryRow,
  type ExceptionRow,
  type MatchRow,
  type RecordRow,
  type SessionRow,
} from './schema';
import type { ListSessionsFilter, SessionHeader, SessionRepository } from './sessionRepository';

type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

const SNAPSHOT_READ = { isolationLevel: 'repeatable read', accessMode: 'read only' } as const;

/** Rows per multi-row INSERT, well under Postgres' bind parameter limit */
const INSERT_CHUNK_SIZE = 1000;

const opt = <T>(value: T | null): T | undefined => value ?? undefined;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

// ============================================
// Row mapping
// ============================================

function toRecord(row: RecordRow): TransactionRecord {
  return {
    id: row.id,
    sessionId: row.sessionId,
    source: row.source,
    date: new Date(`${row.recordDate}T00:00:00.000Z`),
    amount: row.amount,
    description: row.description,
    ...(row.externalReference ? { externalReference: row.externalReference } : {}),
    rowNumber: row.rowNumber,
  };
}

function toMatch(row: MatchRow): Match {
  return {
    id: row.id,
    ledgerRecordId: row.ledgerRecordId,
    bankRecordId: row.bankRecordId,
    score: row.score,
    dateDifferenceDays: row.dateDifferenceDays,
    amountDifference: row.amountDifference,
    kind: row.kind,
    status: row.status,
    confirmedBy: opt(row.confirmedBy),
    confirmedAt: opt(row.confirmedAt),
    rejectedBy: opt(row.rejectedBy),
    rejectedAt: opt(row.rejectedAt),
    rejectionReason: opt(row.rejectionReason),
    createdAt: row.createdAt,
  };
}

function toException(row: ExceptionRow): ReconciliationException {
  return {
    id: row.id,
    recordId: row.recordId,
    source: row.source,
    kind: row.kind,
    status: row.status,
    nearMiss: opt(row.nearMiss),
    duplicateOfRecordIds: opt(row.duplicateOfRecordIds),
    resolutionNote: opt(row.resolutionNote),
    resolvedBy: opt(row.resolvedBy),
    resolvedAt: opt(row.resolvedAt),
    closedByMatchId: opt(row.closedByMatchId),
    createdAt: row.createdAt,
  };
}

function toAuditEntry(row: AuditEntryRow): AuditEntry {
  return {
    id: row.id,
    action: row.action,
    performedBy: row.performedBy,
    targetId: opt(row.targetId),
    note: opt(row.note),
    at: row.at,
  };
}

function sessionValues(session: Session): typeof sessions.$inferInsert {
  return {
    id: session.id,
    name: session.name,
    description: session.description ?? null,
    status: session.status,
    dateToleranceDays: session.dateToleranceDays,
    amountTolerance: session.amountTolerance,
    failureReason: session.failureReason ?? null,
    version: session.version,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    processedAt: session.processedAt ?? null,
  };
}

// ============================================
// Repository
// ============================================

export class DrizzleSessionRepository implements SessionRepository {
  constructor(private readonly db: Database) {}

  async create(session: Session): Promise<Session> {
    const stored: Session = { ...session, version: 1 };

    await this.db.transaction(async (tx) => {
      await tx.insert(sessions).values(sessionValues(stored));

      const allRecords = [...stored.ledgerRecords, ...stored.bankRecords];
      for (const batch of chunk(allRecords, INSERT_CHUNK_SIZE)) {
        await tx.insert(records).values(
          batch.map((record) => ({
            id: record.id,
            sessionId: stored.id,
            source: record.source,
            recordDate: record.date.toISOString().slice(0, 10),
            amount: record.amount,
            description: record.description,
            externalReference: record.externalReference ?? null,
            rowNumber: record.rowNumber,
          }))
        );
      }

      await this.writeOutcome(tx, stored);
    });

    return stored;
  }

  /**
   * Reads the session and its children from one snapshot, so a concurrent
   * save is seen entirely or not at all.
   */
  async findById(id: string): Promise<Session | null> {
    return this.db.transaction(async (tx) => {
      const [row] = await tx.select().from(sessions).where(eq(sessions.id, id));
      if (!row) {
        return null;
      }

      const [recordRows, matchRows, exceptionRows, auditRows] = await Promise.all([
        tx.select().from(records).where(eq(records.sessionId, id)).orderBy(asc(records.rowNumber)),
        tx.select().from(matches).where(eq(matches.sessionId, id)).orderBy(asc(matches.position)),
        tx.select().from(exceptions).where(eq(exceptions.sessionId, id)).orderBy(asc(exceptions.position)),
        tx
          .select()
          .from(auditEntries)
          .where(eq(auditEntries.sessionId, id))
          .orderBy(asc(auditEntries.position)),
      ]);

      return this.toSession(row, recordRows, matchRows, exceptionRows, auditRows);
    }, SNAPSHOT_READ);
  }

  async save(session: Session): Promise<Session> {
    return this.db.transaction(async (tx) => {
      const updated = await tx
        .update(sessions)
        .set({ ...sessionValues(session), version: sql`${sessions.version} + 1` })
        .where(and(eq(sessions.id, session.id), eq(sessions.version, session.version)))
        .returning({ version: sessions.version });

      const [saved] = updated;
      if (!saved) {
        const [existing] = await tx
          .select({ version: sessions.version })
          .from(sessions)
          .where(eq(sessions.id, session.id));
        if (!existing) {
          throw AppError.notFound(`Session ${session.id} not found`);
        }
        throw new ConcurrentModificationError(
          session.id,
          `was modified concurrently (expected version ${session.version}, found ${existing.version})`
        );
      }

      await tx.delete(matches).where(eq(matches.sessionId, session.id));
      await tx.delete(exceptions).where(eq(exceptions.sessionId, session.id));
      await this.writeOutcome(tx, session);

      return { ...session, version: saved.version };
    });
  }

  async delete(id: string): Promise<boolean> {
    // Child rows go with ON DELETE CASCADE
    const deleted = await this.db.delete(sessions).where(eq(sessions.id, id)).returning({ id: sessions.id });
    return deleted.length > 0;
  }

  async list(filter: ListSessionsFilter = {}): Promise<SessionHeader[]> {
    const rows = await this.db
      .select({
        session: sessions,
        ledgerRecordCount: sql<number>`count(${records.id}) filter (where ${records.source} = 'LEDGER')`.mapWith(Number),
        bankRecordCount: sql<number>`count(${records.id}) filter (where ${records.source} = 'BANK')`.mapWith(Number),
      })
      .from(sessions)
      .leftJoin(records, eq(records.sessionId, sessions.id))
      .where(filter.status ? eq(sessions.status, filter.status) : undefined)
      .groupBy(sessions.id)
      .orderBy(desc(sessions.createdAt), asc(sessions.id));

    return rows.map(({ session, ledgerRecordCount, bankRecordCount }) => ({
      id: session.id,
      name: session.name,
      ...(session.description ? { description: session.description } : {}),
      status: session.status,
      ledgerRecordCount,
      bankRecordCount,
      createdAt: session.createdAt,
      updatedAt: session.updatedAt,
      ...(session.processedAt ? { processedAt: session.processedAt } : {}),
      version: session.version,
    }));
  }

  /**
   * Writes matches, exceptions and any audit entries not yet stored.
   */
  private async writeOutcome(tx: Transaction, session: Session): Promise<void> {
    const ranked = session.matches.map((match, position) => ({ match, position }));
    for (const batch of chunk(ranked, INSERT_CHUNK_SIZE)) {
      await tx.insert(matches).values(
        batch.map(({ match, position }) => ({
          id: match.id,
          sessionId: session.id,
          ledgerRecordId: match.ledgerRecordId,
          bankRecordId: match.bankRecordId,
          score: match.score,
          dateDifferenceDays: match.dateDifferenceDays,
          amountDifference: match.amountDifference,
          kind: match.kind,
          status: match.status,
          confirmedBy: match.confirmedBy ?? null,
          confirmedAt: match.confirmedAt ?? null,
          rejectedBy: match.rejectedBy ?? null,
          rejectedAt: match.rejectedAt ?? null,
          rejectionReason: match.rejectionReason ?? null,
          position,
          createdAt: match.createdAt,
        }))
      );
    }

    for (const batch of chunk(
      session.exceptions.map((exception, position) => ({ exception, position })),
      INSERT_CHUNK_SIZE
    )) {
      await tx.insert(exceptions).values(
        batch.map(({ exception, position }) => ({
          id: exception.id,
          sessionId: session.id,
          recordId: exception.recordId,
          source: exception.source,
          kind: exception.kind,
          status: exception.status,
          nearMiss: exception.nearMiss ?? null,
          duplicateOfRecordIds: exception.duplicateOfRecordIds ?? null,
          resolutionNote: exception.resolutionNote ?? null,
          resolvedBy: exception.resolvedBy ?? null,
          resolvedAt: exception.resolvedAt ?? null,
          closedByMatchId: exception.closedByMatchId ?? null,
          position,
          createdAt: exception.createdAt,
        }))
      );
    }

    const trail = session.auditTrail.map((entry, position) => ({ entry, position }));
    for (const batch of chunk(trail, INSERT_CHUNK_SIZE)) {
      await tx
        .insert(auditEntries)
        .values(
          batch.map(({ entry, position }) => ({
            id: entry.id,
            sessionId: session.id,
            action: entry.action,
            performedBy: entry.performedBy,
            targetId: entry.targetId ?? null,
            note: entry.note ?? null,
            position,
            at: entry.at,
          }))
        )
        .onConflictDoNothing({ target: auditEntries.id });
    }
  }

  private toSession(
    row: SessionRow,
    recordRows: RecordRow[],
    matchRows: MatchRow[],
    exceptionRows: ExceptionRow[],
    auditRows: AuditEntryRow[]
  ): Session {
    const allRecords = recordRows.map(toRecord);

    return {
      id: row.id,
      name: row.name,
      description: opt(row.description),
      status: row.status,
      dateToleranceDays: row.dateToleranceDays,
      amountTolerance: row.amountTolerance,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
      processedAt: opt(row.processedAt),
      failureReason: opt(row.failureReason),
      version: row.version,
      ledgerRecords: allRecords.filter((record) => record.source === 'LEDGER'),
      bankRecords: allRecords.filter((record) => record.source === 'BANK'),
      matches: matchRows.map(toMatch),
      exceptions: exceptionRows.map(toException),
      auditTrail: auditRows.map(toAuditEntry),
    };
  }
}
