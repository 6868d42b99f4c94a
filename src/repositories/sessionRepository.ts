import type { Session, SessionStatus } from '../reconciliation/types';

/**
 * Lightweight listing row, without records, matches or exceptions.
 */
export interface SessionHeader {
  id: string;
  name: string;
  description?: string;
  status: SessionStatus;
  ledgerRecordCount: number;
  bankRecordCount: number;
  createdAt: Date;
  updatedAt: Date;
  processedAt?: Date;
  version: number;
}

export interface ListSessionsFilter {
  status?: SessionStatus;
}

/**
 * Persistence boundary for sessions.
 *
 * A session is always loaded and saved whole. `save` is optimistic: it
 * fails with ConcurrentModificationError when the stored version differs
 * from the one the caller loaded, and returns the session with its
 * version incremented.
 */
export interface SessionRepository {
  create(session: Session): Promise<Session>;
  findById(id: string): Promise<Session | null>;
  save(session: Session): Promise<Session>;
  delete(id: string): Promise<boolean>;
  list(filter?: ListSessionsFilter): Promise<SessionHeader[]>;
}

export function toHeader(session: Session): SessionHeader {
  return {
    id: session.id,
    name: session.name,
    ...(session.description ? { description: session.description } : {}),
    status: session.status,
    ledgerRecordCount: session.ledgerRecords.length,
    bankRecordCount: session.bankRecords.length,
    createdAt: session.createdAt,
    updatedAt: session.updatedAt,
    ...(session.processedAt ? { processedAt: session.processedAt } : {}),
    version: session.version,
  };
}

/**
 * Newest first, ties by id.
 */
export function compareHeaders(a: SessionHeader, b: SessionHeader): number {
  return b.createdAt.getTime() - a.createdAt.getTime() || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0);
}
