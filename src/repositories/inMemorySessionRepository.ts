import { AppError } from '../utils/AppError';
import { ConcurrentModificationError } from '../utils/errors';
import type { Session } from '../reconciliation/types';
import {
  compareHeaders,
  toHeader,
  type ListSessionsFilter,
  type SessionHeader,
  type SessionRepository,
} from './sessionRepository';

/**
 * Process-local repository. Used when no database is configured and in
 * tests. Sessions are cloned on the way in and out so callers can never
 * mutate stored state by accident.
 */
export class InMemorySessionRepository implements SessionRepository {
  private readonly sessions = new Map<string, Session>();

  async create(session: Session): Promise<Session> {
    if (this.sessions.has(session.id)) {
      throw AppError.conflict(`Session ${session.id} already exists`);
    }

    const stored: Session = { ...structuredClone(session), version: 1 };
    this.sessions.set(stored.id, stored);
    return structuredClone(stored);
  }

  async findById(id: string): Promise<Session | null> {
    const stored = this.sessions.get(id);
    return stored ? structuredClone(stored) : null;
  }

  async save(session: Session): Promise<Session> {
    const stored = this.sessions.get(session.id);
    if (!stored) {
      throw AppError.notFound(`Session ${session.id} not found`);
    }
    if (stored.version !== session.version) {
      throw new ConcurrentModificationError(
        session.id,
        `was modified concurrently (expected version ${session.version}, found ${stored.version})`
      );
    }

    const next: Session = { ...structuredClone(session), version: stored.version + 1 };
    this.sessions.set(next.id, next);
    return structuredClone(next);
  }

  async delete(id: string): Promise<boolean> {
    return this.sessions.delete(id);
  }

  async list(filter: ListSessionsFilter = {}): Promise<SessionHeader[]> {
    return [...this.sessions.values()]
      .filter((session) => !filter.status || session.status === filter.status)
      .map(toHeader)
      .sort(compareHeaders);
  }

  /** Number of stored sessions */
  get size(): number {
    return this.sessions.size;
  }
}
