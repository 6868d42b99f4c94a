import { ConcurrentModificationError } from '../utils/errors';

/**
 * Mutual exclusion per session id.
 *
 * `runExclusive` never queues: if the session is already held the call
 * fails at once with ConcurrentModificationError, and the caller decides
 * whether to retry.
 */
export interface SessionLock {
  runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T>;
}

/**
 * Lock held in this process only. Enough for a single API instance and
 * for tests; the Redis lock uses it as its fallback.
 */
export class InMemorySessionLock implements SessionLock {
  private readonly held = new Set<string>();

  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    if (this.held.has(sessionId)) {
      throw new ConcurrentModificationError(sessionId);
    }

    this.held.add(sessionId);
    try {
      return await fn();
    } finally {
      this.held.delete(sessionId);
    }
  }

  isHeld(sessionId: string): boolean {
    return this.held.has(sessionId);
  }
}
