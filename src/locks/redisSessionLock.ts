/**
 * Redis Session Lock
 *
 * Cross-process lock so that an API request and a queue worker never
 * mutate the same session at once.
 *
 * - Acquire: SET lock:session:{id} {token} PX {ttl} NX
 * - Release: delete the key only if it still holds our token (Lua), so an
 *   expired lock taken over by someone else is never released by us
 *
 * When Redis is disabled or unreachable the in-process lock takes over.
 */

import { randomUUID } from 'crypto';
import type Redis from 'ioredis';
import { ConcurrentModificationError } from '../utils/errors';
import logger from '../utils/logger';
import { InMemorySessionLock, type SessionLock } from './sessionLock';

const LOCK_KEY_PREFIX = 'lock:session:';

const RELEASE_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
else
  return 0
end
`;

/**
 * The two primitives the lock needs from a key-value store.
 */
export interface LockStore {
  /** True when the key was free and is now held with this token */
  acquire(key: string, token: string, ttlMs: number): Promise<boolean>;
  /** True when the key still held this token and was deleted */
  release(key: string, token: string): Promise<boolean>;
}

export function redisLockStore(client: Redis): LockStore {
  return {
    acquire: async (key, token, ttlMs) => (await client.set(key, token, 'PX', ttlMs, 'NX')) === 'OK',
    release: async (key, token) => (await client.eval(RELEASE_SCRIPT, 1, key, token)) === 1,
  };
}

export function getLockKey(sessionId: string): string {
  return `${LOCK_KEY_PREFIX}${sessionId}`;
}

export interface RedisSessionLockOptions {
  /** Returns null while Redis is disabled or disconnected */
  getStore: () => LockStore | null;
  ttlMs: number;
  fallback?: SessionLock;
  tokenFactory?: () => string;
}

export class RedisSessionLock implements SessionLock {
  private readonly fallback: SessionLock;
  private readonly tokenFactory: () => string;

  constructor(private readonly options: RedisSessionLockOptions) {
    this.fallback = options.fallback ?? new InMemorySessionLock();
    this.tokenFactory = options.tokenFactory ?? randomUUID;
  }

  async runExclusive<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    const store = this.options.getStore();
    if (!store) {
      return this.fallback.runExclusive(sessionId, fn);
    }

    const key = getLockKey(sessionId);
    const token = this.tokenFactory();

    let acquired: boolean;
    try {
      acquired = await store.acquire(key, token, this.options.ttlMs);
    } catch (error) {
      logger.warn(
        `Session lock acquire failed (falling back to in-process lock): ${error instanceof Error ? error.message : 'Unknown error'}`
      );
      return this.fallback.runExclusive(sessionId, fn);
    }

    if (!acquired) {
      throw new ConcurrentModificationError(sessionId);
    }

    try {
      return await fn();
    } finally {
      await this.release(store, key, token, sessionId);
    }
  }

  private async release(store: LockStore, key: string, token: string, sessionId: string): Promise<void> {
    try {
      const released = await store.release(key, token);
      if (!released) {
        logger.warn(`Session lock for ${sessionId} expired before release (ttl ${this.options.ttlMs}ms)`);
      }
    } catch (error) {
      logger.warn(
        `Session lock release failed for ${sessionId}, key expires on its own: ${error instanceof Error ? error.message : 'Unknown error'}`
      );
    }
  }
}
