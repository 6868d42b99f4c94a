import { env } from '../config';
import { getRedisClient, isRedisAvailable } from '../redis/client';
import { RedisSessionLock, redisLockStore } from './redisSessionLock';
import { InMemorySessionLock, type SessionLock } from './sessionLock';

export { InMemorySessionLock } from './sessionLock';
export { RedisSessionLock, redisLockStore, getLockKey } from './redisSessionLock';
export type { SessionLock } from './sessionLock';
export type { LockStore, RedisSessionLockOptions } from './redisSessionLock';

/**
 * The lock for this process: Redis-backed when Redis is enabled,
 * in-process otherwise.
 */
export function createSessionLock(): SessionLock {
  if (!env.REDIS_ENABLED) {
    return new InMemorySessionLock();
  }

  return new RedisSessionLock({
    ttlMs: env.SESSION_LOCK_TTL_MS,
    getStore: () => {
      const client = getRedisClient();
      return client && isRedisAvailable() ? redisLockStore(client) : null;
    },
  });
}
