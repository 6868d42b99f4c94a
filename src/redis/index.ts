/**
 * Redis Module
 *
 * Exports the Redis client and the summary cache for the reconciliation engine.
 *
 * IMPORTANT: Redis is an OPTIONAL performance optimization.
 * The application works correctly without Redis.
 * The session repository remains the source of truth.
 */

// Client exports
export {
  getRedisClient,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
  getQueueConnectionOptions,
} from './client';

// Summary cache exports
export {
  getCachedSummary,
  setCachedSummary,
  clearCachedSummary,
  parseCachedSummary,
} from './summaryCache';
