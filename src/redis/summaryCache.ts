/**
 * Session Summary Cache
 *
 * Redis-backed copy of session summaries for UI polling.
 *
 * DESIGN PRINCIPLES:
 * - The repository remains the SOURCE OF TRUTH
 * - Redis is a FAST MIRROR, written after every successful save
 * - Entries are tagged with the session version; a stale entry is a miss
 * - Redis failures never affect reconciliation
 *
 * KEY FORMAT: session:{sessionId}:summary
 */

import { z } from 'zod';
import type { SessionSummary } from '../reconciliation/types';
import { safeRedisOperation, safeRedisWrite } from './client';

// ============================================
// Configuration
// ============================================

const CACHE_KEY_PREFIX = 'session:';
const CACHE_KEY_SUFFIX = ':summary';

/**
 * Cache TTL in seconds (1 hour)
 */
const CACHE_TTL_SECONDS = 60 * 60;

function getCacheKey(sessionId: string): string {
  return `${CACHE_KEY_PREFIX}${sessionId}${CACHE_KEY_SUFFIX}`;
}

// ============================================
// Data Structure
// ============================================

const count = z.number().int().nonnegative();

const summarySchema = z.object({
  sessionId: z.string(),
  status: z.enum(['CREATED', 'MATCHING', 'REVIEW', 'COMPLETED', 'FAILED']),
  totalRecords: count,
  ledgerRecordCount: count,
  bankRecordCount: count,
  matchedCount: count,
  confirmedCount: count,
  proposedCount: count,
  exceptionCountByKind: z.object({
    UNMATCHED_LEDGER: count,
    UNMATCHED_BANK: count,
    AMOUNT_MISMATCH: count,
    DUPLICATE_CANDIDATE: count,
  }),
  openExceptionCount: count,
  resolvedExceptionCount: count,
  coverageRatio: z.number(),
  matchRate: z.number(),
  matchedAmount: z.number().int(),
  unmatchedLedgerAmount: z.number().int(),
  unmatchedBankAmount: z.number().int(),
}) satisfies z.ZodType<SessionSummary>;

/**
 * Parses a cached hash. Anything malformed counts as a miss.
 */
export function parseCachedSummary(
  data: Record<string, string>,
  expectedVersion: number
): SessionSummary | null {
  if (data.version !== String(expectedVersion) || !data.summary) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(data.summary);
  } catch {
    return null;
  }

  const parsed = summarySchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

// ============================================
// Cache Operations
// ============================================

/**
 * Gets the cached summary for this exact session version
 *
 * @returns Cached summary or null on a miss
 */
export async function getCachedSummary(
  sessionId: string,
  version: number
): Promise<SessionSummary | null> {
  const cacheKey = getCacheKey(sessionId);

  return safeRedisOperation(
    async (client) => parseCachedSummary(await client.hgetall(cacheKey), version),
    null,
    `Session summary GET (${sessionId})`
  );
}

/**
 * Stores the summary of a session version
 */
export async function setCachedSummary(
  sessionId: string,
  version: number,
  summary: SessionSummary
): Promise<void> {
  const cacheKey = getCacheKey(sessionId);

  await safeRedisWrite(async (client) => {
    const multi = client.multi();

    multi.hset(cacheKey, {
      version: version.toString(),
      summary: JSON.stringify(summary),
    });
    multi.expire(cacheKey, CACHE_TTL_SECONDS);

    await multi.exec();
  }, `Session summary SET (${sessionId})`);
}

/**
 * Removes a session's summary, e.g. when the session is deleted
 */
export async function clearCachedSummary(sessionId: string): Promise<void> {
  const cacheKey = getCacheKey(sessionId);

  await safeRedisWrite(async (client) => {
    await client.del(cacheKey);
  }, `Session summary CLEAR (${sessionId})`);
}

export default {
  getCachedSummary,
  setCachedSummary,
  clearCachedSummary,
};
