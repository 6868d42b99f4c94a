/**
 * Matching dispatchers
 *
 * `POST /sessions/:id/start` moves a session to MATCHING and hands the
 * pass to a dispatcher. With Redis enabled the pass goes through the
 * BullMQ queue; without it the pass runs in this process.
 */

import type { ReconciliationService } from '../services/reconciliation.service';
import logger from '../utils/logger';
import { getMatchingQueue } from './reconciliation.queue';

export interface DispatchReceipt {
  mode: 'queued' | 'inline';
  jobId?: string;
}

export interface MatchingDispatcher {
  dispatch(sessionId: string): Promise<DispatchReceipt>;
}

export class QueueMatchingDispatcher implements MatchingDispatcher {
  async dispatch(sessionId: string): Promise<DispatchReceipt> {
    const job = await getMatchingQueue().add('run-matching', { sessionId });
    logger.info(`[Job ${job.id}] Matching queued for session ${sessionId}`);

    return { mode: 'queued', ...(job.id ? { jobId: job.id } : {}) };
  }
}

/**
 * Runs the pass before returning. A failed pass is already recorded on the
 * session (FAILED); errors are rethrown either way so the caller of `start`
 * sees lock contention or the failure instead of a receipt.
 */
export class InlineMatchingDispatcher implements MatchingDispatcher {
  constructor(private readonly service: ReconciliationService) {}

  async dispatch(sessionId: string): Promise<DispatchReceipt> {
    try {
      await this.service.runMatching(sessionId);
    } catch (error) {
      logger.error(
        `Inline matching failed for session ${sessionId}: ${error instanceof Error ? error.message : String(error)}`
      );
      throw error;
    }

    return { mode: 'inline' };
  }
}
