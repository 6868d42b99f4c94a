/**
 * Reconciliation Background Worker
 *
 * Runs the matching pass for sessions queued by `start`:
 * 1. DOMAIN ERRORS - contract violations (empty side, invalid records,
 *    wrong state) fail the job at once via UnrecoverableError.
 * 2. RETRIES - lock contention, cancellation and infrastructure errors
 *    are rethrown so BullMQ retries them with backoff.
 * 3. SHUTDOWN - closing the worker aborts passes in flight; the sessions
 *    stay in MATCHING and the jobs are retried elsewhere.
 */

import { Job, UnrecoverableError } from 'bullmq';
import type { ReconciliationService } from '../services/reconciliation.service';
import { AppError } from '../utils/AppError';
import { ConcurrentModificationError, MatchingCancelledError } from '../utils/errors';
import logger from '../utils/logger';
import type { MatchingJobData } from './reconciliation.queue';

export type MatchingJob = Pick<Job<MatchingJobData>, 'id' | 'data'>;

function isRetryable(error: unknown): boolean {
  if (error instanceof ConcurrentModificationError || error instanceof MatchingCancelledError) {
    return true;
  }
  return !(error instanceof AppError && error.isOperational);
}

/**
 * Processes one matching job.
 */
export async function processMatchingJob(
  job: MatchingJob,
  service: ReconciliationService,
  signal?: AbortSignal
): Promise<void> {
  const { sessionId } = job.data;
  logger.info(`[Job ${job.id}] Running matching for session ${sessionId}`);

  try {
    await service.runMatching(sessionId, { signal });
  } catch (error) {
    if (isRetryable(error)) {
      throw error;
    }

    const message = error instanceof Error ? error.message : String(error);
    throw new UnrecoverableError(message);
  }
}

export interface MatchingProcessor {
  process: (job: MatchingJob) => Promise<void>;
  /** Aborts every pass in flight */
  abortAll: () => void;
}

/**
 * Binds the processor to a service and tracks in-flight passes so that a
 * shutting-down worker can cancel them.
 */
export function createMatchingProcessor(service: ReconciliationService): MatchingProcessor {
  const inFlight = new Set<AbortController>();

  return {
    process: async (job) => {
      const controller = new AbortController();
      inFlight.add(controller);
      try {
        await processMatchingJob(job, service, controller.signal);
      } finally {
        inFlight.delete(controller);
      }
    },
    abortAll: () => {
      for (const controller of inFlight) {
        controller.abort();
      }
    },
  };
}
