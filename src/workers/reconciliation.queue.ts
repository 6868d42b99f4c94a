import { Queue, Worker, Job } from 'bullmq';
import { env } from '../config';
import { getQueueConnectionOptions } from '../redis/client';
import logger from '../utils/logger';

// ============================================
// Queue Definition
// ============================================

export const MATCHING_QUEUE_NAME = 'reconciliation-matching';

export interface MatchingJobData {
  sessionId: string;
}

export const MATCHING_JOB_OPTIONS = {
  attempts: 3,
  backoff: {
    type: 'exponential',
    delay: 1000,
  },
  removeOnComplete: true,
  removeOnFail: false,
} as const;

let matchingQueue: Queue<MatchingJobData> | null = null;

/**
 * The queue is created on first use so that importing this module never
 * opens a Redis connection.
 */
export function getMatchingQueue(): Queue<MatchingJobData> {
  if (!matchingQueue) {
    matchingQueue = new Queue<MatchingJobData>(MATCHING_QUEUE_NAME, {
      connection: getQueueConnectionOptions(),
      defaultJobOptions: MATCHING_JOB_OPTIONS,
    });
  }
  return matchingQueue;
}

export async function closeMatchingQueue(): Promise<void> {
  if (matchingQueue) {
    await matchingQueue.close();
    matchingQueue = null;
  }
}

// ============================================
// Worker Setup
// ============================================

export function setupMatchingWorker(
  processor: (job: Job<MatchingJobData>) => Promise<void>
): Worker<MatchingJobData> {
  const worker = new Worker<MatchingJobData>(MATCHING_QUEUE_NAME, processor, {
    connection: getQueueConnectionOptions(),
    // Control concurrency
    concurrency: env.MATCHING_CONCURRENCY,
    // Large sessions take a while to match
    lockDuration: 60000, // 60 seconds
  });

  worker.on('completed', (job) => {
    logger.info(`[Job ${job.id}] Matching completed for session ${job.data.sessionId}`);
  });

  worker.on('failed', (job, err) => {
    logger.error(`[Job ${job?.id}] Matching failed: ${err.message}`);
  });

  worker.on('error', (err) => {
    logger.error(`Worker error: ${err.message}`);
  });

  return worker;
}
