/**
 * Workers Module
 *
 * Exports the matching queue, its worker and the dispatchers.
 */

export {
  MATCHING_QUEUE_NAME,
  MATCHING_JOB_OPTIONS,
  getMatchingQueue,
  closeMatchingQueue,
  setupMatchingWorker,
  type MatchingJobData,
} from './reconciliation.queue';
export { processMatchingJob, createMatchingProcessor, type MatchingJob, type MatchingProcessor } from './reconciliationWorker';
export {
  QueueMatchingDispatcher,
  InlineMatchingDispatcher,
  type MatchingDispatcher,
  type DispatchReceipt,
} from './dispatcher';
