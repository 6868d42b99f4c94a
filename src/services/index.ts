export { healthService, HealthService } from './health.service';
export {
  ReconciliationService,
  redisSummaryCache,
  type CreateSessionInput,
  type CreateSessionResult,
  type RunMatchingOptions,
  type SummaryCache,
  type ReconciliationServiceDeps,
} from './reconciliation.service';
