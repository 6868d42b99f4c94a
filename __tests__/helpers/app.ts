import type { Application } from 'express';
import { createApp } from '../../src/app';
import type { SessionLock } from '../../src/locks/sessionLock';
import { InMemorySessionRepository } from '../../src/repositories/inMemorySessionRepository';
import { HealthService, type DependencyCheck } from '../../src/services/health.service';
import { ReconciliationService } from '../../src/services/reconciliation.service';
import { InlineMatchingDispatcher } from '../../src/workers/dispatcher';
import { FIXED_NOW, sequentialUuids } from './fixtures';
import { MemorySummaryCache } from './summaryCache';

export interface TestApp {
  app: Application;
  service: ReconciliationService;
}

/**
 * The HTTP app over an in-memory repository, with matching run inline.
 */
export function createTestApp(checks: Record<string, DependencyCheck> = {}, lock?: SessionLock): TestApp {
  const service = new ReconciliationService({
    repository: new InMemorySessionRepository(),
    ...(lock ? { lock } : {}),
    summaryCache: new MemorySummaryCache(),
    clock: () => FIXED_NOW,
    idFactory: sequentialUuids(),
    defaultTolerances: { dateToleranceDays: 3, amountTolerance: 0 },
  });

  const app = createApp({
    service,
    dispatcher: new InlineMatchingDispatcher(service),
    healthService: new HealthService(checks),
  });

  return { app, service };
}
