import { Router } from 'express';
import { HealthController } from '../controllers/health.controller';
import { createHealthRouter } from './health.routes';
import { createSessionsRouter, type SessionsRouterDeps } from './sessions.routes';

export interface RoutesDeps extends SessionsRouterDeps {
  healthController: HealthController;
}

export function createRoutes(deps: RoutesDeps): Router {
  const router = Router();

  // Health check routes
  router.use('/health', createHealthRouter(deps.healthController));

  // Reconciliation sessions (create, match, review, complete)
  router.use('/sessions', createSessionsRouter(deps));

  return router;
}

export default createRoutes;
