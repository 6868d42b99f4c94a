import { Request, Response } from 'express';
import { healthService as defaultHealthService, HealthService } from '../services/health.service';
import { sendSuccess, sendError } from '../utils/response';
import { asyncHandler } from '../utils/asyncHandler';

/**
 * Health check controller
 */
export class HealthController {
  constructor(private readonly healthService: HealthService = defaultHealthService) {}

  /**
   * GET /health
   * Basic health check endpoint
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = this.healthService.getHealthStatus();
    sendSuccess(res, health, 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Readiness check endpoint (checks dependencies)
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = await this.healthService.checkReadiness();

    if (ready) {
      sendSuccess(res, { ready, checks }, 'Service is ready');
    } else {
      sendError(res, 'Service is not ready', 503, undefined, { ready, checks });
    }
  });

  /**
   * GET /health/live
   * Liveness check endpoint
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}
