import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { checkDatabaseHealth, isDatabaseConfigured } from '../utils/db';
import { isRedisAvailable } from '../redis/client';

export type DependencyCheck = () => Promise<boolean>;

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;
  private readonly checks: Record<string, DependencyCheck>;

  /**
   * @param checks - Readiness probes by name; defaults to the configured
   * database and Redis
   */
  constructor(checks?: Record<string, DependencyCheck>) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
    this.checks = checks ?? HealthService.defaultChecks();
  }

  private static defaultChecks(): Record<string, DependencyCheck> {
    const checks: Record<string, DependencyCheck> = {};

    if (isDatabaseConfigured()) {
      checks.database = checkDatabaseHealth;
    }
    if (env.REDIS_ENABLED) {
      checks.redis = async () => isRedisAvailable();
    }

    return checks;
  }

  /**
   * Get health status
   */
  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Check if the service is ready
   * Checks every configured dependency
   */
  async checkReadiness(): Promise<{ ready: boolean; checks: Record<string, boolean> }> {
    const entries = await Promise.all(
      Object.entries(this.checks).map(async ([name, check]) => [name, await check()] as const)
    );

    const checks: Record<string, boolean> = { server: true, ...Object.fromEntries(entries) };
    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
