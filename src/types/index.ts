// Environment configuration type
export interface EnvConfig {
  NODE_ENV: 'development' | 'production' | 'test';
  PORT: number;
  HOST: string;
  API_PREFIX: string;
  CORS_ORIGIN: string[];
  RATE_LIMIT_WINDOW_MS: number;
  RATE_LIMIT_MAX_REQUESTS: number;
  LOG_LEVEL: 'error' | 'warn' | 'info' | 'http' | 'debug';
  // Postgres (OPTIONAL - sessions are kept in memory without it)
  DATABASE_URL?: string;
  // Redis (OPTIONAL - locks fall back to in-process without it)
  REDIS_ENABLED: boolean;
  REDIS_HOST: string;
  REDIS_PORT: number;
  SESSION_LOCK_TTL_MS: number;
  MATCHING_CONCURRENCY: number;
  // Tolerances applied when a session is created without explicit ones
  DEFAULT_DATE_TOLERANCE_DAYS: number;
  DEFAULT_AMOUNT_TOLERANCE: number;
}

// API Response types
export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  message?: string;
  error?: string;
  code?: string;
  details?: unknown;
  timestamp: string;
}

// Health check response
export interface HealthCheckResponse {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  environment: string;
  version: string;
}
