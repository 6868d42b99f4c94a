import dotenv from 'dotenv';
import { z } from 'zod';
import type { EnvConfig } from '../types';

dotenv.config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

/**
 * Environment schema. Every variable has a default except DATABASE_URL,
 * whose absence selects the in-memory session repository.
 */
const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter(Boolean)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(500),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('info'),
  DATABASE_URL: z.string().url().optional(),
  REDIS_ENABLED: booleanFlag.default('false'),
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  SESSION_LOCK_TTL_MS: z.coerce.number().int().positive().default(60_000),
  MATCHING_CONCURRENCY: z.coerce.number().int().positive().default(2),
  DEFAULT_DATE_TOLERANCE_DAYS: z.coerce.number().int().min(0).default(3),
  DEFAULT_AMOUNT_TOLERANCE: z.coerce.number().int().min(0).default(0),
});

/**
 * Parses an environment map into the typed configuration.
 * Throws with every offending variable listed.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): EnvConfig {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    const problems = parsed.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  return parsed.data;
}

export const env: EnvConfig = loadEnv();

export default env;
