import fs from 'fs';
import path from 'path';
import { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import { env } from '../config';
import * as schema from '../repositories/schema';
import { AppError } from './AppError';
import logger from './logger';

export type Database = NodePgDatabase<typeof schema>;

const SCHEMA_FILE = path.resolve(__dirname, '../../db/schema.sql');

let pool: Pool | null = null;
let database: Database | null = null;

/**
 * Postgres is optional: without DATABASE_URL sessions live in memory.
 */
export const isDatabaseConfigured = (): boolean => Boolean(env.DATABASE_URL);

const getPool = (): Pool => {
  if (!env.DATABASE_URL) {
    throw AppError.internal('DATABASE_URL is not configured');
  }

  if (!pool) {
    pool = new Pool({ connectionString: env.DATABASE_URL, max: 10 });
    pool.on('error', (error) => {
      logger.error(`📦 Idle database client error: ${error.message}`);
    });
  }

  return pool;
};

// Singleton - one pool per process
export const getDatabase = (): Database => {
  if (!database) {
    database = drizzle(getPool(), { schema, logger: env.NODE_ENV === 'development' });
  }
  return database;
};

/**
 * Connect to database and make sure the tables exist
 */
export const connectDatabase = async (): Promise<void> => {
  if (!isDatabaseConfigured()) {
    logger.warn('📦 DATABASE_URL not set - sessions are kept in memory');
    return;
  }

  try {
    const ddl = await fs.promises.readFile(SCHEMA_FILE, 'utf8');
    await getPool().query(ddl);
    logger.info('📦 Database connected successfully');
  } catch (error) {
    logger.error('❌ Database connection failed:', error);
    throw error;
  }
};

/**
 * Disconnect from database
 */
export const disconnectDatabase = async (): Promise<void> => {
  if (!pool) {
    return;
  }

  try {
    await pool.end();
    logger.info('📦 Database disconnected');
  } catch (error) {
    logger.error('❌ Database disconnect failed:', error);
    throw error;
  } finally {
    pool = null;
    database = null;
  }
};

/**
 * Check database health
 */
export const checkDatabaseHealth = async (): Promise<boolean> => {
  if (!isDatabaseConfigured()) {
    return false;
  }

  try {
    await getPool().query('SELECT 1');
    return true;
  } catch (error) {
    logger.debug(`Database health check failed: ${error instanceof Error ? error.message : String(error)}`);
    return false;
  }
};
