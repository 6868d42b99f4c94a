/**
 * Jest setup file
 * This file is executed before each test file
 */

// Set test environment variables BEFORE any source module reads them
process.env.NODE_ENV = 'test';
process.env.CORS_ORIGIN = '*';
process.env.PORT = '3001';
process.env.LOG_LEVEL = 'error'; // Reduce logging noise during tests
process.env.REDIS_ENABLED = 'false'; // No Redis in unit tests
process.env.REDIS_HOST = 'localhost';
process.env.REDIS_PORT = '6379';
delete process.env.DATABASE_URL; // Sessions stay in memory

// Global test timeout
jest.setTimeout(30000);
