export { default as logger, Logging, sessionLogger } from './logger';
export { sendSuccess, sendError } from './response';
export { asyncHandler } from './asyncHandler';
export { AppError, ErrorCode } from './AppError';
export * from './errors';
export { getDatabase, connectDatabase, disconnectDatabase, checkDatabaseHealth, isDatabaseConfigured } from './db';
export type { Database } from './db';
