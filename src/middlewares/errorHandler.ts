import { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/AppError';
import logger from '../utils/logger';
import { env } from '../config';

interface HttpError extends Error {
  status?: number;
  type?: string;
}

/**
 * Global error handling middleware
 */
export const errorHandler = (
  err: HttpError | AppError,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  // Default error values
  let statusCode = 500;
  let message = 'Internal Server Error';
  let isOperational = false;
  let code: string | undefined;
  let details: unknown;

  // Check if it's our custom AppError
  if (err instanceof AppError) {
    statusCode = err.statusCode;
    message = err.message;
    isOperational = err.isOperational;
    code = err.code;
    details = err.details;
  } else if (err.type === 'entity.parse.failed' || err.type === 'entity.too.large') {
    // body-parser rejections
    statusCode = err.status ?? 400;
    message = err.message;
    isOperational = true;
  }

  // Log error
  if (!isOperational) {
    logger.error('Unhandled Error:', err);
  } else {
    logger.warn(`Operational Error: ${message}`);
  }

  // Send response
  res.status(statusCode).json({
    success: false,
    error: message,
    ...(code && { code }),
    ...(details !== undefined && { details }),
    ...(env.NODE_ENV === 'development' && {
      stack: err.stack,
    }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
