import { Response } from 'express';
import { ApiResponse } from '../types';

/**
 * Send a success response
 */
export const sendSuccess = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    data,
    message,
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};

/**
 * Send an error response
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  message?: string,
  details?: unknown
): Response => {
  const response: ApiResponse = {
    success: false,
    error,
    message,
    ...(details !== undefined ? { details } : {}),
    timestamp: new Date().toISOString(),
  };

  return res.status(statusCode).json(response);
};
