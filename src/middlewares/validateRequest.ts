import { Request, Response, NextFunction } from 'express';
import { z, ZodError, ZodSchema, ZodTypeAny } from 'zod';
import { AppError } from '../utils/AppError';

interface ValidationSchemas {
  query?: ZodSchema;
  params?: ZodSchema;
}

const formatIssues = (error: ZodError): Array<{ field: string; message: string }> =>
  error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));

/**
 * Parses a request part against a schema, typed by the schema's output.
 *
 * @throws AppError (400) listing every failing field
 */
export function parseRequest<T extends ZodTypeAny>(schema: T, value: unknown): z.output<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = formatIssues(result.error);
    throw AppError.badRequest(
      `Validation failed: ${issues.map((issue) => `${issue.field || 'body'} ${issue.message}`).join(', ')}`,
      issues
    );
  }
  return result.data;
}

/**
 * Middleware to validate request query and params using Zod schemas.
 * Bodies are parsed inside the handler with parseRequest so they stay typed.
 */
export const validateRequest = (schemas: ValidationSchemas) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    try {
      if (schemas.params) {
        parseRequest(schemas.params, req.params);
      }
      if (schemas.query) {
        parseRequest(schemas.query, req.query);
      }
      next();
    } catch (error) {
      next(error);
    }
  };
};

export default validateRequest;
