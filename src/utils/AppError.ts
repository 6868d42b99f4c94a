/**
 * Error codes for programmatic handling by API clients and the job worker
 */
export enum ErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  NOT_FOUND = 'NOT_FOUND',
  CONFLICT = 'CONFLICT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',

  // Input data
  MALFORMED_ROW = 'MALFORMED_ROW',
  MALFORMED_ROWS = 'MALFORMED_ROWS',
  INVALID_RECORDS = 'INVALID_RECORDS',

  // Session state machine
  EMPTY_RECORD_SET = 'EMPTY_RECORD_SET',
  INCOMPLETE_RECONCILIATION = 'INCOMPLETE_RECONCILIATION',
  IRREVERSIBLE_STATE = 'IRREVERSIBLE_STATE',
  INVALID_TRANSITION = 'INVALID_TRANSITION',
  RESOLUTION_NOTE_REQUIRED = 'RESOLUTION_NOTE_REQUIRED',
  MATCHING_CANCELLED = 'MATCHING_CANCELLED',
  COVERAGE_INVARIANT = 'COVERAGE_INVARIANT',

  // Locking
  CONCURRENT_MODIFICATION = 'CONCURRENT_MODIFICATION',
}

/**
 * Custom application error class for operational errors
 */
export class AppError extends Error {
  public readonly statusCode: number;
  public readonly isOperational: boolean;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(
    message: string,
    statusCode: number,
    isOperational = true,
    code: ErrorCode = ErrorCode.INTERNAL_ERROR,
    details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    this.code = code;
    this.details = details;

    // Capture stack trace
    Error.captureStackTrace(this, this.constructor);
  }

  static badRequest(message: string, details?: unknown): AppError {
    return new AppError(message, 400, true, ErrorCode.BAD_REQUEST, details);
  }

  static notFound(message = 'Resource not found'): AppError {
    return new AppError(message, 404, true, ErrorCode.NOT_FOUND);
  }

  static conflict(message: string): AppError {
    return new AppError(message, 409, true, ErrorCode.CONFLICT);
  }

  static internal(message = 'Internal server error'): AppError {
    return new AppError(message, 500, false, ErrorCode.INTERNAL_ERROR);
  }
}

export default AppError;
