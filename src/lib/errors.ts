/**
 * Application errors
 *
 * Failures outside field validation: an unreadable form file, a payload that
 * is not JSON, a database that rejects the save. Field problems are reported
 * as FormValidation results instead (see form-validation.ts).
 *
 * Each AppError has a short form for the operator (toClientError) and a
 * full form for the structured log (toLogError).
 */

/**
 * Error codes
 */
export const ErrorCode = {
  /** Form payload file is not valid JSON */
  INVALID_FORM: 'INVALID_FORM',
  /** Reading or writing the configuration database failed */
  DATABASE_ERROR: 'DATABASE_ERROR',
  /** Form payload file could not be read */
  FILESYSTEM_ERROR: 'FILESYSTEM_ERROR',
  UNKNOWN_ERROR: 'UNKNOWN_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

/**
 * Operator-facing summary of an AppError
 */
export interface ClientError {
  code: ErrorCodeType;
  message: string;
}

/**
 * Log representation of an AppError
 */
export type LogError = {
  code: ErrorCodeType;
  message: string;
  details?: Record<string, unknown>;
  timestamp: string;
};

/**
 * Error raised by the configuration store and the CLI
 *
 * @example
 * ```typescript
 * throw new AppError(ErrorCode.DATABASE_ERROR, 'database is locked', { table: 'regex_rules' });
 * ```
 */
export class AppError extends Error {
  readonly code: ErrorCodeType;

  /** Log only (file paths, driver error names) */
  readonly details?: Record<string, unknown>;

  readonly timestamp: string;

  constructor(code: ErrorCodeType, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
    this.timestamp = new Date().toISOString();

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, AppError);
    }
  }

  /** Code and message, without details */
  toClientError(): ClientError {
    return { code: this.code, message: this.message };
  }

  toLogError(): LogError {
    return {
      code: this.code,
      message: this.message,
      details: this.details,
      timestamp: this.timestamp,
    };
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Wrap a thrown value into an AppError.
 * An AppError passes through unchanged; anything else takes defaultCode and
 * keeps the original error name in details.
 */
export function wrapError(error: unknown, defaultCode: ErrorCodeType = ErrorCode.UNKNOWN_ERROR): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new AppError(defaultCode, error.message, { originalError: error.name });
  }

  return new AppError(defaultCode, String(error));
}

/**
 * Message of a thrown value
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
