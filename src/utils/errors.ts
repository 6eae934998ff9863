/**
 * Errors surfaced in tool results.
 *
 * Everything a handler throws ends up as an {@link AssessmentError} body:
 * input problems, unknown sessions, writes to a completed session, backup
 * locations outside the backup directory, SQLite failures and failed
 * narrative generation.
 */

import Database from 'better-sqlite3';
import { ZodError } from 'zod';

import { LLMError, LLMErrorCode } from '../engines/llm-client.js';

export const ErrorCode = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_ARGUMENTS: 'INVALID_ARGUMENTS',
  UNKNOWN_TOOL: 'UNKNOWN_TOOL',
  NOT_FOUND: 'NOT_FOUND',
  SESSION_LOCKED: 'SESSION_LOCKED',
  PATH_OUTSIDE_ROOT: 'PATH_OUTSIDE_ROOT',
  STORAGE_ERROR: 'STORAGE_ERROR',
  GENERATION_ERROR: 'GENERATION_ERROR',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCodeType = (typeof ErrorCode)[keyof typeof ErrorCode];

const HTTP_STATUS: Record<ErrorCodeType, number> = {
  VALIDATION_ERROR: 422,
  INVALID_ARGUMENTS: 422,
  UNKNOWN_TOOL: 400,
  NOT_FOUND: 404,
  SESSION_LOCKED: 409,
  PATH_OUTSIDE_ROOT: 403,
  STORAGE_ERROR: 503,
  GENERATION_ERROR: 502,
  INTERNAL_ERROR: 500,
};

/** Generation failures worth another attempt later */
const TRANSIENT_LLM_CODES: ReadonlySet<LLMErrorCode> = new Set([
  LLMErrorCode.RATE_LIMIT,
  LLMErrorCode.TIMEOUT,
  LLMErrorCode.API_ERROR,
]);

export interface AssessmentErrorOptions {
  details?: Record<string, unknown> | undefined;
  isRetryable?: boolean;
  cause?: unknown;
}

export class AssessmentError extends Error {
  public readonly code: ErrorCodeType;
  public readonly httpStatus: number;
  public readonly details: Record<string, unknown> | undefined;
  public readonly isRetryable: boolean;

  constructor(message: string, code: ErrorCodeType, options: AssessmentErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = 'AssessmentError';
    this.code = code;
    this.httpStatus = HTTP_STATUS[code];
    this.details = options.details;
    this.isRetryable = options.isRetryable ?? false;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: true,
      code: this.code,
      message: this.message,
      httpStatus: this.httpStatus,
      isRetryable: this.isRetryable,
      ...(this.details && { details: this.details }),
    };
  }
}

export class NotFoundError extends AssessmentError {
  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      details: { resourceType, resourceId },
    });
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends AssessmentError {
  constructor(message: string, validationErrors?: Array<{ path: string; message: string }>) {
    super(message, ErrorCode.VALIDATION_ERROR, {
      details: validationErrors ? { errors: validationErrors } : undefined,
    });
    this.name = 'ValidationError';
  }

  static fromZodError(error: ZodError): ValidationError {
    const validationErrors = error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
    }));
    return new ValidationError(
      `Validation failed: ${validationErrors.map((e) => e.message).join(', ')}`,
      validationErrors
    );
  }
}

/**
 * A completed session is read-only
 */
export class SessionLockedError extends AssessmentError {
  constructor(sessionId: string) {
    super(`Session is completed and read-only: ${sessionId}`, ErrorCode.SESSION_LOCKED, {
      details: { sessionId },
    });
    this.name = 'SessionLockedError';
  }
}

export class StorageError extends AssessmentError {
  constructor(message: string, details?: Record<string, unknown>, cause?: unknown) {
    super(`Storage error: ${message}`, ErrorCode.STORAGE_ERROR, {
      details,
      isRetryable: true,
      cause,
    });
    this.name = 'StorageError';
  }
}

/**
 * Map anything a handler threw onto an {@link AssessmentError}
 */
export function classifyError(error: unknown): AssessmentError {
  if (error instanceof AssessmentError) {
    return error;
  }

  if (error instanceof ZodError) {
    return ValidationError.fromZodError(error);
  }

  if (error instanceof Database.SqliteError) {
    return new StorageError(error.message, { sqliteCode: error.code }, error);
  }

  if (error instanceof LLMError) {
    return new AssessmentError(`Narrative generation failed: ${error.message}`, ErrorCode.GENERATION_ERROR, {
      details: { reason: error.code },
      isRetryable: TRANSIENT_LLM_CODES.has(error.code),
      cause: error,
    });
  }

  if (error instanceof Error) {
    return new AssessmentError(error.message, ErrorCode.INTERNAL_ERROR, { cause: error });
  }

  return new AssessmentError('An unexpected error occurred', ErrorCode.INTERNAL_ERROR, {
    details: { originalError: String(error) },
  });
}

export function createErrorResponse(error: unknown, requestId?: string): Record<string, unknown> {
  return {
    ...classifyError(error).toJSON(),
    ...(requestId && { requestId }),
  };
}
