/**
* Unified Error Handling Package
*
* Standard error classes, error codes and the canonical error body returned
* by every route:
* {
*   error: string;       // Human-readable error message
*   code: string;        // Machine-readable error code
*   details?: unknown;   // Additional error details (validation issues, etc.)
*   requestId?: string;  // Request ID for tracing
* }
*/

// ============================================================================
// Error Code Constants
// ============================================================================

export const ErrorCodes = {
  // Validation Errors
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  INVALID_INPUT: 'INVALID_INPUT',
  UNSUPPORTED_MEDIA_TYPE: 'UNSUPPORTED_MEDIA_TYPE',
  PAYLOAD_TOO_LARGE: 'PAYLOAD_TOO_LARGE',

  // Resource Errors
  NOT_FOUND: 'NOT_FOUND',

  // Method Errors
  METHOD_NOT_ALLOWED: 'METHOD_NOT_ALLOWED',

  // Service Errors
  INTERNAL_ERROR: 'INTERNAL_ERROR',

  // Export Errors
  EXPORT_INIT_FAILED: 'EXPORT_INIT_FAILED',
  EXPORT_WRITE_FAILED: 'EXPORT_WRITE_FAILED',
} as const;

export type ErrorCode = typeof ErrorCodes[keyof typeof ErrorCodes];

// ============================================================================
// Error Response Interface
// ============================================================================

/**
 * Standardized error response shape returned by all API endpoints.
 */
export interface ErrorResponse {
  /** Human-readable error message */
  error: string;
  /** Machine-readable error code from ErrorCodes */
  code: string;
  /** Additional error details (validation issues, etc.) - hidden in production */
  details?: unknown;
  /** Request ID for distributed tracing */
  requestId?: string;
}

// ============================================================================
// Base Application Error Class
// ============================================================================

export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: unknown;
  public readonly requestId: string | undefined;
  public readonly statusCode: number;

  constructor(
    message: string,
    code: ErrorCode = ErrorCodes.INTERNAL_ERROR,
    statusCode: number = 500,
    details?: unknown,
    requestId: string | undefined = undefined,
    options?: { cause?: Error }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.requestId = requestId;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): ErrorResponse {
    return {
      error: this.message,
      code: this.code,
      ...(this.details !== undefined && { details: this.details }),
      ...(this.requestId !== undefined && { requestId: this.requestId }),
    };
  }

  /**
  * Get sanitized version for client exposure.
  * details are only included in development.
  */
  toClientJSON(): ErrorResponse {
    const isDevelopment = process.env['NODE_ENV'] === 'development';

    return {
      error: this.message,
      code: this.code,
      ...(isDevelopment && this.details !== undefined && { details: this.details }),
      ...(this.requestId !== undefined && { requestId: this.requestId }),
    };
  }
}

// ============================================================================
// Specific Error Classes
// ============================================================================

/**
* The export container could not be created or opened for writing.
* This is the only failure that aborts an export before any entry is written.
*/
export class ExportInitError extends AppError {
  constructor(
    message: string = 'Unable to create export zip.',
    details?: unknown,
    cause?: Error
  ) {
    super(message, ErrorCodes.EXPORT_INIT_FAILED, 500, details, undefined, cause ? { cause } : undefined);
  }
}

/**
* The export container was opened but could not be sealed.
*/
export class ExportWriteError extends AppError {
  constructor(
    message: string = 'Unable to finalize export zip.',
    details?: unknown,
    cause?: Error
  ) {
    super(message, ErrorCodes.EXPORT_WRITE_FAILED, 500, details, undefined, cause ? { cause } : undefined);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
* Zod issue shape, kept structural so callers need not import zod
*/
export interface ZodIssue {
  path: PropertyKey[];
  message: string;
  code: string;
}

/**
* Extract issues from a zod error (or anything carrying an issues array)
*/
export function extractZodIssues(error: unknown): ZodIssue[] {
  if (!error || typeof error !== 'object' || !('issues' in error) || !Array.isArray(error.issues)) {
    return [];
  }

  const issues: unknown[] = error.issues;
  return issues.flatMap((issue): ZodIssue[] => {
    if (!issue || typeof issue !== 'object') return [];
    const path = 'path' in issue && Array.isArray(issue.path) ? issue.path : [];
    const message = 'message' in issue && typeof issue.message === 'string' ? issue.message : 'Invalid value';
    const code = 'code' in issue && typeof issue.code === 'string' ? issue.code : 'invalid_type';
    return [{ path, message, code }];
  });
}

/**
* Format zod validation error for consistent response
*/
export function formatZodError(error: unknown): { message: string; issues: ZodIssue[] } {
  const issues = extractZodIssues(error);

  return {
    message: issues.length > 0
      ? `Validation failed: ${issues.map(i => i.message).join(', ')}`
      : 'Validation failed',
    issues,
  };
}
