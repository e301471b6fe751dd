/**
 * Error Handling Utilities
 *
 * Typed application errors shared by the sync workers, the access policy
 * and the HTTP layer.
 */

/**
 * Base application error class
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly isOperational: boolean;

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true
  ) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.statusCode = statusCode;
    this.isOperational = isOperational;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Database error
 */
export class DatabaseError extends AppError {
  constructor(message: string) {
    super(message, 'DATABASE_ERROR', 500);
  }
}

/**
 * Validation error
 */
export class ValidationError extends AppError {
  public readonly field: string | undefined;

  constructor(message: string, field?: string) {
    super(message, 'VALIDATION_ERROR', 400);
    this.field = field;
  }
}

/**
 * Not found error
 */
export class NotFoundError extends AppError {
  public readonly resource: string;

  constructor(resource: string, identifier?: string) {
    const message = identifier
      ? `${resource} not found: ${identifier}`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', 404);
    this.resource = resource;
  }
}

/**
 * Conflict error (unique key already taken)
 */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 'CONFLICT', 409);
  }
}

/**
 * A read against a chain node failed or returned something unusable
 */
export class ChainQueryError extends AppError {
  constructor(message: string, public readonly chain?: string) {
    super(message, 'CHAIN_QUERY_ERROR', 502);
  }
}

/**
 * The chat platform rejected or never received a permission change
 */
export class NotifierError extends AppError {
  constructor(message: string) {
    super(message, 'NOTIFIER_ERROR', 502);
  }
}

/**
 * Invalid or missing startup configuration
 */
export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR', 500, false);
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format error for API response (no internal details)
 */
export function formatApiError(error: unknown): {
  status: number;
  body: { success: false; error: string; code: string };
} {
  if (error instanceof AppError && error.isOperational) {
    return {
      status: error.statusCode,
      body: {
        success: false,
        error: error.message,
        code: error.code,
      },
    };
  }

  // Don't expose internal error details
  return {
    status: 500,
    body: {
      success: false,
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
    },
  };
}
