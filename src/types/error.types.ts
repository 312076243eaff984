/**
 * Error types and codes
 */

export enum ErrorCode {
  // Validation errors (400)
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',

  // Not found errors (404)
  RESOURCE_NOT_FOUND = 'RESOURCE_NOT_FOUND',
  WASH_BAY_NOT_FOUND = 'WASH_BAY_NOT_FOUND',
  MOBILE_TEAM_NOT_FOUND = 'MOBILE_TEAM_NOT_FOUND',

  // Conflict errors (409)
  BAY_NUMBER_EXISTS = 'BAY_NUMBER_EXISTS',
  TEAM_NAME_EXISTS = 'TEAM_NAME_EXISTS',

  // Server errors (5xx)
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export class AppError extends Error {
  constructor(
    public code: ErrorCode | string,
    message: string,
    public statusCode: number = 500,
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Raised by repositories when the backing store cannot be read or written.
 * Callers may retry; nothing below the HTTP layer does.
 */
export function storeUnavailable(operation: string, cause: string): AppError {
  return new AppError(
    ErrorCode.STORE_UNAVAILABLE,
    `Failed to ${operation}: ${cause}`,
    503,
    { retryable: true }
  );
}

export function invalidInput(message: string, details?: Record<string, unknown>): AppError {
  return new AppError(ErrorCode.INVALID_INPUT, message, 400, details);
}
