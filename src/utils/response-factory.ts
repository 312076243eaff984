import { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';
import { AppError } from '../types/error.types';

/**
 * `{ data, message? }`. A null `data` is a valid answer (no free resource),
 * so the message is what tells clients why.
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  const response: ApiSuccessResponse<T> = { data };

  if (message) {
    response.message = message;
  }

  return response;
}

export function createErrorResponse(
  code: string,
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  return {
    error: {
      code,
      message,
      ...(details && { details }),
    },
  };
}

export function createAppErrorResponse(error: AppError): ApiErrorResponse {
  return createErrorResponse(error.code, error.message, error.details);
}
