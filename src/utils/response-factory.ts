import type { ApiSuccessResponse, ApiErrorResponse } from '../types/api.types';
import { InfrastructureError, type AppError, type ErrorCode } from '../types/error.types';

/**
 * `{ data, message? }` envelope used by every 2xx response
 */
export function createSuccessResponse<T>(data: T, message?: string): ApiSuccessResponse<T> {
  return message ? { data, message } : { data };
}

/**
 * `{ error: { code, message, details? } }` envelope used by every 4xx/5xx response
 */
export function createErrorResponse(
  code: ErrorCode | 'NOT_FOUND',
  message: string,
  details?: Record<string, unknown>
): ApiErrorResponse {
  const error: ApiErrorResponse['error'] = { code, message };
  if (details) {
    error.details = details;
  }
  return { error };
}

export function toErrorResponse(error: AppError): ApiErrorResponse {
  // Lock timeouts and store outages are worth retrying as-is
  const details = error instanceof InfrastructureError ? { ...error.details, retryable: true } : error.details;
  return createErrorResponse(error.code, error.message, details);
}
