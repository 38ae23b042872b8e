import { BaseError } from './errors.js';

/**
 * Outcome of one request crossing a component boundary.
 * `data` is present on success, `error` (and usually `errorCode`) on failure.
 */
export type StandardResponse<T = unknown> =
  | { success: true; data: T }
  | { success: false; error: string; errorCode?: string; errorDetails?: Record<string, unknown> };

export type FailureResponse = Extract<StandardResponse<never>, { success: false }>;

export function createSuccess<T>(data: T): StandardResponse<T> {
  return { success: true, data };
}

/**
 * Create an error response, optionally with a structured error code and details.
 */
export function createError(
  error: string,
  errorCode?: string,
  errorDetails?: Record<string, unknown>,
): FailureResponse {
  const response: FailureResponse = { success: false, error };
  if (errorCode !== undefined) response.errorCode = errorCode;
  if (errorDetails !== undefined) response.errorDetails = errorDetails;
  return response;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Create an error response from a caught exception.
 * BaseError subclasses keep their code and (object) details.
 */
export function createErrorFromException(error: unknown): FailureResponse {
  if (error instanceof BaseError) {
    return createError(error.message, error.code, isRecord(error.details) ? error.details : undefined);
  }
  if (error instanceof Error) {
    return createError(error.message, 'INTERNAL_ERROR');
  }
  if (typeof error === 'string') {
    return createError(error, 'UNKNOWN_ERROR');
  }
  return createError(String(error) || 'Unknown error occurred', 'UNKNOWN_ERROR');
}
