/**
 * Result Pattern
 *
 * Service methods report business outcomes as Result<T> instead of throwing.
 * Storage failures are the exception: adapters throw StorageError and the
 * HTTP layer turns it into an opaque INTERNAL_ERROR.
 */

/**
 * Error codes a service may return
 */
export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'UNAUTHORIZED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'ALREADY_EXISTS'
  | 'ACTIVE_SUBSCRIPTION_EXISTS'
  | 'ALREADY_SUBSCRIBED'
  | 'INTERNAL_ERROR';

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}

export type Result<T> = Success<T> | Failure;

export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

export function failure(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: Failure['error'] = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success;
}

export function isFailure<T>(result: Result<T>): result is Failure {
  return !result.success;
}
