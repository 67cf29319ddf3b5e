/**
 * Infrastructure Errors
 *
 * Business outcomes travel as Result<T>. These errors are thrown only when the
 * store itself fails; the API layer logs them and answers INTERNAL_ERROR.
 */

/**
 * Postgres unique_violation
 */
export const UNIQUE_VIOLATION = '23505';

/**
 * Error shape returned by PostgREST / Supabase
 */
export interface DatabaseErrorLike {
  message: string;
  code?: string;
}

export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StorageError';
  }
}

export function isUniqueViolation(error: DatabaseErrorLike): boolean {
  return error.code === UNIQUE_VIOLATION;
}

/**
 * Wrap a Supabase error with the failed operation's name
 */
export function storageError(
  operation: string,
  error: DatabaseErrorLike
): StorageError {
  return new StorageError(`Failed to ${operation}: ${error.message}`, {
    cause: error,
  });
}
