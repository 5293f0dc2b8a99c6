import { isErrorType } from './isErrorType.js';

/**
 * Error raised when a request is aborted, e.g. because the client was disposed.
 */
export class AbortError extends Error {
  /** AbortError error-name */
  name = 'AbortError';
}

/**
 * Type guard for {@link AbortError}.
 */
export function isAbortError(error: unknown): error is AbortError {
  return isErrorType(AbortError, error);
}
