import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Error raised when a logical call cannot be turned into a wire request,
 * e.g. an unsupported argument value or an invalid per-call option.
 */
export class RequestBuildError extends Error {
  /** RequestBuildError error-name */
  static name = 'RequestBuildError';
}

/**
 * Type guard for {@link RequestBuildError}.
 */
export function isRequestBuildError(error: unknown): error is RequestBuildError {
  return isErrorType(RequestBuildError, error);
}

/**
 * Extract a {@link RequestBuildError} from an unknown error value, following nested causes.
 */
export function getRequestBuildError(error: unknown): null | RequestBuildError {
  return unwrapErrorType(RequestBuildError, error);
}
