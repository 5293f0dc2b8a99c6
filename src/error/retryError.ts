import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * Shared base for errors that end a retry loop.
 */
abstract class RetryError extends Error {
  /** Internal attempts tried before the loop ended */
  #attempts: number;

  constructor(message: string, attempts: number, opts?: ErrorOptions) {
    super(message, opts);
    this.#attempts = attempts;
  }

  /** Attempts tried before the loop ended */
  get attempts(): number {
    return this.#attempts;
  }
}

/**
 * Error representing a retry loop that ran out of attempts.
 */
export class RetryExhaustedError extends RetryError {
  /** RetryExhaustedError error-name */
  static name = 'RetryExhaustedError';
}

/**
 * Error representing a retry loop that stopped early because the failure was not worth retrying.
 */
export class RetrySuppressedError extends RetryError {
  /** RetrySuppressedError error-name */
  static name = 'RetrySuppressedError';
}

/** Type guard for {@link RetryExhaustedError}. */
export function isRetryExhaustedError(error: unknown): error is RetryExhaustedError {
  return isErrorType(RetryExhaustedError, error);
}

/** Extract a {@link RetryExhaustedError} from an unknown error value, following nested causes. */
export function getRetryExhaustedError(error: unknown): null | RetryExhaustedError {
  return unwrapErrorType(RetryExhaustedError, error);
}

/** Type guard for {@link RetrySuppressedError}. */
export function isRetrySuppressedError(error: unknown): error is RetrySuppressedError {
  return isErrorType(RetrySuppressedError, error);
}

/** Extract a {@link RetrySuppressedError} from an unknown error value, following nested causes. */
export function getRetrySuppressedError(error: unknown): null | RetrySuppressedError {
  return unwrapErrorType(RetrySuppressedError, error);
}
