import type { PipelineMiddleware } from '../core/types.js';
import { getApiError } from '../error/apiError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import { retry } from '../utils/retry.js';

export interface RetryOnErrorOptions {
  /** Retries after the first attempt; 0 disables retrying. */
  maxRetries?: number;
  /** Wait before the first retry, in milliseconds. */
  initialDelay?: number;
  /** Upper bound for any single wait, in milliseconds. */
  maxDelay?: number;
  /** Growth factor applied to the wait after each retry. */
  multiplier?: number;
}

/** Delay before retry number `attempt` (from 1), capped at `maxDelay`. */
export function backoffDelay(attempt: number, { initialDelay = 250, maxDelay = 4000, multiplier = 2 }: RetryOnErrorOptions = {}): number {
  return Math.min(initialDelay * multiplier ** (attempt - 1), maxDelay);
}

/** Temporary API errors and transport timeouts may clear up on their own. */
function isRetryable(err: Error): boolean {
  return getApiError(err)?.isTemporaryError === true || isTimeoutError(err);
}

/**
 * Retries calls failing with a temporary `ApiError` (status 500 and up) or a
 * timeout, with exponential backoff. Each attempt runs the whole pipeline
 * with a fresh context.
 *
 * Any other failure ends the loop with a `RetrySuppressedError`, running out
 * of retries with a `RetryExhaustedError`; both carry the last error as
 * `cause`, so `getApiError` still reaches it.
 */
export function retryOnError(options: RetryOnErrorOptions = {}): PipelineMiddleware {
  const { maxRetries = 5 } = options;

  return {
    name: 'retryOnError',
    around(attempt, call) {
      return retry({
        fn: attempt,
        attempts: maxRetries,
        timeout: (n) => backoffDelay(n, options),
        errFn: (err) => !isRetryable(err),
        onRetry: (n, err, delay) => {
          call.logger.warn(`retrying ${call.httpMethod} ${call.url}`, { attempt: n, delay, error: err.message });
        },
      });
    },
  };
}
