import { RetryExhaustedError, RetrySuppressedError } from '../error/retryError.js';
import { sleep } from './sleep.js';
import type { SafeWrapAsync } from './wrap.js';

/** Options for retry-function */
export interface RetryOptions<R> {
  /** Function to execute; must return a tuple-style result. */
  fn: () => SafeWrapAsync<Error, R>;
  /**
   * Maximum number of retries after the initial attempt (total tries = attempts + 1).
   * Passing 0 means "try once, then stop."
   */
  attempts?: number;
  /**
   * Milliseconds to wait before the next attempt, either fixed or computed
   * from the number of the attempt that just failed (starting at 1).
   */
  timeout?: number | ((attempt: number) => number);
  /**
   * Predicate that decides whether to stop retrying.
   * Return true to stop retrying and surface the error, false to continue.
   */
  errFn?: (e: Error) => boolean;
  /** Called before each wait with the failed attempt, its error and the delay. */
  onRetry?: (attempt: number, err: Error, delay: number) => void;
}

/**
 * Keeps calling a tuple-returning function until it succeeds, the error is
 * suppressed by `errFn`, or the attempts run out.
 *
 * Suppression yields a {@link RetrySuppressedError} and exhaustion a
 * {@link RetryExhaustedError}, each with the last error as `cause`.
 */
export async function retry<R = unknown>({
  fn,
  attempts = 10,
  timeout = 1000,
  errFn,
  onRetry,
}: RetryOptions<R>): SafeWrapAsync<Error, R> {
  for (let attempt = 1; ; attempt += 1) {
    const [err, data] = await fn();
    if (!err) {
      return [null, data];
    }

    if (typeof errFn === 'function' && errFn(err)) {
      return [new RetrySuppressedError('error further retries suppressed', attempt, { cause: err }), null];
    }

    if (attempt > attempts) {
      return [new RetryExhaustedError('error retries exhausted', attempt, { cause: err }), null];
    }

    const delay = typeof timeout === 'function' ? timeout(attempt) : timeout;
    onRetry?.(attempt, err, delay);
    await sleep(delay);
  }
}
