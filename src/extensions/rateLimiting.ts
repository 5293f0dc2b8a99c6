import type { PipelineMiddleware } from '../core/types.js';
import type { RequestContext } from '../core/context.js';
import { getApiError } from '../error/apiError.js';
import { sleep as defaultSleep } from '../utils/sleep.js';

export interface RateLimitingOptions {
  /** Current time in milliseconds. */
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

interface RateWindow {
  remaining: number;
  /** Epoch seconds */
  reset: number;
}

/**
 * Tracks the rate-limit headers of each endpoint and, before calling an
 * endpoint whose window is used up, waits until the window resets.
 *
 * Endpoints are keyed by method and path template.
 */
export function rateLimiting({ now = Date.now, sleep = defaultSleep }: RateLimitingOptions = {}): PipelineMiddleware {
  const windows = new Map<string, RateWindow>();

  function record(key: string, context: RequestContext | undefined): void {
    const remaining = context?.rateLimitRemaining;
    const reset = context?.rateLimitReset;
    if (remaining !== undefined && reset !== undefined) {
      windows.set(key, { remaining, reset });
    }
  }

  return {
    name: 'rateLimiting',
    async around(attempt, call) {
      const key = `${call.httpMethod} ${call.url}`;
      const window = windows.get(key);
      if (window && window.remaining <= 0) {
        const wait = window.reset * 1000 - now();
        if (wait > 0) {
          call.logger.warn(`rate limit reached for ${key}, waiting`, { wait });
          await sleep(wait);
        }
        windows.delete(key);
      }

      const outcome = await attempt();
      const [err, result] = outcome;
      if (err) {
        record(key, getApiError(err)?.context);
      } else {
        record(key, result.context);
      }

      return outcome;
    },
  };
}
