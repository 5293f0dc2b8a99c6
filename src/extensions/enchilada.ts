import type { PipelineMiddleware } from '../core/types.js';
import { decodeHtmlEntities } from './decodeHtmlEntities.js';
import { normalizeBooleans } from './normalizeBooleans.js';
import { type RetryOnErrorOptions, retryOnError } from './retryOnError.js';

/**
 * The commonly wanted extensions in one list: boolean normalization, retry
 * on temporary errors and HTML entity decoding.
 *
 * @example
 * new ApiClient({ ...credentials, middleware: enchilada({ maxRetries: 3 }) });
 */
export function enchilada(options: RetryOnErrorOptions = {}): PipelineMiddleware[] {
  return [normalizeBooleans(), retryOnError(options), decodeHtmlEntities()];
}
