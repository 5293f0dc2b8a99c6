import type { ApiData, Args, HttpMethod, WireRequest, WireResponse } from '../types/request.js';
import type { RequestOptions } from './schemas.js';

/** Values needed to open a {@link RequestContext}. */
export interface RequestContextInit {
  httpMethod: HttpMethod;
  url: string;
  args: Args;
  options?: RequestOptions;
  headers?: Headers;
  extraArgs?: unknown[];
}

/**
 * Mutable record of a single logical call as it moves through the pipeline.
 *
 * Each call (and each retried attempt) owns its own context. Stages fill it
 * in order: `url` goes from path template to absolute URL, `args` loses the
 * entries consumed by the path, `httpRequest` is set by the builder,
 * `httpResponse` by dispatch and `result` by inflation.
 */
export class RequestContext {
  readonly httpMethod: HttpMethod;
  url: string;
  args: Args;
  /** Options taken from `-`-prefixed argument keys; never sent on the wire. */
  readonly options: RequestOptions;
  readonly headers: Headers;
  /** Positional values left over after argument normalization. */
  readonly extraArgs: unknown[];
  httpRequest?: WireRequest;
  httpResponse?: WireResponse;
  result?: ApiData;

  constructor({ httpMethod, url, args, options = {}, headers = new Headers(), extraArgs = [] }: RequestContextInit) {
    this.httpMethod = httpMethod;
    this.url = url;
    this.args = args;
    this.options = options;
    this.headers = headers;
    this.extraArgs = extraArgs;
  }

  /** Requests allowed in the current rate-limit window, from `x-rate-limit-limit`. */
  get rateLimit(): number | undefined {
    return this.#rateHeader('x-rate-limit-limit');
  }

  /** Requests left in the current window, from `x-rate-limit-remaining`. */
  get rateLimitRemaining(): number | undefined {
    return this.#rateHeader('x-rate-limit-remaining');
  }

  /** Epoch seconds at which the window resets, from `x-rate-limit-reset`. */
  get rateLimitReset(): number | undefined {
    return this.#rateHeader('x-rate-limit-reset');
  }

  #rateHeader(name: string): number | undefined {
    const value = this.httpResponse?.headers.get(name);
    if (value == null || value.trim() === '') {
      return undefined;
    }

    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
}
