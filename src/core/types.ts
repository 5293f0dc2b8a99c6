import type { ApiData, HttpMethod } from '../types/request.js';
import type { Logger } from '../utils/logger.js';
import type { SafeWrapAsync } from '../utils/wrap.js';
import type { RequestContext } from './context.js';

/**
 * Outcome of a logical call. A deferred outcome means the transport took
 * the request without answering; finish it with `ApiClient.complete`.
 */
export type ApiResult =
  | { deferred: false; result: ApiData; context: RequestContext }
  | { deferred: true; context: RequestContext };

/** Token endpoint outcome: the validated token payload and its context. */
export interface TokenResult<T> {
  result: T;
  context: RequestContext;
}

/** Seams at which middleware may inspect or change a context. */
export type HookName = 'beforeBuild' | 'afterAuth' | 'afterDispatch' | 'afterInflate';

/** Hook run at one of the pipeline seams. Throwing stops the call. */
export type PipelineHook = (context: RequestContext) => void | Promise<void>;

/** What an `around` hook knows about the call it wraps. */
export interface LogicalCall {
  httpMethod: HttpMethod;
  url: string;
  logger: Logger;
}

/** One full run of the pipeline, with a fresh context. */
export type Attempt = () => SafeWrapAsync<Error, ApiResult>;

/**
 * Pluggable behavior layered on the pipeline.
 *
 * Seam hooks run in registration order:
 * - `beforeBuild`: options are extracted, nothing is encoded yet.
 * - `afterAuth`: the request is built and signed, not sent.
 * - `afterDispatch`: a response arrived, not decoded yet.
 * - `afterInflate`: the call succeeded and `context.result` is set.
 *
 * `around` wraps each attempt; the first registered middleware is outermost.
 */
export interface PipelineMiddleware extends Partial<Record<HookName, PipelineHook>> {
  /** Name used in errors and logs */
  name: string;
  around?: (attempt: Attempt, call: LogicalCall) => SafeWrapAsync<Error, ApiResult>;
}
