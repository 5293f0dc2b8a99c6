/**
 * Core entrypoint: the API client, its request context and credentials, and
 * the middleware contract. Import from here if you only need the client
 * without error helpers or extensions.
 * @module
 */

/**
 * Constructor options accepted by {@link ApiClient}.
 */
export type { ApiClientProps } from './client.js';

/**
 * OAuth-authenticated REST client running every call through the request
 * pipeline. All methods return error-first tuples via {@link SafeWrapAsync}.
 */
export { ApiClient } from './client.js';

export { RequestContext, type RequestContextInit } from './context.js';
export { Credentials, type CredentialsInit } from './credentials.js';

/**
 * Configuration, per-call option and token response schemas.
 */
export {
  type AccessToken,
  accessTokenSchema,
  type BearerToken,
  bearerTokenSchema,
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  invalidatedTokenSchema,
  type RequestOptions,
  requestOptionsSchema,
  type RequestToken,
  requestTokenSchema,
} from './schemas.js';

export type { ApiResult, Attempt, HookName, LogicalCall, PipelineHook, PipelineMiddleware, TokenResult } from './types.js';
