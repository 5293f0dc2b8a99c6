/**
 * Root entrypoint: re-exports the client, the request pipeline, the
 * authenticators, the transport, the extensions and the error utilities.
 * Use this import if you want everything from a single module surface.
 * @module
 */

export { OAuth1Authenticator } from './auth/oauth1.js';
export { BearerAuthenticator } from './auth/bearer.js';
export type { Authenticator } from './auth/types.js';

export * from './core/index.js';
export * from './error/index.js';
export * from './extensions/index.js';

/**
 * Default transport, built on the global `fetch`.
 */
export { FetchTransport, type FetchTransportOptions } from './fetch/transport.js';

/**
 * Pipeline stages, for transports and middleware that drive them directly.
 */
export { buildRequest, expandPath, extractOptions, type UrlResolver } from './pipeline/buildRequest.js';
export { inflateResponse } from './pipeline/inflateResponse.js';
export {
  flattenListArgs,
  ID_SENTINEL,
  type NormalizedCall,
  normalizePosArgs,
  type PositionalArg,
} from './pipeline/normalizeArgs.js';

export type {
  ApiArgs,
  ApiData,
  Args,
  ArgValue,
  FilePart,
  HeaderOptions,
  HttpMethod,
  JsonValue,
  Scalar,
  Transport,
  WireRequest,
  WireResponse,
} from './types/request.js';

export { FileUpload } from './utils/fileUpload.js';
export { ConsoleLogger, type Logger, type LoggerMeta, noopLogger } from './utils/logger.js';
export { percentEncode } from './utils/encode.js';
export type { SafeWrap, SafeWrapAsync } from './utils/wrap.js';
export { VERSION } from './version.js';
