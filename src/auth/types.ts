import type { Credentials } from '../core/credentials.js';
import type { RequestContext } from '../core/context.js';
import type { WireRequest } from '../types/request.js';
import type { SafeWrap } from '../utils/wrap.js';

/**
 * Attaches credentials to the request built for a context.
 *
 * Implementations set the `Authorization` header of `context.httpRequest`
 * in place and return the same request.
 */
export interface Authenticator {
  authorize(context: RequestContext, credentials: Credentials): SafeWrap<Error, WireRequest>;
}
