import type { Credentials } from '../core/credentials.js';
import type { RequestContext } from '../core/context.js';
import { RequestBuildError } from '../error/requestBuildError.js';
import type { WireRequest } from '../types/request.js';
import { percentEncode } from '../utils/encode.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { Authenticator } from './types.js';

/**
 * App-only (OAuth 2) authorization.
 *
 * With the `add_consumer_auth_header` option the consumer pair is sent as
 * HTTP Basic credentials, which the token endpoints require. Otherwise the
 * `token` option or the client's access token is sent as a bearer token; a
 * call with neither goes out without an `Authorization` header.
 */
export class BearerAuthenticator implements Authenticator {
  authorize(context: RequestContext, credentials: Credentials): SafeWrap<Error, WireRequest> {
    const request = context.httpRequest;
    if (!request) {
      return [new RequestBuildError('error authorizing a context without a built request'), null];
    }

    if (context.options.add_consumer_auth_header) {
      const basic = Buffer.from(`${credentials.consumerKey}:${credentials.consumerSecret}`).toString('base64');
      request.headers.set('authorization', `Basic ${basic}`);
      return [null, request];
    }

    const token = context.options.token ?? credentials.accessToken;
    if (token) {
      request.headers.set('authorization', `Bearer ${percentEncode(token)}`);
    }

    return [null, request];
  }
}
