import { createHmac } from 'node:crypto';
import OAuth from 'oauth-1.0a';
import type { Credentials } from '../core/credentials.js';
import type { RequestContext } from '../core/context.js';
import { MissingCredentialError } from '../error/missingCredentialError.js';
import { RequestBuildError } from '../error/requestBuildError.js';
import type { WireRequest } from '../types/request.js';
import { decodeFormData } from '../utils/encode.js';
import type { SafeWrap } from '../utils/wrap.js';
import type { Authenticator } from './types.js';

function hmacSha1(baseString: string, key: string): string {
  return createHmac('sha1', key).update(baseString).digest('base64');
}

/** Parameters a form-encoded body contributes to the signature. */
function bodyParams(request: WireRequest): Record<string, string | string[]> {
  const contentType = request.headers.get('content-type') ?? '';
  if (typeof request.body !== 'string' || !contentType.startsWith('application/x-www-form-urlencoded')) {
    return {};
  }

  return decodeFormData(request.body);
}

/**
 * OAuth 1.0a HMAC-SHA1 request signing.
 *
 * Calls carrying an `oauth_args` option are handshake calls: they are signed
 * with the consumer pair plus whatever `oauth_token`/`oauth_token_secret` the
 * handshake supplies, and every other `oauth_*` entry is signed and sent in
 * the header. All other calls need an access token and secret, taken from
 * the `token`/`token_secret` options or else from the client credentials.
 */
export class OAuth1Authenticator implements Authenticator {
  authorize(context: RequestContext, credentials: Credentials): SafeWrap<Error, WireRequest> {
    const request = context.httpRequest;
    if (!request) {
      return [new RequestBuildError('error authorizing a context without a built request'), null];
    }

    const { options } = context;
    const extra: Record<string, string> = {};
    let token: OAuth.Token | undefined;

    if (options.oauth_args) {
      const { oauth_token, oauth_token_secret, ...rest } = options.oauth_args;
      Object.assign(extra, rest);
      if (oauth_token) {
        token = { key: oauth_token, secret: oauth_token_secret ?? '' };
      }
    } else {
      const key = options.token ?? credentials.accessToken;
      if (!key) {
        return [new MissingCredentialError('error request requires an oauth token', 'token'), null];
      }

      const secret = options.token_secret ?? credentials.accessTokenSecret;
      if (!secret) {
        return [new MissingCredentialError('error request requires an oauth token secret', 'token_secret'), null];
      }

      token = { key, secret };
    }

    const oauth = new OAuth({
      consumer: { key: credentials.consumerKey, secret: credentials.consumerSecret },
      signature_method: 'HMAC-SHA1',
      hash_function: hmacSha1,
    });

    const authorization = oauth.authorize(
      { url: request.url, method: request.method, data: { ...bodyParams(request), ...extra } },
      token,
    );

    request.headers.set('authorization', oauth.toHeader({ ...authorization, ...extra }).Authorization);
    return [null, request];
  }
}
