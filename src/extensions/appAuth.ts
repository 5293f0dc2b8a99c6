import { BearerAuthenticator } from '../auth/bearer.js';
import { type ApiClientProps, ApiClient } from '../core/client.js';
import { bearerTokenSchema, invalidatedTokenSchema } from '../core/schemas.js';
import type { TokenResult } from '../core/types.js';
import { urlFor } from '../utils/url.js';
import { type SafeWrap, type SafeWrapAsync, safeWrap } from '../utils/wrap.js';

/** The token endpoints return the token URL-encoded. */
function decodeToken(token: string): SafeWrap<Error, string> {
  const [err, decoded] = safeWrap(() => decodeURIComponent(token));
  if (err) {
    return [new Error('error decoding bearer token', { cause: err }), null];
  }

  return [null, decoded];
}

/**
 * Client for app-only (OAuth 2) authentication: calls carry a bearer token
 * instead of an OAuth 1.0a signature.
 *
 * @example
 * const client = new AppAuthClient({ consumerKey, consumerSecret });
 * const [err, token] = await client.oauth2Token();
 * if (!err) client.setAccessToken(token.result);
 */
export class AppAuthClient extends ApiClient {
  constructor(props: ApiClientProps) {
    super({ ...props, authenticator: props.authenticator ?? new BearerAuthenticator() });
  }

  /** `token` => `https://api.x.com/oauth2/token` */
  oauth2UrlFor(...parts: string[]): string {
    return urlFor('', this.settings.apiUrl, 'oauth2', ...parts);
  }

  /**
   * Gets a bearer token with the client-credentials grant. The token is not
   * stored; pass it to {@link setAccessToken} or per call as `-token`.
   */
  async oauth2Token(): SafeWrapAsync<Error, TokenResult<string>> {
    const [err, token] = await this.tokenRequest(
      'bearer token',
      this.oauth2UrlFor('token'),
      { '-add_consumer_auth_header': true, grant_type: 'client_credentials' },
      bearerTokenSchema,
    );
    if (err) {
      return [err, null];
    }

    const [errDecode, decoded] = decodeToken(token.result.access_token);
    if (errDecode) {
      return [errDecode, null];
    }

    return [null, { result: decoded, context: token.context }];
  }

  /**
   * Revokes a bearer token, resolving to the token the API invalidated. A
   * revoked token stored on the client should be cleared with
   * {@link clearAccessToken}.
   */
  async invalidateToken(accessToken: string): SafeWrapAsync<Error, TokenResult<string>> {
    const [err, token] = await this.tokenRequest(
      'token invalidation',
      this.oauth2UrlFor('invalidate_token'),
      { '-add_consumer_auth_header': true, access_token: accessToken },
      invalidatedTokenSchema,
    );
    if (err) {
      return [err, null];
    }

    const [errDecode, decoded] = decodeToken(token.result.access_token);
    if (errDecode) {
      return [errDecode, null];
    }

    return [null, { result: decoded, context: token.context }];
  }
}
