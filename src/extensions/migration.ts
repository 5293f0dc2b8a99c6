import { type ApiClientProps, ApiClient } from '../core/client.js';
import type { AccessToken } from '../core/schemas.js';
import type { TokenResult } from '../core/types.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

export interface MigrationClientProps extends ApiClientProps {
  /** Warn through the logger on every deprecated call. Defaults to true. */
  migrationWarnings?: boolean;
}

/** Arguments for the authorization URL helpers. */
export type AuthUrlArgs = { callback?: string } & Record<string, string>;

interface StoredRequestToken {
  token: string;
  secret: string;
}

/**
 * Client keeping the request token between the handshake steps, for code
 * written against the older stateful handshake API.
 *
 * @example
 * const client = new MigrationClient({ consumerKey, consumerSecret });
 * const [, url] = await client.getAuthorizationUrl({ callback });
 * // ...user authorizes, the callback receives oauth_verifier
 * await client.requestAccessToken(verifier);
 */
export class MigrationClient extends ApiClient {
  #warnings: boolean;
  #requestToken?: StoredRequestToken;

  constructor({ migrationWarnings = true, ...props }: MigrationClientProps) {
    super(props);
    this.#warnings = migrationWarnings;
  }

  get requestToken(): string | undefined {
    return this.#requestToken?.token;
  }

  get requestTokenSecret(): string | undefined {
    return this.#requestToken?.secret;
  }

  /**
   * Gets and stores a request token, then builds the `oauth/authenticate`
   * URL for it.
   *
   * @deprecated Use {@link oauthRequestToken} and {@link oauthAuthenticationUrl}.
   */
  getAuthenticationUrl(args: AuthUrlArgs = {}): SafeWrapAsync<Error, URL> {
    this.#deprecated('getAuthenticationUrl');
    return this.#authUrl('authenticate', args);
  }

  /**
   * Gets and stores a request token, then builds the `oauth/authorize` URL
   * for it.
   *
   * @deprecated Use {@link oauthRequestToken} and {@link oauthAuthorizationUrl}.
   */
  getAuthorizationUrl(args: AuthUrlArgs = {}): SafeWrapAsync<Error, URL> {
    this.#deprecated('getAuthorizationUrl');
    return this.#authUrl('authorize', args);
  }

  /**
   * Trades the stored request token and the verifier for an access token,
   * which becomes the client's access token.
   *
   * @deprecated Use {@link oauthAccessToken} and {@link setAccessToken}.
   */
  async requestAccessToken(verifier: string): SafeWrapAsync<Error, TokenResult<AccessToken>> {
    this.#deprecated('requestAccessToken');

    const stored = this.#requestToken;
    if (!stored) {
      return [new Error('error no request token stored, get an authorization URL first'), null];
    }

    const [err, token] = await this.oauthAccessToken({ token: stored.token, token_secret: stored.secret, verifier });
    if (err) {
      return [err, null];
    }

    this.setAccessToken(token.result.oauth_token, token.result.oauth_token_secret);
    this.#requestToken = undefined;
    return [null, token];
  }

  async #authUrl(endpoint: 'authenticate' | 'authorize', { callback = 'oob', ...args }: AuthUrlArgs): SafeWrapAsync<Error, URL> {
    const [err, token] = await this.oauthRequestToken({ callback });
    if (err) {
      return [err, null];
    }

    const { oauth_token, oauth_token_secret } = token.result;
    this.#requestToken = { token: oauth_token, secret: oauth_token_secret };

    const urlArgs = { oauth_token, ...args };
    const url = endpoint === 'authenticate' ? this.oauthAuthenticationUrl(urlArgs) : this.oauthAuthorizationUrl(urlArgs);
    return [null, url];
  }

  #deprecated(method: string): void {
    if (this.#warnings) {
      this.logger.warn(`${method} will be removed in a future release`, { method });
    }
  }
}
