/** Consumer credentials plus an optional access token pair. */
export interface CredentialsInit {
  consumerKey: string;
  consumerSecret: string;
  accessToken?: string;
  accessTokenSecret?: string;
}

/**
 * Credentials shared by every call a client makes.
 *
 * The consumer pair is fixed for the client's lifetime. The access token pair
 * changes as a unit: setting a token without a secret drops the old secret,
 * and a secret is never visible without its token.
 */
export class Credentials {
  readonly consumerKey: string;
  readonly consumerSecret: string;
  #accessToken?: string;
  #accessTokenSecret?: string;

  constructor({ consumerKey, consumerSecret, accessToken, accessTokenSecret }: CredentialsInit) {
    this.consumerKey = consumerKey;
    this.consumerSecret = consumerSecret;
    if (accessToken) {
      this.setAccessToken(accessToken, accessTokenSecret);
    }
  }

  get accessToken(): string | undefined {
    return this.#accessToken;
  }

  get accessTokenSecret(): string | undefined {
    return this.#accessToken ? this.#accessTokenSecret : undefined;
  }

  get hasAccessToken(): boolean {
    return Boolean(this.#accessToken);
  }

  get hasAccessTokenSecret(): boolean {
    return Boolean(this.accessTokenSecret);
  }

  setAccessToken(token: string, secret?: string): void {
    this.#accessToken = token || undefined;
    this.#accessTokenSecret = this.#accessToken && secret ? secret : undefined;
  }

  /** Forgets the access token and its secret. */
  clearAccessToken(): void {
    this.#accessToken = undefined;
    this.#accessTokenSecret = undefined;
  }
}
