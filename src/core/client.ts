import type { StandardSchemaV1 } from '@standard-schema/spec';
import { OAuth1Authenticator } from '../auth/oauth1.js';
import type { Authenticator } from '../auth/types.js';
import { RequestBuildError } from '../error/requestBuildError.js';
import { FetchTransport } from '../fetch/transport.js';
import { buildRequest, extractOptions } from '../pipeline/buildRequest.js';
import { inflateResponse } from '../pipeline/inflateResponse.js';
import { normalizePosArgs, type PositionalArg } from '../pipeline/normalizeArgs.js';
import type { ApiArgs, HttpMethod, Transport, WireResponse } from '../types/request.js';
import { mergeHeaderOptions } from '../utils/headers.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { urlFor } from '../utils/url.js';
import { validateSync, validator } from '../utils/validator.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';
import { VERSION } from '../version.js';
import { RequestContext } from './context.js';
import { Credentials } from './credentials.js';
import {
  type AccessToken,
  accessTokenSchema,
  type ClientConfig,
  type ClientConfigInput,
  clientConfigSchema,
  type RequestToken,
  requestTokenSchema,
} from './schemas.js';
import type { ApiResult, Attempt, HookName, LogicalCall, PipelineMiddleware, TokenResult } from './types.js';

const HTTP_METHODS: ReadonlySet<string> = new Set<HttpMethod>(['GET', 'POST', 'PUT', 'DELETE']);

function isHttpMethod(method: string): method is HttpMethod {
  return HTTP_METHODS.has(method);
}

const FORM_ACCEPT = 'application/x-www-form-urlencoded';

/** Configuration for constructing an {@link ApiClient}, extends {@link ClientConfigInput}. */
export interface ApiClientProps extends ClientConfigInput {
  /** Puts requests on the wire. Defaults to a {@link FetchTransport} using `timeout`. */
  transport?: Transport;
  /** Signs requests. Defaults to {@link OAuth1Authenticator}. */
  authenticator?: Authenticator;
  /** Behavior layered on the pipeline, in registration order. */
  middleware?: PipelineMiddleware[];
  /** Defaults to {@link noopLogger}, which discards everything. */
  logger?: Logger;
}

/**
 * OAuth-authenticated REST client.
 *
 * Every call runs the same pipeline: extract options, build the request,
 * sign it, dispatch it and inflate the response, with middleware hooks
 * between the stages. Each call gets its own {@link RequestContext}.
 *
 * All methods return error-first tuples via {@link SafeWrapAsync}. Caller
 * input errors (`MissingArgumentError`, `ConflictingArgumentError`,
 * `MissingPathArgumentError`, `RequestBuildError`, `MissingCredentialError`)
 * are returned before anything is sent; a failed response is an `ApiError`.
 *
 * @example
 * const client = new ApiClient({ consumerKey, consumerSecret, accessToken, accessTokenSecret });
 * const [err, outcome] = await client.get('statuses/home_timeline', { count: 200 });
 */
export class ApiClient {
  /** Validated configuration with defaults applied. */
  #settings: ClientConfig;
  /** Consumer pair and the mutable access token pair. */
  #credentials: Credentials;
  #transport: Transport;
  #authenticator: Authenticator;
  #middleware: readonly PipelineMiddleware[];
  #logger: Logger;
  /** Headers every request starts from. */
  #defaultHeaders: Headers;

  /**
   * Creates a client from its configuration.
   *
   * @throws {ValidationError} When the configuration is invalid.
   */
  constructor({ transport, authenticator, middleware = [], logger, ...config }: ApiClientProps) {
    const [err, settings] = validateSync(config, clientConfigSchema);
    if (err) {
      throw err;
    }

    this.#settings = settings;
    this.#credentials = new Credentials(settings);
    this.#transport = transport ?? new FetchTransport({ timeout: settings.timeout });
    this.#authenticator = authenticator ?? new OAuth1Authenticator();
    this.#middleware = [...middleware];
    this.#logger = logger ?? noopLogger;
    this.#defaultHeaders = mergeHeaderOptions(
      {
        'User-Agent': settings.agent,
        'X-Twitter-Client': settings.agent,
        'X-Twitter-Client-Version': VERSION,
      },
      settings.defaultHeaders,
    );
  }

  /** Configuration with defaults applied. */
  protected get settings(): Readonly<ClientConfig> {
    return this.#settings;
  }

  protected get logger(): Logger {
    return this.#logger;
  }

  get accessToken(): string | undefined {
    return this.#credentials.accessToken;
  }

  /** Undefined whenever there is no access token. */
  get accessTokenSecret(): string | undefined {
    return this.#credentials.accessTokenSecret;
  }

  get hasAccessToken(): boolean {
    return this.#credentials.hasAccessToken;
  }

  get hasAccessTokenSecret(): boolean {
    return this.#credentials.hasAccessTokenSecret;
  }

  /** Replaces the access token pair; a token without a secret drops the old secret. */
  setAccessToken(token: string, secret?: string): void {
    this.#credentials.setAccessToken(token, secret);
  }

  /** Forgets the access token and its secret. */
  clearAccessToken(): void {
    this.#credentials.clearAccessToken();
  }

  /** `statuses/show` => `https://api.x.com/1.1/statuses/show.json`; absolute URLs pass through. */
  apiUrlFor(...parts: string[]): string {
    return urlFor(this.#settings.apiExt, this.#settings.apiUrl, this.#settings.apiVersion, ...parts);
  }

  /** Like {@link apiUrlFor}, on the upload host. */
  uploadUrlFor(...parts: string[]): string {
    return urlFor(this.#settings.apiExt, this.#settings.uploadUrl, this.#settings.apiVersion, ...parts);
  }

  /** `request_token` => `https://api.x.com/oauth/request_token` */
  oauthUrlFor(...parts: string[]): string {
    return urlFor('', this.#settings.apiUrl, 'oauth', ...parts);
  }

  /**
   * Performs a logical call.
   *
   * @param method - HTTP verb, in any case.
   * @param url - Path template such as `statuses/:id/retweets`, or an absolute URL.
   * @param args - API arguments plus `-`-prefixed options.
   * @param extraArgs - Passed through on `context.extraArgs`.
   * @returns A promise resolving to `[error, outcome]`.
   */
  async request(method: string, url: string, args: ApiArgs = {}, ...extraArgs: unknown[]): SafeWrapAsync<Error, ApiResult> {
    const httpMethod = method.toUpperCase();
    if (!isHttpMethod(httpMethod)) {
      return [new RequestBuildError(`error unsupported HTTP method ${method}`), null];
    }

    const call: LogicalCall = { httpMethod, url, logger: this.#logger };
    const attempt = this.#middleware.reduceRight<Attempt>((next, middleware) => {
      const around = middleware.around;
      return around ? () => around.call(middleware, next, call) : next;
    }, () => this.#execute(httpMethod, url, args, extraArgs));

    const [err, outcome] = await safeWrapAsync(attempt);
    if (err) {
      return [new Error(`error in ${httpMethod} request to ${url}`, { cause: err }), null];
    }

    return outcome;
  }

  /** GET request, see {@link request}. */
  get(url: string, args?: ApiArgs, ...extraArgs: unknown[]): SafeWrapAsync<Error, ApiResult> {
    return this.request('GET', url, args, ...extraArgs);
  }

  /** POST request, see {@link request}. */
  post(url: string, args?: ApiArgs, ...extraArgs: unknown[]): SafeWrapAsync<Error, ApiResult> {
    return this.request('POST', url, args, ...extraArgs);
  }

  /** DELETE request, see {@link request}. */
  delete(url: string, args?: ApiArgs, ...extraArgs: unknown[]): SafeWrapAsync<Error, ApiResult> {
    return this.request('DELETE', url, args, ...extraArgs);
  }

  /**
   * Performs a call whose required arguments may be given positionally, in
   * `names` order, or in a trailing argument bag.
   *
   * @example
   * client.requestWithPosArgs([':ID', 'status'], 'post', 'some/endpoint', 'alice', 'down the rabbit hole');
   */
  async requestWithPosArgs(
    names: readonly string[],
    method: string,
    url: string,
    ...values: PositionalArg[]
  ): SafeWrapAsync<Error, ApiResult> {
    const [err, call] = normalizePosArgs(names, method, url, ...values);
    if (err) {
      return [err, null];
    }

    return this.request(call.httpMethod, call.path, call.args, ...call.extraArgs);
  }

  /**
   * Performs a call that needs a `screen_name` or `user_id`, optionally given
   * as a leading positional value.
   *
   * @example
   * client.requestWithId('get', 'statuses/user_timeline', 'semifor', { count: 20 });
   */
  requestWithId(method: string, url: string, ...values: PositionalArg[]): SafeWrapAsync<Error, ApiResult> {
    return this.requestWithPosArgs([':ID'], method, url, ...values);
  }

  /**
   * Finishes a call a deferring transport left open, once its response arrived.
   * A context completes at most once.
   */
  async complete(context: RequestContext, response: WireResponse): SafeWrapAsync<Error, ApiResult> {
    if (context.httpResponse !== undefined) {
      return [new RequestBuildError(`error ${context.httpMethod} context already completed`), null];
    }

    context.httpResponse = response;

    const [errDispatch] = await this.#runHooks('afterDispatch', context);
    if (errDispatch) {
      return [errDispatch, null];
    }

    this.#logger.debug('received response', { method: context.httpMethod, url: context.url, status: response.status });

    const [errInflate] = inflateResponse(context, response);
    if (errInflate) {
      return [errInflate, null];
    }

    const [errHooks] = await this.#runHooks('afterInflate', context);
    if (errHooks) {
      return [errHooks, null];
    }

    return [null, { deferred: false, result: context.result ?? null, context }];
  }

  /**
   * Step 1 of the 3-legged handshake: gets a request token.
   *
   * @param callback - Callback URL, or `oob` for PIN-based authorization.
   * @param extra - Further body arguments, e.g. `x_auth_access_type`.
   */
  oauthRequestToken(
    { callback = 'oob', ...extra }: { callback?: string } & Record<string, string> = {},
  ): SafeWrapAsync<Error, TokenResult<RequestToken>> {
    return this.#tokenCall(
      'request token',
      this.oauthUrlFor('request_token'),
      { '-accept': FORM_ACCEPT, '-oauth_args': { oauth_callback: callback }, ...extra },
      requestTokenSchema,
    );
  }

  /** Step 2: URL to send the user to, signing in with an existing authorization. */
  oauthAuthenticationUrl(args: Record<string, string>): URL {
    return this.#authUrl('authenticate', args);
  }

  /** Step 2: URL to send the user to, always asking for authorization. */
  oauthAuthorizationUrl(args: Record<string, string>): URL {
    return this.#authUrl('authorize', args);
  }

  /**
   * Step 3: trades the authorized request token for an access token.
   * Keys are accepted with or without the `oauth_` prefix.
   *
   * @example
   * client.oauthAccessToken({ token, token_secret, verifier })
   */
  oauthAccessToken(args: Record<string, string>): SafeWrapAsync<Error, TokenResult<AccessToken>> {
    const oauthArgs = Object.fromEntries(
      Object.entries(args).map(([key, value]): [string, string] => [key.startsWith('oauth_') ? key : `oauth_${key}`, value]),
    );

    return this.#tokenCall(
      'access token',
      this.oauthUrlFor('access_token'),
      { '-accept': FORM_ACCEPT, '-oauth_args': oauthArgs },
      accessTokenSchema,
    );
  }

  /** Trades a username and password for an access token (xAuth). */
  xauth(username: string, password: string, extra: ApiArgs = {}): SafeWrapAsync<Error, TokenResult<AccessToken>> {
    return this.#tokenCall(
      'xauth access token',
      this.oauthUrlFor('access_token'),
      {
        '-accept': FORM_ACCEPT,
        '-oauth_args': {},
        x_auth_mode: 'client_auth',
        x_auth_password: password,
        x_auth_username: username,
        ...extra,
      },
      accessTokenSchema,
    );
  }

  /**
   * Aborts in-flight requests through the transport.
   */
  dispose(): void {
    this.#transport.dispose?.();
  }

  /**
   * POSTs to a token endpoint and validates the decoded body.
   */
  protected async tokenRequest<T>(
    what: string,
    url: string,
    args: ApiArgs,
    schema: StandardSchemaV1<unknown, T>,
  ): SafeWrapAsync<Error, TokenResult<T>> {
    return this.#tokenCall(what, url, args, schema);
  }

  async #tokenCall<T>(
    what: string,
    url: string,
    args: ApiArgs,
    schema: StandardSchemaV1<unknown, T>,
  ): SafeWrapAsync<Error, TokenResult<T>> {
    const [err, outcome] = await this.request('POST', url, args);
    if (err) {
      return [new Error(`error requesting ${what}`, { cause: err }), null];
    }

    if (outcome.deferred) {
      return [new Error(`error requesting ${what}, transport deferred the response`), null];
    }

    const [errParse, parsed] = await validator(outcome.result, schema);
    if (errParse) {
      return [new Error(`error parsing ${what} response`, { cause: errParse }), null];
    }

    return [null, { result: parsed, context: outcome.context }];
  }

  #authUrl(endpoint: string, args: Record<string, string>): URL {
    const url = new URL(this.oauthUrlFor(endpoint));
    for (const [key, value] of Object.entries(args)) {
      url.searchParams.set(key, value);
    }

    return url;
  }

  /**
   * One attempt of a logical call, from option extraction to dispatch.
   */
  async #execute(httpMethod: HttpMethod, url: string, bag: ApiArgs, extraArgs: unknown[]): SafeWrapAsync<Error, ApiResult> {
    const [errOptions, extracted] = extractOptions(bag);
    if (errOptions) {
      return [errOptions, null];
    }

    const context = new RequestContext({
      httpMethod,
      url,
      args: extracted.args,
      options: extracted.options,
      extraArgs,
      headers: mergeHeaderOptions(this.#defaultHeaders, {
        Accept: 'application/json',
        'Content-Type': 'application/json;charset=utf8',
      }),
    });

    const [errBefore] = await this.#runHooks('beforeBuild', context);
    if (errBefore) {
      return [errBefore, null];
    }

    const [errBuild] = buildRequest(context, (path) => this.apiUrlFor(path));
    if (errBuild) {
      return [errBuild, null];
    }

    const [errAuth, request] = this.#authenticator.authorize(context, this.#credentials);
    if (errAuth) {
      return [errAuth, null];
    }

    const [errAfter] = await this.#runHooks('afterAuth', context);
    if (errAfter) {
      return [errAfter, null];
    }

    this.#logger.debug('dispatching request', { method: request.method, url: request.url });

    const [errThrown, sent] = await safeWrapAsync(() => this.#transport.send(request));
    if (errThrown) {
      return [new Error(`error dispatching ${httpMethod} request`, { cause: errThrown }), null];
    }

    const [errSend, response] = sent;
    if (errSend) {
      return [new Error(`error dispatching ${httpMethod} request`, { cause: errSend }), null];
    }

    if (response === undefined) {
      return [null, { deferred: true, context }];
    }

    return this.complete(context, response);
  }

  async #runHooks(hook: HookName, context: RequestContext): SafeWrapAsync<Error, RequestContext> {
    for (const middleware of this.#middleware) {
      const fn = middleware[hook];
      if (!fn) {
        continue;
      }

      const [err] = await safeWrapAsync(async () => fn.call(middleware, context));
      if (err) {
        return [new Error(`error in ${middleware.name} ${hook} hook`, { cause: err }), null];
      }
    }

    return [null, context];
  }
}
