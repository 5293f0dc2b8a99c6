import type { RequestContext } from '../core/context.js';
import type { ApiData, JsonValue, WireRequest, WireResponse } from '../types/request.js';
import { isErrorType } from './isErrorType.js';
import { unwrapErrorType } from './unwrapErrorType.js';

/**
 * API error codes that point at authentication or token problems rather than
 * at the requested resource.
 */
export const TOKEN_ERROR_CODES: ReadonlySet<number> = new Set([32, 64, 88, 89, 99, 135, 136, 215, 226, 326]);

type JsonObject = { [key: string]: JsonValue };

function isJsonObject(value: ApiData | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** First entry of an `{ errors: [...] }` envelope, if the body is one. */
function firstError(body: ApiData | undefined): JsonObject | undefined {
  if (!isJsonObject(body) || !Array.isArray(body.errors)) {
    return undefined;
  }

  const [first] = body.errors;
  return isJsonObject(first) ? first : undefined;
}

function stringField(value: JsonValue | undefined, key: string): string | undefined {
  if (!isJsonObject(value)) {
    return undefined;
  }

  const field = value[key];
  return typeof field === 'string' && field.length > 0 ? field : undefined;
}

/**
 * Human-readable error text, tried in order: `errors[0].message`,
 * `error.message`, a string `error`, a top-level `message`.
 */
function mineErrorText(body: ApiData | undefined): string | undefined {
  if (!isJsonObject(body)) {
    return undefined;
  }

  const error = body.error;

  return (
    stringField(firstError(body), 'message') ??
    stringField(error, 'message') ??
    (typeof error === 'string' && error.length > 0 ? error : undefined) ??
    stringField(body, 'message')
  );
}

function mineErrorCode(body: ApiData | undefined): number {
  const code = firstError(body)?.code;
  if (typeof code === 'number' && Number.isInteger(code)) {
    return code;
  }

  if (typeof code === 'string' && /^\d+$/.test(code)) {
    return Number(code);
  }

  return 0;
}

/**
 * Outcome of a call whose response was not a success, or whose body failed
 * to decode. Holds the completed request context.
 *
 * All derived fields are computed once, when the error is created.
 */
export class ApiError extends Error {
  /** ApiError error-name */
  static name = 'ApiError';

  #context: RequestContext;
  #response: WireResponse;
  #errorText: string;
  #errorCode: number;

  /** Creates an ApiError from a context and the response it received */
  constructor(context: RequestContext, response: WireResponse, opts?: ErrorOptions) {
    const statusLine = `${response.status} ${response.statusText}`.trim();
    // a decode failure leaves its message as the status text
    const decodeFailed = opts?.cause !== undefined && response.statusText.length > 0;
    const errorText = mineErrorText(context.result) ?? (decodeFailed ? response.statusText : statusLine);

    super(errorText, opts);
    this.#context = context;
    this.#response = response;
    this.#errorText = errorText;
    this.#errorCode = mineErrorCode(context.result);
  }

  /** Context of the failed call */
  get context(): RequestContext {
    return this.#context;
  }

  /** Request as it was sent */
  get httpRequest(): WireRequest | undefined {
    return this.#context.httpRequest;
  }

  /** Response as it was received, after inflation adjusted its status */
  get httpResponse(): WireResponse {
    return this.#response;
  }

  /** Decoded response body, if it decoded */
  get errorBody(): ApiData | undefined {
    return this.#context.result;
  }

  get statusCode(): number {
    return this.#response.status;
  }

  /** Status code and reason phrase, e.g. `404 Not Found` */
  get statusLine(): string {
    return `${this.#response.status} ${this.#response.statusText}`.trim();
  }

  get errorText(): string {
    return this.#errorText;
  }

  /** Code of the first entry in an `errors` envelope, or 0 */
  get errorCode(): number {
    return this.#errorCode;
  }

  /** Whether the error code denotes an authentication or token problem */
  get isTokenError(): boolean {
    return TOKEN_ERROR_CODES.has(this.#errorCode);
  }

  /** Retrying the same request will not help (status below 500) */
  get isPermanentError(): boolean {
    return this.#response.status < 500;
  }

  /** The failure may clear up on retry (status 500 and up) */
  get isTemporaryError(): boolean {
    return !this.isPermanentError;
  }
}

/**
 * Type guard for {@link ApiError}.
 */
export function isApiError(error: unknown): error is ApiError {
  return isErrorType(ApiError, error);
}

/**
 * Extract an {@link ApiError} from an unknown error value, following nested causes.
 */
export function getApiError(error: unknown): null | ApiError {
  return unwrapErrorType(ApiError, error);
}
