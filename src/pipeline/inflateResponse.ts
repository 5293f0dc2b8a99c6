import type { RequestContext } from '../core/context.js';
import { ApiError } from '../error/apiError.js';
import type { ApiData, WireResponse } from '../types/request.js';
import { decodeFormData } from '../utils/encode.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

export const FORM_MEDIA_TYPE = 'application/x-www-form-urlencoded';

/** Media type of a `Content-Type` header, without parameters, lowercased. */
export function mediaType(headers: Headers): string {
  return (headers.get('content-type') ?? '').split(';')[0].trim().toLowerCase();
}

/** `Content-Length` header, or the body's UTF-8 byte length when the header is absent. */
export function contentLength(response: WireResponse): number {
  const header = response.headers.get('content-length');
  const parsed = header === null ? Number.NaN : Number(header);

  return Number.isFinite(parsed) ? parsed : new TextEncoder().encode(response.body).byteLength;
}

/**
 * Decodes the body by, in order: a JSON media type, an empty body, or an
 * `accept` option of form-urlencoded (token endpoints label form data as
 * HTML). Anything else stays undecoded.
 */
function decodeBody(context: RequestContext, response: WireResponse): SafeWrap<Error, ApiData | undefined> {
  if (mediaType(response.headers) === 'application/json') {
    return safeWrap<ApiData | undefined>(() => JSON.parse(response.body) ?? undefined);
  }

  if (contentLength(response) === 0) {
    return [null, ''];
  }

  if (context.options.accept?.split(';')[0].trim().toLowerCase() === FORM_MEDIA_TYPE) {
    return [null, decodeFormData(response.body)];
  }

  return [null, undefined];
}

/**
 * Sets `context.result` from the response and classifies the outcome.
 *
 * A body that fails to decode turns the response into a 500 whose status
 * text is the decode error. Success needs a decoded result and a 2xx
 * status; anything else yields an {@link ApiError} for the context.
 */
export function inflateResponse(context: RequestContext, response: WireResponse): SafeWrap<ApiError, ApiData> {
  const [err, data] = decodeBody(context, response);
  if (err) {
    response.status = 500;
    response.statusText = err.message;
  }

  context.httpResponse = response;
  context.result = data ?? undefined;

  if (context.result !== undefined && response.status >= 200 && response.status < 300) {
    return [null, context.result];
  }

  return [new ApiError(context, response, err ? { cause: err } : undefined), null];
}
