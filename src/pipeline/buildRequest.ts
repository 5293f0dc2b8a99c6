import type { RequestContext } from '../core/context.js';
import { type RequestOptions, requestOptionsSchema } from '../core/schemas.js';
import { MissingPathArgumentError } from '../error/missingPathArgumentError.js';
import { RequestBuildError } from '../error/requestBuildError.js';
import type { ApiArgs, Args, ArgValue, FilePart, HttpMethod, Scalar, WireRequest } from '../types/request.js';
import { encodeArgsString, isScalar, isScalarList, joinList, percentEncode } from '../utils/encode.js';
import { FileUpload, isFilePart } from '../utils/fileUpload.js';
import { validateSync } from '../utils/validator.js';
import { type SafeWrap, safeWrap } from '../utils/wrap.js';

/** Leading character marking an argument key as a pipeline option. */
export const OPTION_SIGIL = '-';

export const FORM_CONTENT_TYPE = 'application/x-www-form-urlencoded;charset=utf-8';
export const MULTIPART_CONTENT_TYPE = 'multipart/form-data;charset=utf-8';

/** `:name` placeholders; names start with a letter or underscore so ports never match. */
const PATH_TOKEN = /:([A-Za-z_]\w*)/g;

/** Turns a path template or URL into the absolute URL to request. */
export type UrlResolver = (path: string) => string;

type RequestMaker = (context: RequestContext) => SafeWrap<Error, WireRequest>;

function isArgValue(value: unknown): value is ArgValue {
  return (
    isScalar(value) ||
    isFilePart(value) ||
    (Array.isArray(value) && value.every((item) => isScalar(item) || isFilePart(item)))
  );
}

/**
 * Splits a caller's argument bag into API arguments and `-`-prefixed options.
 *
 * `undefined` and `null` arguments are dropped. Options are validated against
 * {@link requestOptionsSchema}.
 */
export function extractOptions(bag: ApiArgs): SafeWrap<Error, { args: Args; options: RequestOptions }> {
  const args: Args = {};
  const rawOptions: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(bag)) {
    if (value === undefined || value === null) {
      continue;
    }

    if (key.startsWith(OPTION_SIGIL)) {
      rawOptions[key.slice(OPTION_SIGIL.length)] = value;
      continue;
    }

    if (!isArgValue(value)) {
      return [new RequestBuildError(`error unsupported value for argument '${key}'`), null];
    }

    args[key] = value;
  }

  const [err, options] = validateSync(rawOptions, requestOptionsSchema);
  if (err) {
    return [new RequestBuildError('error invalid request options', { cause: err }), null];
  }

  return [null, { args, options }];
}

/** GET arguments cannot carry files, so lists are sent comma separated. */
function flattenGetArgs(args: Args): SafeWrap<Error, Args> {
  for (const [key, value] of Object.entries(args)) {
    if (isScalarList(value)) {
      args[key] = joinList(value);
    } else if (!isScalar(value)) {
      return [new RequestBuildError(`error file argument '${key}' cannot be sent with GET`), null];
    }
  }

  return [null, args];
}

/**
 * Replaces each `:name` placeholder with the percent-encoded argument of that
 * name, removing the argument so it is not sent again in the query or body.
 */
export function expandPath(template: string, args: Args): SafeWrap<Error, string> {
  let url = '';
  let last = 0;

  for (const match of template.matchAll(PATH_TOKEN)) {
    const [token, name] = match;
    const index = match.index ?? 0;

    if (!Object.hasOwn(args, name)) {
      return [new MissingPathArgumentError(`error missing path argument '${name}'`, name, template), null];
    }

    const value = args[name];
    if (!isScalar(value)) {
      return [new RequestBuildError(`error path argument '${name}' must be a string or number`), null];
    }

    const [encodeErr, encoded] = safeWrap(() => percentEncode(value));
    if (encodeErr) {
      return [new RequestBuildError(`error encoding path argument '${name}'`, { cause: encodeErr }), null];
    }

    delete args[name];
    url += template.slice(last, index) + encoded;
    last = index + token.length;
  }

  return [null, url + template.slice(last)];
}

function scalarArgs(args: Args, method: HttpMethod): SafeWrap<Error, Record<string, Scalar>> {
  const scalars: Record<string, Scalar> = {};
  for (const [key, value] of Object.entries(args)) {
    if (!isScalar(value)) {
      return [new RequestBuildError(`error argument '${key}' cannot be form encoded for ${method}`), null];
    }

    scalars[key] = value;
  }

  return [null, scalars];
}

/** Lone surrogates make the encoder throw. */
function encodeArgs(scalars: Record<string, Scalar>): SafeWrap<Error, string> {
  const [err, encoded] = safeWrap(() => encodeArgsString(scalars));
  if (err) {
    return [new RequestBuildError('error encoding arguments', { cause: err }), null];
  }

  return [null, encoded];
}

function partsOf(value: ArgValue): ReadonlyArray<Scalar | FilePart> {
  return isScalar(value) || isFilePart(value) ? [value] : value;
}

function appendPart(form: FormData, key: string, value: Scalar | FilePart): void {
  if (value instanceof FileUpload) {
    form.append(key, value.blob, value.filename);
  } else if (value instanceof Blob) {
    form.append(key, value);
  } else {
    form.append(key, String(value));
  }
}

/** GET and DELETE: arguments go in the query string. */
const makeSimpleRequest: RequestMaker = (context) => {
  const [err, scalars] = scalarArgs(context.args, context.httpMethod);
  if (err) {
    return [err, null];
  }

  const [encodeErr, query] = encodeArgs(scalars);
  if (encodeErr) {
    return [encodeErr, null];
  }

  const url = query ? `${context.url}${context.url.includes('?') ? '&' : '?'}${query}` : context.url;

  return [null, { method: context.httpMethod, url, headers: new Headers(context.headers) }];
};

/** POST and PUT: multipart, JSON or form-encoded body. */
const makeBodyRequest: RequestMaker = (context) => {
  const { args, headers, options } = context;

  if (options.multipart_form_data) {
    const form = new FormData();
    for (const [key, value] of Object.entries(args)) {
      for (const part of partsOf(value)) {
        appendPart(form, key, part);
      }
    }

    headers.set('content-type', MULTIPART_CONTENT_TYPE);
    return [null, { method: context.httpMethod, url: context.url, headers: new Headers(headers), body: form }];
  }

  if (options.to_json !== undefined) {
    const [err, body] = safeWrap(() => JSON.stringify(options.to_json));
    if (err || typeof body !== 'string') {
      return [new RequestBuildError('error encoding JSON body', { cause: err }), null];
    }

    return [null, { method: context.httpMethod, url: context.url, headers: new Headers(headers), body }];
  }

  const [err, scalars] = scalarArgs(args, context.httpMethod);
  if (err) {
    return [err, null];
  }

  const [encodeErr, body] = encodeArgs(scalars);
  if (encodeErr) {
    return [encodeErr, null];
  }

  headers.set('content-type', FORM_CONTENT_TYPE);
  return [null, { method: context.httpMethod, url: context.url, headers: new Headers(headers), body }];
};

const requestMakers: Record<HttpMethod, RequestMaker> = {
  GET: makeSimpleRequest,
  DELETE: makeSimpleRequest,
  POST: makeBodyRequest,
  PUT: makeBodyRequest,
};

/**
 * Turns a context with extracted options into the unsigned wire request.
 *
 * Steps, in order: list flattening for GET, multipart inference for
 * POST/PUT, path expansion, URL resolution, `accept` override, then the
 * method's request maker. Sets `context.url` and `context.httpRequest`.
 */
export function buildRequest(context: RequestContext, resolveUrl: UrlResolver): SafeWrap<Error, WireRequest> {
  const { httpMethod, options } = context;

  if (httpMethod === 'GET') {
    const [err] = flattenGetArgs(context.args);
    if (err) {
      return [err, null];
    }
  }

  const hasBody = httpMethod === 'POST' || httpMethod === 'PUT';
  if (hasBody && options.multipart_form_data === undefined && Object.values(context.args).some((v) => !isScalar(v))) {
    options.multipart_form_data = true;
  }

  const [errPath, path] = expandPath(context.url, context.args);
  if (errPath) {
    return [errPath, null];
  }

  context.url = resolveUrl(path);

  if (options.accept) {
    context.headers.set('accept', options.accept);
  }

  const [err, request] = requestMakers[httpMethod](context);
  if (err) {
    return [err, null];
  }

  context.httpRequest = request;
  return [null, request];
}
