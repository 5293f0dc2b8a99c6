import type { FileUpload } from '../utils/fileUpload.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

/** HTTP verbs the request pipeline knows how to build. */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/** Header options accepted for default headers; a `null` value removes a header. */
export type HeaderOptions = Headers | Array<[string, string]> | Record<string, string | null>;

/** Plain value that encodes to a single string on the wire. */
export type Scalar = string | number | boolean;

/** Binary part of a multipart upload. */
export type FilePart = Blob | FileUpload;

/** Value an API argument may take once options are extracted. */
export type ArgValue = Scalar | FilePart | ReadonlyArray<Scalar | FilePart>;

/** Canonical named-argument bag consumed by the request builder. */
export type Args = Record<string, ArgValue>;

/** Any value JSON can represent. */
export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

/**
 * Argument bag as passed by callers: API arguments plus `-`-prefixed options
 * such as `-accept`, `-token` or `-to_json`. `undefined` values are dropped.
 */
export type ApiArgs = { readonly [key: string]: ArgValue | JsonValue | undefined };

/** Decoded response body. */
export type ApiData = JsonValue;

/** Fully built request handed to a {@link Transport}. */
export interface WireRequest {
  /** HTTP verb */
  method: HttpMethod;
  /** Absolute URL including any query string */
  url: string;
  /** Outgoing headers, including authorization once signed */
  headers: Headers;
  /** Encoded body for POST/PUT */
  body?: string | FormData;
}

/**
 * Raw response captured from a {@link Transport}. Mutable: the inflater
 * rewrites `status` and `statusText` when the body fails to decode.
 */
export interface WireResponse {
  /** HTTP status code */
  status: number;
  /** HTTP reason phrase */
  statusText: string;
  /** Response headers */
  headers: Headers;
  /** Undecoded body text */
  body: string;
}

/**
 * Contract for the component that puts requests on the wire.
 *
 * Resolving to `undefined` means the transport deferred execution; the
 * client then hands back the request context and the caller completes it
 * with `ApiClient.complete` once a response arrives.
 */
export interface Transport {
  /** Sends a request, resolving to the raw response or `undefined` when deferred. */
  send(request: WireRequest): SafeWrapAsync<Error, WireResponse | undefined>;
  /** Optional lifecycle hook to abort in-flight requests and release resources. */
  dispose?(): void;
}
