import { AbortError } from '../error/abortError.js';
import type { Transport, WireRequest, WireResponse } from '../types/request.js';
import { createTimeoutSignal, mergeSignals } from '../utils/signals.js';
import { type SafeWrapAsync, safeWrapAsync } from '../utils/wrap.js';

/** Options to configure the {@link FetchTransport}. */
export interface FetchTransportOptions {
  /**
   * Request timeout in milliseconds; `false` or `0` disables it.
   * @default 10000
   */
  timeout?: number | false;
}

/**
 * {@link Transport} on top of the global `fetch`.
 *
 * - Aborts requests that outlive the timeout with a `TimeoutError`.
 * - `dispose()` aborts in-flight requests with an `AbortError` and refuses new ones.
 * - Non-2xx responses are not errors here; classifying them is up to inflation.
 */
export class FetchTransport implements Transport {
  #timeout: number | false;
  #controller = new AbortController();

  /** Creates a new fetch transport */
  constructor(opts: FetchTransportOptions = {}) {
    this.#timeout = opts.timeout ?? 10_000;
  }

  /**
   * Sends the request and reads the whole body as text.
   *
   * @returns A promise resolving to `[error, response]`.
   */
  async send(request: WireRequest): SafeWrapAsync<Error, WireResponse> {
    if (this.#controller.signal.aborted) {
      return [new Error(`error ${request.method} request on disposed transport`, { cause: this.#controller.signal.reason }), null];
    }

    const headers = new Headers(request.headers);
    if (request.body instanceof FormData) {
      // fetch writes its own multipart content-type with the boundary
      headers.delete('content-type');
    }

    // aborted once the call settles so the timer and the listeners on the transport signal go away
    const settled = new AbortController();
    const signal = mergeSignals([this.#controller.signal, createTimeoutSignal(this.#timeout, settled.signal), settled.signal]);

    try {
      const [err, res] = await safeWrapAsync(() =>
        fetch(request.url, {
          method: request.method,
          headers,
          body: request.body,
          ...(signal && { signal }),
        }),
      );

      if (err) {
        const cause: unknown = signal?.aborted ? signal.reason : err;
        return [new Error(`error sending ${request.method} request in fetchTransport`, { cause }), null];
      }

      const [errBody, body] = await safeWrapAsync(() => res.text());
      if (errBody) {
        const cause: unknown = signal?.aborted ? signal.reason : errBody;
        return [new Error(`error reading ${request.method} response in fetchTransport`, { cause }), null];
      }

      return [null, { status: res.status, statusText: res.statusText, headers: res.headers, body }];
    } finally {
      settled.abort(new AbortError(`error ${request.method} request settled`));
    }
  }

  /** Aborts in-flight requests; later sends fail. */
  dispose(): void {
    this.#controller.abort(new AbortError('error transport disposed'));
  }
}
