import type { Transport, WireRequest, WireResponse } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

type Reply = WireResponse | Error | undefined;

/** JSON response with the given status and extra headers. */
export function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): WireResponse {
  return {
    status,
    statusText: status < 300 ? 'OK' : 'Error',
    headers: new Headers({ 'content-type': 'application/json;charset=utf-8', ...headers }),
    body: JSON.stringify(body),
  };
}

/** Response with a raw body, typed as HTML the way the token endpoints answer. */
export function textResponse(body: string, status = 200, contentType = 'text/html;charset=utf-8'): WireResponse {
  return {
    status,
    statusText: status < 300 ? 'OK' : 'Error',
    headers: new Headers({ 'content-type': contentType }),
    body,
  };
}

/**
 * In-process transport replaying queued replies. An `Error` reply is returned
 * as a transport error and `undefined` defers the request.
 */
export class FakeTransport implements Transport {
  readonly requests: WireRequest[] = [];
  disposed = false;
  #replies: Reply[];

  constructor(...replies: Reply[]) {
    this.#replies = replies;
  }

  reply(...replies: Reply[]): this {
    this.#replies.push(...replies);
    return this;
  }

  async send(request: WireRequest): SafeWrapAsync<Error, WireResponse | undefined> {
    this.requests.push(request);
    if (this.#replies.length === 0) {
      return [new Error(`no reply queued for ${request.method} ${request.url}`), null];
    }

    const reply = this.#replies.shift();
    if (reply instanceof Error) {
      return [reply, null];
    }

    return [null, reply];
  }

  dispose(): void {
    this.disposed = true;
  }

  /** Last request sent. */
  get last(): WireRequest {
    const request = this.requests.at(-1);
    if (!request) {
      throw new Error('no request sent');
    }

    return request;
  }
}
