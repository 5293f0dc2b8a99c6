import { afterEach, beforeEach, describe, expect, it, type MockedFunction, vi } from 'vitest';
import { isAbortError } from '../error/abortError.js';
import { isTimeoutError } from '../error/timeoutError.js';
import type { WireRequest } from '../types/request.js';
import { FetchTransport } from './transport.js';

describe('FetchTransport', () => {
  let mockedFetch: MockedFunction<typeof fetch>;

  beforeEach(() => {
    mockedFetch = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', mockedFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    vi.useRealTimers();
  });

  const get: WireRequest = {
    method: 'GET',
    url: 'https://api.example.test/1.1/a.json?b=1',
    headers: new Headers({ accept: 'application/json' }),
  };

  it('returns status, headers and body text', async () => {
    mockedFetch.mockResolvedValueOnce(
      new Response('{"ok":true}', { status: 200, statusText: 'OK', headers: { 'content-type': 'application/json' } }),
    );

    const [err, response] = await new FetchTransport().send(get);

    expect(err).toBeNull();
    expect(response?.status).toBe(200);
    expect(response?.statusText).toBe('OK');
    expect(response?.body).toBe('{"ok":true}');
    expect(response?.headers.get('content-type')).toBe('application/json');
    expect(mockedFetch).toHaveBeenCalledWith('https://api.example.test/1.1/a.json?b=1', {
      method: 'GET',
      headers: expect.any(Headers),
      body: undefined,
      signal: expect.any(AbortSignal),
    });
  });

  it('does not treat error statuses as transport errors', async () => {
    mockedFetch.mockResolvedValueOnce(new Response('nope', { status: 503, statusText: 'Service Unavailable' }));

    const [err, response] = await new FetchTransport().send(get);

    expect(err).toBeNull();
    expect(response?.status).toBe(503);
  });

  it('lets fetch set the multipart content type', async () => {
    mockedFetch.mockResolvedValueOnce(new Response(''));
    const form = new FormData();
    form.append('media_category', 'tweet_image');

    await new FetchTransport().send({
      method: 'POST',
      url: 'https://upload.example.test/1.1/media/upload.json',
      headers: new Headers({ 'content-type': 'multipart/form-data;charset=utf-8', authorization: 'OAuth x' }),
      body: form,
    });

    const headers = new Headers(mockedFetch.mock.calls[0][1]?.headers);
    expect(headers.has('content-type')).toBe(false);
    expect(headers.get('authorization')).toBe('OAuth x');
  });

  it('wraps network failures', async () => {
    mockedFetch.mockRejectedValueOnce(new TypeError('fetch failed'));

    const [err, response] = await new FetchTransport().send(get);

    expect(response).toBeNull();
    expect(err?.message).toBe('error sending GET request in fetchTransport');
    expect(err?.cause).toBeInstanceOf(TypeError);
  });

  it('times out slow requests', async () => {
    vi.useFakeTimers();
    mockedFetch.mockImplementationOnce(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        }),
    );

    const pending = new FetchTransport({ timeout: 100 }).send(get);
    await vi.advanceTimersByTimeAsync(100);
    const [err] = await pending;

    expect(isTimeoutError(err)).toBe(true);
  });

  it('clears the timeout once a request completes', async () => {
    vi.useFakeTimers();
    mockedFetch.mockImplementation(async () => new Response('{}', { status: 200 }));

    const transport = new FetchTransport({ timeout: 100 });
    await transport.send(get);
    await transport.send(get);

    expect(vi.getTimerCount()).toBe(0);
  });

  it('does not pile up abort listeners across many requests', async () => {
    const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
    mockedFetch.mockImplementation(async () => new Response('{}', { status: 200 }));

    const transport = new FetchTransport();
    for (let i = 0; i < 30; i++) {
      const [err] = await transport.send(get);
      expect(err).toBeNull();
    }

    const listenerWarnings = emitWarning.mock.calls.filter(
      ([warning]) => warning instanceof Error && warning.name === 'MaxListenersExceededWarning',
    );
    emitWarning.mockRestore();

    expect(listenerWarnings).toEqual([]);
  });

  it('aborts in-flight requests and refuses new ones after dispose', async () => {
    mockedFetch.mockImplementationOnce(
      (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(init?.signal?.reason));
        }),
    );

    const transport = new FetchTransport({ timeout: false });
    const pending = transport.send(get);
    transport.dispose();
    const [err] = await pending;
    const [errAfter] = await transport.send(get);

    expect(isAbortError(err)).toBe(true);
    expect(isAbortError(errAfter)).toBe(true);
    expect(mockedFetch).toHaveBeenCalledTimes(1);
  });
});
