import { describe, expect, it, vi } from 'vitest';
import { FakeTransport, jsonResponse } from '../__mocks__/fakeTransport.js';
import { ApiClient } from '../core/client.js';
import type { RequestContext } from '../core/context.js';
import type { PipelineMiddleware } from '../core/types.js';
import { getApiError } from '../error/apiError.js';
import { getRetryExhaustedError, isRetrySuppressedError } from '../error/retryError.js';
import { type Logger, noopLogger } from '../utils/logger.js';
import { backoffDelay, retryOnError } from './retryOnError.js';

const overCapacity = () => jsonResponse({ errors: [{ message: 'Over capacity', code: 130 }] }, 503);

function clientWith(transport: FakeTransport, middleware: PipelineMiddleware[], logger: Logger = noopLogger): ApiClient {
  return new ApiClient({
    consumerKey: 'test-key',
    consumerSecret: 'test-secret',
    accessToken: 'test-token',
    accessTokenSecret: 'test-token-secret',
    transport,
    logger,
    middleware,
  });
}

describe('backoffDelay', () => {
  it('grows exponentially up to the cap', () => {
    expect(backoffDelay(1)).toBe(250);
    expect(backoffDelay(2)).toBe(500);
    expect(backoffDelay(5)).toBe(4000);
    expect(backoffDelay(6)).toBe(4000);
  });

  it('takes custom settings', () => {
    expect(backoffDelay(3, { initialDelay: 100, multiplier: 3 })).toBe(900);
    expect(backoffDelay(3, { initialDelay: 100, maxDelay: 300 })).toBe(300);
  });
});

describe('retryOnError', () => {
  it('retries temporary errors until the call succeeds', async () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const transport = new FakeTransport(overCapacity(), jsonResponse({ ok: true }));
    const client = clientWith(transport, [retryOnError({ initialDelay: 1 })], logger);

    const [err, outcome] = await client.get('statuses/home_timeline');

    expect(err).toBeNull();
    expect(outcome?.deferred).toBe(false);
    expect(transport.requests).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith('retrying GET statuses/home_timeline', {
      attempt: 1,
      delay: 1,
      error: 'Over capacity',
    });
  });

  it('runs every attempt with a fresh context', async () => {
    const contexts: RequestContext[] = [];
    const recorder: PipelineMiddleware = {
      name: 'recorder',
      afterDispatch: (context) => {
        contexts.push(context);
      },
    };
    const transport = new FakeTransport(overCapacity(), jsonResponse({ ok: true }));

    await clientWith(transport, [retryOnError({ initialDelay: 1 }), recorder]).get('statuses/home_timeline');

    expect(contexts).toHaveLength(2);
    expect(contexts[0]).not.toBe(contexts[1]);
    expect(contexts[1].result).toEqual({ ok: true });
  });

  it('does not retry permanent errors', async () => {
    const transport = new FakeTransport(jsonResponse({ errors: [{ message: 'Bad Authentication data', code: 215 }] }, 400));

    const [err] = await clientWith(transport, [retryOnError({ initialDelay: 1 })]).get('account/settings');

    expect(isRetrySuppressedError(err)).toBe(true);
    expect(getApiError(err)?.errorCode).toBe(215);
    expect(getApiError(err)?.isTokenError).toBe(true);
    expect(transport.requests).toHaveLength(1);
  });

  it('gives up after the configured retries', async () => {
    const transport = new FakeTransport(overCapacity(), overCapacity(), overCapacity());

    const [err] = await clientWith(transport, [retryOnError({ maxRetries: 2, initialDelay: 1 })]).get('account/settings');

    expect(getRetryExhaustedError(err)?.attempts).toBe(3);
    expect(getApiError(err)?.statusCode).toBe(503);
    expect(transport.requests).toHaveLength(3);
  });

  it('tries once when retries are disabled', async () => {
    const transport = new FakeTransport(overCapacity());

    const [err] = await clientWith(transport, [retryOnError({ maxRetries: 0 })]).get('account/settings');

    expect(getRetryExhaustedError(err)?.attempts).toBe(1);
    expect(transport.requests).toHaveLength(1);
  });
});
