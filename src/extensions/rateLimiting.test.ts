import { describe, expect, it, vi } from 'vitest';
import { FakeTransport, jsonResponse } from '../__mocks__/fakeTransport.js';
import { ApiClient } from '../core/client.js';
import { noopLogger } from '../utils/logger.js';
import { rateLimiting } from './rateLimiting.js';

const NOW = 1_000_000;

function setup(transport: FakeTransport) {
  const sleep = vi.fn<(ms: number) => Promise<void>>(async () => {});
  const client = new ApiClient({
    consumerKey: 'test-key',
    consumerSecret: 'test-secret',
    accessToken: 'test-token',
    accessTokenSecret: 'test-token-secret',
    transport,
    logger: noopLogger,
    middleware: [rateLimiting({ now: () => NOW, sleep })],
  });

  return { client, sleep };
}

const exhausted = { 'x-rate-limit-limit': '15', 'x-rate-limit-remaining': '0', 'x-rate-limit-reset': '1005' };

describe('rateLimiting', () => {
  it('waits for the window to reset once an endpoint is exhausted', async () => {
    const transport = new FakeTransport(jsonResponse([], 200, exhausted), jsonResponse([]));
    const { client, sleep } = setup(transport);

    await client.get('statuses/home_timeline');
    expect(sleep).not.toHaveBeenCalled();

    await client.get('statuses/home_timeline');
    expect(sleep).toHaveBeenCalledWith(5000);
    expect(transport.requests).toHaveLength(2);
  });

  it('keeps endpoints apart', async () => {
    const transport = new FakeTransport(jsonResponse([], 200, exhausted), jsonResponse({}));
    const { client, sleep } = setup(transport);

    await client.get('statuses/home_timeline');
    await client.get('account/settings');

    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not wait while requests remain', async () => {
    const transport = new FakeTransport(
      jsonResponse([], 200, { ...exhausted, 'x-rate-limit-remaining': '3' }),
      jsonResponse([]),
    );
    const { client, sleep } = setup(transport);

    await client.get('statuses/home_timeline');
    await client.get('statuses/home_timeline');

    expect(sleep).not.toHaveBeenCalled();
  });

  it('does not wait for a window that already reset', async () => {
    const transport = new FakeTransport(
      jsonResponse([], 200, { ...exhausted, 'x-rate-limit-reset': '999' }),
      jsonResponse([]),
    );
    const { client, sleep } = setup(transport);

    await client.get('statuses/home_timeline');
    await client.get('statuses/home_timeline');

    expect(sleep).not.toHaveBeenCalled();
  });

  it('learns limits from error responses', async () => {
    const transport = new FakeTransport(
      jsonResponse({ errors: [{ message: 'Rate limit exceeded', code: 88 }] }, 429, exhausted),
      jsonResponse([]),
    );
    const { client, sleep } = setup(transport);

    const [err] = await client.get('statuses/home_timeline');
    expect(err?.message).toBe('Rate limit exceeded');

    await client.get('statuses/home_timeline');
    expect(sleep).toHaveBeenCalledWith(5000);
  });
});
