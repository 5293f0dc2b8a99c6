import { describe, expect, it } from 'vitest';
import { FakeTransport, jsonResponse } from '../__mocks__/fakeTransport.js';
import { ApiClient } from '../core/client.js';
import { noopLogger } from '../utils/logger.js';
import { enchilada } from './enchilada.js';

describe('enchilada', () => {
  it('bundles the common extensions', () => {
    expect(enchilada().map((middleware) => middleware.name)).toEqual([
      'normalizeBooleans',
      'retryOnError',
      'decodeHtmlEntities',
    ]);
  });

  it('normalizes, retries and decodes in one client', async () => {
    const transport = new FakeTransport(
      jsonResponse({ errors: [{ message: 'Internal error', code: 131 }] }, 500),
      jsonResponse([{ text: 'salt &amp; pepper' }]),
    );
    const client = new ApiClient({
      consumerKey: 'test-key',
      consumerSecret: 'test-secret',
      accessToken: 'test-token',
      accessTokenSecret: 'test-token-secret',
      transport,
      logger: noopLogger,
      middleware: enchilada({ initialDelay: 1 }),
    });

    const [err, outcome] = await client.get('statuses/home_timeline', { trim_user: 1 });

    expect(err).toBeNull();
    expect(outcome?.deferred === false && outcome.result).toEqual([{ text: 'salt & pepper' }]);
    expect(transport.requests).toHaveLength(2);
    expect(transport.last.url).toBe('https://api.x.com/1.1/statuses/home_timeline.json?trim_user=true');
  });
});
