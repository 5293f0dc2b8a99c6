import { describe, expect, it } from 'vitest';
import { FakeTransport, jsonResponse } from '../__mocks__/fakeTransport.js';
import { getApiError } from '../error/apiError.js';
import { noopLogger } from '../utils/logger.js';
import { AppAuthClient } from './appAuth.js';

const BASIC = 'Basic dGVzdC1rZXk6dGVzdC1zZWNyZXQ=';

function clientWith(transport: FakeTransport): AppAuthClient {
  return new AppAuthClient({ consumerKey: 'test-key', consumerSecret: 'test-secret', transport, logger: noopLogger });
}

describe('AppAuthClient', () => {
  it('builds oauth2 URLs', () => {
    expect(clientWith(new FakeTransport()).oauth2UrlFor('token')).toBe('https://api.x.com/oauth2/token');
  });

  it('gets a bearer token with the consumer credentials', async () => {
    const transport = new FakeTransport(jsonResponse({ token_type: 'bearer', access_token: 'AAAA%2FBBBB' }));

    const [err, token] = await clientWith(transport).oauth2Token();

    expect(err).toBeNull();
    expect(token?.result).toBe('AAAA/BBBB');
    expect(transport.last.method).toBe('POST');
    expect(transport.last.url).toBe('https://api.x.com/oauth2/token');
    expect(transport.last.body).toBe('grant_type=client_credentials');
    expect(transport.last.headers.get('authorization')).toBe(BASIC);
  });

  it('sends the stored token as a bearer token', async () => {
    const transport = new FakeTransport(jsonResponse({}));
    const client = clientWith(transport);
    client.setAccessToken('AAAA/BBBB');

    const [err] = await client.get('users/show', { screen_name: 'alice' });

    expect(err).toBeNull();
    expect(transport.last.headers.get('authorization')).toBe('Bearer AAAA%2FBBBB');
  });

  it('prefers a per-call token', async () => {
    const transport = new FakeTransport(jsonResponse({}));
    const client = clientWith(transport);
    client.setAccessToken('stored');

    await client.get('users/show', { screen_name: 'alice', '-token': 'per-call' });

    expect(transport.last.headers.get('authorization')).toBe('Bearer per-call');
  });

  it('sends no authorization without a token', async () => {
    const transport = new FakeTransport(jsonResponse({}));

    await clientWith(transport).get('users/show', { screen_name: 'alice' });

    expect(transport.last.headers.has('authorization')).toBe(false);
  });

  it('invalidates a token', async () => {
    const transport = new FakeTransport(jsonResponse({ access_token: 'AAAA%2FBBBB' }));

    const [err, token] = await clientWith(transport).invalidateToken('AAAA/BBBB');

    expect(err).toBeNull();
    expect(token?.result).toBe('AAAA/BBBB');
    expect(transport.last.url).toBe('https://api.x.com/oauth2/invalidate_token');
    expect(transport.last.body).toBe('access_token=AAAA%2FBBBB');
    expect(transport.last.headers.get('authorization')).toBe(BASIC);
  });

  it('surfaces token endpoint failures', async () => {
    const transport = new FakeTransport(
      jsonResponse({ errors: [{ message: 'Unable to verify your credentials', code: 99 }] }, 403),
    );

    const [err] = await clientWith(transport).oauth2Token();

    expect(err?.message).toBe('error requesting bearer token');
    expect(getApiError(err)?.isTokenError).toBe(true);
  });
});
