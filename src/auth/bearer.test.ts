import { describe, expect, it } from 'vitest';
import { Credentials } from '../core/credentials.js';
import { RequestContext } from '../core/context.js';
import type { RequestOptions } from '../core/schemas.js';
import { BearerAuthenticator } from './bearer.js';

function contextWith(options: RequestOptions = {}): RequestContext {
  const context = new RequestContext({ httpMethod: 'GET', url: 'https://api.example.test/1.1/a.json', args: {}, options });
  context.httpRequest = { method: 'GET', url: context.url, headers: new Headers() };
  return context;
}

const consumer = { consumerKey: 'test-key', consumerSecret: 'test-secret' };
const authenticator = new BearerAuthenticator();

describe('BearerAuthenticator', () => {
  it('sends consumer credentials as HTTP Basic when asked', () => {
    const [, request] = authenticator.authorize(contextWith({ add_consumer_auth_header: true }), new Credentials(consumer));

    expect(request?.headers.get('authorization')).toBe(`Basic ${Buffer.from('test-key:test-secret').toString('base64')}`);
  });

  it('sends the client token as a percent-encoded bearer token', () => {
    const credentials = new Credentials({ ...consumer, accessToken: 'AAAA%2FBBBB=' });

    const [, request] = authenticator.authorize(contextWith(), credentials);

    expect(request?.headers.get('authorization')).toBe('Bearer AAAA%252FBBBB%3D');
  });

  it('prefers the per-call token', () => {
    const credentials = new Credentials({ ...consumer, accessToken: 'client-token' });

    const [, request] = authenticator.authorize(contextWith({ token: 'call-token' }), credentials);

    expect(request?.headers.get('authorization')).toBe('Bearer call-token');
  });

  it('adds no header without a token', () => {
    const [err, request] = authenticator.authorize(contextWith(), new Credentials(consumer));

    expect(err).toBeNull();
    expect(request?.headers.has('authorization')).toBe(false);
  });
});
