import { describe, expect, it } from 'vitest';
import { Credentials } from './credentials.js';

const consumer = { consumerKey: 'test-key', consumerSecret: 'test-secret' };

describe('Credentials', () => {
  it('starts without an access token', () => {
    const credentials = new Credentials(consumer);

    expect(credentials.hasAccessToken).toBe(false);
    expect(credentials.accessToken).toBeUndefined();
    expect(credentials.accessTokenSecret).toBeUndefined();
  });

  it('takes the token pair from the constructor', () => {
    const credentials = new Credentials({ ...consumer, accessToken: 'test-token', accessTokenSecret: 'test-token-secret' });

    expect(credentials.accessToken).toBe('test-token');
    expect(credentials.accessTokenSecret).toBe('test-token-secret');
  });

  it('ignores a secret given without a token', () => {
    const credentials = new Credentials({ ...consumer, accessTokenSecret: 'test-token-secret' });

    expect(credentials.hasAccessTokenSecret).toBe(false);
    expect(credentials.accessTokenSecret).toBeUndefined();
  });

  it('clears the secret together with the token', () => {
    const credentials = new Credentials({ ...consumer, accessToken: 'test-token', accessTokenSecret: 'test-token-secret' });

    credentials.clearAccessToken();

    expect(credentials.hasAccessToken).toBe(false);
    expect(credentials.hasAccessTokenSecret).toBe(false);
    expect(credentials.accessToken).toBeUndefined();
    expect(credentials.accessTokenSecret).toBeUndefined();
  });

  it('drops the previous secret when a token is set without one', () => {
    const credentials = new Credentials({ ...consumer, accessToken: 'old-token', accessTokenSecret: 'old-secret' });

    credentials.setAccessToken('bearer-token');

    expect(credentials.accessToken).toBe('bearer-token');
    expect(credentials.accessTokenSecret).toBeUndefined();
  });

  it('keeps the consumer pair', () => {
    const credentials = new Credentials(consumer);
    credentials.setAccessToken('test-token', 'test-token-secret');
    credentials.clearAccessToken();

    expect(credentials.consumerKey).toBe('test-key');
    expect(credentials.consumerSecret).toBe('test-secret');
  });
});
