import { describe, expect, it } from 'vitest';
import { safeWrap, safeWrapAsync, toError } from './wrap.js';

describe('safeWrap', () => {
  it('returns [null, data] when the function succeeds', () => {
    const [err, data] = safeWrap(() => 42);

    expect(err).toBeNull();
    expect(data).toBe(42);
  });

  it('returns [error, null] when the function throws', () => {
    const [err, data] = safeWrap(() => JSON.parse('{ nope'));

    expect(data).toBeNull();
    expect(err).toBeInstanceOf(SyntaxError);
  });

  it('wraps thrown non-errors', () => {
    const [err] = safeWrap(() => {
      throw 'plain string';
    });

    expect(err).toBeInstanceOf(Error);
    expect(err?.message).toBe('plain string');
    expect(err?.cause).toBe('plain string');
  });
});

describe('safeWrapAsync', () => {
  it('returns [null, data] when the promise resolves', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.resolve('ok'));

    expect(err).toBeNull();
    expect(data).toBe('ok');
  });

  it('returns [error, null] when the promise rejects', async () => {
    const [err, data] = await safeWrapAsync(() => Promise.reject(new Error('async boom')));

    expect(data).toBeNull();
    expect(err?.message).toBe('async boom');
  });

  it('returns [error, null] when the factory throws before returning a promise', async () => {
    const [err, data] = await safeWrapAsync(() => {
      throw new Error('sync boom before promise');
    });

    expect(data).toBeNull();
    expect(err?.message).toBe('sync boom before promise');
  });
});

describe('toError', () => {
  it('passes errors through untouched', () => {
    const err = new TypeError('bad');

    expect(toError(err)).toBe(err);
  });

  it('stringifies other values', () => {
    expect(toError(404).message).toBe('404');
  });
});
