import { describe, expect, it } from 'vitest';
import { isTimeoutError, TimeoutError } from './timeoutError.js';

describe('isTimeoutError', () => {
  it('matches a TimeoutError nested in a cause', () => {
    const err = new Error('error sending request', { cause: new TimeoutError('timed out') });

    expect(isTimeoutError(err)).toBe(true);
  });

  it('returns false for other errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});
