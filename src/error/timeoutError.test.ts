import { describe, expect, it } from 'vitest';
import { isTimeoutError, TimeoutError } from './timeoutError.js';

describe('TimeoutError', () => {
  it('exposes the elapsed deadline and describes it', () => {
    const err = new TimeoutError(1_500);

    expect(err.timeout).toBe(1_500);
    expect(err.message).toBe('error request timed out after 1500ms');
  });
});

describe('isTimeoutError', () => {
  it('returns true for instances of TimeoutError', () => {
    expect(isTimeoutError(new TimeoutError(50))).toBe(true);
  });

  it('returns true for a TimeoutError wrapped by a transport error', () => {
    const err = new Error('error in GET request', { cause: new TimeoutError(50) });

    expect(isTimeoutError(err)).toBe(true);
  });

  it('returns false for non TimeoutError errors', () => {
    expect(isTimeoutError(new Error('boom'))).toBe(false);
  });
});
