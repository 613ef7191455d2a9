/**
 * Tests for retry classification and backoff loop
 */

import { HttpStatusError } from './errors';
import { RetryError, isTransientError, retry } from './retry';

const FAST = { baseDelayMs: 0, maxDelayMs: 0, jitterMaxMs: 0 };

describe('isTransientError', () => {
  it('should retry 5xx and 429', () => {
    expect(isTransientError(new HttpStatusError(503, 'Service Unavailable'))).toBe(true);
    expect(isTransientError(new HttpStatusError(429, 'Too Many Requests'))).toBe(true);
  });

  it('should fail fast on other 4xx', () => {
    expect(isTransientError(new HttpStatusError(404, 'Not Found'))).toBe(false);
    expect(isTransientError(new HttpStatusError(403, 'Forbidden'))).toBe(false);
  });

  it('should fail fast on parse errors', () => {
    expect(isTransientError(new SyntaxError('Unexpected token'))).toBe(false);
    expect(isTransientError(new TypeError('Failed to parse URL from nope'))).toBe(false);
  });

  it('should retry timeouts and connection errors', () => {
    expect(isTransientError(new Error('The operation was aborted due to timeout'))).toBe(true);
    expect(isTransientError(new TypeError('fetch failed'))).toBe(true);
    expect(isTransientError(new Error('connect ECONNREFUSED 127.0.0.1:1'))).toBe(true);
  });
});

describe('retry', () => {
  it('should return the first successful result', async () => {
    const fn = jest.fn(async () => 'ok');
    await expect(retry(fn, { maxAttempts: 3, ...FAST })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('should retry transient failures until success', async () => {
    let calls = 0;
    const fn = jest.fn(async () => {
      calls++;
      if (calls < 3) {
        throw new HttpStatusError(502, 'Bad Gateway');
      }
      return calls;
    });

    await expect(retry(fn, { maxAttempts: 5, ...FAST })).resolves.toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('should stop after maxAttempts with a transient RetryError', async () => {
    const fn = jest.fn(async () => {
      throw new HttpStatusError(500, 'Internal Server Error');
    });

    const error = await retry(fn, { maxAttempts: 2, ...FAST }).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) {
      expect(error.isTransient).toBe(true);
      expect(error.attempts).toBe(2);
      expect(error.message).toBe('Failed after 2 attempt(s): HTTP 500: Internal Server Error');
      expect(error.lastError).toBeInstanceOf(HttpStatusError);
    }
  });

  it('should not retry deterministic failures', async () => {
    const fn = jest.fn(async () => {
      throw new HttpStatusError(404, 'Not Found');
    });

    const error = await retry(fn, { maxAttempts: 5, ...FAST }).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(1);
    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) {
      expect(error.isTransient).toBe(false);
      expect(error.message).toBe('Failed after 1 attempt(s): HTTP 404: Not Found');
    }
  });

  it('should wrap non-Error throws', async () => {
    const error = await retry(
      async () => {
        throw 'plain';
      },
      { maxAttempts: 1, ...FAST }
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RetryError);
    if (error instanceof RetryError) {
      expect(error.lastError.message).toBe('plain');
    }
  });
});
