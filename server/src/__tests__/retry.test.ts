import { describe, it, expect, vi } from 'vitest';
import { getStatusCode, withRetry } from '../lib/retry.js';

describe('withRetry', () => {
  it('retries transient HTTP status errors', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 3) {
        throw Object.assign(new Error('temporary outage'), { status: 503 });
      }
      return 'ok';
    }, { maxAttempts: 3, baseDelay: 1 });

    expect(result).toBe('ok');
    expect(attempts).toBe(3);
  });

  it('retries transient network error codes', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts < 2) {
        throw Object.assign(new Error('socket closed'), { code: 'ECONNRESET' });
      }
      return 42;
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe(42);
    expect(attempts).toBe(2);
  });

  it('uses Retry-After header from response metadata', async () => {
    let attempts = 0;
    const result = await withRetry(async () => {
      attempts += 1;
      if (attempts === 1) {
        throw Object.assign(new Error('slow down'), {
          response: { status: 429, headers: new Headers([['retry-after', '0.001']]) },
        });
      }
      return 'done';
    }, { maxAttempts: 2, baseDelay: 1 });

    expect(result).toBe('done');
    expect(attempts).toBe(2);
  });

  it('does not retry non-transient errors', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw new Error('validation failed');
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('validation failed');
    expect(attempts).toBe(1);
  });

  it('does not retry client errors even when the message looks transient', async () => {
    let attempts = 0;
    await expect(withRetry(async () => {
      attempts += 1;
      throw Object.assign(new Error('bad gateway config'), { status: 400 });
    }, { maxAttempts: 3, baseDelay: 1 })).rejects.toThrow('bad gateway config');
    expect(attempts).toBe(1);
  });

  it('does not retry aborts', async () => {
    const onRetry = vi.fn();
    let attempts = 0;
    const abortError = new Error('The operation was aborted');
    abortError.name = 'AbortError';

    await expect(withRetry(async () => {
      attempts += 1;
      throw abortError;
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('The operation was aborted');

    expect(attempts).toBe(1);
    expect(onRetry).not.toHaveBeenCalled();
  });

  it('reports each retry before the next attempt', async () => {
    const onRetry = vi.fn();
    await expect(withRetry(async () => {
      throw new Error('Request failed with status 502');
    }, { maxAttempts: 3, baseDelay: 1, onRetry })).rejects.toThrow('Request failed with status 502');

    expect(onRetry).toHaveBeenCalledTimes(2);
    expect(onRetry.mock.calls.map(([attempt]) => attempt)).toEqual([1, 2]);
  });

  it('wraps non-Error throws', async () => {
    await expect(withRetry(async () => {
      throw 'plain failure';
    }, { maxAttempts: 1 })).rejects.toThrow('plain failure');
  });
});

describe('getStatusCode', () => {
  it('reads status from the error, statusCode, or the response', () => {
    expect(getStatusCode(Object.assign(new Error('x'), { status: 429 }))).toBe(429);
    expect(getStatusCode({ statusCode: 503 })).toBe(503);
    expect(getStatusCode({ response: { status: 500 } })).toBe(500);
    expect(getStatusCode(new Error('no status'))).toBeNull();
    expect(getStatusCode(null)).toBeNull();
  });
});
