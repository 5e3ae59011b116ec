import { describe, it, expect, vi } from 'vitest';
import { backoffDelay, NonRetryableError, withRetry } from './retry.js';

describe('backoffDelay', () => {
  it('grows geometrically from the base delay', () => {
    expect([1, 2, 3].map((attempt) => backoffDelay(attempt, 100))).toEqual([100, 200, 400]);
    expect(backoffDelay(3, 10, 3)).toBe(90);
  });
});

describe('withRetry', () => {
  it('retries until an attempt succeeds', async () => {
    const fn = vi
      .fn<(attempt: number) => Promise<string>>()
      .mockRejectedValueOnce(new Error('ECONNRESET'))
      .mockResolvedValueOnce('ok');

    await expect(withRetry(fn, { maxAttempts: 3, baseDelayMs: 1 })).resolves.toBe('ok');
    expect(fn.mock.calls).toEqual([[1], [2]]);
  });

  it('gives up after the last attempt with the last error', async () => {
    const fn = vi.fn(async (attempt: number) => {
      throw new Error(`failure ${attempt}`);
    });

    await expect(withRetry(fn, { maxAttempts: 2, baseDelayMs: 1 })).rejects.toThrow('failure 2');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('does not retry a NonRetryableError', async () => {
    const fn = vi.fn(async () => {
      throw new NonRetryableError('HTTP 404');
    });

    await expect(withRetry(fn, { maxAttempts: 5, baseDelayMs: 1 })).rejects.toBeInstanceOf(NonRetryableError);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
