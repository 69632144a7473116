import { describe, expect, it, vi } from 'vitest';
import OpenAI from 'openai';
import { RateLimiter, retryWithBackoff } from '../lib/utils/openai-helper';
import { sleep } from '../lib/utils';

const fast = { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5 };

function apiError(status: number, message: string) {
  return new OpenAI.APIError(status, undefined, message, undefined);
}

describe('retryWithBackoff', () => {
  it('retries rate limits and returns the later success', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(apiError(429, 'Too many requests'))
      .mockResolvedValueOnce('done');

    await expect(retryWithBackoff(fn, fast)).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('retries server errors', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(apiError(503, 'Service unavailable'))
      .mockRejectedValueOnce(apiError(500, 'Internal error'))
      .mockResolvedValueOnce('done');

    await expect(retryWithBackoff(fn, fast)).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry client errors', async () => {
    const error = apiError(400, 'Bad request');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, fast)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    const error = apiError(429, 'Too many requests');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(retryWithBackoff(fn, fast)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });
});

describe('RateLimiter', () => {
  it('never runs more than maxConcurrent tasks at once', async () => {
    const limiter = new RateLimiter(2, 0);
    let active = 0;
    let maxActive = 0;

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map(n =>
        limiter.execute(async () => {
          active++;
          maxActive = Math.max(maxActive, active);
          await sleep(5);
          active--;
          return n * 10;
        })
      )
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(maxActive).toBe(2);
    expect(limiter.active).toBe(0);
  });
});
