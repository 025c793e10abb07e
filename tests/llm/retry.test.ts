import { describe, expect, it, vi } from 'vitest';

import { BackendError } from '../../src/llm/errors.js';
import { backoffDelay, type RetryEvent, withRetry } from '../../src/llm/retry.js';

const FAST = { maxRetries: 2, initialDelayMs: 1, maxDelayMs: 5, multiplier: 2 };

describe('backoffDelay', () => {
  const config = { maxRetries: 5, initialDelayMs: 1000, maxDelayMs: 10000, multiplier: 2 };

  it('grows exponentially', () => {
    expect([0, 1, 2, 3].map((a) => backoffDelay(a, config))).toEqual([1000, 2000, 4000, 8000]);
  });

  it('caps at the maximum', () => {
    expect(backoffDelay(4, config)).toBe(10000);
  });
});

describe('withRetry', () => {
  it('retries server errors until success', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(Object.assign(new Error('unavailable'), { status: 503 }))
      .mockResolvedValueOnce('ok');
    const events: RetryEvent[] = [];

    const result = await withRetry(fn, { ...FAST, onRetry: (e) => events.push(e) });

    expect(result).toBe('ok');
    expect(fn).toHaveBeenCalledTimes(2);
    expect(events).toHaveLength(1);
    expect(events[0]?.attempt).toBe(1);
    expect(events[0]?.delayMs).toBe(1);
    expect(events[0]?.error.kind).toBe('server');
  });

  it('does not retry auth failures', async () => {
    const error = new BackendError('bad key', 'auth', { status: 401 });
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(fn, FAST)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rethrows the original error once retries run out', async () => {
    const error = new Error('ECONNRESET');
    const fn = vi.fn<() => Promise<string>>().mockRejectedValue(error);

    await expect(withRetry(fn, FAST)).rejects.toBe(error);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('waits the server-provided delay for rate limits, capped', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new BackendError('slow down', 'rate-limit', { retryAfterMs: 60000 }))
      .mockResolvedValueOnce('ok');
    const events: RetryEvent[] = [];

    await withRetry(fn, { ...FAST, onRetry: (e) => events.push(e) });

    expect(events[0]?.delayMs).toBe(5);
  });
});
