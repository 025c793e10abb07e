import { describe, expect, it } from 'vitest';

import { RateLimiter } from '../../src/llm/rate-limiter.js';
import { CancelledError } from '../../src/utils/errors.js';

describe('RateLimiter', () => {
  it('rejects a limit below one', () => {
    expect(() => new RateLimiter({ limit: 0, windowMs: 1000 })).toThrow(
      'Rate limit must admit at least one request'
    );
  });

  it('admits up to the limit without waiting', async () => {
    const clock = 0;
    const limiter = new RateLimiter({ limit: 2, windowMs: 1000, now: () => clock });

    expect(await limiter.acquire()).toBe(0);
    expect(await limiter.acquire()).toBe(0);
    expect(limiter.inFlightWindow).toBe(2);
  });

  it('frees slots once the window has passed', async () => {
    let clock = 0;
    const limiter = new RateLimiter({ limit: 1, windowMs: 1000, now: () => clock });

    await limiter.acquire();
    clock = 1000;

    expect(await limiter.acquire()).toBe(0);
    expect(limiter.inFlightWindow).toBe(1);
  });

  it('waits when the window is full', async () => {
    const limiter = new RateLimiter({ limit: 1, windowMs: 20 });

    await limiter.acquire();
    const waited = await limiter.acquire();

    expect(waited).toBeGreaterThan(0);
  });

  it('stops waiting when cancelled', async () => {
    const limiter = new RateLimiter({ limit: 1, windowMs: 60000 });
    const controller = new AbortController();

    await limiter.acquire();
    const pending = limiter.acquire(controller.signal);
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(CancelledError);
  });
});
