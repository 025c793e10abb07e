/**
 * Sliding-window rate limiter for outbound model calls
 *
 * The request log is only touched inside the mutex; the wait it computes is
 * slept outside it, so concurrent callers never queue behind a sleeper.
 */

import { Mutex } from '../utils/mutex.js';
import { sleep } from '../utils/timers.js';

export interface RateLimiterOptions {
  /** Calls admitted per window */
  limit: number;
  windowMs: number;
  now?: () => number;
}

export class RateLimiter {
  private readonly log: number[] = [];
  private readonly mutex = new Mutex();
  private readonly limit: number;
  private readonly windowMs: number;
  private readonly now: () => number;

  constructor(options: RateLimiterOptions) {
    if (options.limit < 1) {
      throw new Error('Rate limit must admit at least one request');
    }
    this.limit = options.limit;
    this.windowMs = options.windowMs;
    this.now = options.now ?? Date.now;
  }

  /**
   * Admit the caller if the window has room, otherwise return how long to wait
   */
  private tryAdmit(): number {
    const now = this.now();
    while (this.log.length > 0 && now - (this.log[0] ?? now) >= this.windowMs) {
      this.log.shift();
    }
    if (this.log.length < this.limit) {
      this.log.push(now);
      return 0;
    }
    const oldest = this.log[0] ?? now;
    return Math.max(1, oldest + this.windowMs - now);
  }

  /**
   * Wait for an admission slot
   * @returns total milliseconds spent waiting
   */
  async acquire(signal?: AbortSignal): Promise<number> {
    let waited = 0;
    for (;;) {
      const wait = await this.mutex.runExclusive(() => this.tryAdmit());
      if (wait === 0) return waited;
      await sleep(wait, signal);
      waited += wait;
    }
  }

  /**
   * Calls admitted inside the current window
   */
  get inFlightWindow(): number {
    const now = this.now();
    return this.log.filter((t) => now - t < this.windowMs).length;
  }
}
