/**
 * Bounded exponential backoff around outbound calls
 */

import type { RetryConfig } from '../types/runner.js';
import { sleep } from '../utils/timers.js';
import { type BackendError, classifyError } from './errors.js';

export interface RetryEvent {
  attempt: number;
  delayMs: number;
  error: BackendError;
}

export interface RetryOptions extends RetryConfig {
  signal?: AbortSignal;
  onRetry?: (event: RetryEvent) => void;
}

/**
 * Delay before retry `attempt` (0-based): initial * multiplier^attempt, capped
 */
export function backoffDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.multiplier, attempt);
  return Math.min(delay, config.maxDelayMs);
}

/**
 * Run `fn`, retrying rate-limit, network and server failures.
 * Other failures (including timeouts) propagate immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions
): Promise<T> {
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      const classified = classifyError(error);
      if (!classified.retryable || attempt >= options.maxRetries) {
        throw error;
      }
      const delayMs =
        classified.kind === 'rate-limit' && classified.retryAfterMs !== undefined
          ? Math.min(classified.retryAfterMs, options.maxDelayMs)
          : backoffDelay(attempt, options);
      options.onRetry?.({ attempt: attempt + 1, delayMs, error: classified });
      await sleep(delayMs, options.signal);
    }
  }
}
