/**
 * Model client: rate limiting, retry/backoff and a hard timeout around a backend
 */

import { printAgentDetail, printWarning } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import type { LlmBackend, LlmRequest, LlmResponse } from '../types/llm.js';
import type { RetryConfig } from '../types/runner.js';
import { CancelledError } from '../utils/errors.js';
import { TimeoutError } from './errors.js';
import type { RateLimiter } from './rate-limiter.js';
import { type RetryOptions, withRetry } from './retry.js';

export interface LlmClientOptions {
  rateLimiter: RateLimiter;
  retry: RetryConfig;
  timeoutMs: number;
  logger: Logger;
  /** Model used when a request names none */
  defaultModel?: string;
}

export class LlmClient {
  constructor(
    readonly backend: LlmBackend,
    private readonly options: LlmClientOptions
  ) {}

  get defaultModel(): string | undefined {
    return this.options.defaultModel;
  }

  /**
   * Issue one model call; retries retryable failures, never retries a timeout
   */
  async call(request: LlmRequest): Promise<LlmResponse> {
    const { logger, retry, rateLimiter } = this.options;
    const resolved: LlmRequest = { ...request };
    const model = request.model ?? this.options.defaultModel;
    if (model !== undefined) resolved.model = model;

    const retryOptions: RetryOptions = {
      ...retry,
      onRetry: ({ attempt, delayMs, error }) => {
        printWarning(
          `${error.kind} error from ${this.backend.name}, retry ${attempt}/${retry.maxRetries} in ${delayMs}ms`
        );
        logger.logEvent({ event: 'model_retry', attempt, delayMs, kind: error.kind, message: error.message });
      },
    };
    if (request.signal) retryOptions.signal = request.signal;

    return withRetry(async () => {
      const waited = await rateLimiter.acquire(request.signal);
      if (waited > 0) {
        printAgentDetail(`Rate limited, waited ${waited}ms`);
      }
      logger.logEvent({
        event: 'model_call',
        backend: this.backend.name,
        model: resolved.model ?? null,
        messages: resolved.messages.length,
        tools: resolved.tools?.length ?? 0,
      });
      const response = await this.callWithTimeout(resolved);
      logger.logEvent({
        event: 'model_response',
        finishReason: response.finishReason,
        textLength: response.text.length,
        functionCalls: response.functionCalls.map((c) => c.name),
      });
      return response;
    }, retryOptions);
  }

  private async callWithTimeout(request: LlmRequest): Promise<LlmResponse> {
    const { timeoutMs } = this.options;
    const controller = new AbortController();
    const onAbort = (): void => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new TimeoutError(timeoutMs));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.backend.call({ ...request, signal: controller.signal }),
        timeout,
      ]);
    } catch (error) {
      if (error instanceof TimeoutError) {
        printWarning(error.message);
        this.options.logger.logEvent({ event: 'model_timeout', timeoutMs });
        throw error;
      }
      if (request.signal?.aborted) {
        throw new CancelledError();
      }
      throw error;
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
