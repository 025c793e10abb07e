/**
 * Backend error taxonomy and classification of thrown values
 */

export type BackendErrorKind =
  | 'rate-limit'
  | 'network'
  | 'timeout'
  | 'auth'
  | 'quota'
  | 'model-unavailable'
  | 'server'
  | 'client'
  | 'unknown';

/** Kinds the retry driver waits out */
export const RETRYABLE_KINDS: ReadonlySet<BackendErrorKind> = new Set([
  'rate-limit',
  'network',
  'server',
]);

export interface BackendErrorOptions {
  status?: number;
  retryAfterMs?: number;
  cause?: unknown;
}

export class BackendError extends Error {
  readonly status: number | undefined;
  readonly retryAfterMs: number | undefined;

  constructor(
    message: string,
    readonly kind: BackendErrorKind,
    options: BackendErrorOptions = {}
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BackendError';
    this.status = options.status;
    this.retryAfterMs = options.retryAfterMs;
  }

  get retryable(): boolean {
    return RETRYABLE_KINDS.has(this.kind);
  }
}

/**
 * Model call exceeded its hard timeout; never retried
 */
export class TimeoutError extends BackendError {
  constructor(readonly timeoutMs: number) {
    super(`Model call timed out after ${Math.round(timeoutMs / 1000)}s`, 'timeout');
    this.name = 'TimeoutError';
  }
}

/**
 * Map an HTTP status to an error kind
 */
export function kindFromStatus(status: number): BackendErrorKind {
  if (status === 429) return 'rate-limit';
  if (status === 401 || status === 403) return 'auth';
  if (status === 402) return 'quota';
  if (status === 404) return 'model-unavailable';
  if (status === 408) return 'timeout';
  if (status >= 500) return 'server';
  if (status >= 400) return 'client';
  return 'unknown';
}

const MESSAGE_RULES: Array<{ kind: BackendErrorKind; pattern: RegExp }> = [
  { kind: 'rate-limit', pattern: /\b429\b|rate.?limit|too many requests/i },
  { kind: 'quota', pattern: /quota|insufficient.?(credit|balance|funds)|billing/i },
  { kind: 'auth', pattern: /\b40[13]\b|unauthori[sz]ed|forbidden|invalid.?api.?key|authentication/i },
  { kind: 'model-unavailable', pattern: /model.*(not found|unavailable|does not exist)/i },
  { kind: 'timeout', pattern: /timed? ?out|timeout|ETIMEDOUT/i },
  {
    kind: 'network',
    pattern: /ECONNRESET|ECONNREFUSED|ENOTFOUND|EAI_AGAIN|EPIPE|socket hang up|network|fetch failed/i,
  },
  { kind: 'server', pattern: /\b5\d\d\b|internal server error|bad gateway|service unavailable|overloaded/i },
];

/**
 * Classify any thrown value into a BackendError
 */
export function classifyError(error: unknown): BackendError {
  if (error instanceof BackendError) return error;

  const message = error instanceof Error ? error.message : String(error);
  const code =
    error instanceof Error && 'code' in error && typeof error.code === 'string'
      ? error.code
      : '';
  const status =
    error instanceof Error && 'status' in error && typeof error.status === 'number'
      ? error.status
      : undefined;

  if (status !== undefined) {
    return new BackendError(message, kindFromStatus(status), { status, cause: error });
  }
  const haystack = `${code} ${message}`;
  const rule = MESSAGE_RULES.find((r) => r.pattern.test(haystack));
  return new BackendError(message, rule?.kind ?? 'unknown', { cause: error });
}
