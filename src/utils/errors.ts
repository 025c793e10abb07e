/**
 * Error types raised across the agent
 */

/**
 * Extract a message from an unknown thrown value
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Raised when the run's cancellation signal fires
 */
export class CancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

/**
 * Throw CancelledError if the signal has fired
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new CancelledError();
  }
}

/**
 * Script text that cannot be parsed
 */
export class ScriptParseError extends Error {
  constructor(
    message: string,
    readonly line: number | null = null
  ) {
    super(line === null ? message : `Line ${line}: ${message}`);
    this.name = 'ScriptParseError';
  }
}

export class ScriptNotFoundError extends Error {
  constructor(readonly target: string) {
    super(`Script not found: ${target}`);
    this.name = 'ScriptNotFoundError';
  }
}

/**
 * A path that escapes the workspace root
 */
export class WorkspacePathError extends Error {
  constructor(
    readonly requested: string,
    reason: string
  ) {
    super(`Invalid path '${requested}': ${reason}`);
    this.name = 'WorkspacePathError';
  }
}

/**
 * Unrecoverable pipeline failure (empty manifest, first file failed)
 */
export class PipelineError extends Error {
  constructor(
    readonly pipeline: 'blueprint' | 'upgrade',
    message: string
  ) {
    super(message);
    this.name = 'PipelineError';
  }
}
