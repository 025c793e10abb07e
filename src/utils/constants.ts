/**
 * Centralized constants for the agent codebase
 * Replaces magic numbers with descriptive names
 */

// === Rate Limiting ===
/** Requests admitted per sliding window */
export const RATE_LIMIT_REQUESTS = 10;
/** Sliding window length in ms */
export const RATE_LIMIT_WINDOW_MS = 1000;

// === Retry / Backoff ===
/** Maximum retries for a retryable backend failure */
export const DEFAULT_MAX_RETRIES = 5;
/** First backoff delay in ms */
export const RETRY_INITIAL_DELAY_MS = 1000;
/** Backoff ceiling in ms */
export const RETRY_MAX_DELAY_MS = 10000;
/** Backoff growth factor */
export const RETRY_MULTIPLIER = 2;
/** Hard timeout for a single model call in ms */
export const DEFAULT_REQUEST_TIMEOUT_MS = 120000;

// === Interpreter ===
/** Iteration cap for $while / $for blocks */
export const MAX_LOOP_ITERATIONS = 1000;
/** Maximum nesting of chained and nested script runs */
export const MAX_CHAIN_DEPTH = 8;
/** Chat history entries sent with each call */
export const MAX_HISTORY_MESSAGES = 50;
/** Variable bound by a placeholder without an explicit name */
export const LATEST_RESULT_VAR = 'LatestResult';
/** Variable always bound to the latest model response */
export const RESPONSE_VAR = 'RESPONSE';

// === Orchestrator ===
/** Continuation depth bound */
export const MAX_CONTINUATION_DEPTH = 10;
/** History entries inspected for repeated tool calls */
export const REPEAT_WINDOW = 10;
/** Repeated-call threshold for tools without a specific one */
export const DEFAULT_REPEAT_THRESHOLD = 2;
/**
 * Repeated-call thresholds for tools that are naturally called many times.
 * One call per response leaves at most REPEAT_WINDOW / 2 results in the window.
 */
export const TOOL_REPEAT_THRESHOLDS: Readonly<Record<string, number>> = {
  write_file: 5,
  edit: 4,
  shell: 4,
  list_files: 4,
  read_file: 4,
};
/** Files a generation task is expected to produce before it counts as done */
export const STALL_TARGET_FILES = 2;
/** Responses shorter than this with no tool calls count as boilerplate */
export const STALL_MIN_TEXT_LENGTH = 40;

// === Blueprint ===
/** Maximum files accepted from a manifest */
export const MAX_BLUEPRINT_FILES = 100;
/** Retries per generated file after its first attempt */
export const MAX_FILE_RETRIES = 20;
/** Linear backoff step between file attempts in ms */
export const FILE_RETRY_BACKOFF_MS = 500;

// === Upgrade / Debug ===
/** Existing code files needed before a fix request is routed to the upgrade flow */
export const MIN_EXISTING_CODE_FILES = 1;
/** Lines of context read around each error location */
export const ERROR_CONTEXT_RADIUS = 10;
/** Intent confidence required to proceed without clarification */
export const INTENT_CONFIDENCE_THRESHOLD = 0.5;
/** Files listed in the read-plan prompt */
export const MAX_LISTED_FILES = 200;

// === Files ===
/** Default line cap for read_file */
export const MAX_FILE_LINES = 500;
/** Default shell command timeout in ms */
export const SHELL_TIMEOUT_MS = 60000;

// === Checkpoints ===
/** Checkpoints older than this are garbage collected */
export const CHECKPOINT_RETENTION_MS = 24 * 60 * 60 * 1000;

// === PTY Configuration ===
/** Terminal column width */
export const PTY_COLS = 200;
/** Terminal row count */
export const PTY_ROWS = 50;

// === Display Limits ===
/** Truncation length for tool argument previews */
export const TRUNCATE_TOOL_ARGS = 60;
/** Truncation length for terminal output lines */
export const TRUNCATE_TERMINAL_LINE = 150;
/** Truncation length for tool result previews */
export const TRUNCATE_RESULT = 100;
