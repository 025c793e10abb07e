/**
 * Agent configuration types
 */

import {
  CHECKPOINT_RETENTION_MS,
  DEFAULT_MAX_RETRIES,
  DEFAULT_REQUEST_TIMEOUT_MS,
  FILE_RETRY_BACKOFF_MS,
  INTENT_CONFIDENCE_THRESHOLD,
  MAX_BLUEPRINT_FILES,
  MAX_CHAIN_DEPTH,
  MAX_CONTINUATION_DEPTH,
  MAX_FILE_RETRIES,
  MAX_HISTORY_MESSAGES,
  MAX_LOOP_ITERATIONS,
  MIN_EXISTING_CODE_FILES,
  RATE_LIMIT_REQUESTS,
  RATE_LIMIT_WINDOW_MS,
  RETRY_INITIAL_DELAY_MS,
  RETRY_MAX_DELAY_MS,
  RETRY_MULTIPLIER,
  STALL_TARGET_FILES,
} from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export type BackendName = 'anthropic' | 'openai';

export type Subcommand = 'run' | 'task';

/**
 * Backoff settings shared by every outbound call
 */
export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}

/**
 * Agent configuration
 */
export interface AgentConfig {
  verbosity: Verbosity;
  enableLog: boolean;
  logDir: string;
  model: string | null;
  backend: BackendName;
  /** Workspace root; every file tool path is confined to it */
  workspace: string;
  checkpointDir: string | null;
  checkpointRetentionMs: number;
  requestTimeoutMs: number;
  rateLimit: { requests: number; windowMs: number };
  retry: RetryConfig;
  maxContinuationDepth: number;
  maxLoopIterations: number;
  maxChainDepth: number;
  maxHistoryMessages: number;
  maxBlueprintFiles: number;
  maxFileRetries: number;
  fileRetryBackoffMs: number;
  stallTargetFiles: number;
  minExistingCodeFiles: number;
  intentConfidenceThreshold: number;
  /** Route the first AI turn through the blueprint / upgrade flows */
  pipelines: boolean;
}

/**
 * Default agent configuration
 */
export const DEFAULT_CONFIG: AgentConfig = {
  verbosity: 'normal',
  enableLog: true,
  logDir: 'logs',
  model: null,
  backend: 'anthropic',
  workspace: '.',
  checkpointDir: null,
  checkpointRetentionMs: CHECKPOINT_RETENTION_MS,
  requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
  rateLimit: { requests: RATE_LIMIT_REQUESTS, windowMs: RATE_LIMIT_WINDOW_MS },
  retry: {
    maxRetries: DEFAULT_MAX_RETRIES,
    initialDelayMs: RETRY_INITIAL_DELAY_MS,
    maxDelayMs: RETRY_MAX_DELAY_MS,
    multiplier: RETRY_MULTIPLIER,
  },
  maxContinuationDepth: MAX_CONTINUATION_DEPTH,
  maxLoopIterations: MAX_LOOP_ITERATIONS,
  maxChainDepth: MAX_CHAIN_DEPTH,
  maxHistoryMessages: MAX_HISTORY_MESSAGES,
  maxBlueprintFiles: MAX_BLUEPRINT_FILES,
  maxFileRetries: MAX_FILE_RETRIES,
  fileRetryBackoffMs: FILE_RETRY_BACKOFF_MS,
  stallTargetFiles: STALL_TARGET_FILES,
  minExistingCodeFiles: MIN_EXISTING_CODE_FILES,
  intentConfidenceThreshold: INTENT_CONFIDENCE_THRESHOLD,
  pipelines: true,
};

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  subcommand: Subcommand;
  /** Script file for `run` */
  scriptFile: string | null;
  /** key=value parameters for `run` */
  params: Record<string, string>;
  /** Task text for `task` */
  message: string;
  config: Partial<AgentConfig>;
}
