/**
 * Execution context and per-run conversation state
 *
 * An AgentContext lives for one CLI invocation (or one library caller)
 * and is passed down explicitly; it owns the script cache, the checkpoint
 * store and the model client. ConversationState belongs to exactly one
 * interpreter invocation: nested and chained runs get a fresh one.
 */

import { CheckpointStore } from '../checkpoint/store.js';
import type { LlmClient } from '../llm/client.js';
import { createNullLogger, type Logger } from '../output/logger.js';
import { createRunStats, type RunStats } from '../output/stats.js';
import { DependencyIndex } from '../pipelines/dependency-index.js';
import { ScriptLoader } from '../script/loader.js';
import type { Script } from '../script/types.js';
import { Environment, type ScriptMap } from '../script/values.js';
import { createDefaultRegistry, type ToolRegistry } from '../tools/index.js';
import type { ChatMessage } from '../types/llm.js';
import { type AgentConfig, DEFAULT_CONFIG } from '../types/runner.js';
import { createWorkspace, type Workspace } from '../workspace/paths.js';
import { InstructionRegistry } from './instructions.js';

export interface AgentContext {
  config: AgentConfig;
  client: LlmClient;
  tools: ToolRegistry;
  workspace: Workspace;
  loader: ScriptLoader;
  checkpoints: CheckpointStore;
  /** Exports and imports of files the agent has written or read */
  dependencies: DependencyIndex;
  instructions: InstructionRegistry;
  logger: Logger;
  /** Cancellation token checked at tool and model boundaries */
  signal: AbortSignal;
  /** Sink for $echo / $print output */
  emit: (text: string) => void;
  /** Streamed model text, when the caller wants it */
  onText?: (chunk: string) => void;
}

export interface AgentContextOptions {
  client: LlmClient;
  config?: Partial<AgentConfig>;
  tools?: ToolRegistry;
  workspace?: Workspace;
  loader?: ScriptLoader;
  checkpoints?: CheckpointStore;
  instructions?: InstructionRegistry;
  logger?: Logger;
  signal?: AbortSignal;
  emit?: (text: string) => void;
  onText?: (chunk: string) => void;
}

/**
 * Build a context, filling every collaborator not supplied
 */
export function createAgentContext(options: AgentContextOptions): AgentContext {
  const config: AgentConfig = { ...DEFAULT_CONFIG, ...options.config };
  const logger = options.logger ?? createNullLogger();
  const checkpointOptions = config.checkpointDir
    ? { dir: config.checkpointDir, retentionMs: config.checkpointRetentionMs, logger }
    : { retentionMs: config.checkpointRetentionMs, logger };

  const context: AgentContext = {
    config,
    client: options.client,
    tools: options.tools ?? createDefaultRegistry(),
    workspace: options.workspace ?? createWorkspace(config.workspace),
    loader: options.loader ?? new ScriptLoader(),
    checkpoints: options.checkpoints ?? new CheckpointStore(checkpointOptions),
    dependencies: new DependencyIndex(),
    instructions: options.instructions ?? new InstructionRegistry(),
    logger,
    signal: options.signal ?? new AbortController().signal,
    emit: options.emit ?? ((text: string) => process.stdout.write(`${text}\n`)),
  };
  if (options.onText) context.onText = options.onText;
  return context;
}

export interface ConversationState {
  script: Script;
  env: Environment;
  /** Append-only chat history */
  history: ChatMessage[];
  stats: RunStats;
  /** 0 for a top-level run, +1 per chain or nested script */
  depth: number;
  /** First AI-bearing message not yet seen, pipelines may still take it */
  routePending: boolean;
}

/**
 * Fresh state: script parameters overridden by the caller's inputs
 */
export function createConversationState(
  script: Script,
  inputParams: ScriptMap,
  depth: number,
  routePending: boolean
): ConversationState {
  const env = new Environment(script.frontmatter.parameters);
  env.assign(inputParams);
  return {
    script,
    env,
    history: [],
    stats: createRunStats(),
    depth,
    routePending,
  };
}
