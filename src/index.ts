#!/usr/bin/env node
/**
 * turnwright - script-driven code generation agent
 * Runs a conversation script (or a one-line task) against a model backend
 * with workspace-confined file and shell tools.
 */

import { randomBytes } from 'crypto';

import { CheckpointStore } from './checkpoint/store.js';
import { parseArgs } from './cli/args.js';
import { createAgentContext } from './core/context.js';
import { TurnInterpreter } from './core/interpreter.js';
import { AnthropicBackend } from './llm/anthropic.js';
import { LlmClient } from './llm/client.js';
import { OpenAiBackend } from './llm/openai.js';
import { RateLimiter } from './llm/rate-limiter.js';
import { configureOutput, printAgent, printAgentDetail, printError } from './output/colors.js';
import { createLogger, type Logger } from './output/logger.js';
import { formatStatsSummary } from './output/stats.js';
import { parseScript, type Script, ScriptLoader, type ScriptMap } from './script/index.js';
import type { LlmBackend } from './types/llm.js';
import { type AgentConfig, DEFAULT_CONFIG } from './types/runner.js';

/** One-turn script a `task` message runs as */
const TASK_SCRIPT = 'user: {{task}} [[RESPONSE]]';

/**
 * Generate a short unique run ID (8 chars, uppercase)
 */
function generateRunId(): string {
  return randomBytes(4).toString('hex').toUpperCase();
}

function createBackend(config: AgentConfig): LlmBackend {
  switch (config.backend) {
    case 'anthropic': {
      const apiKey = process.env['ANTHROPIC_API_KEY'];
      if (!apiKey) {
        throw new Error('ANTHROPIC_API_KEY is not set (or use --backend openai)');
      }
      return new AnthropicBackend({ apiKey });
    }
    case 'openai':
      return new OpenAiBackend();
  }
}

function createClient(config: AgentConfig, logger: Logger): LlmClient {
  const options = {
    rateLimiter: new RateLimiter({ limit: config.rateLimit.requests, windowMs: config.rateLimit.windowMs }),
    retry: config.retry,
    timeoutMs: config.requestTimeoutMs,
    logger,
  };
  return new LlmClient(
    createBackend(config),
    config.model === null ? options : { ...options, defaultModel: config.model }
  );
}

async function main(): Promise<void> {
  const totalStart = Date.now();
  const parsed = parseArgs(process.argv.slice(2));
  const runId = generateRunId();

  const config: AgentConfig = {
    ...DEFAULT_CONFIG,
    ...parsed.config,
  };
  if (config.model === null && process.env['TURNWRIGHT_MODEL']) {
    config.model = process.env['TURNWRIGHT_MODEL'];
  }
  configureOutput(config.verbosity);

  const logName = parsed.scriptFile ?? 'task';
  const logger = createLogger(config.enableLog, config.logDir, logName);

  const loader = new ScriptLoader();
  let script: Script;
  let params: ScriptMap;
  if (parsed.subcommand === 'run' && parsed.scriptFile) {
    script = loader.load(parsed.scriptFile);
    params = parsed.params;
  } else {
    script = parseScript(TASK_SCRIPT);
    params = { task: parsed.message };
  }

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) process.exit(130);
    printAgent('Interrupted, stopping after the current step (Ctrl-C again to force)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const checkpoints = new CheckpointStore(
    config.checkpointDir
      ? { dir: config.checkpointDir, retentionMs: config.checkpointRetentionMs, logger }
      : { retentionMs: config.checkpointRetentionMs, logger }
  );
  const removed = await checkpoints.gc();
  if (removed > 0) printAgentDetail(`Removed ${removed} stale checkpoint(s)`);

  const ctx = createAgentContext({
    client: createClient(config, logger),
    config,
    loader,
    checkpoints,
    logger,
    signal: controller.signal,
  });

  printAgent(`Starting run ${runId}`);
  printAgentDetail(
    `Mode: ${parsed.subcommand} | Backend: ${config.backend} | Workspace: ${ctx.workspace.root}`
  );
  if (config.model) printAgentDetail(`Model: ${config.model}`);
  if (logger.filePath) printAgentDetail(`Log: ${logger.filePath}`);
  logger.logEvent({ event: 'cli_start', runId, subcommand: parsed.subcommand });

  const interpreter = new TurnInterpreter(ctx);
  const result = await interpreter.run(script, params);
  process.off('SIGINT', onSigint);

  if (result.finalText) {
    console.log(`\n${result.finalText}`);
  }
  const summary = formatStatsSummary(result.stats, Date.now() - totalStart);
  if (result.success) {
    printAgent(`Run ${runId} complete: ${summary}`);
  } else {
    printError(`Run ${runId} failed: ${result.error ?? 'unknown error'} (${summary})`);
  }
  logger.logEvent({ event: 'cli_done', runId, success: result.success });
  logger.close();
  process.exit(result.success ? 0 : 1);
}

main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});
