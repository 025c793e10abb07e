/**
 * Tool call orchestrator
 *
 * Executes the tool calls a model proposes and keeps the conversation
 * moving with continuation calls until the model stops or a bound trips:
 * the continuation depth limit, repeated calls to one tool, or a stall
 * that a single directive retry did not fix. Continuations are driven
 * from an explicit work stack, not by recursion.
 */

import {
  colors,
  printAgent,
  printAgentDetail,
  printWarning,
  truncate,
} from '../output/colors.js';
import { recordModelCall, recordToolUse, type RunStats } from '../output/stats.js';
import { WRITE_TODOS_TOOL } from '../tools/todos.js';
import type {
  ChatMessage,
  FunctionCall,
  FunctionResponsePart,
  LlmRequest,
  LlmResponse,
  Part,
} from '../types/llm.js';
import { textMessage } from '../types/llm.js';
import type { ToolErrorType, ToolResult } from '../types/tools.js';
import { getToolPath } from '../types/tools.js';
import {
  DEFAULT_REPEAT_THRESHOLD,
  REPEAT_WINDOW,
  STALL_MIN_TEXT_LENGTH,
  TOOL_REPEAT_THRESHOLDS,
  TRUNCATE_RESULT,
} from '../utils/constants.js';
import {
  CancelledError,
  getErrorMessage,
  throwIfCancelled,
  WorkspacePathError,
} from '../utils/errors.js';
import { formatToolCall } from '../utils/formatting.js';
import type { AgentContext } from './context.js';
import { buildCallMessages } from './llm-call.js';
import { executeInParallel } from './parallel.js';

export type StopReason = 'completed' | 'max-depth' | 'repeat-detected' | 'stalled' | 'error';

export const TODO_DIRECTIVE =
  'The todo list has been created. Now proceed with implementing the tasks. Start by creating the project files and continue until the task is complete. Do not call write_todos again.';
export const PLAN_DIRECTIVE =
  "You've provided a plan or explanation. Now proceed with implementing it. Use the available tools to create files, run commands, and complete the task. Continue until finished.";
export const CONTINUE_DIRECTIVE =
  'Please continue with the next steps to complete the task. Use the available tools to make progress.';

const BOILERPLATE_REGEX = /^(ok(ay)?|sure|done|understood|got it|alright|will do|certainly)[.!]*$/i;
const PLAN_REGEX =
  /\b(I will|I'll|let me|I am going to|I'm going to|here(?:'s| is) (?:the|my) plan|step 1|first,? I)\b/i;

export interface DriveOptions {
  stats: RunStats;
  /** Model and sampling reused for every continuation */
  sampling: Pick<LlmRequest, 'model' | 'temperature' | 'topP' | 'topK'>;
  /** The request should produce files; enables stall recovery */
  expectFiles: boolean;
}

export interface DriveResult {
  /** Last model response seen */
  response: LlmResponse;
  /** Last non-empty response text in the chain */
  text: string;
  toolCalls: number;
  /** Continuation calls issued */
  continuations: number;
  stopReason: StopReason;
  /** Workspace-relative paths changed by successful mutating calls */
  filesWritten: string[];
}

interface Frame {
  response: LlmResponse;
  depth: number;
}

interface ChainState {
  todosWritten: boolean;
  todoDirectiveSent: boolean;
  stallRetrySent: boolean;
  mutationsSinceTodos: number;
  filesWritten: Set<string>;
  toolCalls: number;
  continuations: number;
  lastText: string;
}

/**
 * Structured payload the model receives for one tool result
 */
export function toFunctionResponse(call: FunctionCall, result: ToolResult): FunctionResponsePart {
  const part: FunctionResponsePart = {
    type: 'function_response',
    name: call.name,
    response: result.error
      ? { error: result.error.message, errorType: result.error.type }
      : { output: result.content },
  };
  if (call.id !== undefined) part.id = call.id;
  return part;
}

/**
 * Results for `name` across the last `window` history entries; every part counts
 */
export function countRecentResults(history: ChatMessage[], name: string, window = REPEAT_WINDOW): number {
  return history
    .slice(-window)
    .flatMap((message) => message.parts)
    .filter((part) => part.type === 'function_response' && part.name === name).length;
}

export function repeatThreshold(name: string): number {
  return TOOL_REPEAT_THRESHOLDS[name] ?? DEFAULT_REPEAT_THRESHOLD;
}

/**
 * Minimal, boilerplate or plan-only text
 */
export function looksStalled(text: string): boolean {
  const trimmed = text.trim();
  return (
    trimmed.length < STALL_MIN_TEXT_LENGTH ||
    BOILERPLATE_REGEX.test(trimmed) ||
    PLAN_REGEX.test(trimmed)
  );
}

export class ToolCallOrchestrator {
  private callCounter = 0;

  constructor(private readonly ctx: AgentContext) {}

  /**
   * Execute one call; tool failures become typed error results
   * @throws CancelledError when the run is cancelled
   */
  async executeCall(call: FunctionCall, stats?: RunStats): Promise<ToolResult> {
    const { tools, workspace, signal, logger } = this.ctx;
    throwIfCancelled(signal);

    const tool = tools.get(call.name);
    if (!tool) {
      return this.failure(call, 'not-found', `Tool not found: ${call.name}`);
    }
    const validation = tool.validate(call.args);
    if (!validation.ok) {
      return this.failure(
        call,
        'invalid-parameters',
        `Invalid parameters for ${call.name}: ${validation.message}`
      );
    }

    printAgent(`${colors.cyan}${formatToolCall(call.name, call.args)}${colors.reset}`);
    if (stats) recordToolUse(stats, call.name);
    const start = Date.now();

    try {
      const result = await tool.invoke(validation.params, { workspace, signal });
      const durationMs = Date.now() - start;
      printAgentDetail(`${call.name} -> ${truncate(result.displayText ?? result.content, TRUNCATE_RESULT)}`);
      logger.logEvent({ event: 'tool_result', tool: call.name, id: call.id ?? null, durationMs, ok: !result.error });
      return result;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      const type: ToolErrorType =
        error instanceof WorkspacePathError ? 'invalid-parameters' : 'execution-error';
      return this.failure(call, type, getErrorMessage(error));
    }
  }

  /**
   * Execute calls in independence groups; results in call order
   */
  async executeBatch(calls: FunctionCall[], stats?: RunStats): Promise<ToolResult[]> {
    return executeInParallel(calls, this.ctx.tools.mutatingTools(), (call) =>
      this.executeCall(call, stats)
    );
  }

  /**
   * Run the initial response's calls and every continuation after them.
   * Appends call and result messages to `history`.
   */
  async drive(history: ChatMessage[], initial: LlmResponse, options: DriveOptions): Promise<DriveResult> {
    const { config, signal } = this.ctx;
    const chain: ChainState = {
      todosWritten: false,
      todoDirectiveSent: false,
      stallRetrySent: false,
      mutationsSinceTodos: 0,
      filesWritten: new Set(),
      toolCalls: 0,
      continuations: 0,
      lastText: initial.text.trim(),
    };
    const pending: Frame[] = [{ response: initial, depth: 0 }];
    let last = initial;
    let stopReason: StopReason = 'completed';

    while (pending.length > 0) {
      const frame = pending.pop();
      if (!frame) break;
      throwIfCancelled(signal);
      last = frame.response;

      const text = frame.response.text.trim();
      if (text) chain.lastText = text;
      const calls = frame.response.functionCalls.map((call) => this.withId(call));

      if (calls.length === 0) {
        if (frame.depth > 0 && text) history.push(textMessage('assistant', text));
      } else {
        await this.runCalls(history, calls, frame.depth > 0 ? text : '', chain, options);
      }

      const executed = calls.some((call) => !this.isSuppressed(call, chain));
      let directive: string | null = null;
      if (!executed) {
        if (frame.depth === 0 && calls.length === 0) break;
        directive = this.recoveryDirective(frame.response, chain, options);
        if (directive === null) {
          stopReason = this.isStalled(frame.response, chain, options) ? 'stalled' : 'completed';
          if (stopReason === 'stalled') printWarning('Model stalled before finishing the task');
          break;
        }
      }

      if (frame.depth >= config.maxContinuationDepth) {
        stopReason = 'max-depth';
        printWarning(`Stopping tool loop at depth ${config.maxContinuationDepth}`);
        break;
      }

      if (directive === null && frame.depth > 0) {
        const repeated = this.repeatedTool(history, calls);
        if (repeated !== null) {
          stopReason = 'repeat-detected';
          printWarning(`Stopping tool loop: ${repeated} called repeatedly`);
          break;
        }
      }

      if (directive !== null) {
        printAgentDetail(`Directive: ${truncate(directive, TRUNCATE_RESULT)}`);
        history.push(textMessage('user', directive));
      }
      const next = await this.continueConversation(history, options);
      if (next === null) {
        stopReason = 'error';
        break;
      }
      chain.continuations++;
      pending.push({ response: next, depth: frame.depth + 1 });
    }

    this.ctx.logger.logEvent({
      event: 'tool_loop_done',
      stopReason,
      toolCalls: chain.toolCalls,
      continuations: chain.continuations,
    });

    return {
      response: last,
      text: chain.lastText,
      toolCalls: chain.toolCalls,
      continuations: chain.continuations,
      stopReason,
      filesWritten: [...chain.filesWritten],
    };
  }

  // ============================================================
  // INTERNALS
  // ============================================================

  private withId(call: FunctionCall): FunctionCall {
    if (call.id) return call;
    this.callCounter++;
    return { ...call, id: `call_${this.callCounter}` };
  }

  private isSuppressed(call: FunctionCall, chain: ChainState): boolean {
    return call.name === WRITE_TODOS_TOOL && chain.todosWritten;
  }

  /**
   * Append the call message, execute, append the results message
   */
  private async runCalls(
    history: ChatMessage[],
    calls: FunctionCall[],
    text: string,
    chain: ChainState,
    options: DriveOptions
  ): Promise<void> {
    const callParts = calls.map((call): Part => ({ type: 'function_call', call }));
    history.push({
      role: 'assistant',
      parts: text ? [{ type: 'text', text }, ...callParts] : callParts,
    });

    const suppressed = calls.map((call) => this.isSuppressed(call, chain));
    const runnable = calls.filter((_call, i) => !suppressed[i]);
    const results = await this.executeBatch(runnable, options.stats);
    chain.toolCalls += runnable.length;

    const mutating = this.ctx.tools.mutatingTools();
    let next = 0;
    const responseParts: Part[] = calls.map((call, i) => {
      if (suppressed[i]) {
        printAgentDetail(`Skipped repeated ${call.name}`);
        return toFunctionResponse(call, {
          content: 'Skipped: the todo list already exists. Implement the tasks instead.',
        });
      }
      const result = results[next++] ?? {
        content: '',
        error: { type: 'execution-error', message: 'No result recorded' },
      };
      this.recordOutcome(call, result, chain, mutating);
      return toFunctionResponse(call, result);
    });
    history.push({ role: 'user', parts: responseParts });
  }

  private recordOutcome(
    call: FunctionCall,
    result: ToolResult,
    chain: ChainState,
    mutating: ReadonlySet<string>
  ): void {
    if (result.error) return;
    if (call.name === WRITE_TODOS_TOOL) {
      chain.todosWritten = true;
      chain.mutationsSinceTodos = 0;
      return;
    }
    if (!mutating.has(call.name)) return;
    chain.mutationsSinceTodos++;
    const target = getToolPath(call.args);
    const absolute = target === null ? null : this.ctx.workspace.tryResolve(target);
    if (absolute !== null) {
      chain.filesWritten.add(this.ctx.workspace.relative(absolute));
    }
  }

  private repeatedTool(history: ChatMessage[], calls: FunctionCall[]): string | null {
    for (const name of new Set(calls.map((call) => call.name))) {
      if (countRecentResults(history, name) >= repeatThreshold(name)) {
        return name;
      }
    }
    return null;
  }

  private isStalled(response: LlmResponse, chain: ChainState, options: DriveOptions): boolean {
    return (
      options.expectFiles &&
      chain.filesWritten.size < this.ctx.config.stallTargetFiles &&
      looksStalled(response.text)
    );
  }

  /**
   * Directive to inject after a response that executed nothing, or null to stop
   */
  private recoveryDirective(
    response: LlmResponse,
    chain: ChainState,
    options: DriveOptions
  ): string | null {
    if (chain.todosWritten && chain.mutationsSinceTodos === 0 && !chain.todoDirectiveSent) {
      chain.todoDirectiveSent = true;
      return TODO_DIRECTIVE;
    }
    if (chain.stallRetrySent || !this.isStalled(response, chain, options)) {
      return null;
    }
    chain.stallRetrySent = true;
    return response.text.trim().length >= STALL_MIN_TEXT_LENGTH ? PLAN_DIRECTIVE : CONTINUE_DIRECTIVE;
  }

  private async continueConversation(
    history: ChatMessage[],
    options: DriveOptions
  ): Promise<LlmResponse | null> {
    const { client, config, tools, signal, logger } = this.ctx;
    const { messages, system } = buildCallMessages(history, null, config.maxHistoryMessages);
    const request: LlmRequest = {
      ...options.sampling,
      messages,
      tools: tools.declarations(),
      signal,
    };
    if (system) request.system = system;
    if (this.ctx.onText) request.onText = this.ctx.onText;

    try {
      const response = await client.call(request);
      recordModelCall(options.stats, response.text.length);
      return response;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      const message = getErrorMessage(error);
      printWarning(`Continuation failed: ${message}`);
      logger.logEvent({ event: 'continuation_failed', message });
      return null;
    }
  }

  private failure(call: FunctionCall, type: ToolErrorType, message: string): ToolResult {
    printWarning(`${formatToolCall(call.name, call.args)} failed: ${truncate(message, TRUNCATE_RESULT)}`);
    this.ctx.logger.logEvent({ event: 'tool_error', tool: call.name, id: call.id ?? null, errorType: type, message });
    return { content: '', error: { type, message } };
  }
}
