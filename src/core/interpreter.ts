/**
 * Turn interpreter
 *
 * Walks a script's turns in order. Each turn renders its messages, resolves
 * AI placeholders into model calls (handing tool calls to the orchestrator),
 * then runs control flow, instructions, the chain target and auto-run.
 * The first AI-bearing message of a top-level run may be taken over by the
 * blueprint or upgrade pipeline instead.
 */

import { detectTaskKind, resolveSampling } from '../llm/sampling.js';
import {
  printAgent,
  printAgentDetail,
  printError,
  printModel,
  printWarning,
  truncate,
} from '../output/colors.js';
import { mergeStats, recordModelCall, type RunStats } from '../output/stats.js';
import { BlueprintPipeline } from '../pipelines/blueprint.js';
import { chooseRoute } from '../pipelines/intent.js';
import { UpgradePipeline } from '../pipelines/upgrade.js';
import type { CallOverrides, Instruction, Message, Script, Turn } from '../script/types.js';
import { type ScriptMap, valuesEqual, valueToText } from '../script/values.js';
import {
  getCaptureLogMessage,
  getTemplateVariables,
  renderTemplate,
} from '../script/variables.js';
import type { ChatMessage, LlmRequest } from '../types/llm.js';
import { messageText, textMessage } from '../types/llm.js';
import {
  LATEST_RESULT_VAR,
  RESPONSE_VAR,
  TRUNCATE_TERMINAL_LINE,
} from '../utils/constants.js';
import {
  CancelledError,
  getErrorMessage,
  ScriptNotFoundError,
  throwIfCancelled,
} from '../utils/errors.js';
import type { AgentContext, ConversationState } from './context.js';
import { createConversationState } from './context.js';
import { executeControlFlow } from './control-flow.js';
import { executeInstruction, instructionFromCall } from './instructions.js';
import {
  applyChoice,
  buildCallMessages,
  choiceInstruction,
  type CurrentMessage,
  pickRandom,
  stripPlaceholders,
} from './llm-call.js';
import { renderMessage, type ReplacementRuntime } from './messages.js';
import { type DriveOptions, ToolCallOrchestrator } from './orchestrator.js';

export interface RunOptions {
  /** 0 for a top-level run */
  depth?: number;
  /** Let the first AI turn be routed to a pipeline; defaults to config.pipelines at depth 0 */
  routePipelines?: boolean;
}

export interface RunResult {
  success: boolean;
  finalText: string;
  variables: ScriptMap;
  chatHistory: ChatMessage[];
  error?: string;
  stats: RunStats;
}

type Sampling = DriveOptions['sampling'];

export class TurnInterpreter {
  private readonly orchestrator: ToolCallOrchestrator;

  constructor(
    private readonly ctx: AgentContext,
    orchestrator?: ToolCallOrchestrator
  ) {
    this.orchestrator = orchestrator ?? new ToolCallOrchestrator(ctx);
  }

  /**
   * Run a script; failures are reported in the result, never thrown,
   * except cancellation inside a nested run
   */
  async run(script: Script, inputParams: ScriptMap = {}, options: RunOptions = {}): Promise<RunResult> {
    const depth = options.depth ?? 0;
    const route = options.routePipelines ?? (depth === 0 && this.ctx.config.pipelines);
    const state = createConversationState(script, inputParams, depth, route);
    const { logger, signal } = this.ctx;

    logger.logEvent({ event: 'run_start', script: script.sourcePath, depth, turns: script.turns.length });
    try {
      for (const [index, turn] of script.turns.entries()) {
        throwIfCancelled(signal);
        state.stats.turns++;
        printAgentDetail(`Turn ${index + 1}/${script.turns.length}`);
        await this.runTurn(turn, state);
      }
    } catch (error) {
      if (error instanceof CancelledError && depth > 0) throw error;
      const message = getErrorMessage(error);
      if (depth === 0) printError(message);
      logger.logEvent({ event: 'run_failed', depth, message });
      return { ...this.result(state), success: false, error: message };
    }

    logger.logEvent({ event: 'run_done', depth, aiCalls: state.stats.aiCalls });
    return this.result(state);
  }

  private result(state: ConversationState): RunResult {
    const { env } = state;
    const finalText = valueToText(env.get(RESPONSE_VAR) ?? env.get(LATEST_RESULT_VAR));
    return {
      success: true,
      finalText,
      variables: env.snapshot(),
      chatHistory: state.history,
      stats: state.stats,
    };
  }

  // ============================================================
  // TURNS
  // ============================================================

  private async runTurn(turn: Turn, state: ConversationState): Promise<void> {
    const runtime = this.replacementRuntime(state);
    let fired = false;
    let sawUser = false;

    for (const message of turn.messages) {
      const content = await renderMessage(message, state.env, runtime);
      if (message.role === 'user') sawUser = true;

      if (!message.placeholder) {
        if (content.trim()) state.history.push(textMessage(message.role, content));
        continue;
      }

      fired = true;
      if (state.routePending) {
        state.routePending = false;
        const request = message.role === 'assistant' ? lastUserText(state.history) : stripPlaceholders(content);
        if (request && (await this.routeToPipeline(request, message.placeholder.variable, state))) {
          break;
        }
      }
      await this.resolvePlaceholder(message, content, state);
    }

    for (const block of turn.controlFlow) {
      await executeControlFlow(block, {
        env: state.env,
        maxIterations: this.ctx.config.maxLoopIterations,
        signal: this.ctx.signal,
        runInstruction: (instruction) => this.runInstruction(instruction, state),
        runScript: (name, params) => this.runPipeScript(name, params, state),
      });
    }

    for (const instruction of turn.instructions) {
      await this.runInstruction(instruction, state);
    }

    if (turn.chain) {
      await this.runChain(turn.chain.name, turn.chain.params, state);
    }

    if (!fired && state.script.frontmatter.autoRun && sawUser && state.history.length > 0) {
      printAgentDetail('Auto-running model call');
      await this.resolvePlaceholder(null, '', state);
    }
  }

  private runInstruction(instruction: Instruction, state: ConversationState): Promise<string> {
    return executeInstruction(instruction, state.env, this.ctx.instructions, this.ctx.emit);
  }

  // ============================================================
  // MODEL CALLS
  // ============================================================

  /**
   * Resolve a placeholder message, or an auto-run call when `message` is null
   */
  private async resolvePlaceholder(
    message: Message | null,
    content: string,
    state: ConversationState
  ): Promise<void> {
    const placeholder = message?.placeholder;
    const variable = placeholder?.variable ?? LATEST_RESULT_VAR;
    const choice = message?.choice;
    const role = message?.role ?? 'user';
    const prompt = stripPlaceholders(content);

    let text: string;
    if (choice?.random) {
      text = pickRandom(choice);
      printAgentDetail(`Random pick for ${variable}: ${text}`);
      this.appendExchange(state, role, content, prompt, placeholder?.markup, text);
      this.bind(state, variable, text);
      return;
    }

    const promptText = prompt || lastUserText(state.history);
    const sampling = this.sampling(placeholder?.overrides ?? {}, state.script, promptText);
    const current: CurrentMessage | null =
      message === null || role === 'assistant'
        ? null
        : { role, content: choice ? `${prompt}${choiceInstruction(choice)}` : prompt };
    const { messages, system } = buildCallMessages(
      state.history,
      current,
      this.ctx.config.maxHistoryMessages
    );

    const request: LlmRequest = { ...sampling, messages, signal: this.ctx.signal };
    if (system) request.system = system;
    if (!choice) {
      request.tools = this.ctx.tools.declarations();
      if (this.ctx.onText) request.onText = this.ctx.onText;
    }

    const response = await this.ctx.client.call(request);
    recordModelCall(state.stats, response.text.length);
    this.ctx.logger.logEvent({
      event: 'model_call',
      variable,
      templateVars: message ? getTemplateVariables(message.content) : [],
      chars: response.text.length,
      functionCalls: response.functionCalls.length,
      finishReason: response.finishReason,
    });

    text = choice ? applyChoice(response.text, choice) : response.text;
    if (text.trim()) printModel(truncate(text.trim().replace(/\s+/g, ' '), TRUNCATE_TERMINAL_LINE));

    if (message !== null) {
      this.appendExchange(state, role, content, prompt, placeholder?.markup, text);
    } else if (text.trim()) {
      state.history.push(textMessage('assistant', text));
    }

    if (!choice && response.functionCalls.length > 0) {
      const drive = await this.orchestrator.drive(state.history, response, {
        stats: state.stats,
        sampling,
        expectFiles: detectTaskKind(promptText) === 'code-generation',
      });
      printAgentDetail(
        `Tool loop: ${drive.toolCalls} calls, ${drive.continuations} continuations, ${drive.stopReason}`
      );
      if (drive.text) text = drive.text;
    }

    this.bind(state, variable, text);
  }

  /**
   * History entries for a resolved placeholder: a user prompt followed by
   * the response, or the assistant message with its markup filled in
   */
  private appendExchange(
    state: ConversationState,
    role: Message['role'],
    content: string,
    prompt: string,
    markup: string | undefined,
    text: string
  ): void {
    if (role === 'assistant') {
      const filled = markup ? content.split(markup).join(text) : `${content}${text}`;
      if (filled.trim()) state.history.push(textMessage('assistant', filled.trim()));
      return;
    }
    if (prompt) state.history.push(textMessage(role === 'system' ? 'user' : role, prompt));
    if (text.trim()) state.history.push(textMessage('assistant', text));
  }

  private bind(state: ConversationState, variable: string, text: string): void {
    printAgentDetail(getCaptureLogMessage(text, variable));
    state.env.set(variable, text);
    state.env.set(RESPONSE_VAR, text);
    if (variable !== LATEST_RESULT_VAR) state.env.set(LATEST_RESULT_VAR, text);
  }

  private sampling(overrides: CallOverrides, script: Script, promptText: string): Sampling {
    const { config, client } = this.ctx;
    const model = overrides.model ?? script.frontmatter.model ?? config.model ?? client.defaultModel;
    const sampling: Sampling = resolveSampling(overrides, model, promptText);
    if (model !== undefined) sampling.model = model;
    return sampling;
  }

  // ============================================================
  // PIPELINES
  // ============================================================

  /**
   * Hand the first AI turn to a pipeline when the request fits one
   * @returns true when a pipeline produced the turn's result
   */
  private async routeToPipeline(
    request: string,
    variable: string,
    state: ConversationState
  ): Promise<boolean> {
    const { config, workspace } = this.ctx;
    const route = await chooseRoute(request, workspace, config);
    if (route === 'none') return false;
    printAgent(`Routing request to the ${route} pipeline`);

    let text: string;
    if (route === 'upgrade') {
      const result = await new UpgradePipeline(this.ctx, this.orchestrator).run(request, state.history, {
        stats: state.stats,
        sampling: this.sampling({}, state.script, request),
        expectFiles: false,
      });
      text = result.text;
    } else {
      const result = await new BlueprintPipeline(this.ctx).run(request, state.stats);
      state.history.push(textMessage('user', request));
      text = result.summary;
    }

    // The tool loop has already appended its closing text
    const last = state.history[state.history.length - 1];
    const appended = last?.role === 'assistant' && messageText(last) === text;
    if (text.trim() && !appended) state.history.push(textMessage('assistant', text));
    this.bind(state, variable, text);
    return true;
  }

  // ============================================================
  // NESTED RUNS
  // ============================================================

  private async runNested(
    name: string,
    params: ScriptMap,
    state: ConversationState,
    kind: string
  ): Promise<RunResult | null> {
    if (state.depth + 1 > this.ctx.config.maxChainDepth) {
      printWarning(`${kind} ${name} skipped: depth limit ${this.ctx.config.maxChainDepth} reached`);
      return null;
    }
    let script: Script;
    try {
      script = this.ctx.loader.resolve(name, state.script);
    } catch (error) {
      if (!(error instanceof ScriptNotFoundError)) throw error;
      printWarning(`${kind} ${name} skipped: ${error.message}`);
      return null;
    }
    printAgentDetail(`${kind} ${name}`);
    const result = await this.run(script, params, { depth: state.depth + 1, routePipelines: false });
    mergeStats(state.stats, result.stats);
    if (!result.success) {
      printWarning(`${kind} ${name} failed: ${result.error ?? 'unknown error'}`);
      return null;
    }
    return result;
  }

  /**
   * `-> target(params)`: run with `content` set to the current result,
   * fold its result back
   */
  private async runChain(name: string, params: Record<string, string>, state: ConversationState): Promise<void> {
    const { env } = state;
    const content = valueToText(env.get(LATEST_RESULT_VAR) ?? env.get(RESPONSE_VAR));
    const rendered = renderParams(params, state);
    const result = await this.runNested(name, { content, ...rendered }, state, 'Chain');
    if (result) {
      env.set(LATEST_RESULT_VAR, result.finalText);
      env.set(RESPONSE_VAR, result.finalText);
    }
  }

  /**
   * Pipe element: the nested script sees the current variables, and only
   * the variables it changed are copied back
   */
  private async runPipeScript(
    name: string,
    params: Record<string, string>,
    state: ConversationState
  ): Promise<void> {
    const before = state.env.snapshot();
    const result = await this.runNested(name, { ...before, ...renderParams(params, state) }, state, 'Pipe');
    if (!result) return;
    for (const [key, value] of Object.entries(result.variables)) {
      if (!valuesEqual(before[key], value) || !(key in before)) {
        state.env.set(key, value);
      }
    }
  }

  private replacementRuntime(state: ConversationState): ReplacementRuntime {
    return {
      runScript: async (name, params) => {
        const result = await this.runNested(name, params, state, 'Script');
        return result?.finalText ?? '';
      },
      runInstruction: (name, params) =>
        this.runInstruction(instructionFromCall(name, params), state),
    };
  }
}

function renderParams(params: Record<string, string>, state: ConversationState): ScriptMap {
  return Object.fromEntries(
    Object.entries(params).map(([key, value]) => [key, renderTemplate(value, state.env)])
  );
}

function lastUserText(history: ChatMessage[]): string {
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (message?.role === 'user') {
      const text = messageText(message).trim();
      if (text) return text;
    }
  }
  return '';
}
