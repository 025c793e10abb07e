/**
 * Anthropic Messages API backend
 */

import Anthropic from '@anthropic-ai/sdk';

import type {
  ChatMessage,
  FunctionCall,
  LlmBackend,
  LlmRequest,
  LlmResponse,
  ToolDeclaration,
} from '../types/llm.js';
import { isRecord } from '../utils/guards.js';
import { BackendError, kindFromStatus } from './errors.js';

export const DEFAULT_ANTHROPIC_MODEL = 'claude-sonnet-4-5';
const DEFAULT_MAX_TOKENS = 8192;

export interface AnthropicBackendOptions {
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey?: string;
  maxTokens?: number;
  /** Injected client, used by tests */
  client?: Anthropic;
}

/**
 * Convert chat history to Anthropic message params.
 * System entries are returned separately; consecutive same-role entries merge.
 */
export function toAnthropicMessages(messages: ChatMessage[]): {
  system: string;
  messages: Anthropic.MessageParam[];
} {
  const systemParts: string[] = [];
  const out: Anthropic.MessageParam[] = [];

  for (const message of messages) {
    if (message.role === 'system') {
      for (const part of message.parts) {
        if (part.type === 'text' && part.text) systemParts.push(part.text);
      }
      continue;
    }

    const blocks: Anthropic.ContentBlockParam[] = [];
    for (const part of message.parts) {
      if (part.type === 'text') {
        if (part.text.trim()) blocks.push({ type: 'text', text: part.text });
      } else if (part.type === 'function_call') {
        blocks.push({
          type: 'tool_use',
          id: part.call.id ?? `toolu_${part.call.name}`,
          name: part.call.name,
          input: part.call.args,
        });
      } else {
        blocks.push({
          type: 'tool_result',
          tool_use_id: part.id ?? `toolu_${part.name}`,
          content: JSON.stringify(part.response),
          is_error: 'error' in part.response,
        });
      }
    }
    if (blocks.length === 0) continue;

    const previous = out[out.length - 1];
    if (previous && previous.role === message.role && Array.isArray(previous.content)) {
      previous.content.push(...blocks);
    } else {
      out.push({ role: message.role, content: blocks });
    }
  }

  return { system: systemParts.join('\n\n'), messages: out };
}

function toAnthropicTools(tools: ToolDeclaration[]): Anthropic.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.parameters },
  }));
}

/**
 * Normalize an Anthropic message to the backend-neutral shape
 */
export function fromAnthropicMessage(message: Anthropic.Message): LlmResponse {
  let text = '';
  const functionCalls: FunctionCall[] = [];
  for (const block of message.content) {
    if (block.type === 'text') {
      text += block.text;
    } else if (block.type === 'tool_use') {
      functionCalls.push({
        id: block.id,
        name: block.name,
        args: isRecord(block.input) ? block.input : {},
      });
    }
  }
  return { text, finishReason: message.stop_reason ?? 'unknown', functionCalls };
}

function toBackendError(error: unknown): unknown {
  if (error instanceof Anthropic.APIUserAbortError) {
    return error;
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new BackendError(error.message, 'network', { cause: error });
  }
  if (error instanceof Anthropic.APIError && error.status !== undefined) {
    const retryAfter = Number(error.headers?.['retry-after']);
    return new BackendError(error.message, kindFromStatus(error.status), {
      status: error.status,
      cause: error,
      ...(Number.isFinite(retryAfter) && retryAfter > 0 ? { retryAfterMs: retryAfter * 1000 } : {}),
    });
  }
  return error;
}

export class AnthropicBackend implements LlmBackend {
  readonly name = 'anthropic';
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(options: AnthropicBackendOptions = {}) {
    this.client =
      options.client ??
      new Anthropic({
        maxRetries: 0,
        ...(options.apiKey === undefined ? {} : { apiKey: options.apiKey }),
      });
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
  }

  async call(request: LlmRequest): Promise<LlmResponse> {
    const { system, messages } = toAnthropicMessages(request.messages);
    const systemText = [request.system, system].filter(Boolean).join('\n\n');
    const tools = request.tools && request.tools.length > 0 ? toAnthropicTools(request.tools) : [];

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: request.model ?? DEFAULT_ANTHROPIC_MODEL,
      max_tokens: this.maxTokens,
      messages,
      ...(systemText ? { system: systemText } : {}),
      ...(tools.length > 0 ? { tools } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.topK !== undefined ? { top_k: request.topK } : {}),
    };
    const requestOptions = request.signal ? { signal: request.signal } : {};

    try {
      if (request.onText) {
        const onText = request.onText;
        const stream = this.client.messages.stream(body, requestOptions);
        stream.on('text', (chunk) => onText(chunk));
        return fromAnthropicMessage(await stream.finalMessage());
      }
      return fromAnthropicMessage(await this.client.messages.create(body, requestOptions));
    } catch (error) {
      throw toBackendError(error);
    }
  }
}
