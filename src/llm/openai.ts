/**
 * OpenAI-compatible chat completions backend
 * Works against api.openai.com and local servers exposing /v1/chat/completions
 */

import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionMessageToolCall,
  ChatCompletionTool,
} from 'openai/resources/chat/completions';

import type {
  ChatMessage,
  FunctionCall,
  LlmBackend,
  LlmRequest,
  LlmResponse,
  ToolDeclaration,
} from '../types/llm.js';
import { parseJsonObject } from '../utils/guards.js';
import { BackendError, kindFromStatus } from './errors.js';

export const DEFAULT_OPENAI_MODEL = 'gpt-4o';
/** Sent when no key is configured; local servers ignore it */
const NO_API_KEY = 'none';

/**
 * The part of the SDK client the backend calls
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal }
      ): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAiBackendOptions {
  /** Falls back to OPENAI_API_KEY */
  apiKey?: string;
  /** Falls back to OPENAI_BASE_URL */
  baseUrl?: string;
  maxTokens?: number;
  /** Injected client, used by tests */
  client?: ChatCompletionsClient;
}

/**
 * Convert chat history to chat-completions messages
 */
export function toOpenAiMessages(messages: ChatMessage[]): ChatCompletionMessageParam[] {
  const out: ChatCompletionMessageParam[] = [];
  for (const message of messages) {
    const text = message.parts
      .map((part) => (part.type === 'text' ? part.text : ''))
      .join('');

    if (message.role === 'assistant') {
      const calls = message.parts.flatMap((part): ChatCompletionMessageToolCall[] =>
        part.type === 'function_call'
          ? [
              {
                id: part.call.id ?? `call_${part.call.name}`,
                type: 'function',
                function: { name: part.call.name, arguments: JSON.stringify(part.call.args) },
              },
            ]
          : []
      );
      if (!text && calls.length === 0) continue;
      out.push(
        calls.length > 0
          ? { role: 'assistant', content: text || null, tool_calls: calls }
          : { role: 'assistant', content: text }
      );
      continue;
    }

    if (text) {
      out.push(message.role === 'system' ? { role: 'system', content: text } : { role: 'user', content: text });
    }
    for (const part of message.parts) {
      if (part.type === 'function_response') {
        out.push({
          role: 'tool',
          tool_call_id: part.id ?? `call_${part.name}`,
          content: JSON.stringify(part.response),
        });
      }
    }
  }
  return out;
}

function toOpenAiTools(tools: ToolDeclaration[]): ChatCompletionTool[] {
  return tools.map((tool) => ({
    type: 'function',
    function: { name: tool.name, description: tool.description, parameters: { ...tool.parameters } },
  }));
}

/**
 * Normalize a completion to the backend-neutral shape
 */
export function fromCompletion(completion: ChatCompletion): LlmResponse {
  const choice = completion.choices[0];
  if (!choice) {
    throw new BackendError('Malformed completion: no choices returned', 'server');
  }
  const functionCalls = (choice.message.tool_calls ?? []).map(
    (call): FunctionCall => ({
      id: call.id,
      name: call.function.name,
      args: parseJsonObject(call.function.arguments || '{}') ?? {},
    })
  );
  return { text: choice.message.content ?? '', finishReason: choice.finish_reason, functionCalls };
}

function toBackendError(error: unknown): unknown {
  if (error instanceof OpenAI.APIUserAbortError) {
    return error;
  }
  if (error instanceof OpenAI.APIConnectionError) {
    return new BackendError(error.message, 'network', { cause: error });
  }
  if (error instanceof OpenAI.APIError && error.status !== undefined) {
    const retryAfter = Number(error.headers?.['retry-after']);
    return new BackendError(error.message, kindFromStatus(error.status), {
      status: error.status,
      cause: error,
      ...(Number.isFinite(retryAfter) && retryAfter > 0 ? { retryAfterMs: retryAfter * 1000 } : {}),
    });
  }
  return error;
}

export class OpenAiBackend implements LlmBackend {
  readonly name = 'openai';
  private readonly client: ChatCompletionsClient;
  private readonly maxTokens: number | undefined;

  constructor(options: OpenAiBackendOptions = {}) {
    const baseURL = options.baseUrl ?? process.env['OPENAI_BASE_URL'];
    this.client =
      options.client ??
      new OpenAI({
        apiKey: options.apiKey ?? process.env['OPENAI_API_KEY'] ?? NO_API_KEY,
        maxRetries: 0,
        ...(baseURL ? { baseURL } : {}),
      });
    this.maxTokens = options.maxTokens;
  }

  async call(request: LlmRequest): Promise<LlmResponse> {
    const messages = toOpenAiMessages(request.messages);
    if (request.system) {
      messages.unshift({ role: 'system', content: request.system });
    }
    const tools = request.tools && request.tools.length > 0 ? toOpenAiTools(request.tools) : [];

    const body: ChatCompletionCreateParamsNonStreaming = {
      model: request.model ?? DEFAULT_OPENAI_MODEL,
      messages,
      ...(tools.length > 0 ? { tools, tool_choice: 'auto' as const } : {}),
      ...(request.temperature !== undefined ? { temperature: request.temperature } : {}),
      ...(request.topP !== undefined ? { top_p: request.topP } : {}),
      ...(this.maxTokens !== undefined ? { max_tokens: this.maxTokens } : {}),
    };
    const requestOptions = request.signal ? { signal: request.signal } : {};

    let response: LlmResponse;
    try {
      response = fromCompletion(await this.client.chat.completions.create(body, requestOptions));
    } catch (error) {
      throw toBackendError(error);
    }
    if (response.text) request.onText?.(response.text);
    return response;
  }
}
