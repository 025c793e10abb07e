/**
 * Backend-neutral conversation and model call types
 */

export type Role = 'system' | 'user' | 'assistant';

/**
 * A structured request from the model to invoke a tool
 */
export interface FunctionCall {
  /** Correlation id assigned by the backend, when it has one */
  id?: string;
  name: string;
  args: Record<string, unknown>;
}

export interface TextPart {
  type: 'text';
  text: string;
}

export interface FunctionCallPart {
  type: 'function_call';
  call: FunctionCall;
}

export interface FunctionResponsePart {
  type: 'function_response';
  name: string;
  id?: string;
  response: Record<string, unknown>;
}

export type Part = TextPart | FunctionCallPart | FunctionResponsePart;

/**
 * One chat history entry
 */
export interface ChatMessage {
  role: Role;
  parts: Part[];
}

/**
 * Tool schema advertised to the model
 */
export interface ToolDeclaration {
  name: string;
  description: string;
  /** JSON schema of the arguments object */
  parameters: {
    type: 'object';
    properties: Record<string, unknown>;
    required?: string[];
  };
}

/**
 * Normalized model response
 */
export interface LlmResponse {
  text: string;
  finishReason: string;
  functionCalls: FunctionCall[];
}

/**
 * A single model call
 */
export interface LlmRequest {
  messages: ChatMessage[];
  model?: string;
  temperature?: number;
  topP?: number;
  topK?: number;
  /** Omitted or empty disables tool use for the call */
  tools?: ToolDeclaration[];
  system?: string;
  signal?: AbortSignal;
  /** Incremental text callback for streaming backends */
  onText?: (chunk: string) => void;
}

/**
 * Wire adapter for a model provider
 */
export interface LlmBackend {
  readonly name: string;
  call(request: LlmRequest): Promise<LlmResponse>;
}

/**
 * Create a text-only chat message
 */
export function textMessage(role: Role, text: string): ChatMessage {
  return { role, parts: [{ type: 'text', text }] };
}

/**
 * Concatenated text of a message's text parts
 */
export function messageText(message: ChatMessage): string {
  return message.parts
    .filter((part): part is TextPart => part.type === 'text')
    .map((part) => part.text)
    .join('');
}
