/**
 * Tool contract shared by the registry, the orchestrator and the built-in tools
 */

import type { Workspace } from '../workspace/paths.js';
import type { ToolDeclaration } from './llm.js';

export type ToolErrorType = 'invalid-parameters' | 'execution-error' | 'not-found';

export interface ToolError {
  type: ToolErrorType;
  message: string;
}

/**
 * Outcome of one tool invocation; `error` set means the call failed
 */
export interface ToolResult {
  content: string;
  displayText?: string;
  error?: ToolError;
}

export type Validation<P> =
  | { ok: true; params: P }
  | { ok: false; message: string };

/**
 * Per-invocation context handed to every tool
 */
export interface ToolContext {
  workspace: Workspace;
  /** Cooperative cancellation token */
  signal: AbortSignal;
}

export interface Tool<P = unknown> {
  readonly name: string;
  readonly declaration: ToolDeclaration;
  /** Whether the tool writes the file named by its path argument */
  readonly mutating: boolean;
  validate(args: Record<string, unknown>): Validation<P>;
  invoke(params: P, context: ToolContext): Promise<ToolResult>;
}

/**
 * Read file input
 */
export interface ReadFileInput {
  file_path: string;
  offset?: number;
  limit?: number;
}

/**
 * Write file input
 */
export interface WriteFileInput {
  file_path: string;
  content: string;
}

/**
 * Edit input
 */
export interface EditInput {
  file_path: string;
  old_string: string;
  new_string: string;
  replace_all?: boolean;
}

/**
 * List files input
 */
export interface ListFilesInput {
  path?: string;
  recursive?: boolean;
}

/**
 * Shell input
 */
export interface ShellInput {
  command: string;
  timeout?: number;
}

export type TodoStatus = 'pending' | 'in_progress' | 'completed';

export interface TodoItem {
  content: string;
  status: TodoStatus;
}

/**
 * Todo list input
 */
export interface WriteTodosInput {
  todos: TodoItem[];
}

/**
 * Get a string field from tool input with safe fallback
 */
export function getToolInputString(
  input: Record<string, unknown>,
  field: string,
  defaultValue = ''
): string {
  const value = input[field];
  return typeof value === 'string' ? value : defaultValue;
}

/**
 * Path a call targets, read from its `file_path` or `path` argument
 */
export function getToolPath(input: Record<string, unknown>): string | null {
  const value = getToolInputString(input, 'file_path') || getToolInputString(input, 'path');
  return value === '' ? null : value;
}
