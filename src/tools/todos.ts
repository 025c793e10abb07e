/**
 * write_todos: the model's working task list
 */

import { z } from 'zod';

import type { TodoItem, Tool, WriteTodosInput } from '../types/tools.js';
import { throwIfCancelled } from '../utils/errors.js';
import { defineTool } from './registry.js';

export const WRITE_TODOS_TOOL = 'write_todos';

const STATUS_MARKS: Record<TodoItem['status'], string> = {
  pending: '[ ]',
  in_progress: '[~]',
  completed: '[x]',
};

const writeTodosSchema: z.ZodType<WriteTodosInput, z.ZodTypeDef, unknown> = z.object({
  todos: z
    .array(
      z.object({
        content: z.string().min(1),
        status: z.enum(['pending', 'in_progress', 'completed']).default('pending'),
      })
    )
    .min(1),
});

/**
 * Render a todo list as checklist lines
 */
export function formatTodos(todos: TodoItem[]): string {
  return todos.map((todo) => `${STATUS_MARKS[todo.status]} ${todo.content}`).join('\n');
}

/**
 * Todo list state shared with the tool that updates it
 */
export class TodoList {
  private items: TodoItem[] = [];

  get todos(): readonly TodoItem[] {
    return this.items;
  }

  replace(todos: TodoItem[]): void {
    this.items = todos.map((todo) => ({ ...todo }));
  }
}

export function createWriteTodosTool(list: TodoList): Tool<WriteTodosInput> {
  return defineTool<WriteTodosInput>({
    name: WRITE_TODOS_TOOL,
    description:
      'Create or replace the task list for the current request. Call once, then implement the tasks.',
    parameters: {
      type: 'object',
      properties: {
        todos: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              content: { type: 'string' },
              status: { type: 'string', enum: ['pending', 'in_progress', 'completed'] },
            },
            required: ['content'],
          },
        },
      },
      required: ['todos'],
    },
    schema: writeTodosSchema,
    async invoke(params, { signal }) {
      throwIfCancelled(signal);
      list.replace(params.todos);
      const done = params.todos.filter((t) => t.status === 'completed').length;
      return {
        content: formatTodos(params.todos),
        displayText: `Todo list: ${params.todos.length} items (${done} done)`,
      };
    },
  });
}
