/**
 * Built-in tool set
 */

import { editTool, listFilesTool, readFileTool, writeFileTool } from './files.js';
import { ToolRegistry } from './registry.js';
import { shellTool } from './shell.js';
import { createWriteTodosTool, TodoList } from './todos.js';

export { defineTool, ToolRegistry } from './registry.js';
export { TodoList, WRITE_TODOS_TOOL } from './todos.js';

/**
 * Registry with every built-in tool; the todo list is per registry
 */
export function createDefaultRegistry(todos: TodoList = new TodoList()): ToolRegistry {
  return new ToolRegistry()
    .register(readFileTool)
    .register(writeFileTool)
    .register(editTool)
    .register(listFilesTool)
    .register(shellTool)
    .register(createWriteTodosTool(todos));
}
