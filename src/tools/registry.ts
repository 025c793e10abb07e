/**
 * Tool registry and the zod-backed tool definition helper
 */

import type { z } from 'zod';

import type { ToolDeclaration } from '../types/llm.js';
import type { Tool, ToolContext, ToolResult, Validation } from '../types/tools.js';

export interface ToolDefinition<P> {
  name: string;
  description: string;
  /** JSON schema advertised to the model */
  parameters: ToolDeclaration['parameters'];
  /** Runtime validation of the model's arguments */
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  mutating?: boolean;
  invoke(params: P, context: ToolContext): Promise<ToolResult>;
}

/**
 * Build a Tool whose validate() runs the zod schema
 */
export function defineTool<P>(definition: ToolDefinition<P>): Tool<P> {
  return {
    name: definition.name,
    declaration: {
      name: definition.name,
      description: definition.description,
      parameters: definition.parameters,
    },
    mutating: definition.mutating ?? false,
    validate(args: Record<string, unknown>): Validation<P> {
      const result = definition.schema.safeParse(args);
      if (result.success) {
        return { ok: true, params: result.data };
      }
      const issues = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
        .join('; ');
      return { ok: false, message: issues };
    },
    invoke: definition.invoke,
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, Tool>();

  register<P>(tool: Tool<P>): this {
    this.tools.set(tool.name, tool);
    return this;
  }

  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  names(): string[] {
    return [...this.tools.keys()];
  }

  declarations(): ToolDeclaration[] {
    return [...this.tools.values()].map((tool) => tool.declaration);
  }

  /**
   * Names of tools that write the file named by their path argument
   */
  mutatingTools(): Set<string> {
    return new Set(
      [...this.tools.values()].filter((tool) => tool.mutating).map((tool) => tool.name)
    );
  }
}
