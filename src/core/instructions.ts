/**
 * Instruction execution: echo, set, print and registered custom instructions
 */

import { printWarning } from '../output/colors.js';
import type { Instruction } from '../script/types.js';
import { type Environment, type ScriptValue, valueToText } from '../script/values.js';
import { renderTemplate } from '../script/variables.js';
import { LATEST_RESULT_VAR } from '../utils/constants.js';

export interface CustomInstructionCall {
  name: string;
  /** Arguments with templates rendered */
  args: Record<string, string>;
  value?: string;
  env: Environment;
  emit: (text: string) => void;
}

/**
 * Handler for a `$name` instruction; the returned value is its output
 */
export type InstructionHandler = (
  call: CustomInstructionCall
) => ScriptValue | undefined | Promise<ScriptValue | undefined>;

export class InstructionRegistry {
  private readonly handlers = new Map<string, InstructionHandler>();

  register(name: string, handler: InstructionHandler): this {
    this.handlers.set(name, handler);
    return this;
  }

  get(name: string): InstructionHandler | undefined {
    return this.handlers.get(name);
  }

  has(name: string): boolean {
    return this.handlers.has(name);
  }
}

/**
 * Build an instruction from a `[[@$name(args)]]` or pipe reference
 */
export function instructionFromCall(name: string, args: Record<string, string>): Instruction {
  switch (name) {
    case 'echo': {
      const text = args['text'] ?? args['value'] ?? Object.values(args)[0] ?? '';
      return { kind: 'echo', text, templateRef: false };
    }
    case 'set':
      return {
        kind: 'set',
        assignments: Object.entries(args).map(([key, value]) => ({ key, value })),
      };
    case 'print':
      return { kind: 'print' };
    default:
      return { kind: 'custom', name, args };
  }
}

/**
 * `$set` values: boolean, null and numeric literals become typed values
 */
function coerceLiteral(text: string): ScriptValue {
  const trimmed = text.trim();
  if (trimmed === 'true') return true;
  if (trimmed === 'false') return false;
  if (trimmed === 'null') return null;
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) return Number(trimmed);
  return text;
}

function renderArgs(args: Record<string, string>, env: Environment): Record<string, string> {
  return Object.fromEntries(
    Object.entries(args).map(([key, value]) => [key, renderTemplate(value, env)])
  );
}

/**
 * Execute one instruction against the environment
 * @returns the instruction's output text ('' for none)
 */
export async function executeInstruction(
  instruction: Instruction,
  env: Environment,
  registry: InstructionRegistry,
  emit: (text: string) => void
): Promise<string> {
  switch (instruction.kind) {
    case 'echo': {
      const text = instruction.templateRef
        ? valueToText(env.lookup(instruction.text))
        : renderTemplate(instruction.text, env);
      emit(text);
      return text;
    }
    case 'set': {
      for (const { key, value } of instruction.assignments) {
        env.set(key, coerceLiteral(renderTemplate(value, env)));
      }
      return '';
    }
    case 'print': {
      const text = valueToText(env.get(LATEST_RESULT_VAR));
      emit(text);
      return text;
    }
    case 'custom': {
      const handler = registry.get(instruction.name);
      if (!handler) {
        printWarning(`Unknown instruction $${instruction.name}, skipped`);
        return '';
      }
      const call: CustomInstructionCall = {
        name: instruction.name,
        args: renderArgs(instruction.args, env),
        env,
        emit,
      };
      if (instruction.value !== undefined) {
        call.value = renderTemplate(instruction.value, env);
      }
      return valueToText(await handler(call));
    }
    default: {
      const unreachable: never = instruction;
      return unreachable;
    }
  }
}
