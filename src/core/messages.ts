/**
 * Message rendering: replacement directives and templates
 */

import { printWarning } from '../output/colors.js';
import type { Message, Replacement } from '../script/types.js';
import { type Environment, valueToText } from '../script/values.js';
import { renderTemplate } from '../script/variables.js';
import { getErrorMessage } from '../utils/errors.js';

/**
 * Hooks for directives that run other code
 */
export interface ReplacementRuntime {
  /** `[[@script(params)]]`: the nested run's final text */
  runScript(name: string, params: Record<string, string>): Promise<string>;
  /** `[[@$instr(params)]]`: the instruction's output */
  runInstruction(name: string, params: Record<string, string>): Promise<string>;
}

/**
 * Text a `/pattern/flags:VAR[:group]` directive substitutes
 */
export function applyRegexReplacement(
  replacement: Extract<Replacement, { kind: 'regex' }>,
  env: Environment
): string {
  const source = valueToText(env.lookup(replacement.variable));
  let pattern: RegExp;
  try {
    pattern = new RegExp(replacement.pattern, replacement.flags.replace(/g/g, ''));
  } catch (error) {
    printWarning(`Invalid pattern /${replacement.pattern}/: ${getErrorMessage(error)}`);
    return '';
  }

  const match = pattern.exec(source);
  if (!match) return '';
  const { group } = replacement;
  if (group === undefined) return match[0];
  if (typeof group === 'number') return match[group] ?? '';
  return match.groups?.[group] ?? '';
}

function renderParams(params: Record<string, string>, env: Environment): Record<string, string> {
  return Object.fromEntries(
    Object.entries(params).map(([key, value]) => [key, renderTemplate(value, env)])
  );
}

async function resolveReplacement(
  replacement: Replacement,
  env: Environment,
  runtime: ReplacementRuntime
): Promise<string> {
  switch (replacement.kind) {
    case 'script':
      return runtime.runScript(replacement.name, renderParams(replacement.params, env));
    case 'instruction':
      return runtime.runInstruction(replacement.name, renderParams(replacement.params, env));
    case 'regex':
      return applyRegexReplacement(replacement, env);
    default: {
      const unreachable: never = replacement;
      return unreachable;
    }
  }
}

/**
 * Final text of a message.
 * Immediate messages render templates before directives run; others after.
 */
export async function renderMessage(
  message: Message,
  env: Environment,
  runtime: ReplacementRuntime
): Promise<string> {
  let content = message.immediate ? renderTemplate(message.content, env) : message.content;

  for (const replacement of message.replacements) {
    const value = await resolveReplacement(replacement, env, runtime);
    content = content.split(replacement.markup).join(value);
  }

  return message.immediate ? content : renderTemplate(content, env);
}
