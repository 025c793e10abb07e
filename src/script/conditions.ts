/**
 * Condition and expression evaluation for control-flow blocks
 */

import {
  type Environment,
  isTruthy,
  type ScriptValue,
  valuesEqual,
} from './values.js';

const IDENTIFIER_REGEX = /^[a-zA-Z_][a-zA-Z0-9_.]*$/;
const NUMBER_REGEX = /^-?\d+(\.\d+)?$/;

/** Checked in this order so `!==` is not read as `!=` */
const OPERATORS = ['!==', '===', '!=', '=='] as const;

function isQuoted(text: string): boolean {
  return (
    text.length >= 2 &&
    (text[0] === '"' || text[0] === "'") &&
    text[text.length - 1] === text[0]
  );
}

/**
 * Evaluate an operand: quoted string, boolean or numeric literal,
 * `{{template}}` or dotted variable path, else the text itself
 */
export function evaluateExpression(
  expression: string,
  env: Environment
): ScriptValue {
  const text = expression.trim();
  if (isQuoted(text)) return text.slice(1, -1);

  const template = /^\{\{\s*(.+?)\s*\}\}$/.exec(text);
  if (template?.[1]) return env.lookup(template[1]) ?? null;

  if (text === 'true') return true;
  if (text === 'false') return false;
  if (text === 'null') return null;
  if (NUMBER_REGEX.test(text)) return Number(text);
  if (IDENTIFIER_REGEX.test(text)) return env.lookup(text) ?? null;
  return text;
}

/**
 * Evaluate a condition to a boolean
 *
 * @example evaluateCondition('count == 3', env)
 * @example evaluateCondition('!done', env)
 */
export function evaluateCondition(condition: string, env: Environment): boolean {
  const text = condition.trim();

  for (const operator of OPERATORS) {
    const index = text.indexOf(operator);
    if (index === -1) continue;
    const left = evaluateExpression(text.slice(0, index), env);
    const right = evaluateExpression(text.slice(index + operator.length), env);
    const equal = valuesEqual(left, right);
    return operator.startsWith('!') ? !equal : equal;
  }

  if (text.startsWith('!')) {
    return !evaluateCondition(text.slice(1), env);
  }
  return isTruthy(evaluateExpression(text, env));
}
