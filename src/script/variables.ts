/**
 * Template rendering against the variable environment
 * Handles: {{name}}, {{a.b.c}}, {{name | upper | trim}}
 */

import { formatSize } from '../utils/formatting.js';
import { type Environment, type ScriptValue, valueToText } from './values.js';

const TEMPLATE_REGEX = /\{\{\s*([^{}]+?)\s*\}\}/g;

type Filter = (value: ScriptValue | undefined) => ScriptValue;

const FILTERS: Record<string, Filter> = {
  upper: (v) => valueToText(v).toUpperCase(),
  lower: (v) => valueToText(v).toLowerCase(),
  trim: (v) => valueToText(v).trim(),
  json: (v) => JSON.stringify(v ?? null),
  length: (v) =>
    Array.isArray(v) || typeof v === 'string'
      ? v.length
      : typeof v === 'object' && v !== null
        ? Object.keys(v).length
        : 0,
};

/**
 * Evaluate one `path | filter | filter` expression
 */
export function evaluateTemplateExpression(
  expression: string,
  env: Environment
): ScriptValue | undefined {
  const [path = '', ...filters] = expression.split('|').map((s) => s.trim());
  let value = env.lookup(path);
  for (const name of filters) {
    const filter = FILTERS[name.toLowerCase()];
    if (filter) {
      value = filter(value);
    }
  }
  return value;
}

/**
 * Substitute every {{...}} expression; unknown variables render empty
 */
export function renderTemplate(text: string, env: Environment): string {
  return text.replace(TEMPLATE_REGEX, (_match, expression: string) =>
    valueToText(evaluateTemplateExpression(expression, env))
  );
}

/**
 * Names of the variables a template references (for logging)
 */
export function getTemplateVariables(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(TEMPLATE_REGEX)) {
    const head = (match[1] ?? '').split('|')[0]?.trim().split('.')[0];
    if (head) names.add(head);
  }
  return [...names];
}

/**
 * Get capture log message for [AGENT] output
 */
export function getCaptureLogMessage(output: string, varName: string): string {
  return `${varName} captured (${formatSize(output.length)})`;
}
