/**
 * Task-aware sampling defaults keyed by model capability tier
 */

import type { CallOverrides } from '../script/types.js';

export type TaskKind = 'code-generation' | 'problem-solving' | 'analysis' | 'default';

export type ModelTier = 'small' | 'standard' | 'large';

export interface SamplingParams {
  temperature: number;
  topP: number;
  topK: number;
}

const SAMPLING_TABLE: Record<ModelTier, Record<TaskKind, SamplingParams>> = {
  small: {
    'code-generation': { temperature: 0.2, topP: 0.9, topK: 20 },
    'problem-solving': { temperature: 0.3, topP: 0.9, topK: 30 },
    analysis: { temperature: 0.3, topP: 0.9, topK: 30 },
    default: { temperature: 0.6, topP: 0.95, topK: 40 },
  },
  standard: {
    'code-generation': { temperature: 0.3, topP: 0.95, topK: 40 },
    'problem-solving': { temperature: 0.4, topP: 0.95, topK: 40 },
    analysis: { temperature: 0.5, topP: 0.95, topK: 40 },
    default: { temperature: 0.7, topP: 0.95, topK: 40 },
  },
  large: {
    'code-generation': { temperature: 0.4, topP: 0.95, topK: 50 },
    'problem-solving': { temperature: 0.5, topP: 0.95, topK: 50 },
    analysis: { temperature: 0.6, topP: 0.95, topK: 50 },
    default: { temperature: 0.8, topP: 0.95, topK: 64 },
  },
};

const TASK_PATTERNS: Array<{ kind: TaskKind; pattern: RegExp }> = [
  {
    kind: 'code-generation',
    pattern: /\b(write|implement|create|generate|build|scaffold|code|function|class|component|file)\b/i,
  },
  {
    kind: 'problem-solving',
    pattern: /\b(fix|debug|error|bug|solve|why does|failing|exception|crash)\b/i,
  },
  {
    kind: 'analysis',
    pattern: /\b(analy[sz]e|explain|review|compare|summari[sz]e|evaluate|describe)\b/i,
  },
];

/**
 * Guess the task kind from prompt text
 */
export function detectTaskKind(text: string): TaskKind {
  return TASK_PATTERNS.find((p) => p.pattern.test(text))?.kind ?? 'default';
}

/**
 * Capability tier from a model name
 */
export function modelTier(model: string | undefined): ModelTier {
  if (!model) return 'standard';
  const name = model.toLowerCase();
  if (/haiku|mini|nano|small|flash|lite|\b[1-8]b\b/.test(name)) return 'small';
  if (/opus|large|\bpro\b|ultra|\b(70|72|405)b\b/.test(name)) return 'large';
  return 'standard';
}

/**
 * Per-call overrides win; missing values come from the table
 */
export function resolveSampling(
  overrides: CallOverrides,
  model: string | undefined,
  promptText: string
): SamplingParams {
  const defaults = SAMPLING_TABLE[modelTier(model)][detectTaskKind(promptText)];
  return {
    temperature: overrides.temperature ?? defaults.temperature,
    topP: overrides.topP ?? defaults.topP,
    topK: overrides.topK ?? defaults.topK,
  };
}
