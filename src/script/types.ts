/**
 * Types for parsed scripts
 */

import type { Role } from '../types/llm.js';
import type { ScriptMap, ScriptValue } from './values.js';

/**
 * Per-call overrides given in a placeholder: [[VAR:model=x, temperature=0.2]]
 */
export interface CallOverrides {
  model?: string;
  temperature?: number;
  topP?: number;
  topK?: number;
}

/**
 * Marker meaning "substitute the model's response here"
 */
export interface AiPlaceholder {
  /** Variable the response binds to */
  variable: string;
  overrides: CallOverrides;
  /** Exact markup, e.g. `[[AI:temperature=0]]` */
  markup: string;
}

/**
 * Allowed answers for a constrained placeholder: [[VAR:|A|B|C:2]]
 */
export interface ConstrainedChoice {
  options: string[];
  /** Number of options to pick; absent means one */
  count?: number;
  /** Pick locally at random instead of asking the model */
  random: boolean;
}

/**
 * Substitution directives embedded in message text
 */
export type Replacement =
  | {
      kind: 'script';
      markup: string;
      name: string;
      params: Record<string, string>;
    }
  | {
      kind: 'instruction';
      markup: string;
      name: string;
      params: Record<string, string>;
    }
  | {
      kind: 'regex';
      markup: string;
      pattern: string;
      flags: string;
      variable: string;
      /** Group index or name; whole match when absent */
      group?: number | string;
    };

export interface Message {
  role: Role;
  /** Raw content as written in the script */
  content: string;
  /** Leading `#`: render immediately, marker removed */
  immediate: boolean;
  placeholder?: AiPlaceholder;
  choice?: ConstrainedChoice;
  replacements: Replacement[];
}

export type Instruction =
  | { kind: 'echo'; text: string; templateRef: boolean }
  | { kind: 'set'; assignments: Array<{ key: string; value: string }> }
  | { kind: 'print' }
  | {
      kind: 'custom';
      name: string;
      args: Record<string, string>;
      value?: string;
    };

export type PipeStep =
  | { kind: 'instruction'; instruction: Instruction }
  | { kind: 'script'; name: string; params: Record<string, string> };

export interface MatchCase {
  /** Case label; `_` is the default */
  label: string;
  body: Instruction[];
}

export type ControlFlowBlock =
  | { kind: 'if'; condition: string; then: Instruction[]; else: Instruction[] }
  | { kind: 'while'; condition: string; body: Instruction[] }
  | {
      kind: 'for';
      /** Loop condition, or `item in list` iteration */
      condition: string;
      iterator?: { variable: string; source: string };
      body: Instruction[];
    }
  | { kind: 'match'; expression: string; cases: MatchCase[] }
  | { kind: 'pipe'; steps: PipeStep[] };

export interface ChainTarget {
  name: string;
  params: Record<string, string>;
}

export interface Turn {
  messages: Message[];
  instructions: Instruction[];
  chain?: ChainTarget;
  controlFlow: ControlFlowBlock[];
}

/**
 * Front matter keys
 */
export interface ScriptFrontmatter {
  parameters: ScriptMap;
  inputs: string[];
  outputs: ScriptValue;
  imports: string[];
  type?: string;
  description?: string;
  model?: string;
  autoRun: boolean;
}

/**
 * Parsed script; immutable once built
 */
export interface Script {
  frontmatter: ScriptFrontmatter;
  turns: Turn[];
  /** File the script was read from, null for inline scripts */
  sourcePath: string | null;
}
