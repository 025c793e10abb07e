/**
 * Script module - parsing, loading, values and templates
 */

// Types
export type {
  AiPlaceholder,
  CallOverrides,
  ConstrainedChoice,
  ControlFlowBlock,
  Instruction,
  Message,
  PipeStep,
  Replacement,
  Script,
  ScriptFrontmatter,
  Turn,
} from './types.js';

// Loader
export { ScriptLoader } from './loader.js';

// Parser
export {
  createMessage,
  parseChoice,
  parseInstruction,
  parseScript,
  parseTurn,
} from './parser.js';

// Values
export {
  Environment,
  isTruthy,
  type ScriptMap,
  type ScriptValue,
  toScriptValue,
  valueToText,
} from './values.js';

// Templates and conditions
export { evaluateCondition, evaluateExpression } from './conditions.js';
export { renderTemplate } from './variables.js';
