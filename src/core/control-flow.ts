/**
 * Control-flow blocks: $if, $while, $for, $match, $pipe
 */

import { printWarning } from '../output/colors.js';
import { evaluateCondition, evaluateExpression } from '../script/conditions.js';
import type { ControlFlowBlock, Instruction } from '../script/types.js';
import {
  type Environment,
  isScriptMap,
  type ScriptValue,
  valueToText,
} from '../script/values.js';
import { throwIfCancelled } from '../utils/errors.js';

/**
 * What a block needs from the interpreter that runs it
 */
export interface ControlFlowRuntime {
  env: Environment;
  maxIterations: number;
  signal?: AbortSignal;
  runInstruction(instruction: Instruction): Promise<string>;
  /** Nested script run for a pipe element; keeps only its variable changes */
  runScript(name: string, params: Record<string, string>): Promise<void>;
}

async function runAll(instructions: Instruction[], runtime: ControlFlowRuntime): Promise<void> {
  for (const instruction of instructions) {
    await runtime.runInstruction(instruction);
  }
}

/**
 * Items a `$for x in source` loop walks: list elements, map keys,
 * 0..n-1 for a number, the value itself for a non-empty string
 */
export function iterationItems(source: ScriptValue): ScriptValue[] {
  if (Array.isArray(source)) return source;
  if (isScriptMap(source)) return Object.keys(source);
  if (typeof source === 'number') {
    return Array.from({ length: Math.max(0, Math.floor(source)) }, (_v, i) => i);
  }
  if (typeof source === 'string' && source !== '') return [source];
  return [];
}

async function runLoop(
  condition: string,
  body: Instruction[],
  runtime: ControlFlowRuntime,
  keyword: string
): Promise<number> {
  let iterations = 0;
  while (iterations < runtime.maxIterations && evaluateCondition(condition, runtime.env)) {
    throwIfCancelled(runtime.signal);
    await runAll(body, runtime);
    iterations++;
  }
  if (iterations >= runtime.maxIterations && evaluateCondition(condition, runtime.env)) {
    printWarning(`$${keyword} stopped after ${runtime.maxIterations} iterations`);
  }
  return iterations;
}

/**
 * Execute one block against the live environment
 * @returns iterations run (loops) or 1/0 for whether a branch ran
 */
export async function executeControlFlow(
  block: ControlFlowBlock,
  runtime: ControlFlowRuntime
): Promise<number> {
  const { env } = runtime;

  switch (block.kind) {
    case 'if': {
      await runAll(evaluateCondition(block.condition, env) ? block.then : block.else, runtime);
      return 1;
    }
    case 'while':
      return runLoop(block.condition, block.body, runtime, 'while');
    case 'for': {
      if (!block.iterator) {
        return runLoop(block.condition, block.body, runtime, 'for');
      }
      const items = iterationItems(evaluateExpression(block.iterator.source, env));
      const limit = Math.min(items.length, runtime.maxIterations);
      if (items.length > limit) {
        printWarning(`$for stopped after ${runtime.maxIterations} iterations`);
      }
      for (const item of items.slice(0, limit)) {
        throwIfCancelled(runtime.signal);
        env.set(block.iterator.variable, item);
        await runAll(block.body, runtime);
      }
      return limit;
    }
    case 'match': {
      const key = valueToText(evaluateExpression(block.expression, env));
      const selected =
        block.cases.find((c) => c.label === key) ?? block.cases.find((c) => c.label === '_');
      if (!selected) return 0;
      await runAll(selected.body, runtime);
      return 1;
    }
    case 'pipe': {
      for (const step of block.steps) {
        throwIfCancelled(runtime.signal);
        if (step.kind === 'instruction') {
          await runtime.runInstruction(step.instruction);
        } else {
          await runtime.runScript(step.name, step.params);
        }
      }
      return block.steps.length;
    }
    default: {
      const unreachable: never = block;
      return unreachable;
    }
  }
}
