/**
 * Independence-based grouping of tool calls
 *
 * Calls that write the same file must run in order; everything else may
 * overlap. Groups are consecutive runs of mutually independent calls, so a
 * call never starts before an earlier dependent call has finished.
 */

import * as path from 'path';

import type { FunctionCall } from '../types/llm.js';
import { getToolPath } from '../types/tools.js';

export interface IndexedCall {
  call: FunctionCall;
  /** Position in the model's original call list */
  index: number;
}

function normalizeTarget(target: string): string {
  const posix = target.trim().replace(/\\/g, '/');
  return path.posix.normalize(posix).replace(/^\.\//, '');
}

/**
 * Two calls are dependent only when both mutate files at the same path.
 * A mutating call whose path cannot be read is treated as touching every path.
 */
export function areIndependent(
  a: FunctionCall,
  b: FunctionCall,
  mutating: ReadonlySet<string>
): boolean {
  if (!mutating.has(a.name) || !mutating.has(b.name)) {
    return true;
  }
  const left = getToolPath(a.args);
  const right = getToolPath(b.args);
  if (left === null || right === null) {
    return false;
  }
  return normalizeTarget(left) !== normalizeTarget(right);
}

/**
 * Partition calls, in input order, into groups whose members are pairwise independent
 */
export function groupForParallelExecution(
  calls: FunctionCall[],
  mutating: ReadonlySet<string>
): IndexedCall[][] {
  const groups: IndexedCall[][] = [];
  let current: IndexedCall[] = [];

  calls.forEach((call, index) => {
    const fits = current.every((member) => areIndependent(member.call, call, mutating));
    if (!fits) {
      groups.push(current);
      current = [];
    }
    current.push({ call, index });
  });
  if (current.length > 0) {
    groups.push(current);
  }

  return groups;
}

/**
 * Run groups one after another, members of a group concurrently.
 * Results come back in the original call order.
 */
export async function executeInParallel<R>(
  calls: FunctionCall[],
  mutating: ReadonlySet<string>,
  execute: (call: FunctionCall, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Map<number, R>();

  for (const group of groupForParallelExecution(calls, mutating)) {
    const settled = await Promise.all(
      group.map(async ({ call, index }) => ({ index, result: await execute(call, index) }))
    );
    for (const { index, result } of settled) {
      results.set(index, result);
    }
  }

  return calls.map((_call, index) => {
    const result = results.get(index);
    if (result === undefined) {
      throw new Error(`No result recorded for tool call ${index}`);
    }
    return result;
  });
}
