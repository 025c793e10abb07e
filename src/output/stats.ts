/**
 * Run statistics tracking and summary formatting
 * Tracks turns, model calls, and tool usage for display
 */

import { formatDuration } from './colors.js';

/**
 * Run statistics
 */
export interface RunStats {
  /** Turns visited */
  turns: number;
  /** Model calls issued (including continuations) */
  aiCalls: number;
  /** Tool names used */
  toolsUsed: Set<string>;
  /** Tool invocations */
  toolCalls: number;
  /** Characters of model output (for token estimation) */
  outputChars: number;
}

/**
 * Create empty run stats
 */
export function createRunStats(): RunStats {
  return {
    turns: 0,
    aiCalls: 0,
    toolsUsed: new Set(),
    toolCalls: 0,
    outputChars: 0,
  };
}

/**
 * Record a tool use
 */
export function recordToolUse(stats: RunStats, toolName: string): void {
  stats.toolsUsed.add(toolName);
  stats.toolCalls++;
}

/**
 * Record a model call and the characters it produced
 */
export function recordModelCall(stats: RunStats, outputChars: number): void {
  stats.aiCalls++;
  stats.outputChars += outputChars;
}

/**
 * Merge source stats into target (accumulates values)
 */
export function mergeStats(target: RunStats, source: RunStats): void {
  target.turns += source.turns;
  target.aiCalls += source.aiCalls;
  for (const tool of source.toolsUsed) {
    target.toolsUsed.add(tool);
  }
  target.toolCalls += source.toolCalls;
  target.outputChars += source.outputChars;
}

/**
 * Estimate output tokens from character count
 * Rough estimate: ~4 chars per token
 */
function estimateOutputTokens(chars: number): number {
  return Math.ceil(chars / 4);
}

/**
 * Format number with commas
 */
function formatNumber(n: number): string {
  return n.toLocaleString('en-US');
}

/**
 * Format stats summary for display
 * Example: 12.3s | 3 turns | 4 calls | ~210 out | 5 tools (edit, write_file)
 */
export function formatStatsSummary(
  stats: RunStats,
  durationMs: number
): string {
  const parts: string[] = [];

  parts.push(formatDuration(durationMs));
  parts.push(`${stats.turns} turns`);
  parts.push(`${stats.aiCalls} calls`);
  parts.push(`~${formatNumber(estimateOutputTokens(stats.outputChars))} out`);

  if (stats.toolCalls > 0) {
    const toolList = Array.from(stats.toolsUsed).sort().join(', ');
    parts.push(`${stats.toolCalls} tools (${toolList})`);
  }

  return parts.join(' | ');
}
