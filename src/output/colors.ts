/**
 * ANSI color codes and prefixed terminal output
 */

import type { Verbosity } from '../types/runner.js';

export const colors = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  bold: '\x1b[1m',
  cyan: '\x1b[36m',
  yellow: '\x1b[33m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  magenta: '\x1b[35m',
  blue: '\x1b[34m',
} as const;

export type ColorName = keyof typeof colors;

/**
 * Strip ANSI escape codes from a string
 */
// eslint-disable-next-line no-control-regex -- ANSI escape codes require control characters
const ANSI_REGEX = /\x1b\[[0-9;]*[a-zA-Z]/g;

export function stripAnsi(str: string): string {
  return str.replace(ANSI_REGEX, '');
}

/**
 * Apply color to a string
 */
export function colorize(text: string, color: ColorName): string {
  return `${colors[color]}${text}${colors.reset}`;
}

/**
 * Truncate a string to a maximum length
 */
export function truncate(str: string, len: number): string {
  if (str.length <= len) {
    return str;
  }
  return str.slice(0, len) + '...';
}

/**
 * Format duration in human-readable form
 * Examples: 450ms, 2.5s, 1m30s, 1h2m3s
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  const totalSeconds = ms / 1000;
  if (totalSeconds < 60) {
    return `${totalSeconds.toFixed(1)}s`;
  }
  const hours = Math.floor(totalSeconds / 3600);
  const mins = Math.floor((totalSeconds % 3600) / 60);
  const secs = Math.round(totalSeconds % 60);
  if (hours > 0) {
    return `${hours}h${mins}m${secs}s`;
  }
  return `${mins}m${secs}s`;
}

/**
 * Format current timestamp as HH:MM:SS.mmm
 */
export function formatTimestamp(date: Date = new Date()): string {
  const h = date.getHours().toString().padStart(2, '0');
  const m = date.getMinutes().toString().padStart(2, '0');
  const s = date.getSeconds().toString().padStart(2, '0');
  const ms = date.getMilliseconds().toString().padStart(3, '0');
  return `${h}:${m}:${s}.${ms}`;
}

/**
 * Get a timestamped prefix for output lines
 */
export function timestampPrefix(): string {
  return `${colors.dim}${formatTimestamp()}${colors.reset} `;
}

/**
 * Module-level verbosity, configured once at startup
 */
let outputVerbosity: Verbosity = 'normal';

export function configureOutput(verbosity: Verbosity): void {
  outputVerbosity = verbosity;
}

/**
 * Print an [AGENT] progress message with timestamp (suppressed when quiet)
 */
export function printAgent(message: string): void {
  if (outputVerbosity === 'quiet') return;
  console.log(
    `${timestampPrefix()}${colors.magenta}[AGENT]${colors.reset} ${message}`
  );
}

/**
 * Print an [AGENT] detail line, shown only in verbose mode
 */
export function printAgentDetail(message: string): void {
  if (outputVerbosity !== 'verbose') return;
  console.log(
    `${timestampPrefix()}${colors.magenta}[AGENT]${colors.reset} ${colors.dim}${message}${colors.reset}`
  );
}

/**
 * Print a [MODEL] message with timestamp (suppressed when quiet)
 */
export function printModel(message: string): void {
  if (outputVerbosity === 'quiet') return;
  console.log(
    `${timestampPrefix()}${colors.green}[MODEL]${colors.reset} ${message}`
  );
}

/**
 * Print a warning; always shown
 */
export function printWarning(message: string): void {
  console.log(
    `${timestampPrefix()}${colors.yellow}[WARN]${colors.reset} ${message}`
  );
}

/**
 * Print an error; always shown
 */
export function printError(message: string): void {
  console.error(
    `${timestampPrefix()}${colors.red}[ERROR]${colors.reset} ${message}`
  );
}
