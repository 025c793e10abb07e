/**
 * Shared formatting utilities
 */

import { truncate } from '../output/colors.js';
import { TRUNCATE_TOOL_ARGS } from './constants.js';

const SIZE_THRESHOLD_K = 1000;
const SIZE_THRESHOLD_M = 1000000;

/**
 * Format character count for display
 * @param chars - Number of characters
 * @returns Formatted string: "N chars", "N.NK chars", or "N.NM chars"
 */
export function formatSize(chars: number): string {
  if (chars < SIZE_THRESHOLD_K) {
    return `${chars} chars`;
  } else if (chars < SIZE_THRESHOLD_M) {
    return `${(chars / SIZE_THRESHOLD_K).toFixed(1)}K chars`;
  }
  return `${(chars / SIZE_THRESHOLD_M).toFixed(1)}M chars`;
}

/**
 * One-line preview of a tool call: `write_file(src/index.js)`
 */
export function formatToolCall(
  name: string,
  args: Record<string, unknown>
): string {
  const target = args['file_path'] ?? args['path'] ?? args['command'];
  if (typeof target === 'string') {
    return `${name}(${truncate(target, TRUNCATE_TOOL_ARGS)})`;
  }
  const json = JSON.stringify(args);
  return `${name}(${truncate(json === '{}' ? '' : json, TRUNCATE_TOOL_ARGS)})`;
}

/**
 * Lowercase slug suitable for a package name
 */
export function slugify(text: string): string {
  const slug = text
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug || 'project';
}
