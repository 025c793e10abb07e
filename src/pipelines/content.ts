/**
 * Generated file content cleanup, JSON checks and package.json backfill
 */

import * as path from 'path';

import { isRecord } from '../utils/guards.js';
import { slugify } from '../utils/formatting.js';
import { isCodeFile } from '../workspace/scan.js';
import type { Blueprint } from './manifest.js';
import { isConfigFile } from './manifest.js';

const FENCE_REGEX = /```[^\n`]*\n([\s\S]*?)```/;
const NARRATIVE_PREFIX_REGEX =
  /^(here(?:'s| is| are)|below is|sure|certainly|of course|okay|ok)\b[^\n]*\n+/i;
const ENTRY_NAMES = ['index', 'main', 'server', 'app'];

/**
 * Raw file content from a model reply: the first fenced block if there is
 * one, else the reply minus a leading narrative line
 */
export function cleanGeneratedContent(text: string): string {
  const fenced = FENCE_REGEX.exec(text);
  let content = fenced?.[1] ?? text;
  if (!fenced) {
    content = content.replace(NARRATIVE_PREFIX_REGEX, '');
    content = content.replace(/^```[^\n]*\n?/, '').replace(/\n?```\s*$/, '');
  }
  content = content.replace(/\s+$/, '');
  return content ? `${content}\n` : '';
}

export function isJsonFile(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.json');
}

/**
 * Parse error message for invalid JSON, null when valid
 */
export function jsonError(content: string): string | null {
  try {
    JSON.parse(content);
    return null;
  } catch (error) {
    return error instanceof Error ? error.message : String(error);
  }
}

/**
 * Split `name@range` (scoped names keep their leading @)
 */
export function parsePackageSpec(spec: string): { name: string; version: string } {
  const at = spec.lastIndexOf('@');
  if (at > 0) {
    return { name: spec.slice(0, at).trim(), version: spec.slice(at + 1).trim() || 'latest' };
  }
  return { name: spec.trim(), version: 'latest' };
}

/**
 * Entry point for package.json `main`: a conventional entry name if present,
 * else the first JS/TS code file
 */
export function findEntryFile(blueprint: Blueprint): string | null {
  const code = blueprint.files
    .filter((f) => !isConfigFile(f) && isCodeFile(f.path))
    .map((f) => f.path)
    .filter((p) => /\.(c|m)?(j|t)sx?$/.test(p));
  const conventional = code.find((p) => {
    const base = path.posix.basename(p).replace(/\.[^.]+$/, '');
    return ENTRY_NAMES.includes(base) && !p.includes('/');
  });
  return conventional ?? code[0] ?? null;
}

/**
 * Fill the fields a package manifest needs and merge declared dependencies.
 * Existing values win.
 */
export function backfillPackageJson(
  content: string,
  blueprint: Blueprint,
  workspaceName: string
): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    parsed = {};
  }
  const pkg: Record<string, unknown> = isRecord(parsed) ? { ...parsed } : {};

  if (typeof pkg['name'] !== 'string' || !pkg['name']) pkg['name'] = slugify(workspaceName);
  if (typeof pkg['version'] !== 'string' || !pkg['version']) pkg['version'] = '1.0.0';
  if (typeof pkg['description'] !== 'string') pkg['description'] = blueprint.projectDescription;

  const entry = findEntryFile(blueprint);
  if (typeof pkg['main'] !== 'string' && entry !== null) pkg['main'] = entry;

  const scripts: Record<string, unknown> = isRecord(pkg['scripts']) ? { ...pkg['scripts'] } : {};
  const main = pkg['main'];
  if (typeof scripts['start'] !== 'string' && typeof main === 'string') {
    scripts['start'] = `node ${main}`;
  }
  pkg['scripts'] = scripts;

  const dependencies: Record<string, unknown> = isRecord(pkg['dependencies'])
    ? { ...pkg['dependencies'] }
    : {};
  for (const file of blueprint.files) {
    for (const spec of file.packageDependencies) {
      const { name, version } = parsePackageSpec(spec);
      if (name && dependencies[name] === undefined) dependencies[name] = version;
    }
  }
  pkg['dependencies'] = dependencies;

  return `${JSON.stringify(pkg, null, 2)}\n`;
}
