/**
 * Ignore rules for workspace listing and file reads
 * Default patterns plus .agentignore / .gitignore at the workspace root
 */

import * as fs from 'fs';
import * as path from 'path';

export const DEFAULT_IGNORE_PATTERNS: readonly string[] = [
  'node_modules/',
  '.git/',
  'dist/',
  'build/',
  '.next/',
  'coverage/',
  '__pycache__/',
  '.venv/',
  '*.pyc',
  '.DS_Store',
  'package-lock.json',
  'yarn.lock',
  'pnpm-lock.yaml',
];

export const IGNORE_FILES: readonly string[] = ['.agentignore', '.gitignore'];

interface CompiledPattern {
  negated: boolean;
  directoryOnly: boolean;
  /** Pattern contains a slash, so it matches from the root */
  anchored: boolean;
  regex: RegExp;
}

/**
 * Convert a glob to a regex body (`*`, `?`, `**`)
 */
function globToRegex(glob: string): string {
  let out = '';
  for (let i = 0; i < glob.length; i++) {
    const ch = glob[i] ?? '';
    if (ch === '*') {
      if (glob[i + 1] === '*') {
        out += '.*';
        i++;
        if (glob[i + 1] === '/') i++;
      } else {
        out += '[^/]*';
      }
    } else if (ch === '?') {
      out += '[^/]';
    } else {
      out += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return out;
}

function compilePattern(raw: string): CompiledPattern | null {
  let pattern = raw.trim();
  if (!pattern || pattern.startsWith('#')) return null;

  const negated = pattern.startsWith('!');
  if (negated) pattern = pattern.slice(1);
  const directoryOnly = pattern.endsWith('/');
  if (directoryOnly) pattern = pattern.slice(0, -1);
  const anchored = pattern.includes('/');
  pattern = pattern.replace(/^\//, '');
  if (!pattern) return null;

  return {
    negated,
    directoryOnly,
    anchored,
    regex: new RegExp(`^${globToRegex(pattern)}$`),
  };
}

function toPosix(relPath: string): string {
  return relPath.split(path.sep).join('/').replace(/^\.\//, '');
}

function matches(
  pattern: CompiledPattern,
  relPath: string,
  isDirectory: boolean
): boolean {
  const segments = relPath.split('/').filter(Boolean);

  if (pattern.anchored) {
    // Match the path itself or any parent directory prefix
    for (let i = segments.length; i > 0; i--) {
      const prefix = segments.slice(0, i).join('/');
      const prefixIsDir = i < segments.length || isDirectory;
      if (pattern.directoryOnly && !prefixIsDir) continue;
      if (pattern.regex.test(prefix)) return true;
    }
    return false;
  }

  return segments.some((segment, index) => {
    const segmentIsDir = index < segments.length - 1 || isDirectory;
    if (pattern.directoryOnly && !segmentIsDir) return false;
    return pattern.regex.test(segment);
  });
}

/**
 * Compiled set of ignore patterns; later patterns win, `!` re-includes
 */
export class IgnoreRules {
  private readonly patterns: CompiledPattern[];

  constructor(patterns: readonly string[] = DEFAULT_IGNORE_PATTERNS) {
    this.patterns = patterns
      .map(compilePattern)
      .filter((p): p is CompiledPattern => p !== null);
  }

  /**
   * Check a workspace-relative path
   */
  isIgnored(relPath: string, isDirectory = false): boolean {
    const normalized = toPosix(relPath);
    if (!normalized || normalized === '.') return false;

    let ignored = false;
    for (const pattern of this.patterns) {
      if (matches(pattern, normalized, isDirectory)) {
        ignored = !pattern.negated;
      }
    }
    return ignored;
  }
}

/**
 * Load default patterns plus the workspace's ignore files
 */
export function loadIgnoreRules(root: string): IgnoreRules {
  const patterns = [...DEFAULT_IGNORE_PATTERNS];
  for (const file of IGNORE_FILES) {
    const filePath = path.join(root, file);
    if (!fs.existsSync(filePath)) continue;
    const lines = fs.readFileSync(filePath, 'utf-8').split('\n');
    patterns.push(...lines.map((line) => line.trim()).filter(Boolean));
  }
  return new IgnoreRules(patterns);
}
