/**
 * Live index of what written files actually export and import
 * Pattern based; good enough to cross-check a manifest's declarations.
 */

import * as fs from 'fs/promises';

import type { Workspace } from '../workspace/paths.js';

export interface FileSymbols {
  exports: string[];
  imports: string[];
}

const JS_EXPORT_PATTERNS: readonly RegExp[] = [
  /^\s*export\s+(?:default\s+)?(?:async\s+)?(?:function\*?|class|const|let|var|interface|type|enum)\s+([A-Za-z_$][\w$]*)/gm,
  /^\s*exports\.([A-Za-z_$][\w$]*)\s*=/gm,
  /^\s*module\.exports\.([A-Za-z_$][\w$]*)\s*=/gm,
];
const JS_EXPORT_LIST = /^\s*(?:export|module\.exports\s*=)\s*\{([^}]*)\}/gm;
const JS_EXPORT_SINGLE = /^\s*module\.exports\s*=\s*([A-Za-z_$][\w$]*)\s*;?\s*$/gm;
const JS_IMPORT_PATTERNS: readonly RegExp[] = [
  /^\s*import\s+(?:[\s\S]*?\s+from\s+)?['"]([^'"]+)['"]/gm,
  /require\(\s*['"]([^'"]+)['"]\s*\)/g,
];

const PY_EXPORT_PATTERNS: readonly RegExp[] = [
  /^(?:async\s+)?def\s+([A-Za-z_]\w*)/gm,
  /^class\s+([A-Za-z_]\w*)/gm,
];
const PY_IMPORT_PATTERNS: readonly RegExp[] = [
  /^\s*from\s+([\w.]+)\s+import\s+/gm,
  /^\s*import\s+([\w.]+)/gm,
];

function collect(content: string, patterns: readonly RegExp[], into: Set<string>): void {
  for (const pattern of patterns) {
    for (const match of content.matchAll(pattern)) {
      if (match[1]) into.add(match[1]);
    }
  }
}

/**
 * Names in `{ a, b as c }` or `{ a: fn, b }`: the exported side of each entry
 */
function exportedNames(list: string): string[] {
  return list
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean)
    .map((entry) => {
      const alias = /\bas\s+([A-Za-z_$][\w$]*)$/.exec(entry);
      if (alias?.[1]) return alias[1];
      return entry.split(':')[0]?.trim() ?? '';
    })
    .filter((name) => /^[A-Za-z_$][\w$]*$/.test(name));
}

/**
 * Exports and imports declared in a source file
 */
export function extractSymbols(filePath: string, content: string): FileSymbols {
  const exports = new Set<string>();
  const imports = new Set<string>();

  if (/\.py$/i.test(filePath)) {
    collect(content, PY_EXPORT_PATTERNS, exports);
    collect(content, PY_IMPORT_PATTERNS, imports);
  } else if (/\.(c|m)?(j|t)sx?$/i.test(filePath)) {
    collect(content, JS_EXPORT_PATTERNS, exports);
    for (const match of content.matchAll(JS_EXPORT_LIST)) {
      for (const name of exportedNames(match[1] ?? '')) exports.add(name);
    }
    collect(content, [JS_EXPORT_SINGLE], exports);
    collect(content, JS_IMPORT_PATTERNS, imports);
  }

  return { exports: [...exports].sort(), imports: [...imports].sort() };
}

export class DependencyIndex {
  private readonly files = new Map<string, FileSymbols>();

  update(relativePath: string, content: string): FileSymbols {
    const symbols = extractSymbols(relativePath, content);
    this.files.set(relativePath, symbols);
    return symbols;
  }

  get(relativePath: string): FileSymbols | undefined {
    return this.files.get(relativePath);
  }

  has(relativePath: string): boolean {
    return this.files.has(relativePath);
  }

  /**
   * Re-read files from disk; missing files are dropped from the index
   */
  async refresh(workspace: Workspace, relativePaths: string[]): Promise<void> {
    for (const relativePath of relativePaths) {
      const absolute = workspace.tryResolve(relativePath);
      if (absolute === null) continue;
      try {
        this.update(relativePath, await fs.readFile(absolute, 'utf-8'));
      } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
          this.files.delete(relativePath);
          continue;
        }
        throw error;
      }
    }
  }

  get size(): number {
    return this.files.size;
  }
}
