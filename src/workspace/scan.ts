/**
 * Workspace file listing honouring ignore rules
 */

import type { Dirent } from 'fs';
import * as fs from 'fs/promises';
import * as path from 'path';

import type { Workspace } from './paths.js';

export const CODE_EXTENSIONS: ReadonlySet<string> = new Set([
  '.js',
  '.jsx',
  '.mjs',
  '.cjs',
  '.ts',
  '.tsx',
  '.mts',
  '.cts',
  '.py',
  '.rb',
  '.go',
  '.rs',
  '.java',
  '.kt',
  '.c',
  '.cc',
  '.cpp',
  '.h',
  '.hpp',
  '.cs',
  '.php',
  '.swift',
  '.vue',
  '.svelte',
  '.html',
  '.css',
  '.scss',
]);

export function isCodeFile(filePath: string): boolean {
  return CODE_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

export interface ListOptions {
  /** Directory to list, absolute; defaults to the root */
  from?: string;
  recursive?: boolean;
  maxFiles?: number;
}

/**
 * List workspace-relative file paths, sorted, directories suffixed with `/`
 * when listing non-recursively
 */
export async function listWorkspaceFiles(
  workspace: Workspace,
  options: ListOptions = {}
): Promise<string[]> {
  const { recursive = true, maxFiles = Number.POSITIVE_INFINITY } = options;
  const start = options.from ?? workspace.root;
  const results: string[] = [];
  const pending: string[] = [start];

  while (pending.length > 0 && results.length < maxFiles) {
    const dir = pending.shift();
    if (dir === undefined) break;

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (error) {
      if (dir === start) throw error;
      continue;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));

    for (const entry of entries) {
      const absolute = path.join(dir, entry.name);
      const isDirectory = entry.isDirectory();
      if (workspace.isIgnored(absolute, isDirectory)) continue;

      if (isDirectory) {
        if (recursive) {
          pending.push(absolute);
        } else {
          results.push(`${workspace.relative(absolute)}/`);
        }
      } else if (entry.isFile()) {
        results.push(workspace.relative(absolute));
      }
      if (results.length >= maxFiles) break;
    }
  }

  return results.sort();
}

/**
 * Count existing source files in the workspace
 */
export async function countCodeFiles(workspace: Workspace): Promise<number> {
  try {
    const files = await listWorkspaceFiles(workspace);
    return files.filter(isCodeFile).length;
  } catch {
    // Workspace directory does not exist yet
    return 0;
  }
}
