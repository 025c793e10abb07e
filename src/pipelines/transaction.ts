/**
 * Rollback log for files written by a pipeline
 */

import * as fs from 'fs/promises';
import * as path from 'path';

import type { Workspace } from '../workspace/paths.js';

interface Entry {
  absolute: string;
  /** Content before the first write, null when the file did not exist */
  previous: string | null;
}

export class FileTransaction {
  private readonly entries = new Map<string, Entry>();

  constructor(private readonly workspace: Workspace) {}

  /**
   * Paths written so far, workspace-relative, in write order
   */
  get written(): string[] {
    return [...this.entries.values()].map((e) => this.workspace.relative(e.absolute));
  }

  /**
   * Write a file, remembering what was there first
   * @throws WorkspacePathError when the path leaves the workspace
   */
  async write(relativePath: string, content: string): Promise<string> {
    const absolute = this.workspace.resolve(relativePath);
    if (!this.entries.has(absolute)) {
      this.entries.set(absolute, { absolute, previous: await readIfExists(absolute) });
    }
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, content, 'utf-8');
    return absolute;
  }

  /**
   * Undo every write, newest first: created files are removed, overwritten ones restored
   */
  async rollback(): Promise<void> {
    const entries = [...this.entries.values()].reverse();
    for (const entry of entries) {
      if (entry.previous === null) {
        await fs.rm(entry.absolute, { force: true });
      } else {
        await fs.writeFile(entry.absolute, entry.previous, 'utf-8');
      }
    }
    this.entries.clear();
  }

  /**
   * Keep the writes; the log is cleared
   */
  commit(): void {
    this.entries.clear();
  }
}

async function readIfExists(absolute: string): Promise<string | null> {
  try {
    return await fs.readFile(absolute, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return null;
    throw error;
  }
}
