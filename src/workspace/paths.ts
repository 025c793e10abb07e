/**
 * Workspace path contract
 * Every path handed to a file tool is resolved here and must stay inside the root
 */

import * as fs from 'fs';
import * as path from 'path';

import { WorkspacePathError } from '../utils/errors.js';
import { isRecord } from '../utils/guards.js';
import { IgnoreRules, loadIgnoreRules } from './ignore.js';

/**
 * Absolute prefixes models commonly invent for "the project directory".
 * A path under one of them is re-rooted at the workspace.
 */
export const SYNTHETIC_PREFIXES: readonly string[] = [
  '/workspace/',
  '/project/',
  '/app/',
  '/code/',
  '~/workspace/',
  '~/',
];

function isInside(root: string, candidate: string): boolean {
  const rel = path.relative(root, candidate);
  return (
    rel === '' ||
    (rel !== '..' && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel))
  );
}

function isMissing(error: unknown): boolean {
  return isRecord(error) && (error['code'] === 'ENOENT' || error['code'] === 'ENOTDIR');
}

/**
 * Real path of the deepest existing ancestor, with the missing tail appended
 * @throws WorkspacePathError when a dangling symbolic link is on the path
 */
function realPathOf(target: string, requested: string): string {
  let current = target;
  const tail: string[] = [];
  for (;;) {
    try {
      return path.join(fs.realpathSync(current), ...tail);
    } catch (error) {
      if (!isMissing(error)) throw error;
      if (fs.lstatSync(current, { throwIfNoEntry: false })?.isSymbolicLink()) {
        throw new WorkspacePathError(requested, 'dangling symbolic link');
      }
      const parent = path.dirname(current);
      if (parent === current) return target;
      tail.unshift(path.basename(current));
      current = parent;
    }
  }
}

export class Workspace {
  readonly root: string;
  readonly ignore: IgnoreRules;

  constructor(root: string, ignore?: IgnoreRules) {
    this.root = path.resolve(root);
    this.ignore = ignore ?? new IgnoreRules();
  }

  /**
   * Canonicalize a requested path to an absolute path inside the root
   * @throws WorkspacePathError when the path is empty or escapes the root
   */
  resolve(requested: string): string {
    let candidate = requested.trim().replace(/\\/g, '/');
    if (!candidate) {
      throw new WorkspacePathError(requested, 'path is empty');
    }
    if (candidate.includes('\0')) {
      throw new WorkspacePathError(requested, 'path contains a null byte');
    }

    if (candidate.startsWith('~') || path.isAbsolute(candidate)) {
      const absolute = path.resolve(candidate);
      if (!candidate.startsWith('~') && isInside(this.root, absolute)) {
        return this.checkLinks(absolute, requested);
      }
      const prefix = SYNTHETIC_PREFIXES.find((p) => candidate.startsWith(p));
      if (!prefix) {
        throw new WorkspacePathError(requested, 'outside the workspace');
      }
      candidate = candidate.slice(prefix.length);
      if (!candidate) {
        return this.checkLinks(this.root, requested);
      }
    }

    const resolved = path.resolve(this.root, candidate);
    if (!isInside(this.root, resolved)) {
      throw new WorkspacePathError(requested, 'outside the workspace');
    }
    return this.checkLinks(resolved, requested);
  }

  /**
   * Symbolic links on the path must not lead out of the root
   */
  private checkLinks(absolute: string, requested: string): string {
    const realRoot = realPathOf(this.root, this.root);
    if (!isInside(realRoot, realPathOf(absolute, requested))) {
      throw new WorkspacePathError(requested, 'outside the workspace');
    }
    return absolute;
  }

  /**
   * Resolve, returning null instead of throwing
   */
  tryResolve(requested: string): string | null {
    try {
      return this.resolve(requested);
    } catch (error) {
      if (error instanceof WorkspacePathError) return null;
      throw error;
    }
  }

  /**
   * Workspace-relative POSIX path of an absolute path
   */
  relative(absolute: string): string {
    return path.relative(this.root, absolute).split(path.sep).join('/');
  }

  isIgnored(absolute: string, isDirectory = false): boolean {
    const rel = this.relative(absolute);
    return this.ignore.isIgnored(rel, isDirectory);
  }
}

/**
 * Create a workspace with ignore rules read from its root
 */
export function createWorkspace(root: string): Workspace {
  const resolved = path.resolve(root);
  return new Workspace(resolved, loadIgnoreRules(resolved));
}
