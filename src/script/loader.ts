/**
 * Script file loading with a per-context parse cache
 *
 * One ScriptLoader lives for one CLI invocation (or one library caller's
 * context); chained and nested scripts resolve through it.
 */

import * as fs from 'fs';
import * as path from 'path';

import { ScriptNotFoundError } from '../utils/errors.js';
import { parseScript } from './parser.js';
import type { Script } from './types.js';

export const SCRIPT_EXTENSIONS = ['.ai.yaml', '.yaml', '.yml'] as const;

export class ScriptLoader {
  private readonly cache = new Map<string, Script>();

  constructor(private readonly baseDir: string = process.cwd()) {}

  /**
   * Load and parse a script file, reusing the cached parse
   */
  load(scriptFile: string): Script {
    const absolute = path.resolve(this.baseDir, scriptFile);
    const cached = this.cache.get(absolute);
    if (cached) return cached;

    if (!fs.existsSync(absolute)) {
      throw new ScriptNotFoundError(scriptFile);
    }
    const content = fs.readFileSync(absolute, 'utf-8');
    const script = parseScript(content, absolute);
    this.cache.set(absolute, script);
    return script;
  }

  /**
   * Candidate files for a chain or nested-script name
   */
  candidates(name: string, from: Script | null): string[] {
    const dir = from?.sourcePath ? path.dirname(from.sourcePath) : this.baseDir;
    const base = path.resolve(dir, name);
    const hasExtension = SCRIPT_EXTENSIONS.some((ext) => name.endsWith(ext));
    return hasExtension
      ? [base]
      : [...SCRIPT_EXTENSIONS.map((ext) => `${base}${ext}`), base];
  }

  /**
   * Resolve a script referenced by name from another script
   * @throws ScriptNotFoundError when no candidate exists
   */
  resolve(name: string, from: Script | null): Script {
    const found = this.candidates(name, from).find((file) => fs.existsSync(file));
    if (!found) {
      throw new ScriptNotFoundError(name);
    }
    return this.load(found);
  }

  get size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }
}
