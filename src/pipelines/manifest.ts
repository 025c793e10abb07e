/**
 * Blueprint manifest: schema, parsing, validation and generation order
 */

import * as path from 'path';
import { z } from 'zod';

import { PipelineError } from '../utils/errors.js';
import type { Workspace } from '../workspace/paths.js';

/** Accepts a list, a single string, or a `{ name: version }` map */
const stringList = z.preprocess((value) => {
  if (value === undefined || value === null) return [];
  if (typeof value === 'string') return value.trim() ? [value] : [];
  if (typeof value === 'object' && !Array.isArray(value)) {
    return Object.entries(value).map(([name, version]) =>
      typeof version === 'string' && version ? `${name}@${version}` : name
    );
  }
  return value;
}, z.array(z.string()));

const fileSpecSchema = z.object({
  path: z.string().min(1),
  type: z.string().default('code'),
  dependencies: stringList,
  description: z.string().default(''),
  exports: stringList,
  imports: stringList,
  packageDependencies: stringList,
  relatedFiles: stringList,
});

export const blueprintSchema = z.object({
  projectType: z.string().default('unknown'),
  projectDescription: z.string().default(''),
  files: z.array(fileSpecSchema),
});

export type FileSpec = z.infer<typeof fileSpecSchema>;
export type Blueprint = z.infer<typeof blueprintSchema>;

// ============================================================
// PARSING
// ============================================================

/**
 * Strip markdown fences and take the text between the first `{` and last `}`
 * @throws Error when the text holds no object
 */
export function extractJsonObject(text: string): string {
  const unfenced = text.replace(/```[\w-]*\s*\n?/g, '').replace(/```/g, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  if (start === -1 || end <= start) {
    throw new Error('no JSON object found in response');
  }
  return unfenced.slice(start, end + 1);
}

/**
 * Parse a manifest response
 * @throws Error on malformed JSON or a shape that does not fit the schema
 */
export function parseBlueprint(text: string): Blueprint {
  const json: unknown = JSON.parse(extractJsonObject(text));
  const parsed = blueprintSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(
      issue ? `${issue.path.join('.') || 'manifest'}: ${issue.message}` : 'manifest does not match schema'
    );
  }
  return parsed.data;
}

// ============================================================
// CLASSIFICATION
// ============================================================

const CONFIG_FILE_NAMES: ReadonlySet<string> = new Set([
  'package.json',
  'tsconfig.json',
  'jsconfig.json',
  'composer.json',
  'requirements.txt',
  'pyproject.toml',
  'setup.cfg',
  'cargo.toml',
  'go.mod',
  'pom.xml',
  'build.gradle',
  'dockerfile',
  'docker-compose.yml',
  'docker-compose.yaml',
  'makefile',
  '.babelrc',
  '.eslintrc',
  '.eslintrc.json',
  '.prettierrc',
  '.gitignore',
  '.npmrc',
  '.env',
  '.env.example',
]);

const CONFIG_FILE_PATTERNS: readonly RegExp[] = [
  /\.config\.(c|m)?(j|t)s$/,
  /^tsconfig\..+\.json$/,
  /^\.env\./,
  /\.(ya?ml|toml|ini)$/,
];

/**
 * Config files are always generated after every code file
 */
export function isConfigFile(spec: Pick<FileSpec, 'path' | 'type'>): boolean {
  if (spec.type.toLowerCase() === 'config') return true;
  const name = path.posix.basename(spec.path).toLowerCase();
  return CONFIG_FILE_NAMES.has(name) || CONFIG_FILE_PATTERNS.some((p) => p.test(name));
}

// ============================================================
// VALIDATION
// ============================================================

export interface ValidatedBlueprint {
  blueprint: Blueprint;
  warnings: string[];
}

export function normalizeManifestPath(raw: string): string {
  return path.posix.normalize(raw.trim().replace(/\\/g, '/')).replace(/^\.\//, '');
}

/**
 * Check a manifest against the workspace.
 * Invalid, duplicate and excess entries are dropped with a warning; unresolved
 * dependencies are warnings only.
 * @throws PipelineError when no usable file remains
 */
export function validateBlueprint(
  blueprint: Blueprint,
  workspace: Workspace,
  maxFiles: number
): ValidatedBlueprint {
  const warnings: string[] = [];
  if (blueprint.files.length === 0) {
    throw new PipelineError('blueprint', 'Manifest contains no files');
  }

  const seen = new Set<string>();
  const files: FileSpec[] = [];
  for (const spec of blueprint.files) {
    const absolute = workspace.tryResolve(normalizeManifestPath(spec.path));
    const relative = absolute === null ? '' : workspace.relative(absolute);
    if (!relative) {
      warnings.push(`Invalid path dropped: ${spec.path}`);
      continue;
    }
    if (seen.has(relative)) {
      warnings.push(`Duplicate entry dropped: ${relative}`);
      continue;
    }
    seen.add(relative);
    files.push({ ...spec, path: relative });
  }

  if (files.length > maxFiles) {
    warnings.push(`Manifest lists ${files.length} files, keeping the first ${maxFiles}`);
    files.length = maxFiles;
  }
  if (files.length === 0) {
    throw new PipelineError('blueprint', 'Manifest contains no valid file paths');
  }

  const known = new Set(files.map((f) => f.path));
  for (const spec of files) {
    spec.dependencies = spec.dependencies.map(normalizeManifestPath);
    for (const dependency of spec.dependencies) {
      if (!known.has(dependency)) {
        warnings.push(`${spec.path} depends on unknown file ${dependency}`);
      }
    }
  }

  const { cyclic } = orderFiles(files);
  if (cyclic.length > 0) {
    warnings.push(`Dependency cycle among: ${cyclic.join(', ')}`);
  }

  return { blueprint: { ...blueprint, files }, warnings };
}

// ============================================================
// ORDERING
// ============================================================

export interface FileOrder {
  order: FileSpec[];
  /** Paths left in a cycle, emitted in manifest order */
  cyclic: string[];
}

/**
 * Kahn's algorithm over one partition; ties and cycle leftovers keep manifest order
 */
function kahn(files: FileSpec[], rank: Map<string, number>): FileOrder {
  const members = new Set(files.map((f) => f.path));
  const indegree = new Map<string, number>();
  const dependents = new Map<string, string[]>();

  for (const file of files) {
    const deps = new Set(file.dependencies.filter((d) => members.has(d) && d !== file.path));
    indegree.set(file.path, deps.size);
    for (const dep of deps) {
      dependents.set(dep, [...(dependents.get(dep) ?? []), file.path]);
    }
  }

  const byRank = (a: string, b: string): number => (rank.get(a) ?? 0) - (rank.get(b) ?? 0);
  const ready = files.filter((f) => indegree.get(f.path) === 0).map((f) => f.path);
  const emitted: string[] = [];

  while (ready.length > 0) {
    ready.sort(byRank);
    const next = ready.shift();
    if (next === undefined) break;
    emitted.push(next);
    for (const dependent of dependents.get(next) ?? []) {
      const remaining = (indegree.get(dependent) ?? 0) - 1;
      indegree.set(dependent, remaining);
      if (remaining === 0) ready.push(dependent);
    }
  }

  const done = new Set(emitted);
  const cyclic = files.filter((f) => !done.has(f.path)).map((f) => f.path);
  const byPath = new Map(files.map((f) => [f.path, f]));
  const order = [...emitted, ...cyclic].flatMap((p) => {
    const spec = byPath.get(p);
    return spec ? [spec] : [];
  });
  return { order, cyclic };
}

/**
 * Generation order: code files topologically sorted, then config files,
 * whatever their declared dependencies
 */
export function orderFiles(files: FileSpec[]): FileOrder {
  const rank = new Map(files.map((f, i) => [f.path, i]));
  const code = kahn(files.filter((f) => !isConfigFile(f)), rank);
  const config = kahn(files.filter((f) => isConfigFile(f)), rank);
  return {
    order: [...code.order, ...config.order],
    cyclic: [...code.cyclic, ...config.cyclic],
  };
}
