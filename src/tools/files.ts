/**
 * File tools: read_file, write_file, edit, list_files
 * Every path goes through the workspace path contract.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

import type {
  EditInput,
  ListFilesInput,
  ReadFileInput,
  WriteFileInput,
} from '../types/tools.js';
import { MAX_FILE_LINES } from '../utils/constants.js';
import { throwIfCancelled } from '../utils/errors.js';
import { listWorkspaceFiles } from '../workspace/scan.js';
import { defineTool } from './registry.js';

const MAX_LISTED_ENTRIES = 500;

const readFileSchema: z.ZodType<ReadFileInput, z.ZodTypeDef, unknown> = z.object({
  file_path: z.string().min(1),
  offset: z.number().int().min(1).optional(),
  limit: z.number().int().min(1).optional(),
});

export const readFileTool = defineTool<ReadFileInput>({
  name: 'read_file',
  description:
    'Read a text file from the workspace. offset is the 1-based first line, limit the number of lines.',
  parameters: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Path relative to the workspace root' },
      offset: { type: 'integer', description: 'First line to read (1-based)' },
      limit: { type: 'integer', description: `Lines to read (default ${MAX_FILE_LINES})` },
    },
    required: ['file_path'],
  },
  schema: readFileSchema,
  async invoke(params, { workspace, signal }) {
    throwIfCancelled(signal);
    const absolute = workspace.resolve(params.file_path);
    const content = await fs.readFile(absolute, 'utf-8');
    const lines = content.split('\n');
    const start = (params.offset ?? 1) - 1;
    const limit = params.limit ?? MAX_FILE_LINES;
    const slice = lines.slice(start, start + limit);
    const remaining = lines.length - (start + slice.length);
    const suffix = remaining > 0 ? `\n... (${remaining} more lines)` : '';
    return {
      content: slice.join('\n') + suffix,
      displayText: `Read ${slice.length} lines from ${workspace.relative(absolute)}`,
    };
  },
});

const writeFileSchema: z.ZodType<WriteFileInput, z.ZodTypeDef, unknown> = z.object({
  file_path: z.string().min(1),
  content: z.string(),
});

export const writeFileTool = defineTool<WriteFileInput>({
  name: 'write_file',
  description: 'Create or overwrite a file in the workspace with the given content.',
  parameters: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Path relative to the workspace root' },
      content: { type: 'string', description: 'Full file content' },
    },
    required: ['file_path', 'content'],
  },
  schema: writeFileSchema,
  mutating: true,
  async invoke(params, { workspace, signal }) {
    throwIfCancelled(signal);
    const absolute = workspace.resolve(params.file_path);
    await fs.mkdir(path.dirname(absolute), { recursive: true });
    await fs.writeFile(absolute, params.content, 'utf-8');
    const lineCount = params.content.split('\n').length;
    const relative = workspace.relative(absolute);
    return {
      content: `Wrote ${lineCount} lines to ${relative}`,
      displayText: `Wrote ${relative}`,
    };
  },
});

const editSchema: z.ZodType<EditInput, z.ZodTypeDef, unknown> = z.object({
  file_path: z.string().min(1),
  old_string: z.string().min(1),
  new_string: z.string(),
  replace_all: z.boolean().optional(),
});

/**
 * Count non-overlapping occurrences
 */
export function countOccurrences(haystack: string, needle: string): number {
  if (!needle) return 0;
  let count = 0;
  for (let index = haystack.indexOf(needle); index !== -1; index = haystack.indexOf(needle, index + needle.length)) {
    count++;
  }
  return count;
}

export const editTool = defineTool<EditInput>({
  name: 'edit',
  description:
    'Replace exact text in a file. old_string must match exactly once unless replace_all is true.',
  parameters: {
    type: 'object',
    properties: {
      file_path: { type: 'string', description: 'Path relative to the workspace root' },
      old_string: { type: 'string', description: 'Exact text to replace' },
      new_string: { type: 'string', description: 'Replacement text' },
      replace_all: { type: 'boolean', description: 'Replace every occurrence' },
    },
    required: ['file_path', 'old_string', 'new_string'],
  },
  schema: editSchema,
  mutating: true,
  async invoke(params, { workspace, signal }) {
    throwIfCancelled(signal);
    const absolute = workspace.resolve(params.file_path);
    const relative = workspace.relative(absolute);
    const content = await fs.readFile(absolute, 'utf-8');
    const occurrences = countOccurrences(content, params.old_string);

    if (occurrences === 0) {
      throw new Error(`old_string not found in ${relative}`);
    }
    if (occurrences > 1 && !params.replace_all) {
      throw new Error(
        `old_string matches ${occurrences} times in ${relative}; add context or set replace_all`
      );
    }

    const updated = params.replace_all
      ? content.split(params.old_string).join(params.new_string)
      : content.replace(params.old_string, () => params.new_string);
    await fs.writeFile(absolute, updated, 'utf-8');
    const replaced = params.replace_all ? occurrences : 1;
    return {
      content: `Replaced ${replaced} occurrence${replaced === 1 ? '' : 's'} in ${relative}`,
      displayText: `Edited ${relative}`,
    };
  },
});

const listFilesSchema: z.ZodType<ListFilesInput, z.ZodTypeDef, unknown> = z.object({
  path: z.string().optional(),
  recursive: z.boolean().optional(),
});

export const listFilesTool = defineTool<ListFilesInput>({
  name: 'list_files',
  description: 'List files in a workspace directory, skipping ignored paths.',
  parameters: {
    type: 'object',
    properties: {
      path: { type: 'string', description: 'Directory relative to the workspace root (default: root)' },
      recursive: { type: 'boolean', description: 'Include subdirectories (default: false)' },
    },
  },
  schema: listFilesSchema,
  async invoke(params, { workspace, signal }) {
    throwIfCancelled(signal);
    const from = params.path ? workspace.resolve(params.path) : workspace.root;
    const entries = await listWorkspaceFiles(workspace, {
      from,
      recursive: params.recursive ?? false,
      maxFiles: MAX_LISTED_ENTRIES,
    });
    return {
      content: entries.length > 0 ? entries.join('\n') : '(empty directory)',
      displayText: `Listed ${entries.length} entries`,
    };
  },
});
