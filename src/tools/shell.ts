/**
 * shell: run a command in the workspace through a PTY
 */

import { z } from 'zod';

import { spawnShell } from '../process/pty.js';
import type { ShellInput } from '../types/tools.js';
import { SHELL_TIMEOUT_MS } from '../utils/constants.js';
import { CancelledError, throwIfCancelled } from '../utils/errors.js';
import { defineTool } from './registry.js';

const MAX_OUTPUT_CHARS = 20000;

const shellSchema: z.ZodType<ShellInput, z.ZodTypeDef, unknown> = z.object({
  command: z.string().min(1),
  timeout: z.number().int().positive().optional(),
});

/**
 * Keep the tail of long output, where errors usually are
 */
function clipOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_CHARS) return output;
  return `... (${output.length - MAX_OUTPUT_CHARS} chars omitted)\n${output.slice(-MAX_OUTPUT_CHARS)}`;
}

export const shellTool = defineTool<ShellInput>({
  name: 'shell',
  description:
    'Run a shell command in the workspace root. Returns combined output and exit code.',
  parameters: {
    type: 'object',
    properties: {
      command: { type: 'string', description: 'Command line passed to bash -c' },
      timeout: { type: 'integer', description: `Timeout in ms (default ${SHELL_TIMEOUT_MS})` },
    },
    required: ['command'],
  },
  schema: shellSchema,
  async invoke(params, { workspace, signal }) {
    throwIfCancelled(signal);
    const result = await spawnShell({
      command: params.command,
      cwd: workspace.root,
      timeoutMs: params.timeout ?? SHELL_TIMEOUT_MS,
      signal,
    });

    if (result.cancelled) {
      throw new CancelledError();
    }
    const output = clipOutput(result.output.trim());
    if (result.timedOut) {
      throw new Error(`Command timed out after ${params.timeout ?? SHELL_TIMEOUT_MS}ms\n${output}`);
    }
    if (result.exitCode !== 0) {
      throw new Error(`Exit code ${result.exitCode}\n${output}`);
    }
    return {
      content: output || '(no output)',
      displayText: `Exit 0 in ${result.duration}s`,
    };
  },
});
