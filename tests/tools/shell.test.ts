import { beforeEach, describe, expect, it, vi } from 'vitest';

vi.mock('../../src/process/pty.js', () => ({
  spawnShell: vi.fn(),
}));

import { spawnShell } from '../../src/process/pty.js';
import { shellTool } from '../../src/tools/shell.js';
import { CancelledError } from '../../src/utils/errors.js';
import { Workspace } from '../../src/workspace/paths.js';

describe('shell', () => {
  const context = { workspace: new Workspace('/tmp/ws'), signal: new AbortController().signal };
  const base = { exitCode: 0, output: '', timedOut: false, cancelled: false, duration: 1 };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('runs in the workspace root with the default timeout', async () => {
    vi.mocked(spawnShell).mockResolvedValue({ ...base, output: ' ok \n' });

    const result = await shellTool.invoke({ command: 'npm test' }, context);

    expect(result).toEqual({ content: 'ok', displayText: 'Exit 0 in 1s' });
    expect(spawnShell).toHaveBeenCalledWith({
      command: 'npm test',
      cwd: '/tmp/ws',
      timeoutMs: 60000,
      signal: context.signal,
    });
  });

  it('reports empty output', async () => {
    vi.mocked(spawnShell).mockResolvedValue(base);

    expect((await shellTool.invoke({ command: 'true' }, context)).content).toBe('(no output)');
  });

  it('fails on a non-zero exit code', async () => {
    vi.mocked(spawnShell).mockResolvedValue({ ...base, exitCode: 1, output: 'boom\n' });

    await expect(shellTool.invoke({ command: 'false' }, context)).rejects.toThrow('Exit code 1\nboom');
  });

  it('fails on timeout', async () => {
    vi.mocked(spawnShell).mockResolvedValue({ ...base, exitCode: 137, timedOut: true, output: 'partial' });

    await expect(shellTool.invoke({ command: 'sleep 5', timeout: 100 }, context)).rejects.toThrow(
      'Command timed out after 100ms\npartial'
    );
  });

  it('raises cancellation', async () => {
    vi.mocked(spawnShell).mockResolvedValue({ ...base, cancelled: true });

    await expect(shellTool.invoke({ command: 'sleep 5' }, context)).rejects.toBeInstanceOf(CancelledError);
  });
});
