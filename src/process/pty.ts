/**
 * PTY process management for shell commands
 */

import type { IPty } from 'node-pty';
import * as pty from 'node-pty';

import { stripAnsi } from '../output/colors.js';
import { PTY_COLS, PTY_ROWS } from '../utils/constants.js';

export interface ShellProcessOptions {
  command: string;
  cwd: string;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Raw output as it arrives */
  onData?: (data: string) => void;
}

export interface ShellResult {
  exitCode: number;
  /** Output with ANSI codes stripped and CRLF normalized */
  output: string;
  timedOut: boolean;
  cancelled: boolean;
  /** Seconds */
  duration: number;
}

/**
 * Run a shell command in a PTY, killing it on timeout or cancellation
 */
export function spawnShell(options: ShellProcessOptions): Promise<ShellResult> {
  const { command, cwd, timeoutMs, signal, onData } = options;

  return new Promise((resolve) => {
    const runStart = Date.now();
    let output = '';
    let timedOut = false;
    let cancelled = false;

    const ptyProcess: IPty = pty.spawn('bash', ['-c', command], {
      name: 'xterm-256color',
      cols: PTY_COLS,
      rows: PTY_ROWS,
      cwd,
      env: { ...process.env },
    });

    const timer = setTimeout(() => {
      timedOut = true;
      ptyProcess.kill();
    }, timeoutMs);

    const onAbort = (): void => {
      cancelled = true;
      ptyProcess.kill();
    };
    if (signal?.aborted) {
      onAbort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    ptyProcess.onData((data: string) => {
      output += data;
      onData?.(data);
    });

    ptyProcess.onExit(({ exitCode }) => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      const duration = Math.round((Date.now() - runStart) / 1000);
      resolve({
        exitCode,
        output: stripAnsi(output).replace(/\r\n/g, '\n'),
        timedOut,
        cancelled,
        duration,
      });
    });
  });
}
