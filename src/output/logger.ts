/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Agent event for structured logging
 */
export interface AgentEvent {
  type: 'agent';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<AgentEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Logger that drops everything
 */
export function createNullLogger(): Logger {
  return {
    log: () => undefined,
    logEvent: () => undefined,
    close: () => undefined,
    filePath: null,
  };
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  runName: string
): Logger {
  if (!enabled) {
    return createNullLogger();
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  // Create timestamped filename
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path
    .basename(runName)
    .replace(/\.(ai\.)?ya?ml$/, '')
    .replace(/[^\w.-]+/g, '_');
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      logStream.write(stripAnsi(msg) + '\n');
    },
    logEvent(eventData: Omit<AgentEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'agent' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
