/**
 * Durable progress records keyed by operation id
 *
 * One JSON file per operation under the store directory. Writes go to a
 * temp file that is renamed into place, so a reader never sees a partial
 * record.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

import type { Logger } from '../output/logger.js';
import { CHECKPOINT_RETENTION_MS } from '../utils/constants.js';
import { getErrorMessage } from '../utils/errors.js';

const checkpointSchema = z.object({
  operationId: z.string().min(1),
  step: z.number().int().min(0),
  totalSteps: z.number().int().min(0),
  timestamp: z.number(),
  completedFiles: z.array(z.string()),
  state: z.record(z.unknown()),
});

export type Checkpoint = z.infer<typeof checkpointSchema>;

export interface CheckpointStoreOptions {
  dir?: string;
  retentionMs?: number;
  logger?: Logger;
  now?: () => number;
}

export const DEFAULT_CHECKPOINT_DIR = path.join(os.tmpdir(), 'turnwright-checkpoints');

function fileNameFor(operationId: string): string {
  return `${operationId.replace(/[^\w.-]+/g, '_')}.json`;
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class CheckpointStore {
  readonly dir: string;
  private readonly retentionMs: number;
  private readonly logger: Logger | undefined;
  private readonly now: () => number;

  constructor(options: CheckpointStoreOptions = {}) {
    this.dir = options.dir ?? DEFAULT_CHECKPOINT_DIR;
    this.retentionMs = options.retentionMs ?? CHECKPOINT_RETENTION_MS;
    this.logger = options.logger;
    this.now = options.now ?? Date.now;
  }

  /**
   * Write a checkpoint, stamping the current time
   */
  async save(checkpoint: Omit<Checkpoint, 'timestamp'>): Promise<Checkpoint> {
    const record: Checkpoint = { ...checkpoint, timestamp: this.now() };
    await fs.mkdir(this.dir, { recursive: true });
    const target = path.join(this.dir, fileNameFor(record.operationId));
    const temp = `${target}.${process.pid}.tmp`;
    await fs.writeFile(temp, JSON.stringify(record, null, 2), 'utf-8');
    await fs.rename(temp, target);
    this.logger?.logEvent({
      event: 'checkpoint_saved',
      operationId: record.operationId,
      step: record.step,
      totalSteps: record.totalSteps,
    });
    return record;
  }

  /**
   * Read a checkpoint; null when absent or unreadable
   */
  async load(operationId: string): Promise<Checkpoint | null> {
    const file = path.join(this.dir, fileNameFor(operationId));
    let raw: string;
    try {
      raw = await fs.readFile(file, 'utf-8');
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger?.logEvent({ event: 'checkpoint_corrupt', operationId, message: getErrorMessage(error) });
      return null;
    }
    const parsed = checkpointSchema.safeParse(json);
    if (!parsed.success) {
      this.logger?.logEvent({ event: 'checkpoint_corrupt', operationId, message: parsed.error.message });
      return null;
    }
    return parsed.data;
  }

  async delete(operationId: string): Promise<void> {
    await fs.rm(path.join(this.dir, fileNameFor(operationId)), { force: true });
  }

  /**
   * Operation ids with a stored checkpoint
   */
  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.dir);
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
    return entries
      .filter((name) => name.endsWith('.json'))
      .map((name) => name.slice(0, -'.json'.length))
      .sort();
  }

  /**
   * Delete checkpoints older than the retention window
   * @returns number of records removed
   */
  async gc(): Promise<number> {
    const cutoff = this.now() - this.retentionMs;
    let removed = 0;
    for (const operationId of await this.list()) {
      const checkpoint = await this.load(operationId);
      if (checkpoint === null || checkpoint.timestamp < cutoff) {
        await this.delete(operationId);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger?.logEvent({ event: 'checkpoint_gc', removed });
    }
    return removed;
  }
}
