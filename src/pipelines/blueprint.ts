/**
 * Blueprint pipeline: new-project generation in two phases
 *
 * Phase 1 asks for a JSON manifest of every file. Phase 2 orders the files
 * (code by dependency, config last) and generates each one with its own
 * tools-disabled call. Progress is checkpointed per file so an interrupted
 * run resumes where it stopped.
 */

import { createHash } from 'crypto';
import * as path from 'path';

import type { Checkpoint } from '../checkpoint/store.js';
import type { AgentContext } from '../core/context.js';
import { BackendError } from '../llm/errors.js';
import { resolveSampling } from '../llm/sampling.js';
import { colors, printAgent, printWarning } from '../output/colors.js';
import { recordModelCall, type RunStats } from '../output/stats.js';
import type { LlmRequest } from '../types/llm.js';
import { textMessage } from '../types/llm.js';
import { CancelledError, getErrorMessage, PipelineError } from '../utils/errors.js';
import { sleep } from '../utils/timers.js';
import {
  backfillPackageJson,
  cleanGeneratedContent,
  isJsonFile,
  jsonError,
} from './content.js';
import type { DependencyIndex } from './dependency-index.js';
import {
  type Blueprint,
  blueprintSchema,
  type FileSpec,
  orderFiles,
  parseBlueprint,
  validateBlueprint,
} from './manifest.js';
import { FileTransaction } from './transaction.js';

export const MANIFEST_SYSTEM_PROMPT = `You plan new software projects. Reply with one JSON object and nothing else:
{
  "projectType": "short label, e.g. node-express-api",
  "projectDescription": "one sentence",
  "files": [
    {
      "path": "path relative to the project root",
      "type": "code | config | doc | asset",
      "dependencies": ["project files this file imports"],
      "description": "what the file does",
      "exports": ["names this file exports"],
      "imports": ["modules or names this file imports"],
      "packageDependencies": ["third-party packages this file needs"],
      "relatedFiles": ["other project files it works with"]
    }
  ]
}
List every file the project needs. Do not call tools.`;

export const FILE_SYSTEM_PROMPT =
  'You write one file of a project at a time. Reply with the raw file content only: no explanations, no markdown fences. Do not call tools.';

export interface BlueprintResult {
  blueprint: Blueprint;
  /** Files written in this run, in generation order */
  written: string[];
  /** Files completed by an earlier interrupted run */
  resumed: string[];
  failed: string[];
  warnings: string[];
  summary: string;
}

/**
 * Stable id for a request against a workspace, so a rerun finds its checkpoint
 */
export function blueprintOperationId(workspaceRoot: string, request: string): string {
  const digest = createHash('sha1').update(`${workspaceRoot}\n${request}`).digest('hex');
  return `blueprint-${digest.slice(0, 12)}`;
}

function list(values: string[]): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

/**
 * Prompt for one file; later attempts get progressively more literal
 */
export function buildFilePrompt(
  file: FileSpec,
  blueprint: Blueprint,
  index: DependencyIndex,
  request: string,
  attempt: number
): string {
  const lines = [
    `Project: ${blueprint.projectType} - ${blueprint.projectDescription}`,
    `Request: ${request}`,
    '',
    `Write the complete content of ${file.path}.`,
  ];
  if (file.description) lines.push(`Purpose: ${file.description}`);
  lines.push(`Exports: ${list(file.exports)}`, `Imports: ${list(file.imports)}`);

  const dependencies = blueprint.files.filter((f) => file.dependencies.includes(f.path));
  if (dependencies.length > 0) {
    lines.push('', 'Dependencies:');
    for (const dep of dependencies) {
      const actual = index.get(dep.path);
      let line = `- ${dep.path}: exports ${list(dep.exports)}; imports ${list(dep.imports)}`;
      if (actual && actual.exports.join(',') !== [...dep.exports].sort().join(',')) {
        line += ` (as written, it exports ${list(actual.exports)}; use these)`;
      }
      lines.push(line);
    }
  }

  const related = file.relatedFiles.filter((p) => p !== file.path);
  if (related.length > 0) lines.push(`Related files: ${related.join(', ')}`);
  lines.push(`All project files: ${blueprint.files.map((f) => f.path).join(', ')}`);
  lines.push('', 'Use only the imports listed above and the exports your dependencies provide.');

  if (attempt >= 2) {
    lines.push('', 'Your previous reply was empty.');
  }
  if (attempt >= 4) {
    lines.push(`Output ONLY the content of ${file.path}, starting with its first line.`);
  }
  return lines.join('\n');
}

export class BlueprintPipeline {
  constructor(private readonly ctx: AgentContext) {}

  async run(request: string, stats: RunStats): Promise<BlueprintResult> {
    const { workspace, checkpoints, config, dependencies } = this.ctx;
    const operationId = blueprintOperationId(workspace.root, request);
    const checkpoint = await checkpoints.load(operationId);
    const restored = checkpoint ? this.restore(checkpoint, request) : null;

    let blueprint: Blueprint;
    let completed: string[] = [];
    if (restored) {
      blueprint = restored.blueprint;
      completed = restored.completed;
      printAgent(`Resuming blueprint: ${completed.length}/${blueprint.files.length} files already written`);
      await dependencies.refresh(workspace, completed);
    } else {
      printAgent('Designing project manifest');
      blueprint = await this.design(request, stats);
    }

    const validated = validateBlueprint(blueprint, workspace, config.maxBlueprintFiles);
    blueprint = validated.blueprint;
    for (const warning of validated.warnings) printWarning(warning);

    const { order } = orderFiles(blueprint.files);
    printAgent(
      `Blueprint: ${blueprint.projectType} with ${order.length} files (${order.map((f) => f.path).join(', ')})`
    );

    const transaction = new FileTransaction(workspace);
    const done = new Set(completed);
    const written: string[] = [];
    const failed: string[] = [];

    for (const [step, file] of order.entries()) {
      if (done.has(file.path)) continue;
      const first = done.size === 0 && written.length === 0 && failed.length === 0;

      let content: string | null;
      try {
        content = await this.generateFile(file, blueprint, request, stats);
        if (content !== null) {
          content = this.finalizeContent(file, content, blueprint);
          await transaction.write(file.path, content);
          dependencies.update(file.path, content);
        }
      } catch (error) {
        if (error instanceof CancelledError) throw error;
        printWarning(`${file.path}: ${getErrorMessage(error)}`);
        content = null;
      }

      if (content === null) {
        if (first) {
          await transaction.rollback();
          throw new PipelineError('blueprint', `Could not generate ${file.path}; nothing was kept`);
        }
        failed.push(file.path);
        printWarning(`Skipped ${file.path}`);
        continue;
      }

      written.push(file.path);
      printAgent(`${colors.green}Wrote${colors.reset} ${file.path} (${step + 1}/${order.length})`);
      await checkpoints.save({
        operationId,
        step: step + 1,
        totalSteps: order.length,
        completedFiles: [...completed, ...written],
        state: { request, blueprint },
      });
    }

    transaction.commit();
    await checkpoints.delete(operationId);

    const summary = [
      `Generated ${written.length + completed.length}/${order.length} files for ${blueprint.projectType}.`,
      ...(written.length > 0 ? [`Written: ${written.join(', ')}`] : []),
      ...(completed.length > 0 ? [`Resumed: ${completed.join(', ')}`] : []),
      ...(failed.length > 0 ? [`Failed: ${failed.join(', ')}`] : []),
    ].join('\n');

    return {
      blueprint,
      written,
      resumed: completed,
      failed,
      warnings: validated.warnings,
      summary,
    };
  }

  // ============================================================
  // PHASE 1
  // ============================================================

  /**
   * Ask for the manifest; one regeneration on an unparseable reply
   */
  private async design(request: string, stats: RunStats): Promise<Blueprint> {
    let prompt = request;
    for (let attempt = 1; attempt <= 2; attempt++) {
      const response = await this.call(prompt, MANIFEST_SYSTEM_PROMPT, stats);
      try {
        return parseBlueprint(response);
      } catch (error) {
        const message = getErrorMessage(error);
        if (attempt === 2) {
          throw new PipelineError('blueprint', `Manifest could not be parsed: ${message}`);
        }
        printWarning(`Manifest was not valid (${message}), regenerating`);
        prompt = `${request}\n\nYour previous reply could not be parsed (${message}). Reply with the JSON object only.`;
      }
    }
    throw new PipelineError('blueprint', 'Manifest could not be parsed');
  }

  private restore(
    checkpoint: Checkpoint,
    request: string
  ): { blueprint: Blueprint; completed: string[] } | null {
    if (checkpoint.state['request'] !== request) return null;
    const parsed = blueprintSchema.safeParse(checkpoint.state['blueprint']);
    if (!parsed.success) return null;
    return { blueprint: parsed.data, completed: checkpoint.completedFiles };
  }

  // ============================================================
  // PHASE 2
  // ============================================================

  /**
   * Content for one file, or null when every attempt failed
   */
  private async generateFile(
    file: FileSpec,
    blueprint: Blueprint,
    request: string,
    stats: RunStats
  ): Promise<string | null> {
    const { config, client, signal, dependencies } = this.ctx;
    let noToolsRetried = false;
    const attempts = 1 + config.maxFileRetries;

    for (let attempt = 1; attempt <= attempts; attempt++) {
      let prompt = buildFilePrompt(file, blueprint, dependencies, request, attempt);
      if (noToolsRetried) {
        prompt += '\n\nTools are not available. Reply with the file content as plain text.';
      }

      const request_: LlmRequest = this.request(prompt, FILE_SYSTEM_PROMPT);
      let text: string;
      try {
        const response = await client.call(request_);
        recordModelCall(stats, response.text.length);
        if (response.functionCalls.length > 0) {
          if (noToolsRetried) {
            printWarning(`${file.path}: model kept calling tools`);
            return null;
          }
          noToolsRetried = true;
          continue;
        }
        text = response.text;
      } catch (error) {
        if (error instanceof BackendError) {
          printWarning(`${file.path}: ${error.message}`);
          return null;
        }
        throw error;
      }

      const content = cleanGeneratedContent(text);
      if (content.trim()) return content;

      if (attempt < attempts) {
        printWarning(`${file.path}: empty reply, retry ${attempt}/${config.maxFileRetries}`);
        await sleep(config.fileRetryBackoffMs * attempt, signal);
      }
    }
    return null;
  }

  /**
   * JSON validity check and package.json backfill
   */
  private finalizeContent(file: FileSpec, content: string, blueprint: Blueprint): string {
    if (path.posix.basename(file.path) === 'package.json') {
      return backfillPackageJson(content, blueprint, path.basename(this.ctx.workspace.root));
    }
    if (isJsonFile(file.path)) {
      const problem = jsonError(content);
      if (problem !== null) printWarning(`${file.path} is not valid JSON: ${problem}`);
    }
    return content;
  }

  private request(prompt: string, system: string): LlmRequest {
    const { config, client, signal } = this.ctx;
    const model = config.model ?? client.defaultModel;
    const sampling = resolveSampling({}, model, 'generate code for a new project');
    const request: LlmRequest = {
      messages: [textMessage('user', prompt)],
      system,
      temperature: sampling.temperature,
      topP: sampling.topP,
      topK: sampling.topK,
      signal,
    };
    if (model !== undefined) request.model = model;
    return request;
  }

  private async call(prompt: string, system: string, stats: RunStats): Promise<string> {
    const response = await this.ctx.client.call(this.request(prompt, system));
    recordModelCall(stats, response.text.length);
    return response.text;
  }
}
