/**
 * Upgrade/debug pipeline: targeted changes to an existing project
 *
 * Classifies the request, reads the code around reported error locations,
 * asks for a minimal read plan, then drives one tools-enabled edit loop
 * that is steered away from whole-file rewrites.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';

import type { AgentContext } from '../core/context.js';
import { buildCallMessages } from '../core/llm-call.js';
import type { DriveOptions, DriveResult, ToolCallOrchestrator } from '../core/orchestrator.js';
import { printAgent, printAgentDetail, printWarning } from '../output/colors.js';
import { recordModelCall } from '../output/stats.js';
import type { ChatMessage, LlmRequest, LlmResponse } from '../types/llm.js';
import { textMessage } from '../types/llm.js';
import { getToolPath } from '../types/tools.js';
import { ERROR_CONTEXT_RADIUS, MAX_FILE_LINES, MAX_LISTED_FILES } from '../utils/constants.js';
import { CancelledError, getErrorMessage } from '../utils/errors.js';
import { isCodeFile, listWorkspaceFiles } from '../workspace/scan.js';
import {
  classifyIntent,
  type ErrorLocation,
  type IntentClassification,
  parseErrorLocations,
} from './intent.js';

/** Read-plan entries honoured per request */
const MAX_PLANNED_READS = 10;
/** Files read when no plan and no error location is available */
const FALLBACK_READS = 5;

export const READ_PLAN_SYSTEM_PROMPT =
  'You decide which files must be read before changing a project. Reply with a JSON array only: [{"path": "relative/path", "offset": 1, "limit": 200, "reason": "why"}]. offset and limit are optional. List as few files as possible. Do not call tools.';

export const TARGETED_EDIT_INSTRUCTION =
  'Make targeted edits with the edit tool. Change only what the request needs; do not rewrite existing files from scratch. Use write_file only for new files.';

export const REWRITE_CORRECTION =
  'Do not rewrite the project. Keep the existing files and apply the smallest edits that satisfy the request, using the edit tool on the exact lines that need to change.';

const REWRITE_REGEX =
  /\b(rewrite|rewriting|re-write|from scratch|start over|full rewrite|complete rewrite|replace the (?:entire|whole)|rebuild the (?:entire|whole))\b/i;

const readPlanSchema = z.array(
  z.object({
    path: z.string().min(1),
    offset: z.number().int().min(1).optional(),
    limit: z.number().int().min(1).optional(),
    reason: z.string().default(''),
  })
);

export type ReadPlan = z.infer<typeof readPlanSchema>;

export type UpgradeStatus = 'completed' | 'needs-clarification';

export interface UpgradeResult {
  status: UpgradeStatus;
  intent: IntentClassification;
  /** Error locations that resolved to workspace files */
  errorLocations: ErrorLocation[];
  filesRead: string[];
  filesChanged: string[];
  /** Final model text, or the clarification request */
  text: string;
  drive: DriveResult | null;
}

/**
 * Parse a read plan from a model reply
 * @throws Error when no JSON array matching the plan shape is found
 */
export function parseReadPlan(text: string): ReadPlan {
  const unfenced = text.replace(/```[\w-]*\s*\n?/g, '').replace(/```/g, '');
  const start = unfenced.indexOf('[');
  const end = unfenced.lastIndexOf(']');
  if (start === -1 || end <= start) {
    throw new Error('no JSON array found in response');
  }
  const parsed = readPlanSchema.safeParse(JSON.parse(unfenced.slice(start, end + 1)));
  if (!parsed.success) {
    throw new Error(parsed.error.issues[0]?.message ?? 'read plan does not match schema');
  }
  return parsed.data;
}

/**
 * True when a response proposes replacing existing files wholesale
 */
export function proposesRewrite(response: LlmResponse, existing: ReadonlySet<string>): boolean {
  if (REWRITE_REGEX.test(response.text)) return true;
  return response.functionCalls.some((call) => {
    if (call.name !== 'write_file') return false;
    const target = getToolPath(call.args);
    return target !== null && existing.has(target.replace(/^\.\//, ''));
  });
}

/**
 * Numbered excerpt; `marker` flags one line with `>`
 */
export function numberedExcerpt(lines: string[], firstLine: number, marker?: number): string {
  const width = String(firstLine + lines.length - 1).length;
  return lines
    .map((line, i) => {
      const n = firstLine + i;
      const flag = n === marker ? '>' : ' ';
      return `${flag}${String(n).padStart(width)}| ${line}`;
    })
    .join('\n');
}

async function fileExists(absolute: string): Promise<boolean> {
  try {
    return (await fs.stat(absolute)).isFile();
  } catch {
    // Missing or unreadable paths are simply not candidates
    return false;
  }
}

export class UpgradePipeline {
  constructor(
    private readonly ctx: AgentContext,
    private readonly orchestrator: ToolCallOrchestrator
  ) {}

  /**
   * Run the pipeline; appends the planning exchange and tool loop to `history`
   */
  async run(request: string, history: ChatMessage[], options: DriveOptions): Promise<UpgradeResult> {
    const { config, workspace, dependencies } = this.ctx;
    const intent = classifyIntent(request);
    printAgent(
      `Upgrade intent: ${intent.intent} (${Math.round(intent.confidence * 100)}% confidence)`
    );

    if (intent.confidence < config.intentConfidenceThreshold) {
      printWarning('Request is ambiguous, asking for clarification');
      return {
        status: 'needs-clarification',
        intent,
        errorLocations: [],
        filesRead: [],
        filesChanged: [],
        text: 'Please clarify the request: describe the bug to fix (with the error output if there is one) or the change you want made to the existing code.',
        drive: null,
      };
    }

    const files = await listWorkspaceFiles(workspace, { maxFiles: MAX_LISTED_FILES });
    const locations = await this.resolveLocations(parseErrorLocations(request), files);
    const errorContext = await this.readErrorContext(locations);

    const plan = await this.readPlan(request, files, locations, options);
    const { blocks, read } = await this.readPlannedFiles(plan);
    printAgent(`Read ${read.length} file(s): ${read.join(', ') || '(none)'}`);

    const sections = [request];
    if (errorContext) sections.push(`Code at the reported error locations:\n\n${errorContext}`);
    if (blocks.length > 0) sections.push(`Relevant files:\n\n${blocks.join('\n\n')}`);
    sections.push(TARGETED_EDIT_INSTRUCTION);
    history.push(textMessage('user', sections.join('\n\n')));

    let response = await this.plan(history, options);
    const existing = new Set(files);
    if (proposesRewrite(response, existing)) {
      printWarning('Model proposed a rewrite, redirecting to targeted edits');
      if (response.text.trim()) history.push(textMessage('assistant', response.text.trim()));
      history.push(textMessage('user', REWRITE_CORRECTION));
      response = await this.plan(history, options);
    }

    const drive = await this.orchestrator.drive(history, response, options);
    await dependencies.refresh(workspace, drive.filesWritten);

    return {
      status: 'completed',
      intent,
      errorLocations: locations,
      filesRead: read,
      filesChanged: drive.filesWritten,
      text: drive.text,
      drive,
    };
  }

  // ============================================================
  // ERROR LOCATIONS
  // ============================================================

  /**
   * Keep locations that name a workspace file, directly or by basename
   */
  private async resolveLocations(locations: ErrorLocation[], files: string[]): Promise<ErrorLocation[]> {
    const { workspace } = this.ctx;
    const resolved: ErrorLocation[] = [];
    for (const loc of locations) {
      const absolute = workspace.tryResolve(loc.file);
      if (absolute !== null && (await fileExists(absolute)) && !workspace.isIgnored(absolute)) {
        resolved.push({ ...loc, file: workspace.relative(absolute) });
        continue;
      }
      const base = path.posix.basename(loc.file.replace(/\\/g, '/'));
      const match = files.find((f) => path.posix.basename(f) === base);
      if (match) resolved.push({ ...loc, file: match });
    }
    return resolved;
  }

  private async readErrorContext(locations: ErrorLocation[]): Promise<string> {
    const { workspace } = this.ctx;
    const excerpts: string[] = [];
    for (const loc of locations) {
      const content = await fs.readFile(workspace.resolve(loc.file), 'utf-8');
      const lines = content.split('\n');
      const first = Math.max(1, loc.line - ERROR_CONTEXT_RADIUS);
      const last = Math.min(lines.length, loc.line + ERROR_CONTEXT_RADIUS);
      excerpts.push(
        `--- ${loc.file} (line ${loc.line}) ---\n${numberedExcerpt(lines.slice(first - 1, last), first, loc.line)}`
      );
    }
    return excerpts.join('\n\n');
  }

  // ============================================================
  // READ PLAN
  // ============================================================

  private async readPlan(
    request: string,
    files: string[],
    locations: ErrorLocation[],
    options: DriveOptions
  ): Promise<ReadPlan> {
    const prompt = [
      `Request: ${request}`,
      '',
      `Project files:\n${files.join('\n') || '(none)'}`,
      ...(locations.length > 0
        ? ['', `Error locations:\n${locations.map((l) => `${l.file}:${l.line}`).join('\n')}`]
        : []),
    ].join('\n');

    try {
      const response = await this.call(
        { messages: [textMessage('user', prompt)], system: READ_PLAN_SYSTEM_PROMPT },
        options
      );
      const plan = parseReadPlan(response.text).slice(0, MAX_PLANNED_READS);
      for (const entry of plan) printAgentDetail(`Plan: read ${entry.path} (${entry.reason})`);
      if (plan.length > 0) return plan;
    } catch (error) {
      if (error instanceof CancelledError) throw error;
      printWarning(`Read plan unavailable: ${getErrorMessage(error)}`);
    }

    const fallback =
      locations.length > 0
        ? [...new Set(locations.map((l) => l.file))]
        : files.filter(isCodeFile).slice(0, FALLBACK_READS);
    return fallback.map((p) => ({ path: p, reason: 'fallback' }));
  }

  private async readPlannedFiles(plan: ReadPlan): Promise<{ blocks: string[]; read: string[] }> {
    const { workspace, dependencies } = this.ctx;
    const blocks: string[] = [];
    const read: string[] = [];
    for (const entry of plan) {
      const absolute = workspace.tryResolve(entry.path);
      if (absolute === null || workspace.isIgnored(absolute) || !(await fileExists(absolute))) {
        printAgentDetail(`Skipping ${entry.path}`);
        continue;
      }
      const relative = workspace.relative(absolute);
      const content = await fs.readFile(absolute, 'utf-8');
      dependencies.update(relative, content);
      const lines = content.split('\n');
      const first = entry.offset ?? 1;
      const slice = lines.slice(first - 1, first - 1 + (entry.limit ?? MAX_FILE_LINES));
      blocks.push(`--- ${relative} ---\n${numberedExcerpt(slice, first)}`);
      read.push(relative);
    }
    return { blocks, read };
  }

  // ============================================================
  // MODEL CALLS
  // ============================================================

  private async plan(history: ChatMessage[], options: DriveOptions): Promise<LlmResponse> {
    const { messages, system } = buildCallMessages(history, null, this.ctx.config.maxHistoryMessages);
    const request: Omit<LlmRequest, 'signal' | 'model' | 'temperature' | 'topP' | 'topK'> = {
      messages,
      tools: this.ctx.tools.declarations(),
    };
    if (system) request.system = system;
    if (this.ctx.onText) request.onText = this.ctx.onText;
    return this.call(request, options);
  }

  private async call(
    request: Omit<LlmRequest, 'signal' | 'model' | 'temperature' | 'topP' | 'topK'>,
    options: DriveOptions
  ): Promise<LlmResponse> {
    const response = await this.ctx.client.call({
      ...options.sampling,
      ...request,
      signal: this.ctx.signal,
    });
    recordModelCall(options.stats, response.text.length);
    return response;
  }
}
