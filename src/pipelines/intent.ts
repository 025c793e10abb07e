/**
 * Request routing heuristics: fix/upgrade intent, error locations and
 * which pipeline (if any) takes the first AI turn
 */

import type { AgentConfig } from '../types/runner.js';
import { countCodeFiles } from '../workspace/scan.js';
import type { Workspace } from '../workspace/paths.js';

export type Intent = 'fix' | 'upgrade' | 'both' | 'unknown';

export type Route = 'upgrade' | 'blueprint' | 'none';

export interface IntentClassification {
  intent: Intent;
  /** Winning share of the total score, 0 when nothing matched */
  confidence: number;
  fixScore: number;
  upgradeScore: number;
  /** Keywords and patterns that contributed */
  indicators: string[];
}

export interface ErrorLocation {
  file: string;
  line: number;
  column?: number;
}

const FIX_KEYWORDS = [
  'fix',
  'bug',
  'error',
  'broken',
  'crash',
  'crashes',
  'failing',
  'fails',
  'exception',
  'debug',
  'issue',
  'not working',
  "doesn't work",
  'wrong',
];

const UPGRADE_KEYWORDS = [
  'add',
  'upgrade',
  'update',
  'improve',
  'refactor',
  'extend',
  'modify',
  'change',
  'enhance',
  'migrate',
  'rename',
  'support',
  'feature',
];

const MODIFY_KEYWORDS = [...FIX_KEYWORDS, 'modify', 'change', 'update', 'refactor', 'upgrade', 'improve'];

const CREATE_VERB_REGEX = /\b(create|build|generate|scaffold|bootstrap|make)\b/i;
const PROJECT_NOUN_REGEX =
  /\b(app|application|project|website|site|api|server|service|cli|tool|game|library|bot|dashboard|backend|frontend)\b/i;

/** Stack traces and compiler diagnostics */
export const ERROR_PATTERN =
  /(\b\w*(Error|Exception)\b:|Traceback \(most recent call last\)|^\s+at\s+\S+.*:\d+|File "[^"]+", line \d+|\b[\w./-]+\.\w+:\d+(:\d+)?\b|\b[\w./-]+\.\w+\(\d+,\d+\))/m;

const STACK_SCORE = 3;

function keywordRegex(keyword: string): RegExp {
  const escaped = keyword.replace(/[.*+?^${}()|[\]\\]/g, '\\$&').replace(/\s+/g, '\\s+');
  return new RegExp(`\\b${escaped}\\b`, 'i');
}

function matchedKeywords(text: string, keywords: readonly string[]): string[] {
  return keywords.filter((keyword) => keywordRegex(keyword).test(text));
}

/**
 * Score fix against upgrade intent; `both` when the scores are within one
 */
export function classifyIntent(text: string): IntentClassification {
  const fixMatches = matchedKeywords(text, FIX_KEYWORDS);
  const upgradeMatches = matchedKeywords(text, UPGRADE_KEYWORDS);
  const indicators = [...fixMatches, ...upgradeMatches];

  let fixScore = fixMatches.length;
  if (ERROR_PATTERN.test(text)) {
    fixScore += STACK_SCORE;
    indicators.push('stack-trace');
  }
  const upgradeScore = upgradeMatches.length;
  const total = fixScore + upgradeScore;

  if (total === 0) {
    return { intent: 'unknown', confidence: 0, fixScore, upgradeScore, indicators };
  }

  let intent: Intent;
  if (fixScore > 0 && upgradeScore > 0 && Math.abs(fixScore - upgradeScore) <= 1) {
    intent = 'both';
  } else {
    intent = fixScore > upgradeScore ? 'fix' : 'upgrade';
  }
  const confidence =
    intent === 'both' ? (fixScore + upgradeScore) / (total + 1) : Math.max(fixScore, upgradeScore) / total;

  return { intent, confidence, fixScore, upgradeScore, indicators };
}

const LOCATION_PATTERNS: ReadonlyArray<{
  regex: RegExp;
  read: (m: RegExpMatchArray) => ErrorLocation | null;
}> = [
  {
    // at fn (file:line:col) / at file:line:col
    regex: /\bat\s+(?:[^\s(]+\s+\()?([^\s():]+):(\d+):(\d+)\)?/g,
    read: (m) => location(m[1], m[2], m[3]),
  },
  {
    regex: /File "([^"]+)", line (\d+)/g,
    read: (m) => location(m[1], m[2]),
  },
  {
    regex: /([\w./\\-]+\.\w+)\((\d+),(\d+)\)/g,
    read: (m) => location(m[1], m[2], m[3]),
  },
  {
    regex: /(?:^|[\s'"(])([\w./\\-]+\.[A-Za-z]\w*):(\d+)(?::(\d+))?/gm,
    read: (m) => location(m[1], m[2], m[3]),
  },
];

function location(
  file: string | undefined,
  line: string | undefined,
  column?: string
): ErrorLocation | null {
  if (!file || !line) return null;
  const parsed: ErrorLocation = { file: file.replace(/^file:\/\//, ''), line: Number(line) };
  if (column) parsed.column = Number(column);
  return parsed;
}

/**
 * Error locations in order of appearance, one per file:line
 */
export function parseErrorLocations(text: string): ErrorLocation[] {
  const found: Array<{ index: number; loc: ErrorLocation }> = [];
  const seen = new Set<string>();

  for (const { regex, read } of LOCATION_PATTERNS) {
    for (const match of text.matchAll(regex)) {
      const loc = read(match);
      if (!loc || loc.file.startsWith('node:') || loc.file.includes('node_modules')) continue;
      const key = `${loc.file}:${loc.line}`;
      if (seen.has(key)) continue;
      seen.add(key);
      found.push({ index: match.index ?? 0, loc });
    }
  }

  return found.sort((a, b) => a.index - b.index).map((f) => f.loc);
}

/**
 * True for a request to create a new project from scratch
 */
export function isNewProjectRequest(text: string): boolean {
  return CREATE_VERB_REGEX.test(text) && PROJECT_NOUN_REGEX.test(text);
}

/**
 * True for a request to change existing code
 */
export function isModificationRequest(text: string): boolean {
  return ERROR_PATTERN.test(text) || matchedKeywords(text, MODIFY_KEYWORDS).length > 0;
}

/**
 * Pipeline for the first AI turn. Fix requests need existing code; new
 * projects need an (almost) empty workspace.
 */
export async function chooseRoute(
  text: string,
  workspace: Workspace,
  config: Pick<AgentConfig, 'minExistingCodeFiles'>
): Promise<Route> {
  const modification = isModificationRequest(text);
  const creation = isNewProjectRequest(text);
  if (!modification && !creation) return 'none';

  const codeFiles = await countCodeFiles(workspace);
  if (modification && codeFiles >= config.minExistingCodeFiles) {
    return 'upgrade';
  }
  if (creation && codeFiles <= 2) return 'blueprint';
  return 'none';
}
