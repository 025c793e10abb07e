/**
 * Script parser
 *
 * Turns script text into the Script model:
 * - front matter, then `---` separated turns
 * - `role: content` messages, `role: |` multi-line messages
 * - `$instruction` lines and `$if/$while/$for/$match/$pipe` blocks
 * - `-> target(params)` chain directives
 */

import type { Role } from '../types/llm.js';
import {
  parseAssignment,
  parseParamList,
  splitTopLevel,
  unquote,
} from '../utils/arguments.js';
import { ScriptParseError } from '../utils/errors.js';
import {
  emptyFrontmatter,
  parseYaml,
  splitFrontmatter,
  toFrontmatter,
} from './frontmatter.js';
import type {
  AiPlaceholder,
  CallOverrides,
  ChainTarget,
  ConstrainedChoice,
  ControlFlowBlock,
  Instruction,
  MatchCase,
  Message,
  PipeStep,
  Replacement,
  Script,
  Turn,
} from './types.js';

interface SourceLine {
  text: string;
  /** 1-based line number in the script file */
  line: number;
}

const SEPARATOR_REGEX = /^(---|\*\*\*)\s*$/;
const ROLE_REGEX = /^(system|user|assistant)\s*:(?:\s?(.*))?$/;
const CONTROL_FLOW_REGEX = /^\$(if|while|for|match|pipe)\b\s*(.*)$/;
const CHAIN_REGEX = /^->\s*([\w./-]+)\s*(?:\((.*)\))?\s*$/;
const MULTILINE_MARKERS = new Set(['|', '|-', '>']);

// ============================================================
// MESSAGE DIRECTIVES
// ============================================================

export const PLACEHOLDER_REGEX = /\[\[(\w+)(?::(.*?))?\]\]/;
export const PLACEHOLDER_REGEX_GLOBAL = /\[\[(\w+)(?::(.*?))?\]\]/g;
const SCRIPT_REPLACEMENT_REGEX = /\[\[@(?!\$)([\w./-]+)(?:\((.*?)\))?\]\]/g;
const INSTRUCTION_REPLACEMENT_REGEX = /\[\[@\$(\w+)(?:\((.*?)\))?\]\]/g;
const REGEX_REPLACEMENT_REGEX =
  /(?<=^|\s)\/((?:\\\/|[^/\n])+)\/([a-z]*):([A-Za-z_][\w.]*)(?::(\d+|[A-Za-z_]\w*))?/g;

function parseOverrides(spec: string): CallOverrides {
  const params = parseParamList(spec);
  const overrides: CallOverrides = {};
  if (params['model']) overrides.model = params['model'];

  const numeric = (key: string, alias: string): number | undefined => {
    const raw = params[key] ?? params[alias];
    if (raw === undefined || raw.trim() === '') return undefined;
    const value = Number(raw);
    return Number.isFinite(value) ? value : undefined;
  };
  const temperature = numeric('temperature', 'temp');
  if (temperature !== undefined) overrides.temperature = temperature;
  const topP = numeric('top_p', 'topP');
  if (topP !== undefined) overrides.topP = topP;
  const topK = numeric('top_k', 'topK');
  if (topK !== undefined) overrides.topK = topK;
  return overrides;
}

/**
 * Parse `|A|B|C`, `|A|B|C:2` or `|A|B|C:random`
 */
export function parseChoice(spec: string): ConstrainedChoice {
  let body = spec.trim().replace(/^\|/, '');
  const choice: ConstrainedChoice = { options: [], random: false };

  const modifier = /:\s*(\d+|random)\s*$/.exec(body);
  if (modifier?.[1]) {
    body = body.slice(0, modifier.index);
    if (modifier[1] === 'random') {
      choice.random = true;
    } else {
      choice.count = Number(modifier[1]);
    }
  }
  choice.options = body
    .split('|')
    .map((option) => option.trim())
    .filter(Boolean);
  return choice;
}

function parseReplacements(content: string): Replacement[] {
  const replacements: Replacement[] = [];

  for (const match of content.matchAll(SCRIPT_REPLACEMENT_REGEX)) {
    replacements.push({
      kind: 'script',
      markup: match[0],
      name: match[1] ?? '',
      params: parseParamList(match[2] ?? ''),
    });
  }
  for (const match of content.matchAll(INSTRUCTION_REPLACEMENT_REGEX)) {
    replacements.push({
      kind: 'instruction',
      markup: match[0],
      name: match[1] ?? '',
      params: parseParamList(match[2] ?? ''),
    });
  }
  for (const match of content.matchAll(REGEX_REPLACEMENT_REGEX)) {
    const group = match[4];
    const replacement: Replacement = {
      kind: 'regex',
      markup: match[0],
      pattern: (match[1] ?? '').replace(/\\\//g, '/'),
      flags: match[2] ?? '',
      variable: match[3] ?? '',
    };
    if (group !== undefined) {
      replacement.group = /^\d+$/.test(group) ? Number(group) : group;
    }
    replacements.push(replacement);
  }

  return replacements;
}

/**
 * Build a Message, extracting its placeholder and directives
 */
export function createMessage(role: Role, rawContent: string): Message {
  let content = rawContent;
  const immediate = content.startsWith('#');
  if (immediate) {
    content = content.slice(1).trimStart();
  }

  const message: Message = {
    role,
    content,
    immediate,
    replacements: parseReplacements(content),
  };

  const match = PLACEHOLDER_REGEX.exec(content);
  if (match?.[1]) {
    const spec = match[2] ?? '';
    const placeholder: AiPlaceholder = {
      variable: match[1],
      overrides: {},
      markup: match[0],
    };
    if (spec.trim().startsWith('|')) {
      message.choice = parseChoice(spec);
    } else {
      placeholder.overrides = parseOverrides(spec);
    }
    message.placeholder = placeholder;
  }

  return message;
}

// ============================================================
// INSTRUCTIONS
// ============================================================

/**
 * Parse an instruction body (text after `$`)
 *
 * @example parseInstruction('echo: Hello {{name}}')
 * @example parseInstruction('set(count=1, label="x")')
 */
export function parseInstruction(text: string, line: number | null = null): Instruction {
  const body = text.trim();
  let name: string;
  let value: string | undefined;
  let args: Record<string, string> = {};

  const call = /^(\w+)\s*\(([\s\S]*)\)\s*$/.exec(body);
  const colon = /^(\w+)\s*:\s*([\s\S]*)$/.exec(body);
  const bare = /^(\w+)\s*$/.exec(body);
  if (call?.[1]) {
    name = call[1];
    args = parseParamList(call[2] ?? '');
  } else if (colon?.[1]) {
    name = colon[1];
    value = colon[2] ?? '';
  } else if (bare?.[1]) {
    name = bare[1];
  } else {
    throw new ScriptParseError(`invalid instruction '$${body}'`, line);
  }

  switch (name) {
    case 'echo': {
      const raw = value ?? args['text'] ?? args['value'] ?? Object.values(args)[0] ?? '';
      const templateRef = raw.trimStart().startsWith('?=');
      return {
        kind: 'echo',
        text: templateRef ? raw.trimStart().slice(2).trim() : unquote(raw),
        templateRef,
      };
    }
    case 'set': {
      if (value !== undefined) {
        const assignment = parseAssignment(value);
        if (!assignment) {
          throw new ScriptParseError(`$set expects key=value, got '${value}'`, line);
        }
        return { kind: 'set', assignments: [assignment] };
      }
      return {
        kind: 'set',
        assignments: Object.entries(args).map(([key, v]) => ({ key, value: v })),
      };
    }
    case 'print':
      return { kind: 'print' };
    default: {
      const custom: Instruction = { kind: 'custom', name, args };
      if (value !== undefined) custom.value = unquote(value);
      return custom;
    }
  }
}

// ============================================================
// CONTROL FLOW
// ============================================================

function indentOf(text: string): number {
  return text.length - text.trimStart().length;
}

function isInstructionLine(trimmed: string): boolean {
  return trimmed.startsWith('$') || trimmed.startsWith('- $');
}

function instructionFromLine(trimmed: string, line: number): Instruction {
  const text = trimmed.startsWith('- ') ? trimmed.slice(2).trim() : trimmed;
  return parseInstruction(text.slice(1), line);
}

function parsePipeSteps(text: string, line: number): PipeStep[] {
  return splitTopLevel(text.replace(/->/g, '\u0000'), '\u0000').map((part) => {
    if (part.startsWith('$')) {
      return { kind: 'instruction', instruction: parseInstruction(part.slice(1), line) };
    }
    const match = /^([\w./-]+)\s*(?:\((.*)\))?$/.exec(part);
    if (!match?.[1]) {
      throw new ScriptParseError(`invalid pipe element '${part}'`, line);
    }
    return { kind: 'script', name: match[1], params: parseParamList(match[2] ?? '') };
  });
}

/**
 * Parse a control-flow block from its header and indented body lines
 */
function parseControlFlow(
  keyword: string,
  header: string,
  body: SourceLine[],
  line: number
): ControlFlowBlock {
  const condition = header.replace(/:\s*$/, '').trim();

  if (keyword === 'pipe') {
    const chain = [condition, ...body.map((l) => l.text.trim())]
      .filter(Boolean)
      .join(' ')
      .replace(/^->\s*/, '');
    return { kind: 'pipe', steps: parsePipeSteps(chain, line) };
  }

  if (!condition) {
    throw new ScriptParseError(`$${keyword} needs a condition`, line);
  }

  if (keyword === 'match') {
    const cases: MatchCase[] = [];
    for (const source of body) {
      const trimmed = source.text.trim();
      if (!trimmed || trimmed.startsWith('#') || trimmed === 'case:' || trimmed === 'cases:') continue;
      if (isInstructionLine(trimmed)) {
        const current = cases[cases.length - 1];
        if (!current) {
          throw new ScriptParseError('instruction before any case label', source.line);
        }
        current.body.push(instructionFromLine(trimmed, source.line));
        continue;
      }
      const label = /^(?:case\s+)?(.+?)\s*:\s*(.*)$/.exec(trimmed);
      if (!label?.[1]) {
        throw new ScriptParseError(`expected a case label, got '${trimmed}'`, source.line);
      }
      const matchCase: MatchCase = { label: unquote(label[1]), body: [] };
      const inline = (label[2] ?? '').trim();
      if (inline && isInstructionLine(inline)) {
        matchCase.body.push(instructionFromLine(inline, source.line));
      }
      cases.push(matchCase);
    }
    return { kind: 'match', expression: condition, cases };
  }

  const sections: Record<string, Instruction[]> = { then: [], else: [], do: [] };
  let section = keyword === 'if' ? 'then' : 'do';
  for (const source of body) {
    const trimmed = source.text.trim();
    if (!trimmed || trimmed.startsWith('#')) continue;
    const label = /^(then|else|do)\s*:\s*(.*)$/.exec(trimmed);
    if (label?.[1]) {
      section = label[1];
      const inline = (label[2] ?? '').trim();
      if (inline) {
        sections[section]?.push(instructionFromLine(inline, source.line));
      }
      continue;
    }
    if (!isInstructionLine(trimmed)) {
      throw new ScriptParseError(`expected an instruction, got '${trimmed}'`, source.line);
    }
    sections[section]?.push(instructionFromLine(trimmed, source.line));
  }

  const bodyInstructions = sections['do'] ?? [];
  switch (keyword) {
    case 'if':
      return {
        kind: 'if',
        condition,
        then: sections['then'] ?? [],
        else: sections['else'] ?? [],
      };
    case 'while':
      return { kind: 'while', condition, body: bodyInstructions };
    default: {
      const block: ControlFlowBlock = { kind: 'for', condition, body: bodyInstructions };
      const iterator = /^(\w+)\s+in\s+(.+)$/.exec(condition);
      if (iterator?.[1] && iterator[2]) {
        block.iterator = { variable: iterator[1], source: iterator[2].trim() };
      }
      return block;
    }
  }
}

// ============================================================
// TURNS
// ============================================================

interface PendingMessage {
  role: Role;
  lines: string[];
  multiline: boolean;
  indent: number;
}

function dedent(lines: string[]): string[] {
  const indents = lines.filter((l) => l.trim() !== '').map(indentOf);
  const base = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((l) => l.slice(Math.min(base, indentOf(l))));
}

function finishMessage(pending: PendingMessage): Message {
  const lines = pending.multiline ? dedent(pending.lines) : pending.lines;
  while (lines.length > 0 && lines[lines.length - 1]?.trim() === '') {
    lines.pop();
  }
  return createMessage(pending.role, lines.join('\n'));
}

/**
 * Parse one turn's lines
 */
export function parseTurn(lines: SourceLine[]): Turn {
  const turn: Turn = { messages: [], instructions: [], controlFlow: [] };
  let pending: PendingMessage | null = null;

  const flush = (): void => {
    if (pending) {
      turn.messages.push(finishMessage(pending));
      pending = null;
    }
  };

  let i = 0;
  while (i < lines.length) {
    const source = lines[i];
    i++;
    if (!source) continue;
    const trimmed = source.text.trim();
    const indent = indentOf(source.text);

    // Indented lines inside a `role: |` block are content verbatim
    const current: PendingMessage | null = pending;
    if (current?.multiline && (trimmed === '' || indent > current.indent)) {
      current.lines.push(source.text);
      continue;
    }
    if (!trimmed || trimmed.startsWith('#')) continue;

    const controlFlow = CONTROL_FLOW_REGEX.exec(trimmed);
    if (controlFlow?.[1]) {
      flush();
      const body: SourceLine[] = [];
      while (i < lines.length) {
        const next = lines[i];
        if (!next) break;
        if (next.text.trim() !== '' && indentOf(next.text) <= indent) break;
        body.push(next);
        i++;
      }
      turn.controlFlow.push(
        parseControlFlow(controlFlow[1], controlFlow[2] ?? '', body, source.line)
      );
      continue;
    }

    const chain = CHAIN_REGEX.exec(trimmed);
    if (chain?.[1]) {
      flush();
      if (turn.chain) {
        throw new ScriptParseError('a turn can chain to only one script', source.line);
      }
      const target: ChainTarget = { name: chain[1], params: parseParamList(chain[2] ?? '') };
      turn.chain = target;
      continue;
    }

    if (trimmed.startsWith('$')) {
      flush();
      turn.instructions.push(parseInstruction(trimmed.slice(1), source.line));
      continue;
    }

    const role = ROLE_REGEX.exec(trimmed);
    if (role?.[1]) {
      flush();
      const value = role[2] ?? '';
      const roleName: Role = role[1] === 'system' ? 'system' : role[1] === 'assistant' ? 'assistant' : 'user';
      pending = MULTILINE_MARKERS.has(value.trim())
        ? { role: roleName, lines: [], multiline: true, indent }
        : { role: roleName, lines: [value.trim()], multiline: false, indent };
      continue;
    }

    if (current) {
      current.lines.push(current.multiline ? source.text : trimmed);
    } else {
      pending = { role: 'user', lines: [trimmed], multiline: false, indent };
    }
  }
  flush();

  return turn;
}

function isEmptyTurn(turn: Turn): boolean {
  return (
    turn.messages.length === 0 &&
    turn.instructions.length === 0 &&
    turn.controlFlow.length === 0 &&
    !turn.chain
  );
}

/**
 * Parse script source into a Script
 */
export function parseScript(content: string, sourcePath: string | null = null): Script {
  const { frontmatter, body, offset } = splitFrontmatter(content);

  const turns: Turn[] = [];
  let chunk: SourceLine[] = [];
  const pushTurn = (): void => {
    const turn = parseTurn(chunk);
    if (!isEmptyTurn(turn)) turns.push(turn);
    chunk = [];
  };

  body.split('\n').forEach((text, index) => {
    if (SEPARATOR_REGEX.test(text)) {
      pushTurn();
    } else {
      chunk.push({ text: text.replace(/\r$/, ''), line: offset + index + 1 });
    }
  });
  pushTurn();

  return {
    frontmatter: frontmatter === null ? emptyFrontmatter() : toFrontmatter(parseYaml(frontmatter)),
    turns,
    sourcePath,
  };
}
