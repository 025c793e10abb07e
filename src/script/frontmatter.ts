/**
 * Script front matter: detection, a small YAML subset, and typed fields
 *
 * Supported YAML: nested maps by indentation, `- item` lists (including
 * lists of maps), inline `[a, b]` lists and `{a: 1}` maps, quoted strings,
 * numbers, booleans, null, and `|` / `|-` / `>` block scalars.
 */

import { splitTopLevel, unquote } from '../utils/arguments.js';
import { ScriptParseError } from '../utils/errors.js';
import type { ScriptFrontmatter } from './types.js';
import {
  isScriptMap,
  type ScriptMap,
  type ScriptValue,
  valueToText,
} from './values.js';

export const FRONTMATTER_KEYS: ReadonlySet<string> = new Set([
  'parameters',
  'params',
  'input',
  'inputs',
  'output',
  'outputs',
  'import',
  'imports',
  'type',
  'description',
  'model',
  'name',
  'version',
  'prompt',
  'response_format',
  'autoRun',
  'autoRunLLMIfPromptAvailable',
]);

const SEPARATOR_REGEX = /^(---|\*\*\*)\s*$/;

interface YamlLine {
  indent: number;
  text: string;
  /** 1-based source line */
  line: number;
}

// ============================================================
// SCALARS
// ============================================================

function stripInlineComment(text: string): string {
  const index = text.indexOf(' #');
  return index === -1 ? text : text.slice(0, index).trimEnd();
}

/**
 * Parse a single YAML scalar or inline collection
 */
export function parseScalar(raw: string): ScriptValue {
  const text = raw.trim();
  if (text === '' || text === '~' || text === 'null') return null;

  if (text.startsWith('"') && text.endsWith('"') && text.length >= 2) {
    try {
      const parsed: unknown = JSON.parse(text);
      if (typeof parsed === 'string') return parsed;
    } catch {
      // Not valid JSON escapes; fall back to raw contents
    }
    return text.slice(1, -1);
  }
  if (text.startsWith("'") && text.endsWith("'") && text.length >= 2) {
    return text.slice(1, -1).replace(/''/g, "'");
  }
  if (text.startsWith('[') && text.endsWith(']')) {
    return splitTopLevel(text.slice(1, -1)).map(parseScalar);
  }
  if (text.startsWith('{') && text.endsWith('}')) {
    const map: ScriptMap = {};
    for (const entry of splitTopLevel(text.slice(1, -1))) {
      const colon = entry.indexOf(':');
      if (colon > 0) {
        map[unquote(entry.slice(0, colon))] = parseScalar(entry.slice(colon + 1));
      }
    }
    return map;
  }

  const value = stripInlineComment(text);
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (/^-?\d+(\.\d+)?$/.test(value)) return Number(value);
  return value;
}

// ============================================================
// BLOCKS
// ============================================================

function toLines(source: string): YamlLine[] {
  return source.split('\n').map((raw, index) => {
    const withoutCr = raw.replace(/\r$/, '');
    const indent = withoutCr.length - withoutCr.trimStart().length;
    return { indent, text: withoutCr.trim(), line: index + 1 };
  });
}

function isSkippable(line: YamlLine): boolean {
  return line.text === '' || line.text.startsWith('#');
}

class YamlReader {
  private index = 0;

  constructor(private readonly lines: YamlLine[]) {}

  private peek(): YamlLine | undefined {
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      if (line && !isSkippable(line)) return line;
      this.index++;
    }
    return undefined;
  }

  parseDocument(): ScriptMap {
    const first = this.peek();
    if (!first) return {};
    const value = this.parseBlock(first.indent);
    if (!isScriptMap(value)) {
      throw new ScriptParseError('front matter must be a mapping', first.line);
    }
    return value;
  }

  private parseBlock(indent: number): ScriptValue {
    const first = this.peek();
    if (!first) return null;
    return first.text === '-' || first.text.startsWith('- ')
      ? this.parseList(indent)
      : this.parseMap(indent);
  }

  private parseList(indent: number): ScriptValue[] {
    const items: ScriptValue[] = [];
    for (let line = this.peek(); line; line = this.peek()) {
      if (line.indent !== indent) break;
      if (line.text !== '-' && !line.text.startsWith('- ')) break;

      const rest = line.text.slice(1).trim();
      if (rest === '') {
        this.index++;
        const next = this.peek();
        items.push(next && next.indent > indent ? this.parseBlock(next.indent) : null);
      } else if (/^[^'"[{][^:]*:(\s|$)/.test(rest)) {
        // `- key: value` opens a map whose keys sit two columns deeper
        const itemIndent = indent + 2;
        this.lines[this.index] = { indent: itemIndent, text: rest, line: line.line };
        items.push(this.parseMap(itemIndent));
      } else {
        this.index++;
        items.push(parseScalar(rest));
      }
    }
    return items;
  }

  private parseMap(indent: number): ScriptMap {
    const map: ScriptMap = {};
    for (let line = this.peek(); line; line = this.peek()) {
      if (line.indent < indent) break;
      if (line.indent > indent) {
        throw new ScriptParseError('unexpected indentation', line.line);
      }
      const match = /^("[^"]*"|'[^']*'|[^:]+?)\s*:(?:\s+(.*))?$/.exec(line.text);
      if (!match?.[1]) {
        throw new ScriptParseError(`expected 'key: value', got '${line.text}'`, line.line);
      }
      const key = unquote(match[1]);
      const rawValue = (match[2] ?? '').trim();
      this.index++;

      if (rawValue === '|' || rawValue === '|-' || rawValue === '>' || rawValue === '>-') {
        map[key] = this.parseBlockScalar(indent, rawValue);
      } else if (rawValue === '') {
        const next = this.peek();
        if (next && next.indent > indent) {
          map[key] = this.parseBlock(next.indent);
        } else if (next && next.indent === indent && next.text.startsWith('- ')) {
          map[key] = this.parseList(indent);
        } else {
          map[key] = null;
        }
      } else {
        map[key] = parseScalar(rawValue);
      }
    }
    return map;
  }

  private parseBlockScalar(parentIndent: number, style: string): string {
    const collected: YamlLine[] = [];
    while (this.index < this.lines.length) {
      const line = this.lines[this.index];
      if (!line) break;
      if (line.text !== '' && line.indent <= parentIndent) break;
      collected.push(line);
      this.index++;
    }
    while (collected.length > 0 && collected[collected.length - 1]?.text === '') {
      collected.pop();
    }
    const base = Math.min(
      ...collected.filter((l) => l.text !== '').map((l) => l.indent)
    );
    const rows = collected.map((l) =>
      l.text === '' ? '' : ' '.repeat(Math.max(0, l.indent - base)) + l.text
    );
    const folded = style.startsWith('>');
    const body = folded ? rows.join(' ').replace(/ {2,}/g, ' ') : rows.join('\n');
    return style.endsWith('-') ? body : `${body}\n`;
  }
}

/**
 * Parse a YAML mapping document
 */
export function parseYaml(source: string): ScriptMap {
  return new YamlReader(toLines(source)).parseDocument();
}

// ============================================================
// DETECTION AND TYPED FIELDS
// ============================================================

/**
 * Split front matter from the turn body.
 * Either fenced (`---` first line ... `---`) or the block before the first
 * separator when its first key is a front matter key.
 */
export function splitFrontmatter(content: string): {
  frontmatter: string | null;
  body: string;
  /** Source lines consumed before the body */
  offset: number;
} {
  const lines = content.replace(/\r\n/g, '\n').split('\n');

  if (lines[0] !== undefined && SEPARATOR_REGEX.test(lines[0])) {
    const end = lines.findIndex((l, i) => i > 0 && SEPARATOR_REGEX.test(l));
    if (end !== -1) {
      const block = lines.slice(1, end);
      if (looksLikeFrontmatter(block)) {
        return {
          frontmatter: block.join('\n'),
          body: lines.slice(end + 1).join('\n'),
          offset: end + 1,
        };
      }
    }
    return { frontmatter: null, body: lines.slice(1).join('\n'), offset: 1 };
  }

  const separator = lines.findIndex((l) => SEPARATOR_REGEX.test(l));
  const head = separator === -1 ? lines : lines.slice(0, separator);
  if (looksLikeFrontmatter(head)) {
    return {
      frontmatter: head.join('\n'),
      body: separator === -1 ? '' : lines.slice(separator + 1).join('\n'),
      offset: separator === -1 ? lines.length : separator + 1,
    };
  }
  return { frontmatter: null, body: lines.join('\n'), offset: 0 };
}

function looksLikeFrontmatter(lines: string[]): boolean {
  const first = lines.find((l) => l.trim() !== '' && !l.trim().startsWith('#'));
  if (!first || /^\s/.test(first)) return false;
  const match = /^([A-Za-z_][\w-]*)\s*:/.exec(first);
  return match?.[1] !== undefined && FRONTMATTER_KEYS.has(match[1]);
}

function toStringList(value: ScriptValue | undefined): string[] {
  if (value === undefined || value === null) return [];
  if (Array.isArray(value)) return value.map(valueToText).filter(Boolean);
  if (isScriptMap(value)) return Object.keys(value);
  return valueToText(value)
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/**
 * Convert parsed YAML into typed front matter
 */
export function toFrontmatter(map: ScriptMap): ScriptFrontmatter {
  const params = map['parameters'] ?? map['params'];
  const autoRun = map['autoRunLLMIfPromptAvailable'] ?? map['autoRun'];

  const frontmatter: ScriptFrontmatter = {
    parameters: isScriptMap(params) ? params : {},
    inputs: toStringList(map['input'] ?? map['inputs']),
    outputs: map['output'] ?? map['outputs'] ?? null,
    imports: toStringList(map['import'] ?? map['imports']),
    autoRun: autoRun === undefined || autoRun === null ? true : autoRun !== false && autoRun !== 'false',
  };
  const type = map['type'];
  if (typeof type === 'string') frontmatter.type = type;
  const description = map['description'];
  if (typeof description === 'string') frontmatter.description = description;
  const model = map['model'];
  if (typeof model === 'string') frontmatter.model = model;
  return frontmatter;
}

export function emptyFrontmatter(): ScriptFrontmatter {
  return { parameters: {}, inputs: [], outputs: null, imports: [], autoRun: true };
}
