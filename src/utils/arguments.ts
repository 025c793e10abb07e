/**
 * Shared argument parsing utilities
 */

/**
 * Remove one pair of matching surrounding quotes
 */
export function unquote(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length >= 2) {
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' || first === "'") && first === last) {
      return trimmed.slice(1, -1);
    }
  }
  return trimmed;
}

/**
 * Split on a separator outside quotes and brackets
 *
 * @example splitTopLevel("a=1, b='x, y'") // ["a=1", "b='x, y'"]
 */
export function splitTopLevel(text: string, separator = ','): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let current = '';

  for (const ch of text) {
    if (quote) {
      if (ch === quote) quote = null;
      current += ch;
    } else if (ch === '"' || ch === "'") {
      quote = ch;
      current += ch;
    } else if (ch === '(' || ch === '[' || ch === '{') {
      depth++;
      current += ch;
    } else if (ch === ')' || ch === ']' || ch === '}') {
      depth = Math.max(0, depth - 1);
      current += ch;
    } else if (ch === separator && depth === 0) {
      parts.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  parts.push(current);

  return parts.map((p) => p.trim()).filter(Boolean);
}

/**
 * Parse `key=value` or `key: value` into its parts
 */
export function parseAssignment(
  text: string
): { key: string; value: string } | null {
  const match = /^\s*([A-Za-z_][\w.-]*)\s*(?:=|:)\s*([\s\S]*)$/.exec(text);
  if (!match?.[1]) return null;
  return { key: match[1], value: unquote(match[2] ?? '') };
}

/**
 * Parse a comma separated parameter list: `a=1, b="two"`
 */
export function parseParamList(text: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const part of splitTopLevel(text)) {
    const assignment = parseAssignment(part);
    if (assignment) {
      params[assignment.key] = assignment.value;
    }
  }
  return params;
}
