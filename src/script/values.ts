/**
 * Script variable values and the environment that holds them
 */

/**
 * Dynamically typed script value
 */
export type ScriptValue =
  | string
  | number
  | boolean
  | null
  | ScriptValue[]
  | ScriptMap;

export interface ScriptMap {
  [key: string]: ScriptValue;
}

export function isScriptMap(value: ScriptValue | undefined): value is ScriptMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert an arbitrary JS value (parsed JSON, tool output) to a ScriptValue
 */
export function toScriptValue(value: unknown): ScriptValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (Array.isArray(value)) return value.map(toScriptValue);
  if (typeof value === 'object') {
    const out: ScriptMap = {};
    for (const [key, inner] of Object.entries(value)) {
      out[key] = toScriptValue(inner);
    }
    return out;
  }
  return String(value);
}

/**
 * Truthiness rules for conditions
 * bool as-is; string true unless empty, "0" or "false"; number unless zero;
 * null false; lists and maps true
 */
export function isTruthy(value: ScriptValue | undefined): boolean {
  if (value === undefined || value === null) return false;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0 && !Number.isNaN(value);
  if (typeof value === 'string') {
    return value !== '' && value !== '0' && value.toLowerCase() !== 'false';
  }
  return true;
}

/**
 * Text form used in templates and comparisons
 */
export function valueToText(value: ScriptValue | undefined): string {
  if (value === undefined || value === null) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value);
}

/**
 * Equality for `==` / `===`: primitives by text form, containers structurally
 */
export function valuesEqual(
  left: ScriptValue | undefined,
  right: ScriptValue | undefined
): boolean {
  const leftIsContainer = typeof left === 'object' && left !== null;
  const rightIsContainer = typeof right === 'object' && right !== null;
  if (leftIsContainer !== rightIsContainer) return false;
  if (leftIsContainer) {
    return JSON.stringify(left) === JSON.stringify(right);
  }
  return valueToText(left) === valueToText(right);
}

/**
 * Walk a dotted path through nested maps (and list indices)
 */
export function lookupPath(
  root: ScriptMap,
  dottedPath: string
): ScriptValue | undefined {
  let current: ScriptValue | undefined = root;
  for (const key of dottedPath.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(key);
      current = Number.isInteger(index) ? current[index] : undefined;
    } else if (isScriptMap(current)) {
      current = Object.prototype.hasOwnProperty.call(current, key)
        ? current[key]
        : undefined;
    } else {
      return undefined;
    }
    if (current === undefined) return undefined;
  }
  return current;
}

/**
 * Mutable variable environment owned by one interpreter invocation
 */
export class Environment {
  private readonly vars = new Map<string, ScriptValue>();

  constructor(initial: ScriptMap = {}) {
    this.assign(initial);
  }

  get(name: string): ScriptValue | undefined {
    return this.vars.get(name);
  }

  has(name: string): boolean {
    return this.vars.has(name);
  }

  set(name: string, value: ScriptValue): void {
    this.vars.set(name, value);
  }

  /**
   * Resolve `a.b.c` against the environment
   */
  lookup(dottedPath: string): ScriptValue | undefined {
    const [head = '', ...rest] = dottedPath.split('.');
    const value = this.vars.get(head);
    if (rest.length === 0 || value === undefined) return value;
    return lookupPath({ [head]: value }, dottedPath);
  }

  /**
   * Deep-copy values from a map, overwriting existing names
   */
  assign(values: ScriptMap): void {
    for (const [key, value] of Object.entries(values)) {
      this.vars.set(key, structuredClone(value));
    }
  }

  snapshot(): ScriptMap {
    return Object.fromEntries(this.vars);
  }

  clone(): Environment {
    return new Environment(this.snapshot());
  }
}
