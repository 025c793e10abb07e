import { describe, expect, it } from 'vitest';

import { parseAssignment, parseParamList, splitTopLevel, unquote } from '../../src/utils/arguments.js';

describe('unquote', () => {
  it('removes one pair of matching quotes', () => {
    expect(unquote(' "a b" ')).toBe('a b');
    expect(unquote("'x'")).toBe('x');
    expect(unquote("'x")).toBe("'x");
    expect(unquote('"a\'')).toBe('"a\'');
  });
});

describe('splitTopLevel', () => {
  it('ignores separators inside quotes and brackets', () => {
    expect(splitTopLevel("a=1, b='x, y', c=f(1,2)")).toEqual(['a=1', "b='x, y'", 'c=f(1,2)']);
  });

  it('drops empty parts', () => {
    expect(splitTopLevel('a,, b,')).toEqual(['a', 'b']);
  });
});

describe('parseAssignment', () => {
  it('accepts = and :', () => {
    expect(parseAssignment('key=value')).toEqual({ key: 'key', value: 'value' });
    expect(parseAssignment('key: "quoted value"')).toEqual({ key: 'key', value: 'quoted value' });
  });

  it('rejects text without a key', () => {
    expect(parseAssignment('=x')).toBeNull();
  });
});

describe('parseParamList', () => {
  it('keeps valid assignments only', () => {
    expect(parseParamList('a=1, b="two", junk')).toEqual({ a: '1', b: 'two' });
  });
});
