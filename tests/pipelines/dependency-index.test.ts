import * as fs from 'fs/promises';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { DependencyIndex, extractSymbols } from '../../src/pipelines/dependency-index.js';
import { createTempWorkspace, type TempWorkspace } from '../helpers/mocks.js';

describe('extractSymbols', () => {
  it('reads JavaScript exports and imports', () => {
    const content = [
      "import x from './x.js';",
      "const y = require('y');",
      'export function foo() {}',
      'export const bar = 1;',
      'module.exports = { baz, qux: fn };',
    ].join('\n');

    expect(extractSymbols('a.js', content)).toEqual({
      exports: ['bar', 'baz', 'foo', 'qux'],
      imports: ['./x.js', 'y'],
    });
  });

  it('reads renamed exports', () => {
    expect(extractSymbols('a.ts', 'export { run as start, stop };').exports).toEqual(['start', 'stop']);
  });

  it('reads Python definitions and imports', () => {
    const content = 'from os import path\nimport sys\ndef run():\n    pass\nclass Tool:\n    pass\n';

    expect(extractSymbols('tool.py', content)).toEqual({ exports: ['Tool', 'run'], imports: ['os', 'sys'] });
  });

  it('ignores other file types', () => {
    expect(extractSymbols('README.md', 'export const a = 1;')).toEqual({ exports: [], imports: [] });
  });
});

describe('DependencyIndex', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('refreshes from disk and drops deleted files', async () => {
    const index = new DependencyIndex();
    await temp.write('a.js', 'export const one = 1;');
    await temp.write('b.js', 'export const two = 2;');
    await index.refresh(temp.workspace, ['a.js', 'b.js']);
    expect(index.get('a.js')?.exports).toEqual(['one']);
    expect(index.size).toBe(2);

    await temp.write('a.js', 'export const uno = 1;');
    await fs.rm(path.join(temp.root, 'b.js'));
    await index.refresh(temp.workspace, ['a.js', 'b.js']);

    expect(index.get('a.js')?.exports).toEqual(['uno']);
    expect(index.has('b.js')).toBe(false);
  });
});
