import { describe, expect, it } from 'vitest';

import {
  type Blueprint,
  blueprintSchema,
  isConfigFile,
  normalizeManifestPath,
  orderFiles,
  parseBlueprint,
  validateBlueprint,
} from '../../src/pipelines/manifest.js';
import { Workspace } from '../../src/workspace/paths.js';

function blueprint(files: Array<Record<string, unknown>>): Blueprint {
  return blueprintSchema.parse({ files });
}

function paths(bp: Blueprint['files']): string[] {
  return bp.map((f) => f.path);
}

describe('parseBlueprint', () => {
  it('parses a fenced manifest and fills defaults', () => {
    const parsed = parseBlueprint(
      'Here is the manifest:\n```json\n{"files":[{"path":"a.js","dependencies":"b.js","packageDependencies":{"express":"^4"}}]}\n```'
    );

    expect(parsed).toEqual({
      projectType: 'unknown',
      projectDescription: '',
      files: [
        {
          path: 'a.js',
          type: 'code',
          dependencies: ['b.js'],
          description: '',
          exports: [],
          imports: [],
          packageDependencies: ['express@^4'],
          relatedFiles: [],
        },
      ],
    });
  });

  it('rejects text without an object', () => {
    expect(() => parseBlueprint('no manifest here')).toThrow('no JSON object found in response');
  });

  it('names the field that does not fit', () => {
    expect(() => parseBlueprint('{"files": "x"}')).toThrow('files: Expected array, received string');
  });
});

describe('isConfigFile', () => {
  it('recognizes config names, patterns and the config type', () => {
    expect(isConfigFile({ path: 'package.json', type: 'code' })).toBe(true);
    expect(isConfigFile({ path: 'vite.config.ts', type: 'code' })).toBe(true);
    expect(isConfigFile({ path: 'deploy/settings.yaml', type: 'code' })).toBe(true);
    expect(isConfigFile({ path: 'src/app.js', type: 'config' })).toBe(true);
    expect(isConfigFile({ path: 'src/app.js', type: 'code' })).toBe(false);
  });
});

describe('normalizeManifestPath', () => {
  it('drops ./ and normalizes separators', () => {
    expect(normalizeManifestPath(' ./src\\lib//util.js ')).toBe('src/lib/util.js');
  });
});

describe('orderFiles', () => {
  it('puts dependencies first and config files last', () => {
    const files = blueprint([
      { path: 'package.json' },
      { path: 'index.js', dependencies: ['lib/util.js', 'package.json'] },
      { path: 'lib/util.js' },
    ]).files;

    const { order, cyclic } = orderFiles(files);

    expect(paths(order)).toEqual(['lib/util.js', 'index.js', 'package.json']);
    expect(cyclic).toEqual([]);
  });

  it('emits files in a cycle in manifest order', () => {
    const files = blueprint([
      { path: 'a.js', dependencies: ['b.js'] },
      { path: 'b.js', dependencies: ['a.js'] },
      { path: 'c.js' },
    ]).files;

    const { order, cyclic } = orderFiles(files);

    expect(paths(order)).toEqual(['c.js', 'a.js', 'b.js']);
    expect(cyclic).toEqual(['a.js', 'b.js']);
  });
});

describe('validateBlueprint', () => {
  const workspace = new Workspace('/ws');

  it('drops invalid and duplicate entries with warnings', () => {
    const { blueprint: validated, warnings } = validateBlueprint(
      blueprint([
        { path: '../outside.js' },
        { path: './a.js' },
        { path: 'a.js' },
        { path: 'b.js', dependencies: ['missing.js'] },
      ]),
      workspace,
      10
    );

    expect(paths(validated.files)).toEqual(['a.js', 'b.js']);
    expect(warnings).toEqual([
      'Invalid path dropped: ../outside.js',
      'Duplicate entry dropped: a.js',
      'b.js depends on unknown file missing.js',
    ]);
  });

  it('keeps at most the file limit', () => {
    const { blueprint: validated, warnings } = validateBlueprint(
      blueprint([{ path: 'a.js' }, { path: 'b.js' }, { path: 'c.js' }]),
      workspace,
      2
    );

    expect(paths(validated.files)).toEqual(['a.js', 'b.js']);
    expect(warnings).toEqual(['Manifest lists 3 files, keeping the first 2']);
  });

  it('reports dependency cycles', () => {
    const { warnings } = validateBlueprint(
      blueprint([
        { path: 'a.js', dependencies: ['b.js'] },
        { path: 'b.js', dependencies: ['a.js'] },
      ]),
      workspace,
      10
    );

    expect(warnings).toEqual(['Dependency cycle among: a.js, b.js']);
  });

  it('fails without usable files', () => {
    expect(() => validateBlueprint(blueprint([]), workspace, 10)).toThrow('Manifest contains no files');
    expect(() => validateBlueprint(blueprint([{ path: '../x.js' }]), workspace, 10)).toThrow(
      'Manifest contains no valid file paths'
    );
  });
});
