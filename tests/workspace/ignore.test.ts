import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { IgnoreRules } from '../../src/workspace/ignore.js';
import { createWorkspace } from '../../src/workspace/paths.js';
import { createTempWorkspace, type TempWorkspace } from '../helpers/mocks.js';

describe('IgnoreRules', () => {
  describe('defaults', () => {
    const rules = new IgnoreRules();

    it('ignores dependency and build directories', () => {
      expect(rules.isIgnored('node_modules/x/index.js')).toBe(true);
      expect(rules.isIgnored('dist', true)).toBe(true);
      expect(rules.isIgnored('src/app.js')).toBe(false);
    });

    it('applies directory-only patterns to directories', () => {
      expect(rules.isIgnored('dist')).toBe(false);
    });

    it('matches file globs in any directory', () => {
      expect(rules.isIgnored('a/b.pyc')).toBe(true);
      expect(rules.isIgnored('package-lock.json')).toBe(true);
    });

    it('never ignores the root', () => {
      expect(rules.isIgnored('.')).toBe(false);
      expect(rules.isIgnored('')).toBe(false);
    });
  });

  describe('custom patterns', () => {
    const rules = new IgnoreRules(['*.log', '!keep.log', '/secret', 'docs/**/draft.md']);

    it('re-includes negated paths', () => {
      expect(rules.isIgnored('app.log')).toBe(true);
      expect(rules.isIgnored('keep.log')).toBe(false);
    });

    it('anchors patterns with a slash to the root', () => {
      expect(rules.isIgnored('secret')).toBe(true);
      expect(rules.isIgnored('sub/secret')).toBe(false);
    });

    it('matches ** across directories', () => {
      expect(rules.isIgnored('docs/a/b/draft.md')).toBe(true);
      expect(rules.isIgnored('docs/draft.md')).toBe(true);
      expect(rules.isIgnored('docs/final.md')).toBe(false);
    });
  });
});

describe('createWorkspace', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('reads ignore files from the root', async () => {
    await temp.write('.gitignore', 'secret.txt\n# comment\n');
    const workspace = createWorkspace(temp.root);

    expect(workspace.isIgnored(path.join(temp.root, 'secret.txt'))).toBe(true);
    expect(workspace.isIgnored(path.join(temp.root, 'public.txt'))).toBe(false);
  });
});
