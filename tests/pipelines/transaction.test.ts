import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { FileTransaction } from '../../src/pipelines/transaction.js';
import { WorkspacePathError } from '../../src/utils/errors.js';
import { createTempWorkspace, type TempWorkspace } from '../helpers/mocks.js';

describe('FileTransaction', () => {
  let temp: TempWorkspace;

  beforeEach(async () => {
    temp = await createTempWorkspace();
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it('rolls back created and overwritten files', async () => {
    await temp.write('existing.txt', 'before');
    const tx = new FileTransaction(temp.workspace);

    await tx.write('src/new.js', 'new');
    await tx.write('existing.txt', 'after');
    await tx.write('existing.txt', 'again');
    expect(tx.written).toEqual(['src/new.js', 'existing.txt']);

    await tx.rollback();

    expect(await temp.exists('src/new.js')).toBe(false);
    expect(await temp.read('existing.txt')).toBe('before');
    expect(tx.written).toEqual([]);
  });

  it('keeps writes after commit', async () => {
    const tx = new FileTransaction(temp.workspace);
    await tx.write('kept.txt', 'kept');

    tx.commit();
    await tx.rollback();

    expect(await temp.read('kept.txt')).toBe('kept');
  });

  it('refuses paths outside the workspace', async () => {
    const tx = new FileTransaction(temp.workspace);

    await expect(tx.write('../escape.txt', 'x')).rejects.toBeInstanceOf(WorkspacePathError);
  });
});
