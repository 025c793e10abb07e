import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { TurnInterpreter } from '../../src/core/interpreter.js';
import {
  BlueprintPipeline,
  blueprintOperationId,
  buildFilePrompt,
  MANIFEST_SYSTEM_PROMPT,
} from '../../src/pipelines/blueprint.js';
import { DependencyIndex } from '../../src/pipelines/dependency-index.js';
import { blueprintSchema } from '../../src/pipelines/manifest.js';
import { createRunStats } from '../../src/output/stats.js';
import { parseScript } from '../../src/script/parser.js';
import { messageText, textMessage } from '../../src/types/llm.js';
import {
  createCall,
  createResponse,
  createTempWorkspace,
  createTestContext,
  ScriptedBackend,
  type TempWorkspace,
} from '../helpers/mocks.js';

const MANIFEST = JSON.stringify({
  projectType: 'node-cli',
  projectDescription: 'Greets people',
  files: [
    { path: 'package.json', type: 'config' },
    { path: 'index.js', exports: ['greet'], packageDependencies: ['chalk@^4'] },
  ],
});

const TWO_FILES = JSON.stringify({
  projectType: 'node-cli',
  files: [{ path: 'a.js' }, { path: 'b.js' }],
});

describe('blueprintOperationId', () => {
  it('is stable per workspace and request', () => {
    const id = blueprintOperationId('/ws', 'make a game');

    expect(id).toMatch(/^blueprint-[0-9a-f]{12}$/);
    expect(blueprintOperationId('/ws', 'make a game')).toBe(id);
    expect(blueprintOperationId('/ws', 'make a site')).not.toBe(id);
  });
});

describe('buildFilePrompt', () => {
  const blueprint = blueprintSchema.parse({
    projectType: 'node-cli',
    projectDescription: 'Counts things',
    files: [
      { path: 'a.js', dependencies: ['b.js'], description: 'Entry point' },
      { path: 'b.js', exports: ['one', 'two'] },
    ],
  });

  it('describes the file and its dependencies', () => {
    const index = new DependencyIndex();
    const file = blueprint.files[0];
    if (!file) throw new Error('missing file spec');

    const lines = buildFilePrompt(file, blueprint, index, 'count things', 1).split('\n');

    expect(lines.slice(0, 6)).toEqual([
      'Project: node-cli - Counts things',
      'Request: count things',
      '',
      'Write the complete content of a.js.',
      'Purpose: Entry point',
      'Exports: (none)',
    ]);
    expect(lines).toContain('- b.js: exports one, two; imports (none)');
    expect(lines).toContain('All project files: a.js, b.js');
  });

  it('points out exports that differ from the manifest', () => {
    const index = new DependencyIndex();
    index.update('b.js', 'export const one = 1;');
    const file = blueprint.files[0];
    if (!file) throw new Error('missing file spec');

    const lines = buildFilePrompt(file, blueprint, index, 'count things', 1).split('\n');

    expect(lines).toContain('- b.js: exports one, two; imports (none) (as written, it exports one; use these)');
  });

  it('gets more literal on later attempts', () => {
    const file = blueprint.files[1];
    if (!file) throw new Error('missing file spec');

    const lines = buildFilePrompt(file, blueprint, new DependencyIndex(), 'count things', 4).split('\n');

    expect(lines.slice(-2)).toEqual([
      'Your previous reply was empty.',
      'Output ONLY the content of b.js, starting with its first line.',
    ]);
  });
});

describe('BlueprintPipeline', () => {
  let temp: TempWorkspace;
  let logSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(async () => {
    temp = await createTempWorkspace();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    logSpy.mockRestore();
    await temp.cleanup();
  });

  it('writes code before config and backfills package.json', async () => {
    const backend = new ScriptedBackend([
      createResponse(MANIFEST),
      createResponse('```js\nexport function greet() {}\n```'),
      createResponse('{"name":"greeter"}'),
    ]);
    const { ctx } = createTestContext(temp, backend);

    const result = await new BlueprintPipeline(ctx).run('build a greeter cli', createRunStats());

    expect(result.written).toEqual(['index.js', 'package.json']);
    expect(result.failed).toEqual([]);
    expect(result.summary).toBe('Generated 2/2 files for node-cli.\nWritten: index.js, package.json');
    expect(await temp.read('index.js')).toBe('export function greet() {}\n');
    expect(JSON.parse(await temp.read('package.json'))).toEqual({
      name: 'greeter',
      version: '1.0.0',
      description: 'Greets people',
      main: 'index.js',
      scripts: { start: 'node index.js' },
      dependencies: { chalk: '^4' },
    });
    expect(ctx.dependencies.get('index.js')?.exports).toEqual(['greet']);
    expect(backend.requests[0]?.system).toBe(MANIFEST_SYSTEM_PROMPT);
    expect(backend.requests[1]?.tools).toBeUndefined();
    expect(await ctx.checkpoints.load(blueprintOperationId(temp.root, 'build a greeter cli'))).toBeNull();
  });

  it('regenerates an unparseable manifest once', async () => {
    const backend = new ScriptedBackend([
      createResponse('I cannot do JSON'),
      createResponse(TWO_FILES),
      createResponse('const a = 1;'),
      createResponse('const b = 2;'),
    ]);
    const { ctx } = createTestContext(temp, backend);

    const result = await new BlueprintPipeline(ctx).run('make two files', createRunStats());

    expect(result.written).toEqual(['a.js', 'b.js']);
    expect(messageText(backend.requests[1]?.messages[0] ?? textMessage('user', ''))).toBe(
      'make two files\n\nYour previous reply could not be parsed (no JSON object found in response). Reply with the JSON object only.'
    );
  });

  it('fails after a second unparseable manifest', async () => {
    const backend = new ScriptedBackend().otherwise(createResponse('still no JSON'));
    const { ctx } = createTestContext(temp, backend);

    await expect(new BlueprintPipeline(ctx).run('make two files', createRunStats())).rejects.toThrow(
      'Manifest could not be parsed: no JSON object found in response'
    );
  });

  it('keeps nothing when the first file cannot be generated', async () => {
    const backend = new ScriptedBackend([createResponse(TWO_FILES)]).otherwise(createResponse(''));
    const { ctx } = createTestContext(temp, backend, { maxFileRetries: 2 });

    await expect(new BlueprintPipeline(ctx).run('make two files', createRunStats())).rejects.toThrow(
      'Could not generate a.js; nothing was kept'
    );
    expect(await temp.exists('a.js')).toBe(false);
    expect(backend.requests).toHaveLength(4);
  });

  it('retries an empty file reply as many times as configured', async () => {
    const backend = new ScriptedBackend([
      createResponse(JSON.stringify({ files: [{ path: 'a.js' }] })),
      createResponse(''),
      createResponse(''),
      createResponse('const a = 1;'),
    ]);
    const { ctx } = createTestContext(temp, backend, { maxFileRetries: 2 });

    const result = await new BlueprintPipeline(ctx).run('make one file', createRunStats());

    expect(result.written).toEqual(['a.js']);
    expect(backend.requests).toHaveLength(4);
    expect(await temp.read('a.js')).toBe('const a = 1;\n');
  });

  it('skips a later file that cannot be generated', async () => {
    const backend = new ScriptedBackend([createResponse(TWO_FILES), createResponse('const a = 1;')]).otherwise(
      createResponse('')
    );
    const { ctx } = createTestContext(temp, backend, { maxFileRetries: 2 });

    const result = await new BlueprintPipeline(ctx).run('make two files', createRunStats());

    expect(result.written).toEqual(['a.js']);
    expect(result.failed).toEqual(['b.js']);
    expect(await temp.read('a.js')).toBe('const a = 1;\n');
  });

  it('asks again without tools when a file reply calls one', async () => {
    const backend = new ScriptedBackend([
      createResponse(JSON.stringify({ files: [{ path: 'a.js' }] })),
      createResponse('', [createCall('write_file', { file_path: 'a.js', content: 'x' })]),
      createResponse('const a = 1;'),
    ]);
    const { ctx } = createTestContext(temp, backend);

    const result = await new BlueprintPipeline(ctx).run('make one file', createRunStats());

    expect(result.written).toEqual(['a.js']);
    expect(messageText(backend.requests[2]?.messages[0] ?? textMessage('user', ''))).toContain(
      'Tools are not available. Reply with the file content as plain text.'
    );
  });

  it('resumes from a checkpoint', async () => {
    const request = 'make two files';
    const blueprint = blueprintSchema.parse(JSON.parse(TWO_FILES));
    await temp.write('a.js', 'const a = 1;\n');
    const backend = new ScriptedBackend([createResponse('const b = 2;')]);
    const { ctx } = createTestContext(temp, backend);
    await ctx.checkpoints.save({
      operationId: blueprintOperationId(temp.root, request),
      step: 1,
      totalSteps: 2,
      completedFiles: ['a.js'],
      state: { request, blueprint },
    });

    const result = await new BlueprintPipeline(ctx).run(request, createRunStats());

    expect(result.resumed).toEqual(['a.js']);
    expect(result.written).toEqual(['b.js']);
    expect(backend.requests).toHaveLength(1);
    expect(result.summary).toBe('Generated 2/2 files for node-cli.\nWritten: b.js\nResumed: a.js');
  });

  it('takes over a new-project request from a script', async () => {
    const backend = new ScriptedBackend([
      createResponse(JSON.stringify({ projectType: 'todo-app', files: [{ path: 'index.js' }] })),
      createResponse('console.log("todo");'),
    ]);
    const { ctx } = createTestContext(temp, backend);

    const result = await new TurnInterpreter(ctx).run(parseScript('user: create a todo app [[RESPONSE]]'));

    const summary = 'Generated 1/1 files for todo-app.\nWritten: index.js';
    expect(result.finalText).toBe(summary);
    expect(result.chatHistory).toEqual([
      textMessage('user', 'create a todo app'),
      textMessage('assistant', summary),
    ]);
    expect(await temp.read('index.js')).toBe('console.log("todo");\n');
  });
});
