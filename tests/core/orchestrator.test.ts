import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import {
  CONTINUE_DIRECTIVE,
  countRecentResults,
  type DriveOptions,
  looksStalled,
  repeatThreshold,
  TODO_DIRECTIVE,
  toFunctionResponse,
  ToolCallOrchestrator,
} from '../../src/core/orchestrator.js';
import { createRunStats } from '../../src/output/stats.js';
import { type ChatMessage, textMessage } from '../../src/types/llm.js';
import {
  createCall,
  createResponse,
  createTempWorkspace,
  createTestContext,
  ScriptedBackend,
  type TempWorkspace,
} from '../helpers/mocks.js';

const FINAL_TEXT = 'Everything requested is now in place and the work is finished.';

function driveOptions(expectFiles = false): DriveOptions {
  return { stats: createRunStats(), sampling: {}, expectFiles };
}

describe('ToolCallOrchestrator', () => {
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

  describe('executeCall', () => {
    it('reports unknown tools', async () => {
      const { ctx } = createTestContext(temp);

      const result = await new ToolCallOrchestrator(ctx).executeCall(createCall('teleport', {}));

      expect(result.error).toEqual({ type: 'not-found', message: 'Tool not found: teleport' });
    });

    it('reports invalid parameters', async () => {
      const { ctx } = createTestContext(temp);

      const result = await new ToolCallOrchestrator(ctx).executeCall(createCall('read_file', {}));

      expect(result.error).toEqual({
        type: 'invalid-parameters',
        message: 'Invalid parameters for read_file: file_path: Required',
      });
    });

    it('reports paths outside the workspace as invalid parameters', async () => {
      const { ctx } = createTestContext(temp);

      const result = await new ToolCallOrchestrator(ctx).executeCall(
        createCall('write_file', { file_path: '../escape.txt', content: 'x' })
      );

      expect(result.error?.type).toBe('invalid-parameters');
      expect(await temp.exists('../escape.txt')).toBe(false);
    });

    it('records tool use in stats', async () => {
      const { ctx } = createTestContext(temp);
      const stats = createRunStats();

      const result = await new ToolCallOrchestrator(ctx).executeCall(
        createCall('write_file', { file_path: 'a.txt', content: 'one\ntwo' }),
        stats
      );

      expect(result.content).toBe('Wrote 2 lines to a.txt');
      expect(stats.toolCalls).toBe(1);
      expect([...stats.toolsUsed]).toEqual(['write_file']);
    });
  });

  describe('drive', () => {
    it('executes calls and continues until the model stops', async () => {
      const backend = new ScriptedBackend([createResponse(FINAL_TEXT)]);
      const { ctx } = createTestContext(temp, backend);
      const history: ChatMessage[] = [];

      const result = await new ToolCallOrchestrator(ctx).drive(
        history,
        createResponse('', [createCall('write_file', { file_path: 'a.txt', content: 'hello' })]),
        driveOptions()
      );

      expect(result.stopReason).toBe('completed');
      expect(result.toolCalls).toBe(1);
      expect(result.continuations).toBe(1);
      expect(result.filesWritten).toEqual(['a.txt']);
      expect(result.text).toBe(FINAL_TEXT);
      expect(await temp.read('a.txt')).toBe('hello');
      expect(history).toHaveLength(3);
      expect(history[2]).toEqual(textMessage('assistant', FINAL_TEXT));
    });

    it('returns immediately for a response without calls', async () => {
      const backend = new ScriptedBackend();
      const { ctx } = createTestContext(temp, backend);

      const result = await new ToolCallOrchestrator(ctx).drive([], createResponse('Hi'), driveOptions(true));

      expect(result.stopReason).toBe('completed');
      expect(result.continuations).toBe(0);
      expect(backend.requests).toHaveLength(0);
    });

    it('stops when one tool keeps being called', async () => {
      await temp.write('a.txt', 'content');
      const readCall = createCall('read_file', { file_path: 'a.txt' });
      const backend = new ScriptedBackend().otherwise(createResponse('', [readCall]));
      const { ctx } = createTestContext(temp, backend);

      const result = await new ToolCallOrchestrator(ctx).drive([], createResponse('', [readCall]), driveOptions());

      expect(result.stopReason).toBe('repeat-detected');
      expect(result.toolCalls).toBe(4);
      expect(result.continuations).toBe(3);
      expect(backend.requests).toHaveLength(3);
    });

    it('stops when the same write keeps being repeated', async () => {
      const writeCall = createCall('write_file', { file_path: 'a.txt', content: 'same' });
      const backend = new ScriptedBackend().otherwise(createResponse('', [writeCall]));
      const { ctx } = createTestContext(temp, backend);

      const result = await new ToolCallOrchestrator(ctx).drive([], createResponse('', [writeCall]), driveOptions());

      expect(result.stopReason).toBe('repeat-detected');
      expect(result.toolCalls).toBe(5);
      expect(result.continuations).toBe(4);
      expect(result.filesWritten).toEqual(['a.txt']);
      expect(await temp.read('a.txt')).toBe('same');
    });

    it('stops at the continuation depth limit', async () => {
      await temp.write('a.txt', 'content');
      const readCall = createCall('read_file', { file_path: 'a.txt' });
      const backend = new ScriptedBackend().otherwise(createResponse('', [readCall]));
      const { ctx } = createTestContext(temp, backend, { maxContinuationDepth: 2 });

      const result = await new ToolCallOrchestrator(ctx).drive([], createResponse('', [readCall]), driveOptions());

      expect(result.stopReason).toBe('max-depth');
      expect(result.continuations).toBe(2);
      expect(result.toolCalls).toBe(3);
    });

    it('answers a repeated todo call without running it and sends one directive', async () => {
      const todosCall = createCall('write_todos', { todos: [{ content: 'Create index.js' }] });
      const backend = new ScriptedBackend([createResponse('', [todosCall]), createResponse(FINAL_TEXT)]);
      const { ctx } = createTestContext(temp, backend);
      const history: ChatMessage[] = [];

      const result = await new ToolCallOrchestrator(ctx).drive(history, createResponse('', [todosCall]), driveOptions());

      expect(result.stopReason).toBe('completed');
      expect(result.toolCalls).toBe(1);
      expect(result.continuations).toBe(2);
      expect(history[3]).toEqual({
        role: 'user',
        parts: [
          {
            type: 'function_response',
            name: 'write_todos',
            id: 'call_2',
            response: { output: 'Skipped: the todo list already exists. Implement the tasks instead.' },
          },
        ],
      });
      expect(history[4]).toEqual(textMessage('user', TODO_DIRECTIVE));
    });

    it('retries a stall once, then reports it', async () => {
      await temp.write('a.txt', 'content');
      const backend = new ScriptedBackend([createResponse("I'll create the files next."), createResponse('Sure.')]);
      const { ctx } = createTestContext(temp, backend);
      const history: ChatMessage[] = [];

      const result = await new ToolCallOrchestrator(ctx).drive(
        history,
        createResponse('', [createCall('read_file', { file_path: 'a.txt' })]),
        driveOptions(true)
      );

      expect(result.stopReason).toBe('stalled');
      expect(result.continuations).toBe(2);
      expect(history).toContainEqual(textMessage('user', CONTINUE_DIRECTIVE));
    });

    it('stops with an error when a continuation fails', async () => {
      await temp.write('a.txt', 'content');
      const backend = new ScriptedBackend([new Error('connection reset')]);
      const { ctx } = createTestContext(temp, backend);

      const result = await new ToolCallOrchestrator(ctx).drive(
        [],
        createResponse('', [createCall('read_file', { file_path: 'a.txt' })]),
        driveOptions()
      );

      expect(result.stopReason).toBe('error');
      expect(result.continuations).toBe(0);
      expect(result.toolCalls).toBe(1);
    });
  });
});

describe('orchestrator helpers', () => {
  it('builds function responses for results and errors', () => {
    expect(toFunctionResponse(createCall('read_file', {}, 'c1'), { content: 'body' })).toEqual({
      type: 'function_response',
      name: 'read_file',
      id: 'c1',
      response: { output: 'body' },
    });
    expect(
      toFunctionResponse(createCall('shell', {}), {
        content: '',
        error: { type: 'execution-error', message: 'boom' },
      })
    ).toEqual({
      type: 'function_response',
      name: 'shell',
      response: { error: 'boom', errorType: 'execution-error' },
    });
  });

  it('counts results for a tool in the recent window', () => {
    const result = (name: string): ChatMessage => ({
      role: 'user',
      parts: [{ type: 'function_response', name, response: {} }],
    });
    const history = [result('edit'), result('edit'), result('shell'), textMessage('user', 'x')];

    expect(countRecentResults(history, 'edit')).toBe(2);
    expect(countRecentResults(history, 'edit', 2)).toBe(0);
  });

  it('counts every result part of a batch', () => {
    const batch: ChatMessage = {
      role: 'user',
      parts: [
        { type: 'function_response', name: 'write_file', response: {} },
        { type: 'function_response', name: 'write_file', response: {} },
        { type: 'function_response', name: 'read_file', response: {} },
      ],
    };

    expect(countRecentResults([batch], 'write_file')).toBe(2);
    expect(countRecentResults([batch, batch], 'write_file')).toBe(4);
  });

  it('uses per-tool repeat thresholds', () => {
    expect(repeatThreshold('write_file')).toBe(5);
    expect(repeatThreshold('read_file')).toBe(4);
    expect(repeatThreshold('write_todos')).toBe(2);
  });

  it('detects stalled text', () => {
    expect(looksStalled('ok')).toBe(true);
    expect(looksStalled("Here is the plan: I'll build the parser and then the command line tool.")).toBe(true);
    expect(looksStalled('The parser and the command line tool now handle every documented case.')).toBe(false);
  });
});
