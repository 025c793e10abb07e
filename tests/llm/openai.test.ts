import OpenAI from 'openai';
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from 'openai/resources/chat/completions';
import { describe, expect, it } from 'vitest';

import { BackendError } from '../../src/llm/errors.js';
import { type ChatCompletionsClient, OpenAiBackend, toOpenAiMessages } from '../../src/llm/openai.js';
import type { ChatMessage } from '../../src/types/llm.js';
import { textMessage } from '../../src/types/llm.js';

interface SentRequest {
  body: ChatCompletionCreateParamsNonStreaming;
  signal: AbortSignal | undefined;
}

function completion(choices: ChatCompletion['choices']): ChatCompletion {
  return { id: 'cmpl-1', object: 'chat.completion', created: 0, model: 'local-model', choices };
}

/**
 * Client that answers every request with `reply`, or throws it
 */
function createClient(reply: ChatCompletion | Error): { client: ChatCompletionsClient; sent: SentRequest[] } {
  const sent: SentRequest[] = [];
  const client: ChatCompletionsClient = {
    chat: {
      completions: {
        async create(body, options) {
          sent.push({ body, signal: options?.signal });
          if (reply instanceof Error) throw reply;
          return reply;
        },
      },
    },
  };
  return { client, sent };
}

describe('toOpenAiMessages', () => {
  it('converts calls and results to tool messages', () => {
    const history: ChatMessage[] = [
      textMessage('user', 'list files'),
      {
        role: 'assistant',
        parts: [{ type: 'function_call', call: { id: 'c1', name: 'list_files', args: {} } }],
      },
      {
        role: 'user',
        parts: [{ type: 'function_response', name: 'list_files', id: 'c1', response: { files: [] } }],
      },
      textMessage('assistant', ''),
    ];

    expect(toOpenAiMessages(history)).toEqual([
      { role: 'user', content: 'list files' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'c1', type: 'function', function: { name: 'list_files', arguments: '{}' } }],
      },
      { role: 'tool', tool_call_id: 'c1', content: '{"files":[]}' },
    ]);
  });
});

describe('OpenAiBackend', () => {
  it('sends the system prompt, model and sampling', async () => {
    const { client, sent } = createClient(
      completion([
        {
          index: 0,
          finish_reason: 'stop',
          logprobs: null,
          message: { role: 'assistant', content: 'hello', refusal: null },
        },
      ])
    );
    const backend = new OpenAiBackend({ client });
    const controller = new AbortController();

    const response = await backend.call({
      messages: [textMessage('user', 'hi')],
      system: 'Be brief.',
      model: 'local-model',
      temperature: 0.2,
      signal: controller.signal,
    });

    expect(response).toEqual({ text: 'hello', finishReason: 'stop', functionCalls: [] });
    expect(sent[0]?.body).toEqual({
      model: 'local-model',
      temperature: 0.2,
      messages: [
        { role: 'system', content: 'Be brief.' },
        { role: 'user', content: 'hi' },
      ],
    });
    expect(sent[0]?.signal).toBe(controller.signal);
  });

  it('declares tools and parses tool calls', async () => {
    const { client, sent } = createClient(
      completion([
        {
          index: 0,
          finish_reason: 'tool_calls',
          logprobs: null,
          message: {
            role: 'assistant',
            content: null,
            refusal: null,
            tool_calls: [{ id: 'c1', type: 'function', function: { name: 'read_file', arguments: '{"path":"a.js"}' } }],
          },
        },
      ])
    );
    const backend = new OpenAiBackend({ client });

    const response = await backend.call({
      messages: [textMessage('user', 'read it')],
      tools: [{ name: 'read_file', description: 'Read a file', parameters: { type: 'object', properties: {} } }],
    });

    expect(response).toEqual({
      text: '',
      finishReason: 'tool_calls',
      functionCalls: [{ id: 'c1', name: 'read_file', args: { path: 'a.js' } }],
    });
    expect(sent[0]?.body.tool_choice).toBe('auto');
    expect(sent[0]?.body.tools).toEqual([
      {
        type: 'function',
        function: { name: 'read_file', description: 'Read a file', parameters: { type: 'object', properties: {} } },
      },
    ]);
  });

  it('maps API errors with the retry-after header', async () => {
    const { client } = createClient(
      new OpenAI.RateLimitError(429, { message: 'slow down' }, undefined, { 'retry-after': '2' })
    );
    const backend = new OpenAiBackend({ client });

    const error: unknown = await backend.call({ messages: [textMessage('user', 'hi')] }).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BackendError);
    expect(error).toMatchObject({ kind: 'rate-limit', status: 429, retryAfterMs: 2000, message: '429 slow down' });
  });

  it('maps connection failures to network errors', async () => {
    const { client } = createClient(new OpenAI.APIConnectionError({ message: 'socket hang up' }));
    const backend = new OpenAiBackend({ client });

    await expect(backend.call({ messages: [textMessage('user', 'hi')] })).rejects.toMatchObject({
      kind: 'network',
      message: 'socket hang up',
    });
  });

  it('rejects completions without choices', async () => {
    const { client } = createClient(completion([]));
    const backend = new OpenAiBackend({ client });

    await expect(backend.call({ messages: [textMessage('user', 'hi')] })).rejects.toThrow(
      'Malformed completion: no choices returned'
    );
  });
});
