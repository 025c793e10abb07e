import { describe, expect, it } from 'vitest';

import {
  applyChoice,
  buildCallMessages,
  choiceInstruction,
  matchOption,
  pickRandom,
  stripPlaceholders,
} from '../../src/core/llm-call.js';
import type { ChatMessage } from '../../src/types/llm.js';
import { textMessage } from '../../src/types/llm.js';

describe('stripPlaceholders', () => {
  it('removes placeholder markup', () => {
    expect(stripPlaceholders('Hi [[RESPONSE]] there [[X:temp=0]]')).toBe('Hi  there');
  });
});

describe('buildCallMessages', () => {
  it('sends system text separately and drops empty entries', () => {
    const history = [
      textMessage('system', 'S'),
      textMessage('user', 'a'),
      textMessage('assistant', ''),
      textMessage('assistant', 'b'),
    ];

    const result = buildCallMessages(history, { role: 'user', content: 'c [[X]]' }, 50);

    expect(result).toEqual({
      system: 'S',
      messages: [textMessage('user', 'a'), textMessage('assistant', 'b'), textMessage('user', 'c')],
    });
  });

  it('never opens the window on an orphaned tool result', () => {
    const history: ChatMessage[] = [
      textMessage('user', 'a'),
      { role: 'assistant', parts: [{ type: 'function_call', call: { name: 'list_files', args: {} } }] },
      { role: 'user', parts: [{ type: 'function_response', name: 'list_files', response: { content: '' } }] },
      textMessage('assistant', 'done'),
    ];

    expect(buildCallMessages(history, null, 2).messages).toEqual([textMessage('assistant', 'done')]);
  });

  it('sends a system-role current message as user and skips an assistant one', () => {
    expect(buildCallMessages([], { role: 'system', content: 'rules' }, 50).messages).toEqual([
      textMessage('user', 'rules'),
    ]);
    expect(() => buildCallMessages([], { role: 'assistant', content: '[[R]]' }, 50)).toThrow(
      'No messages to send to the model'
    );
  });
});

describe('constrained choice', () => {
  it('builds the instruction for one option', () => {
    expect(choiceInstruction({ options: ['A', 'B'], random: false })).toBe(
      '\n\nYou must choose from these options only: A|B\nAnswer with the option only.'
    );
  });

  it('builds the instruction for several options', () => {
    expect(choiceInstruction({ options: ['A', 'B', 'C'], count: 2, random: false })).toBe(
      '\n\nYou must choose from these options only: A|B|C\nChoose exactly 2 options, separated by |.'
    );
  });

  it('maps a sentence onto the option it names', () => {
    expect(applyChoice('Answer: Beta', { options: ['Alpha', 'Beta', 'Gamma'], random: false })).toBe('Beta');
  });

  it('collects several options', () => {
    expect(applyChoice('red, blue', { options: ['red', 'green', 'blue'], count: 2, random: false })).toBe('red, blue');
  });

  it('keeps the raw text when nothing matches', () => {
    expect(applyChoice(' none of these ', { options: ['x', 'y'], random: false })).toBe('none of these');
  });

  it('always answers with a single option', () => {
    expect(applyChoice('whatever', { options: ['only'], random: false })).toBe('only');
  });

  it('checks options in the order given', () => {
    expect(matchOption('New York is big', ['New York', 'New'])).toBe('New York');
    expect(matchOption('New York is big', ['New', 'New York'])).toBe('New');
  });

  it('matches an option inside a longer word', () => {
    expect(applyChoice('passed', { options: ['pass', 'fail'], random: false })).toBe('pass');
    expect(matchOption('The build FAILED twice', ['pass', 'fail'])).toBe('fail');
  });

  it('picks locally for random choices', () => {
    const choice = { options: ['a', 'b', 'c'], count: 2, random: true };

    expect(pickRandom(choice, () => 0)).toBe('a, b');
    expect(pickRandom(choice, () => 0.99)).toBe('c, b');
  });
});
