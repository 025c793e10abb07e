import { describe, expect, it } from 'vitest';

import {
  createMessage,
  parseChoice,
  parseInstruction,
  parseScript,
} from '../../src/script/parser.js';

describe('createMessage', () => {
  it('extracts a placeholder with call overrides', () => {
    const message = createMessage('user', 'Summarize [[SUMMARY:temperature=0.2, model=fast]]');

    expect(message.immediate).toBe(false);
    expect(message.placeholder).toEqual({
      variable: 'SUMMARY',
      overrides: { model: 'fast', temperature: 0.2 },
      markup: '[[SUMMARY:temperature=0.2, model=fast]]',
    });
    expect(message.choice).toBeUndefined();
  });

  it('accepts the short temperature alias and ignores non-numeric values', () => {
    const message = createMessage('user', '[[R:temp=0.5, top_k=abc, top_p=0.9]]');

    expect(message.placeholder?.overrides).toEqual({ temperature: 0.5, topP: 0.9 });
  });

  it('marks a leading # as immediate and strips it', () => {
    const message = createMessage('user', '# Pick one [[CHOICE:|red|green|blue:2]]');

    expect(message.immediate).toBe(true);
    expect(message.content).toBe('Pick one [[CHOICE:|red|green|blue:2]]');
    expect(message.placeholder?.variable).toBe('CHOICE');
    expect(message.choice).toEqual({ options: ['red', 'green', 'blue'], count: 2, random: false });
  });

  it('has no placeholder for plain text', () => {
    const message = createMessage('system', 'Be brief.');

    expect(message.placeholder).toBeUndefined();
    expect(message.replacements).toEqual([]);
  });

  it('collects script, instruction and regex replacements', () => {
    const message = createMessage('user', 'Use [[@helper(x=1)]] and [[@$now]] then /id-(\\d+)/g:ids:1');

    expect(message.replacements).toEqual([
      { kind: 'script', markup: '[[@helper(x=1)]]', name: 'helper', params: { x: '1' } },
      { kind: 'instruction', markup: '[[@$now]]', name: 'now', params: {} },
      {
        kind: 'regex',
        markup: '/id-(\\d+)/g:ids:1',
        pattern: 'id-(\\d+)',
        flags: 'g',
        variable: 'ids',
        group: 1,
      },
    ]);
    expect(message.placeholder).toBeUndefined();
  });
});

describe('parseChoice', () => {
  it('parses plain options', () => {
    expect(parseChoice('|A|B|C')).toEqual({ options: ['A', 'B', 'C'], random: false });
  });

  it('parses a count', () => {
    expect(parseChoice('|A|B|C:2')).toEqual({ options: ['A', 'B', 'C'], count: 2, random: false });
  });

  it('parses random selection', () => {
    expect(parseChoice('| A | B :random')).toEqual({ options: ['A', 'B'], random: true });
  });
});

describe('parseInstruction', () => {
  it('parses echo with quoted text', () => {
    expect(parseInstruction('echo: "Hello {{name}}"')).toEqual({
      kind: 'echo',
      text: 'Hello {{name}}',
      templateRef: false,
    });
  });

  it('parses echo of a template reference', () => {
    expect(parseInstruction('echo: ?= greeting')).toEqual({
      kind: 'echo',
      text: 'greeting',
      templateRef: true,
    });
  });

  it('parses set with a parameter list', () => {
    expect(parseInstruction('set(count=1, label="x")')).toEqual({
      kind: 'set',
      assignments: [
        { key: 'count', value: '1' },
        { key: 'label', value: 'x' },
      ],
    });
  });

  it('parses set with a single assignment', () => {
    expect(parseInstruction('set: mode=fast')).toEqual({
      kind: 'set',
      assignments: [{ key: 'mode', value: 'fast' }],
    });
  });

  it('parses print', () => {
    expect(parseInstruction('print')).toEqual({ kind: 'print' });
  });

  it('keeps unknown instructions as custom', () => {
    expect(parseInstruction('notify: "done"')).toEqual({
      kind: 'custom',
      name: 'notify',
      args: {},
      value: 'done',
    });
    expect(parseInstruction('log(level=info)')).toEqual({
      kind: 'custom',
      name: 'log',
      args: { level: 'info' },
    });
  });

  it('rejects malformed instructions with the line number', () => {
    expect(() => parseInstruction('!!', 3)).toThrow("Line 3: invalid instruction '$!!'");
  });

  it('rejects set without an assignment', () => {
    expect(() => parseInstruction('set: nothing')).toThrow("$set expects key=value, got 'nothing'");
  });
});

describe('parseScript', () => {
  it('splits turns on --- and ***', () => {
    const script = parseScript('user: Hello [[RESPONSE]]\n---\nsystem: Be brief.\nuser: Second\n***\nuser: Third');

    expect(script.turns).toHaveLength(3);
    expect(script.turns[0]?.messages[0]?.placeholder?.variable).toBe('RESPONSE');
    expect(script.turns[1]?.messages.map((m) => [m.role, m.content])).toEqual([
      ['system', 'Be brief.'],
      ['user', 'Second'],
    ]);
    expect(script.sourcePath).toBeNull();
  });

  it('reads fenced front matter', () => {
    const script = parseScript(
      '---\nmodel: fast-model\nparameters:\n  name: demo\nautoRun: false\n---\nuser: Hi {{name}}'
    );

    expect(script.frontmatter.model).toBe('fast-model');
    expect(script.frontmatter.parameters).toEqual({ name: 'demo' });
    expect(script.frontmatter.autoRun).toBe(false);
    expect(script.turns).toHaveLength(1);
  });

  it('reads an unfenced head block whose first key is a front matter key', () => {
    const script = parseScript('description: Greeter\ninputs: [name]\n---\nuser: Hi');

    expect(script.frontmatter.description).toBe('Greeter');
    expect(script.frontmatter.inputs).toEqual(['name']);
    expect(script.frontmatter.autoRun).toBe(true);
    expect(script.turns).toHaveLength(1);
  });

  it('treats a fenced block of messages as a turn', () => {
    const script = parseScript('---\nuser: hi\n---\nuser: bye');

    expect(script.frontmatter.parameters).toEqual({});
    expect(script.turns.map((t) => t.messages[0]?.content)).toEqual(['hi', 'bye']);
  });

  it('dedents multi-line messages', () => {
    const script = parseScript('user: |\n  line one\n    indented\n  line three\nassistant: ok');
    const messages = script.turns[0]?.messages ?? [];

    expect(messages[0]?.content).toBe('line one\n  indented\nline three');
    expect(messages[1]).toMatchObject({ role: 'assistant', content: 'ok' });
  });

  it('joins continuation lines onto the previous message', () => {
    const script = parseScript('user: first\nsecond line');

    expect(script.turns[0]?.messages[0]?.content).toBe('first\nsecond line');
  });

  it('parses instructions, control flow and a chain', () => {
    const source = [
      '$set: count=0',
      '$if count == 0:',
      '  then: $echo: zero',
      '  else:',
      '    $echo: other',
      '$while count != 3:',
      '  do:',
      '    $set: count=1',
      '$for item in items:',
      '  $echo: {{item}}',
      '$match mode:',
      '  fast: $echo: quick',
      '  _:',
      '    $echo: default',
      '-> next(mode=fast)',
    ].join('\n');
    const turn = parseScript(source).turns[0];

    expect(turn?.instructions).toEqual([{ kind: 'set', assignments: [{ key: 'count', value: '0' }] }]);
    expect(turn?.controlFlow).toEqual([
      {
        kind: 'if',
        condition: 'count == 0',
        then: [{ kind: 'echo', text: 'zero', templateRef: false }],
        else: [{ kind: 'echo', text: 'other', templateRef: false }],
      },
      {
        kind: 'while',
        condition: 'count != 3',
        body: [{ kind: 'set', assignments: [{ key: 'count', value: '1' }] }],
      },
      {
        kind: 'for',
        condition: 'item in items',
        iterator: { variable: 'item', source: 'items' },
        body: [{ kind: 'echo', text: '{{item}}', templateRef: false }],
      },
      {
        kind: 'match',
        expression: 'mode',
        cases: [
          { label: 'fast', body: [{ kind: 'echo', text: 'quick', templateRef: false }] },
          { label: '_', body: [{ kind: 'echo', text: 'default', templateRef: false }] },
        ],
      },
    ]);
    expect(turn?.chain).toEqual({ name: 'next', params: { mode: 'fast' } });
  });

  it('parses a pipe of a script and an instruction', () => {
    const turn = parseScript('$pipe shout(x=1) -> $echo: done').turns[0];

    expect(turn?.controlFlow).toEqual([
      {
        kind: 'pipe',
        steps: [
          { kind: 'script', name: 'shout', params: { x: '1' } },
          { kind: 'instruction', instruction: { kind: 'echo', text: 'done', templateRef: false } },
        ],
      },
    ]);
  });

  it('rejects a second chain in one turn', () => {
    expect(() => parseScript('user: hi\n-> a\n-> b')).toThrow('Line 3: a turn can chain to only one script');
  });

  it('drops empty turns', () => {
    expect(parseScript('user: a\n---\n\n---\nuser: b').turns).toHaveLength(2);
  });
});
