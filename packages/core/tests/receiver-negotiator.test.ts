import { describe, it, expect } from 'vitest';
import { ReceiverNegotiator, buildReceiverPrompt } from '../src/receiver-negotiator.js';
import { RECEIVER_NEGOTIATOR_PROMPT } from '../src/prompts.js';
import { NumberParameter } from '../src/schema/parameters.js';
import { Tool } from '../src/schema/tool.js';
import { ScriptedToolformer, inOrder } from './fixtures/scripted.js';

const double = new Tool('double', 'Doubles a number', [new NumberParameter('x', 'Input', true)], (args) =>
  Number(args['x']) * 2,
);

describe('buildReceiverPrompt', () => {
  it('documents the tools the service holds', () => {
    expect(buildReceiverPrompt([double], 'Answers within a second.')).toBe(
      `${RECEIVER_NEGOTIATOR_PROMPT}\n\nThe service has access to the following tools:\n\n` +
        'Tool double:\n\nDoubles a number\nParameters:\n\tx (number, required): Input.\n' +
        '\n\nAnswers within a second.',
    );
  });

  it('says when there are none', () => {
    expect(buildReceiverPrompt([]).endsWith('No tools are available.')).toBe(true);
  });
});

describe('ReceiverNegotiator', () => {
  it('answers within one conversation per session', async () => {
    const backend = new ScriptedToolformer((message, turn) => `turn ${turn}: ${message}`);
    const session = new ReceiverNegotiator(backend).openSession([double]);
    const signal = new AbortController().signal;

    await expect(session('first', { signal })).resolves.toEqual({
      status: 'success',
      body: 'turn 0: first',
    });
    await expect(session('second', { signal })).resolves.toEqual({
      status: 'success',
      body: 'turn 1: second',
    });
    expect(backend.conversations).toHaveLength(1);
    expect(backend.conversations[0].spec.tools).toEqual([]);
  });

  it('reports backend failures as error replies', async () => {
    const backend = new ScriptedToolformer(() => {
      throw new Error('model overloaded');
    });
    const session = new ReceiverNegotiator(backend).openSession([]);
    await expect(session('hi', { signal: new AbortController().signal })).resolves.toEqual({
      status: 'error',
      message: 'model overloaded',
    });
  });

  it('separate sessions do not share history', () => {
    const backend = new ScriptedToolformer(inOrder('ok'));
    const receiver = new ReceiverNegotiator(backend);
    receiver.openSession([]);
    receiver.openSession([]);
    expect(backend.conversations).toHaveLength(2);
  });
});
