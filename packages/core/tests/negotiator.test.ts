import { describe, it, expect, vi, type Mock } from 'vitest';
import {
  OPENING_MESSAGE,
  ProtocolNegotiator,
  buildNegotiatorPrompt,
  type Counterparty,
  type CounterpartyReply,
} from '../src/negotiator.js';
import { SENDER_NEGOTIATOR_PROMPT } from '../src/prompts.js';
import { TaskSchema } from '../src/schema/task-schema.js';
import { CallAbortedError } from '../src/errors.js';
import { DOUBLE_IT_BLOCK, ScriptedToolformer, inOrder } from './fixtures/scripted.js';

const TASK = { description: 'Double a number', input: { type: 'number' }, output: { type: 'number' } };

function agreeable(body = 'Sounds good.'): Mock<Counterparty> {
  return vi.fn<Counterparty>(async () => ({ status: 'success', body }));
}

describe('buildNegotiatorPrompt', () => {
  it('appends the task schema and additional information', () => {
    const schema = new TaskSchema({ a: 1 });
    expect(buildNegotiatorPrompt(schema, 'Be quick.')).toBe(
      `${SENDER_NEGOTIATOR_PROMPT}\nThe JSON schema of the task is the following:\n\n{\n  "a": 1\n}\n\nBe quick.`,
    );
  });
});

describe('ProtocolNegotiator', () => {
  it('extracts a protocol on the first turn without consulting the counterparty', async () => {
    const backend = new ScriptedToolformer(inOrder(DOUBLE_IT_BLOCK));
    const other = agreeable();
    const outcome = await new ProtocolNegotiator(backend).negotiate(TASK, other);

    expect(outcome.status).toBe('extracted');
    expect(outcome.rounds).toBe(0);
    expect(other).not.toHaveBeenCalled();
    expect(backend.conversations[0].received).toEqual([OPENING_MESSAGE]);
    expect(backend.conversations[0].spec.category).toBe('negotiation');
  });

  it('forwards replies until the backend settles', async () => {
    const backend = new ScriptedToolformer(
      inOrder('How about plain numbers?', 'And the reply?', DOUBLE_IT_BLOCK),
    );
    const other = vi.fn<Counterparty>(async (message) => ({ status: 'success', body: `re: ${message}` }));
    const outcome = await new ProtocolNegotiator(backend).negotiate(TASK, other);

    expect(outcome.status).toBe('extracted');
    expect(outcome.rounds).toBe(2);
    expect(other.mock.calls.map(([message]) => message)).toEqual([
      'How about plain numbers?',
      'And the reply?',
    ]);
    expect(backend.conversations[0].received).toEqual([
      OPENING_MESSAGE,
      're: How about plain numbers?',
      're: And the reply?',
    ]);
    if (outcome.status === 'extracted') {
      expect(outcome.protocol.name).toBe('DoubleIt');
    }
    expect(outcome.transcript.map((round) => round.index)).toEqual([0, 1, 2]);
  });

  it('exhausts after the round limit', async () => {
    const backend = new ScriptedToolformer(inOrder('Still thinking.'));
    const other = agreeable();
    const outcome = await new ProtocolNegotiator(backend, { maxRounds: 3 }).negotiate(TASK, other);

    expect(outcome).toMatchObject({ status: 'exhausted', rounds: 3 });
    expect(other).toHaveBeenCalledTimes(3);
    expect(backend.conversations[0].received).toHaveLength(3);
  });

  it('with a single round consults the counterparty once and stops', async () => {
    const backend = new ScriptedToolformer(inOrder('Proposal without a final block.'));
    const other = agreeable(DOUBLE_IT_BLOCK);
    const outcome = await new ProtocolNegotiator(backend, { maxRounds: 1 }).negotiate(TASK, other);

    expect(outcome.status).toBe('exhausted');
    expect(outcome.rounds).toBe(1);
    expect(other).toHaveBeenCalledTimes(1);
  });

  it('keeps negotiating when the counterparty reports an error', async () => {
    const backend = new ScriptedToolformer(inOrder('Hello?', DOUBLE_IT_BLOCK));
    const other = vi.fn<Counterparty>(async () => ({ status: 'error', message: 'service busy' }));
    const outcome = await new ProtocolNegotiator(backend).negotiate(TASK, other);

    expect(outcome.status).toBe('extracted');
    expect(backend.conversations[0].received[1]).toBe(
      'Error interacting with the other party: service busy',
    );
  });

  it('turns a throwing counterparty into an error message', async () => {
    const backend = new ScriptedToolformer(inOrder('Hello?', DOUBLE_IT_BLOCK));
    const other = vi.fn<Counterparty>(async () => {
      throw new Error('connection reset');
    });
    const outcome = await new ProtocolNegotiator(backend).negotiate(TASK, other);

    expect(outcome.transcript[0].counterparty).toEqual({
      status: 'error',
      message: 'connection reset',
    });
    expect(backend.conversations[0].received[1]).toBe(
      'Error interacting with the other party: connection reset',
    );
  });

  it('treats a counterparty that misses the deadline as an error', async () => {
    const backend = new ScriptedToolformer(inOrder('Hello?', DOUBLE_IT_BLOCK));
    const other = vi.fn<Counterparty>(() => new Promise<CounterpartyReply>(() => undefined));
    const outcome = await new ProtocolNegotiator(backend, { roundTimeoutMs: 20 }).negotiate(TASK, other);

    expect(outcome.status).toBe('extracted');
    expect(backend.conversations[0].received[1]).toBe(
      'Error interacting with the other party: counterparty reply timed out after 20ms',
    );
  });

  it('stops when the caller aborts', async () => {
    const controller = new AbortController();
    const backend = new ScriptedToolformer(inOrder('Hello?'));
    const other = vi.fn<Counterparty>(
      (_message, { signal }) =>
        new Promise<CounterpartyReply>((_, reject) => {
          signal.addEventListener('abort', () => reject(new Error('cancelled')));
          setTimeout(() => controller.abort(), 0);
        }),
    );

    await expect(
      new ProtocolNegotiator(backend).negotiate(TASK, other, { signal: controller.signal }),
    ).rejects.toBeInstanceOf(CallAbortedError);
  });

  it('propagates failures of its own backend', async () => {
    const backend = new ScriptedToolformer(() => {
      throw new Error('quota exceeded');
    });
    await expect(new ProtocolNegotiator(backend).negotiate(TASK, agreeable())).rejects.toThrow(
      'quota exceeded',
    );
  });
});
