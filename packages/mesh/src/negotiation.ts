import { z } from 'zod';
import { type Counterparty, type ReceiverNegotiator, type Tool, errorMessage } from '@pactwire/core';
import type { MeshAgent } from './agent.js';
import type { ServiceDescriptor } from './protocol/types.js';

/** Standard service carrying negotiation turns between agents. */
export const NEGOTIATE_SERVICE = 'pactwire/negotiate';

export const NEGOTIATE_SERVICE_DESCRIPTOR: ServiceDescriptor = {
  name: NEGOTIATE_SERVICE,
  description: 'One turn of a protocol negotiation. Omit sessionId to open a new session.',
  payloadSchema: {
    type: 'object',
    required: ['text'],
    properties: {
      text: { type: 'string', description: 'The negotiation message' },
      sessionId: { type: 'string', description: 'Session returned by an earlier turn' },
    },
  },
};

export interface NegotiatePayload {
  text: string;
  sessionId?: string;
}

export interface NegotiateResult {
  text: string;
  sessionId: string;
}

const negotiatePayloadSchema = z.object({
  text: z.string(),
  sessionId: z.string().min(1).optional(),
});

const negotiateReplySchema = z.union([
  z.object({ text: z.string(), sessionId: z.string() }),
  z.object({ error: z.string() }),
]);

interface ReceiverSession {
  counterparty: Counterparty;
  /** Settles when the latest queued turn has finished. */
  tail: Promise<void>;
}

export interface ServeNegotiationOptions {
  /** Appended to the receiver prompt of every session. */
  additionalInfo?: string;
}

/**
 * Answers the negotiate service on behalf of a receiver. Each session id gets its own receiver
 * session; a first message without one gets a fresh id.
 */
export function serveNegotiation(
  agent: MeshAgent,
  receiver: ReceiverNegotiator,
  tools: readonly Tool[],
  options: ServeNegotiationOptions = {},
): void {
  const sessions = new Map<string, ReceiverSession>();

  agent.register(NEGOTIATE_SERVICE_DESCRIPTOR, async (payload, { signal }) => {
    const parsed = negotiatePayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new Error('Invalid negotiation payload');
    }
    const { text, sessionId = crypto.randomUUID() } = parsed.data;

    let session = sessions.get(sessionId);
    if (!session) {
      session = {
        counterparty: receiver.openSession(tools, { additionalInfo: options.additionalInfo }),
        tail: Promise.resolve(),
      };
      sessions.set(sessionId, session);
    }

    // Turns of one session run in order: a turn the sender stopped waiting for still holds the
    // conversation until it finishes.
    const { counterparty } = session;
    const turn = session.tail.then(() => counterparty(text, { signal }));
    session.tail = turn.then(
      () => undefined,
      () => undefined,
    );
    const reply = await turn;
    if (reply.status === 'error') {
      throw new Error(reply.message);
    }
    const result: NegotiateResult = { text: reply.body, sessionId };
    return result;
  });
}

export interface MeshCounterpartyOptions {
  /** Deadline for each turn. Without one a turn waits as long as the receiver takes. */
  timeoutMs?: number;
}

/** A Counterparty that reaches the receiver through a peer's negotiate service. */
export function meshCounterparty(
  agent: MeshAgent,
  peerId: string,
  options: MeshCounterpartyOptions = {},
): Counterparty {
  let sessionId: string | undefined;

  return async (message, { signal }) => {
    const payload: NegotiatePayload =
      sessionId === undefined ? { text: message } : { text: message, sessionId };

    let result: unknown;
    try {
      const response = await agent.request(peerId, NEGOTIATE_SERVICE, payload, {
        signal,
        // Zero disables the agent's default request timeout.
        timeoutMs: options.timeoutMs ?? 0,
      });
      result = response.result;
    } catch (error) {
      if (signal.aborted) {
        throw error;
      }
      return { status: 'error', message: errorMessage(error) };
    }

    const reply = negotiateReplySchema.safeParse(result);
    if (!reply.success) {
      return { status: 'error', message: 'Malformed negotiation reply' };
    }
    if ('error' in reply.data) {
      return { status: 'error', message: reply.data.error };
    }
    sessionId = reply.data.sessionId;
    return { status: 'success', body: reply.data.text };
  };
}
