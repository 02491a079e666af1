import type { Toolformer } from './backend/types.js';
import { errorMessage } from './errors.js';
import { type ProtocolExtraction, extractProtocol } from './extraction.js';
import { type Logger, silentLogger } from './logger.js';
import type { Protocol } from './protocol.js';
import { SENDER_NEGOTIATOR_PROMPT } from './prompts.js';
import { TaskSchema, type TaskSchemaData } from './schema/task-schema.js';
import { runWithDeadline } from './timeout.js';

export const OPENING_MESSAGE = 'Hello! How may I help you?';
export const DEFAULT_MAX_ROUNDS = 10;

export type CounterpartyReply = { status: 'success'; body: string } | { status: 'error'; message: string };

/** The agent on the other side of a negotiation. May be network-bound. */
export type Counterparty = (
  message: string,
  context: { signal: AbortSignal },
) => Promise<CounterpartyReply>;

export type NegotiationState =
  | { kind: 'negotiating'; round: number }
  | { kind: 'extracted'; protocol: Protocol }
  | { kind: 'exhausted' };

/** One exchange with the negotiator's backend, plus what the counterparty answered to it. */
export interface NegotiationRound {
  index: number;
  outgoing: string;
  reply: string;
  extraction: ProtocolExtraction;
  counterparty?: CounterpartyReply;
}

/**
 * `rounds` counts completed counterparty exchanges. Exhaustion is a normal outcome: the caller
 * may retry with other parameters.
 */
export type NegotiationOutcome =
  | { status: 'extracted'; protocol: Protocol; rounds: number; transcript: NegotiationRound[] }
  | { status: 'exhausted'; rounds: number; transcript: NegotiationRound[] };

export interface ProtocolNegotiatorOptions {
  maxRounds?: number;
  /** Deadline for each backend turn and each counterparty reply. */
  roundTimeoutMs?: number;
  logger?: Logger;
}

export interface NegotiateOptions {
  /** Free text appended to the opening prompt. */
  additionalInfo?: string;
  signal?: AbortSignal;
}

export function buildNegotiatorPrompt(taskSchema: TaskSchema, additionalInfo?: string): string {
  let prompt = `${SENDER_NEGOTIATOR_PROMPT}\nThe JSON schema of the task is the following:\n\n${taskSchema.toString()}`;
  if (additionalInfo) {
    prompt += `\n\n${additionalInfo}`;
  }
  return prompt;
}

/** Sender side of a negotiation: talks to its backend until the backend emits a final protocol. */
export class ProtocolNegotiator {
  readonly maxRounds: number;
  private readonly logger: Logger;

  constructor(
    private readonly toolformer: Toolformer,
    private readonly options: ProtocolNegotiatorOptions = {},
  ) {
    this.maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
    this.logger = options.logger ?? silentLogger;
  }

  async negotiate(
    taskSchemaLike: TaskSchema | TaskSchemaData,
    otherParty: Counterparty,
    options: NegotiateOptions = {},
  ): Promise<NegotiationOutcome> {
    const taskSchema = TaskSchema.from(taskSchemaLike);
    const conversation = this.toolformer.newConversation({
      prompt: buildNegotiatorPrompt(taskSchema, options.additionalInfo),
      tools: [],
      category: 'negotiation',
    });
    const deadline = { signal: options.signal, timeoutMs: this.options.roundTimeoutMs };
    const transcript: NegotiationRound[] = [];

    let state: NegotiationState = { kind: 'negotiating', round: 0 };
    let outgoing = OPENING_MESSAGE;

    while (state.kind === 'negotiating') {
      const round: number = state.round;
      if (round >= this.maxRounds) {
        state = { kind: 'exhausted' };
        break;
      }

      const message = outgoing;
      const reply = await runWithDeadline(
        'negotiation turn',
        (signal) => conversation.chat(message, { signal }),
        deadline,
      );
      const extraction = extractProtocol(reply);
      const record: NegotiationRound = { index: round, outgoing: message, reply, extraction };
      transcript.push(record);

      if (extraction.found) {
        this.logger.debug(`Round ${round}: extracted protocol ${extraction.protocol.name}`);
        state = { kind: 'extracted', protocol: extraction.protocol };
        break;
      }

      this.logger.debug(`Round ${round}: no final protocol (${extraction.reason}), forwarding`);
      const answer = await this.consult(otherParty, reply, options.signal);
      record.counterparty = answer;
      outgoing =
        answer.status === 'success'
          ? answer.body
          : `Error interacting with the other party: ${answer.message}`;
      state = { kind: 'negotiating', round: round + 1 };
    }

    const rounds = transcript.filter((record) => record.counterparty !== undefined).length;
    if (state.kind === 'extracted') {
      return { status: 'extracted', protocol: state.protocol, rounds, transcript };
    }
    this.logger.debug(`Negotiation exhausted after ${rounds} round(s)`);
    return { status: 'exhausted', rounds, transcript };
  }

  /** Counterparty failures are reported back into the negotiation instead of aborting it. */
  private async consult(
    otherParty: Counterparty,
    message: string,
    signal: AbortSignal | undefined,
  ): Promise<CounterpartyReply> {
    try {
      return await runWithDeadline(
        'counterparty reply',
        (callSignal) => otherParty(message, { signal: callSignal }),
        { signal, timeoutMs: this.options.roundTimeoutMs },
      );
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      this.logger.warn(`Counterparty failed: ${errorMessage(error)}`);
      return { status: 'error', message: errorMessage(error) };
    }
  }
}
