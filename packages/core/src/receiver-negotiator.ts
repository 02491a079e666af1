import type { Toolformer } from './backend/types.js';
import { errorMessage } from './errors.js';
import { type Logger, silentLogger } from './logger.js';
import type { Counterparty } from './negotiator.js';
import { RECEIVER_NEGOTIATOR_PROMPT } from './prompts.js';
import type { Tool } from './schema/tool.js';
import { runWithDeadline } from './timeout.js';

export interface ReceiverNegotiatorOptions {
  /** Deadline for each backend turn. */
  roundTimeoutMs?: number;
  logger?: Logger;
}

export function buildReceiverPrompt(tools: readonly Tool[], additionalInfo?: string): string {
  const toolDocs =
    tools.length === 0
      ? 'No tools are available.'
      : tools.map((tool) => tool.asDocumented()).join('\n\n');
  let prompt = `${RECEIVER_NEGOTIATOR_PROMPT}\n\nThe service has access to the following tools:\n\n${toolDocs}`;
  if (additionalInfo) {
    prompt += `\n\n${additionalInfo}`;
  }
  return prompt;
}

/** Service side of a negotiation. Each session is one conversation with the backend. */
export class ReceiverNegotiator {
  private readonly logger: Logger;

  constructor(
    private readonly toolformer: Toolformer,
    private readonly options: ReceiverNegotiatorOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Opens a session that answers a sender's negotiation messages. The tools are described to the
   * backend but not attached: the session negotiates, it does not perform the task.
   */
  openSession(tools: readonly Tool[], options: { additionalInfo?: string } = {}): Counterparty {
    const conversation = this.toolformer.newConversation({
      prompt: buildReceiverPrompt(tools, options.additionalInfo),
      tools: [],
      category: 'negotiation',
    });

    return async (message, { signal }) => {
      try {
        const body = await runWithDeadline(
          'receiver negotiation turn',
          (callSignal) => conversation.chat(message, { signal: callSignal }),
          { signal, timeoutMs: this.options.roundTimeoutMs },
        );
        return { status: 'success', body };
      } catch (error) {
        this.logger.warn(`Receiver negotiation turn failed: ${errorMessage(error)}`);
        return { status: 'error', message: errorMessage(error) };
      }
    };
  }
}
