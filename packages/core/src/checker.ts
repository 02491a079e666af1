import type { Toolformer } from './backend/types.js';
import { type Logger, silentLogger } from './logger.js';
import { CHECKER_PROMPT } from './prompts.js';
import type { Tool } from './schema/tool.js';
import { type CallOptions, runWithDeadline } from './timeout.js';

const VERDICT_WINDOW = 10;

/** Only the tail of the reply carries the verdict; "yes" or "no" inside the reasoning is ignored. */
export function isAffirmativeVerdict(reply: string): boolean {
  return reply.trim().toLowerCase().slice(-VERDICT_WINDOW).includes('yes');
}

export function buildCheckerMessage(
  protocolDocument: string,
  tools: readonly Tool[],
  additionalInfo?: string,
): string {
  let message = `Protocol document:\n\n${protocolDocument}\n\nFunctions that the implementer will have access to:\n\n`;
  if (tools.length === 0) {
    message += 'No additional functions provided';
  } else {
    message += tools.map((tool) => `${tool.asDocumented()}\n\n`).join('');
  }
  if (additionalInfo) {
    message += `\n\nAdditional information:\n\n${additionalInfo}`;
  }
  return message;
}

export interface ProtocolCheckerOptions {
  logger?: Logger;
  /** Deadline for the backend call when the caller passes none. */
  timeoutMs?: number;
}

export interface CheckOptions extends CallOptions {
  additionalInfo?: string;
}

/**
 * Judges whether an implementer holding the given tools could serve a protocol. One backend
 * round trip per check; backend failures propagate to the caller.
 */
export class ProtocolChecker {
  private readonly logger: Logger;

  constructor(
    private readonly toolformer: Toolformer,
    private readonly options: ProtocolCheckerOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async check(
    protocolDocument: string,
    tools: readonly Tool[],
    options: CheckOptions = {},
  ): Promise<boolean> {
    const conversation = this.toolformer.newConversation({
      prompt: CHECKER_PROMPT,
      tools: [],
      category: 'protocolChecking',
    });
    const message = buildCheckerMessage(protocolDocument, tools, options.additionalInfo);
    const reply = await runWithDeadline(
      'protocol check',
      (signal) => conversation.chat(message, { signal }),
      { signal: options.signal, timeoutMs: options.timeoutMs ?? this.options.timeoutMs },
    );
    const verdict = isAffirmativeVerdict(reply);
    this.logger.debug(`Protocol check verdict: ${verdict ? 'feasible' : 'not feasible'}`);
    return verdict;
  }
}
