import { ConversationBusyError } from '../errors.js';
import { type Logger, silentLogger } from '../logger.js';
import { type Tool, ToolSet, formatToolResult } from '../schema/tool.js';
import { type CallOptions, runWithDeadline } from '../timeout.js';

/** What a conversation is used for; backends may use it for routing or accounting. */
export type ConversationCategory = 'negotiation' | 'programming' | 'protocolChecking' | (string & {});

export interface ConversationSpec {
  prompt: string;
  tools: readonly Tool[];
  category?: ConversationCategory;
}

/**
 * A stateful exchange with a reasoning backend. Each chat call appends one user turn and
 * resolves with one assistant reply. Calls must not overlap.
 */
export interface Conversation {
  chat(message: string, options?: CallOptions): Promise<string>;
}

/** Starts conversations with one reasoning backend. */
export interface Toolformer {
  readonly name: string;
  newConversation(spec: ConversationSpec): Conversation;
}

/**
 * Base for backend conversations: rejects overlapping calls and applies the caller's
 * deadline and cancellation to each exchange.
 */
export abstract class SequentialConversation implements Conversation {
  private busy = false;
  private readonly tools: ToolSet;

  /** Throws InvalidSchemaError when two tools share a name. */
  protected constructor(
    protected readonly spec: ConversationSpec,
    protected readonly logger: Logger = silentLogger,
  ) {
    this.tools = ToolSet.of(spec.tools);
  }

  async chat(message: string, options: CallOptions = {}): Promise<string> {
    if (this.busy) {
      throw new ConversationBusyError();
    }
    this.busy = true;
    try {
      const reply = await runWithDeadline(
        `${this.spec.category ?? 'conversation'} turn`,
        (signal) => this.exchange(message, signal),
        options,
      );
      this.logger.debug(`[${this.spec.category ?? 'conversation'}] reply`, reply);
      return reply;
    } finally {
      this.busy = false;
    }
  }

  /** Sends one user message, resolves any tool calls, and returns the final assistant text. */
  protected abstract exchange(message: string, signal: AbortSignal): Promise<string>;

  /** Runs a tool the backend asked for and returns the text to hand back to it. */
  protected async runTool(name: string, args: Record<string, unknown>): Promise<string> {
    const tool = this.tools.get(name);
    if (!tool) {
      this.logger.warn(`Backend called unknown tool ${name}`);
      return formatToolResult({ ok: false, error: `unknown tool: ${name}` });
    }
    this.logger.debug(`Calling tool ${name}`, args);
    const result = await tool.callForBackend(args);
    if (!result.ok) {
      this.logger.warn(`Tool ${name} failed: ${result.error}`);
    }
    return formatToolResult(result);
  }
}
