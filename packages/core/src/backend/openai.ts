import { z } from 'zod';
import type { Logger } from '../logger.js';
import { postJson, parseArguments } from './http.js';
import {
  type Conversation,
  type ConversationSpec,
  SequentialConversation,
  type Toolformer,
} from './types.js';

export interface HttpToolformerOptions {
  apiKey: string;
  model: string;
  baseUrl?: string;
  temperature?: number;
  /** Upper bound on tool-call round trips within one chat turn. Default 8. */
  maxToolRounds?: number;
  logger?: Logger;
}

export const DEFAULT_MAX_TOOL_ROUNDS = 8;
const OPENAI_BASE_URL = 'https://api.openai.com/v1';

interface OpenAiToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

type OpenAiMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: OpenAiToolCall[] }
  | { role: 'tool'; tool_call_id: string; content: string };

const completionSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string().optional() }),
              }),
            )
            .nullish(),
        }),
      }),
    )
    .min(1),
});

class OpenAiConversation extends SequentialConversation {
  private readonly history: OpenAiMessage[] = [];

  constructor(
    spec: ConversationSpec,
    private readonly options: HttpToolformerOptions,
  ) {
    super(spec, options.logger);
  }

  protected async exchange(message: string, signal: AbortSignal): Promise<string> {
    const maxToolRounds = this.options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    // Committed to history only once the turn completes.
    const pending: OpenAiMessage[] = [{ role: 'user', content: message }];

    for (let round = 0; ; round++) {
      const data = await postJson(
        'OpenAI',
        `${this.options.baseUrl ?? OPENAI_BASE_URL}/chat/completions`,
        { Authorization: `Bearer ${this.options.apiKey}` },
        this.requestBody(pending),
        signal,
      );
      const parsed = completionSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error('OpenAI reply did not contain a chat completion');
      }
      const reply = parsed.data.choices[0].message;
      const content = reply.content ?? '';
      const calls = reply.tool_calls ?? [];

      if (calls.length === 0 || round >= maxToolRounds) {
        if (calls.length > 0) {
          this.logger.warn(`Ignoring tool calls after ${maxToolRounds} tool round(s)`);
        }
        pending.push({ role: 'assistant', content });
        this.history.push(...pending);
        return content;
      }

      pending.push({
        role: 'assistant',
        content: reply.content ?? null,
        tool_calls: calls.map((call) => ({
          id: call.id,
          type: 'function',
          function: { name: call.function.name, arguments: call.function.arguments ?? '{}' },
        })),
      });
      for (const call of calls) {
        const result = await this.runTool(call.function.name, parseArguments(call.function.arguments));
        pending.push({ role: 'tool', tool_call_id: call.id, content: result });
      }
    }
  }

  private requestBody(pending: OpenAiMessage[]): Record<string, unknown> {
    const body: Record<string, unknown> = {
      model: this.options.model,
      messages: [{ role: 'system', content: this.spec.prompt }, ...this.history, ...pending],
    };
    if (this.options.temperature !== undefined) {
      body['temperature'] = this.options.temperature;
    }
    if (this.spec.tools.length > 0) {
      body['tools'] = this.spec.tools.map((tool) => tool.asOpenAiTool());
      body['tool_choice'] = 'auto';
    }
    return body;
  }
}

/** OpenAI-compatible chat completions backend. Tools use the nested function-call convention. */
export class OpenAiToolformer implements Toolformer {
  readonly name: string;

  constructor(private readonly options: HttpToolformerOptions) {
    this.name = `openai_${options.model}`;
  }

  newConversation(spec: ConversationSpec): Conversation {
    return new OpenAiConversation(spec, this.options);
  }
}
