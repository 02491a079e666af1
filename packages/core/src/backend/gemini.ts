import { z } from 'zod';
import { postJson, parseArguments } from './http.js';
import { DEFAULT_MAX_TOOL_ROUNDS, type HttpToolformerOptions } from './openai.js';
import {
  type Conversation,
  type ConversationSpec,
  SequentialConversation,
  type Toolformer,
} from './types.js';

const GEMINI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta';

type GeminiPart =
  | { text: string }
  | { functionCall: { name: string; args: Record<string, unknown> } }
  | { functionResponse: { name: string; response: { content: string } } };

interface GeminiContent {
  role: 'user' | 'model';
  parts: GeminiPart[];
}

const generateSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z.object({
          parts: z
            .array(
              z.object({
                text: z.string().optional(),
                functionCall: z.object({ name: z.string(), args: z.unknown() }).optional(),
              }),
            )
            .default([]),
        }),
      }),
    )
    .min(1),
});

class GeminiConversation extends SequentialConversation {
  private readonly history: GeminiContent[] = [];

  constructor(
    spec: ConversationSpec,
    private readonly options: HttpToolformerOptions,
  ) {
    super(spec, options.logger);
  }

  protected async exchange(message: string, signal: AbortSignal): Promise<string> {
    const maxToolRounds = this.options.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS;
    const pending: GeminiContent[] = [{ role: 'user', parts: [{ text: message }] }];

    for (let round = 0; ; round++) {
      const data = await postJson(
        'Gemini',
        `${this.options.baseUrl ?? GEMINI_BASE_URL}/models/${this.options.model}:generateContent`,
        { 'x-goog-api-key': this.options.apiKey },
        this.requestBody(pending),
        signal,
      );
      const parsed = generateSchema.safeParse(data);
      if (!parsed.success) {
        throw new Error('Gemini reply did not contain a candidate');
      }
      const parts = parsed.data.candidates[0].content.parts;
      const text = parts.map((part) => part.text ?? '').join('');
      const calls = parts.flatMap((part) => (part.functionCall ? [part.functionCall] : []));

      if (calls.length === 0 || round >= maxToolRounds) {
        if (calls.length > 0) {
          this.logger.warn(`Ignoring function calls after ${maxToolRounds} tool round(s)`);
        }
        pending.push({ role: 'model', parts: [{ text }] });
        this.history.push(...pending);
        return text;
      }

      const modelParts: GeminiPart[] = [];
      if (text !== '') {
        modelParts.push({ text });
      }
      const responses: GeminiPart[] = [];
      for (const call of calls) {
        const args = parseArguments(call.args);
        modelParts.push({ functionCall: { name: call.name, args } });
        const content = await this.runTool(call.name, args);
        responses.push({ functionResponse: { name: call.name, response: { content } } });
      }
      pending.push({ role: 'model', parts: modelParts }, { role: 'user', parts: responses });
    }
  }

  private requestBody(pending: GeminiContent[]): Record<string, unknown> {
    const body: Record<string, unknown> = {
      systemInstruction: { parts: [{ text: this.spec.prompt }] },
      contents: [...this.history, ...pending],
    };
    if (this.options.temperature !== undefined) {
      body['generationConfig'] = { temperature: this.options.temperature };
    }
    if (this.spec.tools.length > 0) {
      body['tools'] = [
        { functionDeclarations: this.spec.tools.map((tool) => tool.asFunctionDeclaration()) },
      ];
    }
    return body;
  }
}

/** Gemini generateContent backend. Tools use flat function declarations. */
export class GeminiToolformer implements Toolformer {
  readonly name: string;

  constructor(private readonly options: HttpToolformerOptions) {
    this.name = `gemini_${options.model}`;
  }

  newConversation(spec: ConversationSpec): Conversation {
    return new GeminiConversation(spec, this.options);
  }
}
