import type { Toolformer } from './backend/types.js';
import { ImplementationNotFoundError } from './errors.js';
import { extractImplementation, stripCodeFences } from './extraction.js';
import { type Logger, silentLogger } from './logger.js';
import { PROGRAMMER_PROMPT } from './prompts.js';
import { TaskSchema, type TaskSchemaData } from './schema/task-schema.js';
import { type CallOptions, runWithDeadline } from './timeout.js';

/** Name the backend is asked to implement. */
export const SOLICITED_ENTRY_POINT = 'send_query';
/** Name the adapter executor calls. */
export const CANONICAL_ENTRY_POINT = 'run';

export const DEFAULT_MAX_ATTEMPTS = 5;

export const MISSING_IMPLEMENTATION_NUDGE =
  'You have not provided an implementation yet. Please provide one by surrounding it in the tags <IMPLEMENTATION> and </IMPLEMENTATION>.';

export type EntryPointBinding = { ok: true; code: string } | { ok: false; problem: string };

// Column 0 only: nested and indented declarations are helpers' business.
const TOP_LEVEL_FUNCTION_RE = /^(?:export\s+)?(async\s+)?function\s*(\*?)\s*([A-Za-z_$][\w$]*)\s*\(/gm;
const TOP_LEVEL_BINDING_RE = /^(?:export\s+)?(?:const|let|var|class)\s+([A-Za-z_$][\w$]*)\b/gm;

/**
 * Renames the solicited entry point declaration to the canonical one and exports it. Works on
 * top-level declarations only; remaining call sites go through a forwarding function.
 */
export function bindEntryPoint(code: string): EntryPointBinding {
  const functions = [...code.matchAll(TOP_LEVEL_FUNCTION_RE)];
  const solicited = functions.filter((match) => match[3] === SOLICITED_ENTRY_POINT);

  if (solicited.length === 0) {
    return {
      ok: false,
      problem: `The implementation does not declare a top-level function ${SOLICITED_ENTRY_POINT}.`,
    };
  }
  if (solicited.length > 1) {
    return {
      ok: false,
      problem: `The implementation declares ${SOLICITED_ENTRY_POINT} more than once.`,
    };
  }
  const clashes =
    functions.some((match) => match[3] === CANONICAL_ENTRY_POINT) ||
    [...code.matchAll(TOP_LEVEL_BINDING_RE)].some((match) => match[1] === CANONICAL_ENTRY_POINT);
  if (clashes) {
    return {
      ok: false,
      problem: `The implementation must not declare its own top-level ${CANONICAL_ENTRY_POINT}.`,
    };
  }

  const [declaration] = solicited;
  const start = declaration.index ?? code.indexOf(declaration[0]);
  const replacement = `export ${declaration[1] ?? ''}function${declaration[2]} ${CANONICAL_ENTRY_POINT}(`;
  let bound = code.slice(0, start) + replacement + code.slice(start + declaration[0].length);

  // A hoisted declaration, so references that run before the end of the file still resolve.
  if (new RegExp(`\\b${SOLICITED_ENTRY_POINT}\\b`).test(bound)) {
    bound += `\n\nfunction ${SOLICITED_ENTRY_POINT}(...args) {\n  return ${CANONICAL_ENTRY_POINT}(...args);\n}`;
  }
  return { ok: true, code: bound };
}

export interface AdapterProgrammerOptions {
  maxAttempts?: number;
  /** Deadline for each backend turn when the caller passes none. */
  attemptTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Synthesises a JavaScript adapter for a protocol: `export async function run(task_data)` that
 * talks to the service through the ambient `send_to_server(query)`.
 */
export class AdapterProgrammer {
  readonly maxAttempts: number;
  private readonly logger: Logger;

  constructor(
    private readonly toolformer: Toolformer,
    private readonly options: AdapterProgrammerOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.logger = options.logger ?? silentLogger;
  }

  async synthesize(
    taskSchemaLike: TaskSchema | TaskSchemaData,
    protocolDocument: string,
    options: CallOptions = {},
  ): Promise<string> {
    const taskSchema = TaskSchema.from(taskSchemaLike);
    const conversation = this.toolformer.newConversation({
      prompt: PROGRAMMER_PROMPT,
      tools: [],
      category: 'programming',
    });
    const deadline = {
      signal: options.signal,
      timeoutMs: options.timeoutMs ?? this.options.attemptTimeoutMs,
    };

    let message = `JSON schema:\n\n${JSON.stringify(taskSchema.toJSON())}\n\nProtocol document:\n\n${protocolDocument}`;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      const outgoing = message;
      const reply = await runWithDeadline(
        `programming attempt ${attempt}`,
        (signal) => conversation.chat(outgoing, { signal }),
        deadline,
      );

      const block = extractImplementation(reply);
      if (!block.found) {
        this.logger.debug(`Attempt ${attempt}: no implementation block (${block.reason})`);
        message = MISSING_IMPLEMENTATION_NUDGE;
        continue;
      }

      const binding = bindEntryPoint(stripCodeFences(block.body));
      if (binding.ok) {
        this.logger.debug(`Attempt ${attempt}: adapter ready`);
        return binding.code;
      }
      this.logger.debug(`Attempt ${attempt}: ${binding.problem}`);
      message = `${binding.problem} Please send the corrected implementation between the tags <IMPLEMENTATION> and </IMPLEMENTATION>, with ${SOLICITED_ENTRY_POINT} declared exactly once as a top-level function.`;
    }

    throw new ImplementationNotFoundError(this.maxAttempts);
  }
}
