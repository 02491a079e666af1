import { z } from 'zod';
import { InvalidSchemaError, errorMessage } from '../errors.js';
import {
  type DeclarationProperty,
  type JsonSchema,
  type OpenAiProperty,
  type Parameter,
  type StandardApiParameter,
  parameterFromStandardApi,
} from './parameters.js';

export type ToolArguments = Record<string, unknown>;
export type ToolFunction = (args: ToolArguments) => unknown;

/** Outcome of a tool call made on behalf of a reasoning backend. */
export type ToolResult = { ok: true; value: unknown } | { ok: false; error: string };

export interface OpenAiTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: {
      type: 'object';
      properties: Record<string, OpenAiProperty>;
      required: string[];
    };
  };
}

export interface FunctionDeclaration {
  name: string;
  description: string;
  parameters?: {
    type: 'OBJECT';
    properties: Record<string, DeclarationProperty>;
    required: string[];
  };
}

export interface FlatToolSchema {
  name: string;
  description: string;
  parameters: Record<string, OpenAiProperty>;
  required: string[];
  output_schema?: JsonSchema;
}

export interface StandardApiTool {
  name: string;
  description: string;
  parameters: StandardApiParameter[];
  output_schema?: JsonSchema;
}

export class Tool {
  readonly parameters: readonly Parameter[];

  constructor(
    readonly name: string,
    readonly description: string,
    parameters: readonly Parameter[],
    readonly fn: ToolFunction,
    readonly outputSchema?: JsonSchema,
  ) {
    if (name.trim() === '') {
      throw new InvalidSchemaError('Tool name must not be empty');
    }
    const seen = new Set<string>();
    for (const parameter of parameters) {
      if (seen.has(parameter.name)) {
        throw new InvalidSchemaError(`Tool ${name} declares parameter ${parameter.name} twice`);
      }
      seen.add(parameter.name);
    }
    this.parameters = Object.freeze([...parameters]);
  }

  private requiredNames(): string[] {
    return this.parameters.filter((p) => p.required).map((p) => p.name);
  }

  private openAiProperties(): Record<string, OpenAiProperty> {
    return Object.fromEntries(this.parameters.map((p) => [p.name, p.asOpenAiProperty()]));
  }

  asOpenAiTool(): OpenAiTool {
    return {
      type: 'function',
      function: {
        name: this.name,
        description: this.description,
        parameters: {
          type: 'object',
          properties: this.openAiProperties(),
          required: this.requiredNames(),
        },
      },
    };
  }

  asFunctionDeclaration(): FunctionDeclaration {
    if (this.parameters.length === 0) {
      return { name: this.name, description: this.description };
    }
    return {
      name: this.name,
      description: this.description,
      parameters: {
        type: 'OBJECT',
        properties: Object.fromEntries(
          this.parameters.map((p) => [p.name, p.asDeclarationProperty()]),
        ),
        required: this.requiredNames(),
      },
    };
  }

  asFlatSchema(): FlatToolSchema {
    const schema: FlatToolSchema = {
      name: this.name,
      description: this.description,
      parameters: this.openAiProperties(),
      required: this.requiredNames(),
    };
    if (this.outputSchema !== undefined) {
      schema.output_schema = this.outputSchema;
    }
    return schema;
  }

  asStandardApi(): StandardApiTool {
    const api: StandardApiTool = {
      name: this.name,
      description: this.description,
      parameters: this.parameters.map((p) => p.asStandardApi()),
    };
    if (this.outputSchema !== undefined) {
      api.output_schema = this.outputSchema;
    }
    return api;
  }

  asNaturalLanguage(): string {
    const lines = this.parameters.map((p) => p.asNaturalLanguage());
    return `Function ${this.name}: ${this.description}. Parameters:\n${this.describe(lines)}`;
  }

  asDocumented(): string {
    const lines = this.parameters.map((p) => p.asDocumented());
    return `Tool ${this.name}:\n\n${this.description}\nParameters:\n${this.describe(lines)}`;
  }

  private describe(lines: string[]): string {
    let text = lines.length === 0 ? 'No parameters.' : lines.map((line) => `\t${line}\n`).join('');
    if (this.outputSchema !== undefined) {
      text += `\nReturns an object with schema: ${JSON.stringify(this.outputSchema, null, 2)}`;
    }
    return text;
  }

  /** Calls the tool for program code; failures propagate. */
  async invoke(args: ToolArguments): Promise<unknown> {
    return await this.fn(args);
  }

  /** Calls the tool for a reasoning backend. Never throws: failures become an error result. */
  async callForBackend(args: ToolArguments): Promise<ToolResult> {
    try {
      const value = await this.fn(args);
      return { ok: true, value };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  }
}

/** Text handed back to a reasoning backend for a tool call. */
export function formatToolResult(result: ToolResult): string {
  if (!result.ok) {
    return `Tool call failed: ${result.error}`;
  }
  if (typeof result.value === 'string') {
    return result.value;
  }
  return JSON.stringify(result.value ?? null);
}

const standardTool = z.object({
  name: z.string().min(1),
  description: z.string(),
  parameters: z.array(z.unknown()).default([]),
  output_schema: z.record(z.unknown()).optional(),
});

export function toolFromStandardApi(info: unknown, fn: ToolFunction): Tool {
  const parsed = standardTool.safeParse(info);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidSchemaError(`Invalid tool: ${detail}`);
  }
  const { name, description, parameters, output_schema: outputSchema } = parsed.data;
  return new Tool(name, description, parameters.map(parameterFromStandardApi), fn, outputSchema);
}

/** Ordered tools with unique names. */
export class ToolSet {
  private readonly byName = new Map<string, Tool>();

  private constructor(tools: readonly Tool[]) {
    for (const tool of tools) {
      if (this.byName.has(tool.name)) {
        throw new InvalidSchemaError(`Duplicate tool name: ${tool.name}`);
      }
      this.byName.set(tool.name, tool);
    }
  }

  static of(tools: readonly Tool[]): ToolSet {
    return new ToolSet(tools);
  }

  get(name: string): Tool | undefined {
    return this.byName.get(name);
  }

  list(): Tool[] {
    return [...this.byName.values()];
  }

  get size(): number {
    return this.byName.size;
  }
}
