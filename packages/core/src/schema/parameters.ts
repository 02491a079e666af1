import { z } from 'zod';
import { InvalidSchemaError, UnsupportedParameterTypeError } from '../errors.js';

/** JSON-schema-like structure. Array item schemas are kept as-is, not modelled as parameters. */
export type JsonSchema = Record<string, unknown>;

export type ParameterKind = 'string' | 'enum' | 'number' | 'array';

/** Property in the nested function-call convention (`{ type: 'function', function: {...} }`). */
export interface OpenAiProperty {
  type: 'string' | 'number' | 'array';
  description: string;
  enum?: string[];
  items?: JsonSchema;
}

/** Property in the flat declarative convention (function declarations). */
export interface DeclarationProperty {
  type: 'STRING' | 'NUMBER' | 'ARRAY';
  description: string;
  enum?: string[];
  items?: JsonSchema;
}

interface StandardApiBase {
  name: string;
  description: string;
  required: boolean;
}

export type StandardApiParameter =
  | (StandardApiBase & { type: 'string' })
  | (StandardApiBase & { type: 'enum'; values: string[] })
  | (StandardApiBase & { type: 'number' })
  | (StandardApiBase & { type: 'array'; item_schema: JsonSchema });

export abstract class Parameter {
  abstract readonly kind: ParameterKind;

  constructor(
    readonly name: string,
    readonly description: string,
    readonly required: boolean,
  ) {
    if (name.trim() === '') {
      throw new InvalidSchemaError('Parameter name must not be empty');
    }
  }

  abstract asOpenAiProperty(): OpenAiProperty;
  abstract asDeclarationProperty(): DeclarationProperty;
  abstract asStandardApi(): StandardApiParameter;

  /** Sentence for documentation read by a person or a model. */
  asNaturalLanguage(): string {
    return this.sentence(this.kind);
  }

  /** Same sentence as asNaturalLanguage, with the adapter language's type names. */
  asDocumented(): string {
    return this.sentence(this.documentedType());
  }

  protected abstract documentedType(): string;

  protected details(): string {
    return '';
  }

  private sentence(typeName: string): string {
    const required = this.required ? ', required' : '';
    return `${this.name} (${typeName}${required}): ${this.description}.${this.details()}`;
  }
}

export class StringParameter extends Parameter {
  readonly kind = 'string';

  asOpenAiProperty(): OpenAiProperty {
    return { type: 'string', description: this.description };
  }

  asDeclarationProperty(): DeclarationProperty {
    return { type: 'STRING', description: this.description };
  }

  asStandardApi(): StandardApiParameter {
    return {
      type: 'string',
      name: this.name,
      description: this.description,
      required: this.required,
    };
  }

  protected documentedType(): string {
    return 'string';
  }
}

export class EnumParameter extends Parameter {
  readonly kind = 'enum';
  readonly values: readonly string[];

  constructor(name: string, description: string, values: readonly string[], required: boolean) {
    super(name, description, required);
    if (values.length === 0) {
      throw new InvalidSchemaError(`Enum parameter ${name} must list at least one value`);
    }
    this.values = Object.freeze([...values]);
  }

  asOpenAiProperty(): OpenAiProperty {
    return { type: 'string', description: this.description, enum: [...this.values] };
  }

  asDeclarationProperty(): DeclarationProperty {
    return { type: 'STRING', description: this.description, enum: [...this.values] };
  }

  asStandardApi(): StandardApiParameter {
    return {
      type: 'enum',
      name: this.name,
      description: this.description,
      values: [...this.values],
      required: this.required,
    };
  }

  protected documentedType(): string {
    return 'string';
  }

  protected override details(): string {
    return ` Possible values: ${this.values.join(', ')}`;
  }
}

export class NumberParameter extends Parameter {
  readonly kind = 'number';

  asOpenAiProperty(): OpenAiProperty {
    return { type: 'number', description: this.description };
  }

  asDeclarationProperty(): DeclarationProperty {
    return { type: 'NUMBER', description: this.description };
  }

  asStandardApi(): StandardApiParameter {
    return {
      type: 'number',
      name: this.name,
      description: this.description,
      required: this.required,
    };
  }

  protected documentedType(): string {
    return 'number';
  }
}

export class ArrayParameter extends Parameter {
  readonly kind = 'array';
  readonly itemSchema: Readonly<JsonSchema>;

  constructor(name: string, description: string, required: boolean, itemSchema: JsonSchema) {
    super(name, description, required);
    this.itemSchema = Object.freeze(structuredClone(itemSchema));
  }

  asOpenAiProperty(): OpenAiProperty {
    return { type: 'array', description: this.description, items: structuredClone(this.itemSchema) };
  }

  asDeclarationProperty(): DeclarationProperty {
    return { type: 'ARRAY', description: this.description, items: structuredClone(this.itemSchema) };
  }

  asStandardApi(): StandardApiParameter {
    return {
      type: 'array',
      name: this.name,
      description: this.description,
      required: this.required,
      item_schema: structuredClone(this.itemSchema),
    };
  }

  protected documentedType(): string {
    return 'Array<unknown>';
  }

  protected override details(): string {
    return ` Each item should follow the JSON schema: ${JSON.stringify(this.itemSchema)}`;
  }
}

const standardBase = z.object({
  type: z.string(),
  name: z.string().min(1),
  description: z.string(),
  required: z.boolean().default(false),
});

const standardEnumExtra = z.object({ values: z.array(z.string()).min(1) });
const standardArrayExtra = z.object({ item_schema: z.record(z.unknown()) });

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
}

/** Rebuilds a parameter from its standard-API form. */
export function parameterFromStandardApi(info: unknown): Parameter {
  const base = standardBase.safeParse(info);
  if (!base.success) {
    throw new InvalidSchemaError(`Invalid parameter: ${formatIssues(base.error)}`);
  }
  const { type, name, description, required } = base.data;

  switch (type) {
    case 'string': {
      return new StringParameter(name, description, required);
    }
    case 'number': {
      return new NumberParameter(name, description, required);
    }
    case 'enum': {
      const extra = standardEnumExtra.safeParse(info);
      if (!extra.success) {
        throw new InvalidSchemaError(`Invalid enum parameter ${name}: ${formatIssues(extra.error)}`);
      }
      return new EnumParameter(name, description, extra.data.values, required);
    }
    case 'array': {
      const extra = standardArrayExtra.safeParse(info);
      if (!extra.success) {
        throw new InvalidSchemaError(
          `Invalid array parameter ${name}: ${formatIssues(extra.error)}`,
        );
      }
      return new ArrayParameter(name, description, required, extra.data.item_schema);
    }
    default: {
      throw new UnsupportedParameterTypeError(type);
    }
  }
}

const jsonSchemaProperty = z.object({
  type: z.string().optional(),
  description: z.string().default(''),
  enum: z.array(z.string()).min(1).optional(),
  items: z.record(z.unknown()).optional(),
});

/** Builds a parameter from a JSON-schema property, as found in nested function-call tool definitions. */
export function parameterFromJsonSchema(
  name: string,
  schema: unknown,
  required: boolean,
): Parameter {
  const parsed = jsonSchemaProperty.safeParse(schema);
  if (!parsed.success) {
    throw new InvalidSchemaError(`Invalid schema for ${name}: ${formatIssues(parsed.error)}`);
  }
  const { type, description, enum: values, items } = parsed.data;

  if (values) {
    return new EnumParameter(name, description, values, required);
  }
  switch (type) {
    case 'string': {
      return new StringParameter(name, description, required);
    }
    case 'number':
    case 'integer': {
      return new NumberParameter(name, description, required);
    }
    case 'array': {
      return new ArrayParameter(name, description, required, items ?? {});
    }
    default: {
      throw new UnsupportedParameterTypeError(type);
    }
  }
}
