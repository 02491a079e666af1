import { z } from 'zod';
import { InvalidSchemaError } from '../errors.js';

export type TaskSchemaData = Record<string, unknown>;

const taskSchemaData = z.record(z.unknown());

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Input/output contract of the task a receiver performs. The data is copied and frozen on
 * construction, so a negotiation can never observe it changing.
 */
export class TaskSchema {
  readonly data: Readonly<TaskSchemaData>;

  constructor(data: unknown) {
    const parsed = taskSchemaData.safeParse(data);
    if (!parsed.success || Array.isArray(data)) {
      throw new InvalidSchemaError('Task schema must be a JSON object');
    }
    this.data = deepFreeze(structuredClone(parsed.data));
  }

  static from(like: TaskSchema | TaskSchemaData): TaskSchema {
    return like instanceof TaskSchema ? like : new TaskSchema(like);
  }

  get description(): string | undefined {
    const description = this.data['description'];
    return typeof description === 'string' ? description : undefined;
  }

  toJSON(): TaskSchemaData {
    return structuredClone(this.data);
  }

  toString(): string {
    return JSON.stringify(this.data, null, 2);
  }
}
