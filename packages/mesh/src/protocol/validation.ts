import type { ServiceDescriptor } from './types.js';

export type PayloadValidation = { valid: true } | { valid: false; error: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function typeName(value: unknown): string {
  if (Array.isArray(value)) {
    return 'array';
  }
  return value === null ? 'null' : typeof value;
}

function matchesType(expected: string, value: unknown): boolean {
  switch (expected) {
    case 'integer': {
      return Number.isInteger(value);
    }
    case 'object': {
      return isRecord(value);
    }
    default: {
      return typeName(value) === expected;
    }
  }
}

/**
 * Checks a request payload against the descriptor's schema: the payload is an object, required
 * fields are present, and fields with a declared top-level `type` match it. Nested schemas are
 * not descended into.
 */
export function validatePayload(descriptor: ServiceDescriptor, payload: unknown): PayloadValidation {
  if (!isRecord(payload)) {
    return { valid: false, error: 'Payload must be an object' };
  }
  const schema = descriptor.payloadSchema;
  if (!schema) {
    return { valid: true };
  }

  const properties = isRecord(schema['properties']) ? schema['properties'] : {};
  const required = Array.isArray(schema['required'])
    ? schema['required'].filter((key): key is string => typeof key === 'string')
    : [];

  for (const key of required) {
    if (!(key in payload)) {
      return { valid: false, error: `Missing required field: ${key}` };
    }
  }
  for (const [key, value] of Object.entries(payload)) {
    const property = properties[key];
    if (!isRecord(property)) {
      continue;
    }
    const expected = property['type'];
    if (typeof expected === 'string' && !matchesType(expected, value)) {
      return {
        valid: false,
        error: `Field ${key} expected type ${expected} but got ${typeName(value)}`,
      };
    }
  }
  return { valid: true };
}
