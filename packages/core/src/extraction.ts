import { Protocol, type ProtocolMetadata } from './protocol.js';

export const FINAL_PROTOCOL_TAG = 'FINALPROTOCOL';
export const IMPLEMENTATION_TAG = 'IMPLEMENTATION';

export const DEFAULT_PROTOCOL_NAME = 'Unnamed protocol';

export type ExtractionFailure = 'missing-open-tag' | 'missing-close-tag';

export type TagExtraction = { found: true; body: string } | { found: false; reason: ExtractionFailure };

export type ProtocolExtraction =
  | { found: true; protocol: Protocol }
  | { found: false; reason: ExtractionFailure };

const HEADER_DELIMITER = '---';
const FENCE_LINE_RE = /^\s*```[\w.+-]*\s*$/;

/** Body between the first `<TAG>` and the first `</TAG>` after it, trimmed. */
export function extractTagged(text: string, tag: string): TagExtraction {
  const open = `<${tag}>`;
  const close = `</${tag}>`;

  const start = text.indexOf(open);
  if (start === -1) {
    return { found: false, reason: 'missing-open-tag' };
  }
  const bodyStart = start + open.length;
  const end = text.indexOf(close, bodyStart);
  if (end === -1) {
    return { found: false, reason: 'missing-close-tag' };
  }
  return { found: true, body: text.slice(bodyStart, end).trim() };
}

function parseHeader(body: string): Map<string, string> | undefined {
  const lines = body.trim().split(/\r?\n/);
  if (lines[0]?.trim() !== HEADER_DELIMITER) {
    return undefined;
  }
  const closing = lines.findIndex((line, index) => index > 0 && line.trim() === HEADER_DELIMITER);
  if (closing === -1) {
    return undefined;
  }

  const fields = new Map<string, string>();
  for (const line of lines.slice(1, closing)) {
    const colon = line.indexOf(':');
    if (colon === -1) {
      continue;
    }
    const key = line.slice(0, colon).trim().toLowerCase();
    if (key !== '') {
      fields.set(key, line.slice(colon + 1).trim());
    }
  }
  return fields;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Reads the metadata of a protocol body. The `---` header comes first; a body without one may
 * carry `<NAME>` and `<DESCRIPTION>` tags instead.
 */
export function parseProtocolMetadata(body: string): ProtocolMetadata {
  const header = parseHeader(body);

  if (header === undefined) {
    const name = extractTagged(body, 'NAME');
    const description = extractTagged(body, 'DESCRIPTION');
    return {
      name: (name.found ? nonEmpty(name.body) : undefined) ?? DEFAULT_PROTOCOL_NAME,
      description: description.found ? description.body : '',
      multiround: false,
      extra: {},
    };
  }

  const extra: Record<string, string> = {};
  for (const [key, value] of header) {
    if (key !== 'name' && key !== 'description' && key !== 'multiround') {
      extra[key] = value;
    }
  }
  return {
    name: nonEmpty(header.get('name')) ?? DEFAULT_PROTOCOL_NAME,
    description: header.get('description') ?? '',
    multiround: header.get('multiround')?.toLowerCase() === 'true',
    extra,
  };
}

export function extractProtocol(text: string): ProtocolExtraction {
  const block = extractTagged(text, FINAL_PROTOCOL_TAG);
  if (!block.found) {
    return block;
  }
  return { found: true, protocol: new Protocol(block.body, parseProtocolMetadata(block.body)) };
}

export function extractImplementation(text: string): TagExtraction {
  return extractTagged(text, IMPLEMENTATION_TAG);
}

/** Drops Markdown code fence lines (with or without a language marker) left around code. */
export function stripCodeFences(code: string): string {
  let stripped = code
    .split(/\r?\n/)
    .filter((line) => !FENCE_LINE_RE.test(line))
    .join('\n')
    .trim();
  stripped = stripped.replace(/^```[\w.+-]*/, '').replace(/```$/, '');
  return stripped.trim();
}
