import { BackendRequestError } from '../errors.js';

function clipText(text: string, maxLength = 240): string {
  if (text.length <= maxLength) {
    return text;
  }
  return `${text.slice(0, maxLength)}...`;
}

function messageFromBody(raw: string): string | undefined {
  const trimmed = raw.trim();
  if (trimmed === '') {
    return undefined;
  }
  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return clipText(trimmed.replace(/\s+/g, ' '));
  }
  if (json !== null && typeof json === 'object' && 'error' in json) {
    const block = json.error;
    if (typeof block === 'string') {
      return clipText(block);
    }
    if (block !== null && typeof block === 'object' && 'message' in block) {
      if (typeof block.message === 'string') {
        return clipText(block.message);
      }
    }
  }
  return clipText(trimmed.replace(/\s+/g, ' '));
}

/** POSTs a JSON body and returns the parsed JSON reply, or throws BackendRequestError. */
export async function postJson(
  provider: string,
  url: string,
  headers: Record<string, string>,
  body: unknown,
  signal: AbortSignal,
): Promise<unknown> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...headers },
    body: JSON.stringify(body),
    signal,
  });

  if (!response.ok) {
    throw new BackendRequestError(provider, response.status, messageFromBody(await response.text()));
  }
  const data: unknown = await response.json();
  return data;
}

/** Tool-call arguments arrive as a JSON string or an object depending on the backend. */
export function parseArguments(args: unknown): Record<string, unknown> {
  if (args !== null && typeof args === 'object' && !Array.isArray(args)) {
    return Object.fromEntries(Object.entries(args));
  }
  if (typeof args === 'string' && args.trim() !== '') {
    try {
      const parsed: unknown = JSON.parse(args);
      if (parsed !== null && typeof parsed === 'object' && !Array.isArray(parsed)) {
        return Object.fromEntries(Object.entries(parsed));
      }
    } catch {
      return { _raw: args };
    }
    return { _raw: args };
  }
  return {};
}
