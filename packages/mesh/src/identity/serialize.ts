function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => sortKeys(item));
  }

  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, child]) => [key, sortKeys(child)]),
    );
  }

  return value;
}

/** UTF-8 JSON with object keys sorted at every depth; the bytes that get signed. */
export function canonicalize(object: unknown): Uint8Array {
  const json = JSON.stringify(sortKeys(object));
  return new TextEncoder().encode(json);
}
