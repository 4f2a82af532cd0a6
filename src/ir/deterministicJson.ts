/**
 * JSON text with object keys sorted at every depth, two-space indented and
 * newline-terminated. Array order is kept: canonicalize arrays before calling.
 */
export function stableStringify(value: unknown, space: number = 2): string {
  return JSON.stringify(value, sortKeys, space) + '\n';
}

function byKey([a]: [string, unknown], [b]: [string, unknown]): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// JSON.stringify applies the replacer again to every value of the returned object
function sortKeys(_key: string, value: unknown): unknown {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return value;
  return Object.fromEntries(Object.entries(value).sort(byKey));
}
