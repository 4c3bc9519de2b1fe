import { createHash } from 'crypto';

const normalizeNewlines = (value: string) => value.replace(/\r\n/g, '\n').replace(/\r/g, '\n');

/**
 * JSON serialization with object keys sorted, so equivalent payloads hash alike.
 */
export function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(item => stableStringify(item)).join(',')}]`;
  }
  if (value && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    const body = entries.map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`).join(',');
    return `{${body}}`;
  }
  if (typeof value === 'string') {
    return JSON.stringify(normalizeNewlines(value));
  }
  return JSON.stringify(value) ?? 'null';
}

export function hashJson(value: unknown): string {
  return createHash('sha256').update(stableStringify(value)).digest('hex');
}

export function cacheKey(namespace: string, payload: unknown): string {
  return `${namespace}:${hashJson(payload)}`;
}
