import { createHash } from 'node:crypto';

/**
 * JSON with object keys sorted by code point, so equal payloads serialize
 * identically whatever order their keys were built in. Keys holding
 * `undefined` are dropped, as `JSON.stringify` would.
 */
export function canonicalJson(value: unknown): string {
  if (value === undefined) {
    return 'null';
  }
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value);
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalJson(item)).join(',')}]`;
  }

  const entries = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  const serialized = entries.map(([key, val]) => `${JSON.stringify(key)}:${canonicalJson(val)}`).join(',');
  return `{${serialized}}`;
}

export function checksumFrom(value: unknown, algorithm: string = 'sha256'): string {
  return createHash(algorithm).update(canonicalJson(value)).digest('hex');
}
