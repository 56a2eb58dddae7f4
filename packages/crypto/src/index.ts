import { sha256 as nobleSha256 } from '@noble/hashes/sha256';
import { randomBytes } from '@noble/hashes/utils';

export type { HashHex } from './types';

import type { HashHex } from './types';

/**
 * SHA-256 hash of arbitrary bytes, returned as a lowercase hex string.
 *
 * @example
 * ```typescript
 * const hash = sha256(new TextEncoder().encode('hello'));
 * console.log(hash); // '2cf24dba5fb0a30e...'
 * ```
 */
export function sha256(data: Uint8Array): HashHex {
  return toHex(nobleSha256(data));
}

/** SHA-256 hash of a UTF-8 string, returned as a lowercase hex string. */
export function sha256String(data: string): HashHex {
  return sha256(new TextEncoder().encode(data));
}

/**
 * SHA-256 hash of a value in canonical JSON form.
 *
 * Two structurally equal objects produce the same hash regardless of key
 * insertion order. `bigint` members hash by their decimal string.
 */
export function sha256Object(obj: unknown): HashHex {
  return sha256String(canonicalizeJson(obj));
}

/**
 * Deterministic JSON serialization with recursively sorted keys.
 *
 * `undefined` members are dropped, `bigint` values are rendered as decimal
 * strings and `Map` instances as objects keyed by their (string) keys.
 *
 * @example
 * ```typescript
 * canonicalizeJson({ z: 1, a: 2n }); // '{"a":"2","z":1}'
 * ```
 */
export function canonicalizeJson(obj: unknown): string {
  return JSON.stringify(sortKeys(obj));
}

function sortKeys(value: unknown): unknown {
  if (value === null || value === undefined) {
    return value;
  }
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (Array.isArray(value)) {
    return value.map(sortKeys);
  }
  if (value instanceof Map) {
    const asObject: Record<string, unknown> = {};
    for (const [k, v] of value) {
      asObject[String(k)] = v;
    }
    return sortKeys(asObject);
  }
  if (typeof value === 'object') {
    const source: Record<string, unknown> = { ...value };
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(source).sort()) {
      const v = source[key];
      if (v !== undefined) {
        sorted[key] = sortKeys(v);
      }
    }
    return sorted;
  }
  return value;
}

/** Encode bytes as a lowercase hex string. */
export function toHex(data: Uint8Array): string {
  let hex = '';
  for (const byte of data) {
    hex += byte.toString(16).padStart(2, '0');
  }
  return hex;
}

/**
 * Generate a random hex identifier.
 *
 * @param bytes - Number of random bytes (default 16, giving 32 hex chars).
 */
export function generateId(bytes: number = 16): string {
  return toHex(randomBytes(bytes));
}

/** Current time as an ISO 8601 string. */
export function timestamp(): string {
  return new Date().toISOString();
}
