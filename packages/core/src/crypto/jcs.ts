import canonicalizeModule from 'canonicalize';
import { utf8ToBytes } from '../utils/bytes.js';

const canonicalize = canonicalizeModule as unknown as (input: unknown) => string | undefined;

/**
 * Replaces bigint values with their decimal string form so amounts survive
 * JSON canonicalization. Plain objects and arrays are copied; everything else
 * is returned as is.
 */
export function toJsonSafe(input: unknown): unknown {
  if (typeof input === 'bigint') {
    return input.toString();
  }
  if (Array.isArray(input)) {
    return input.map((item) => toJsonSafe(item));
  }
  if (input !== null && typeof input === 'object' && !(input instanceof Uint8Array)) {
    const out: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (value !== undefined) {
        out[key] = toJsonSafe(value);
      }
    }
    return out;
  }
  return input;
}

export function canonicalizeJson(input: unknown): string {
  const out = canonicalize(toJsonSafe(input));
  if (out === undefined) {
    throw new Error('Unable to canonicalize input');
  }
  return out;
}

export function canonicalizeBytes(input: unknown): Uint8Array {
  return utf8ToBytes(canonicalizeJson(input));
}
