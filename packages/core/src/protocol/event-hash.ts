import { canonicalizeBytes } from '../crypto/jcs.js';
import { sha256Bytes, sha256Hex } from '../crypto/hash.js';

export type EventEnvelope = Record<string, unknown>;

export function stripHash(envelope: EventEnvelope): EventEnvelope {
  const { hash: _hash, ...rest } = envelope;
  return rest;
}

export function canonicalEventBytes(envelope: EventEnvelope): Uint8Array {
  return canonicalizeBytes(stripHash(envelope));
}

export function eventHashBytes(envelope: EventEnvelope): Uint8Array {
  return sha256Bytes(canonicalEventBytes(envelope));
}

export function eventHashHex(envelope: EventEnvelope): string {
  return sha256Hex(canonicalEventBytes(envelope));
}

/**
 * Recomputes the hash of an envelope and compares it with the `hash` field it
 * carries.
 */
export function verifyEventHash(envelope: EventEnvelope): boolean {
  const hash = envelope.hash;
  return typeof hash === 'string' && hash.length > 0 && hash === eventHashHex(envelope);
}
