import { describe, expect, it } from 'vitest';
import {
  bytesToHex,
  canonicalizeJson,
  eventHashHex,
  hexToBytes,
  normalizeHex,
  sha256Hex,
  sha256Utf8Hex,
  toJsonSafe,
  utf8ToBytes,
  verifyEventHash,
} from '../src/index.js';

describe('hashing', () => {
  it('sha256 matches known digests', () => {
    expect(sha256Hex(new Uint8Array())).toBe(
      'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855',
    );
    expect(sha256Utf8Hex('abc')).toBe(
      'ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad',
    );
  });
});

describe('canonical json', () => {
  it('sorts keys and stringifies bigint amounts', () => {
    expect(canonicalizeJson({ b: 1, a: [2n, 'x'] })).toBe('{"a":["2","x"],"b":1}');
  });

  it('drops undefined fields before canonicalizing', () => {
    expect(toJsonSafe({ a: undefined, b: { c: 3n } })).toEqual({ b: { c: '3' } });
    expect(canonicalizeJson({ a: undefined, z: null })).toBe('{"z":null}');
  });
});

describe('hex helpers', () => {
  it('round-trips bytes and accepts a 0x prefix', () => {
    expect(bytesToHex(hexToBytes('0x0aFF'))).toBe('0aff');
    expect(normalizeHex('')).toBe('');
    expect(bytesToHex(utf8ToBytes('hi'))).toBe('6869');
  });

  it('rejects odd-length or non-hex input', () => {
    expect(() => normalizeHex('abc')).toThrow('hex length must be even');
    expect(() => normalizeHex('zz')).toThrow('hex contains non-hex characters');
  });
});

describe('event hash', () => {
  it('ignores the hash field and detects tampering', () => {
    const envelope: Record<string, unknown> = { v: 1, type: 'test.event', payload: { n: 1 } };
    const hash = eventHashHex(envelope);
    envelope.hash = hash;
    expect(eventHashHex(envelope)).toBe(hash);
    expect(verifyEventHash(envelope)).toBe(true);

    const tampered = { ...envelope, payload: { n: 2 } };
    expect(verifyEventHash(tampered)).toBe(false);
  });
});
