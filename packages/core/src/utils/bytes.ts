const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

const HEX_PATTERN = /^[0-9a-f]*$/i;

export function utf8ToBytes(input: string): Uint8Array {
  return textEncoder.encode(input);
}

export function bytesToUtf8(bytes: Uint8Array): string {
  return textDecoder.decode(bytes);
}

/**
 * Accepts an optional `0x` prefix and returns lower-case hex without it.
 * Throws when the remainder is not an even-length hex string.
 */
export function normalizeHex(input: string): string {
  const hex = input.startsWith('0x') || input.startsWith('0X') ? input.slice(2) : input;
  if (hex.length % 2 !== 0) {
    throw new Error('hex length must be even');
  }
  if (!HEX_PATTERN.test(hex)) {
    throw new Error('hex contains non-hex characters');
  }
  return hex.toLowerCase();
}

export function hexToBytes(hex: string): Uint8Array {
  const normalized = normalizeHex(hex);
  const bytes = new Uint8Array(normalized.length / 2);
  for (let i = 0; i < bytes.length; i++) {
    bytes[i] = Number.parseInt(normalized.slice(i * 2, i * 2 + 2), 16);
  }
  return bytes;
}

export function bytesToHex(bytes: Uint8Array): string {
  return Array.from(bytes)
    .map((b) => b.toString(16).padStart(2, '0'))
    .join('');
}

export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) {
    return false;
  }
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return false;
    }
  }
  return true;
}
