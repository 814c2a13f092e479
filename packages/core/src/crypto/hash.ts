import { sha256 } from '@noble/hashes/sha256';
import { bytesToHex, utf8ToBytes } from '../utils/bytes.js';

export function sha256Bytes(data: Uint8Array): Uint8Array {
  return sha256(data);
}

export function sha256Hex(data: Uint8Array): string {
  return bytesToHex(sha256Bytes(data));
}

export function sha256Utf8Hex(text: string): string {
  return sha256Hex(utf8ToBytes(text));
}
