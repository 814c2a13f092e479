import { canonicalizeBytes } from '../crypto/jcs.js';
import { eventHashHex } from '../protocol/event-hash.js';
import type { EventEnvelope } from '../protocol/event-hash.js';
import { bytesEqual, bytesToUtf8, utf8ToBytes } from '../utils/bytes.js';
import type { KVStore } from './kv.js';

const PREFIX_EVENT = 'ev:';
const PREFIX_LOG_SEQ = 'log:seq:';
const PREFIX_LOG_HASH = 'log:hash:';
const KEY_LOG_SEQ = 'meta:logseq';

function encodeSeq(seq: number): string {
  return seq.toString(16).padStart(16, '0');
}

function decodeSeq(value: string): number {
  return Number.parseInt(value, 16);
}

function parseEventEnvelope(bytes: Uint8Array): EventEnvelope | null {
  try {
    const parsed: unknown = JSON.parse(bytesToUtf8(bytes));
    if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
      return null;
    }
    return { ...parsed };
  } catch {
    return null;
  }
}

function validateEventBytes(hash: string, eventBytes: Uint8Array): EventEnvelope {
  const envelope = parseEventEnvelope(eventBytes);
  if (!envelope) {
    throw new Error('Invalid event bytes (not JSON)');
  }
  const envelopeHash = envelope.hash;
  if (typeof envelopeHash !== 'string' || envelopeHash.length === 0) {
    throw new Error('Event envelope missing hash');
  }
  if (eventHashHex(envelope) !== envelopeHash || envelopeHash !== hash) {
    throw new Error('Event hash mismatch');
  }
  if (!bytesEqual(canonicalizeBytes(envelope), eventBytes)) {
    throw new Error('Event bytes are not canonical JCS');
  }
  return envelope;
}

/**
 * Append-only event log over a KVStore. Events are content-addressed by hash
 * and ordered by a monotonically increasing sequence number.
 */
export class EventStore {
  constructor(private readonly store: KVStore) {}

  /**
   * Appends a hashed envelope. Returns false when the hash is already in the
   * log.
   */
  async appendEnvelope(envelope: EventEnvelope): Promise<boolean> {
    const hash = envelope.hash;
    if (typeof hash !== 'string') {
      throw new Error('Event envelope missing hash');
    }
    return this.appendEvent(hash, canonicalizeBytes(envelope));
  }

  async appendEvent(hash: string, eventBytes: Uint8Array): Promise<boolean> {
    validateEventBytes(hash, eventBytes);
    if (await this.store.get(`${PREFIX_LOG_HASH}${hash}`)) {
      return false;
    }
    const key = `${PREFIX_EVENT}${hash}`;
    const existing = await this.store.get(key);
    if (existing && !bytesEqual(existing, eventBytes)) {
      throw new Error('Event immutability violation');
    }
    if (!existing) {
      await this.store.put(key, eventBytes);
    }
    const seq = await this.nextLogSeq();
    await this.store.put(`${PREFIX_LOG_SEQ}${encodeSeq(seq)}`, utf8ToBytes(hash));
    await this.store.put(`${PREFIX_LOG_HASH}${hash}`, utf8ToBytes(encodeSeq(seq)));
    await this.store.put(KEY_LOG_SEQ, utf8ToBytes(String(seq + 1)));
    return true;
  }

  async getEvent(hash: string): Promise<Uint8Array | undefined> {
    return this.store.get(`${PREFIX_EVENT}${hash}`);
  }

  async getEnvelope(hash: string): Promise<EventEnvelope | null> {
    const bytes = await this.getEvent(hash);
    return bytes ? parseEventEnvelope(bytes) : null;
  }

  async hasEvent(hash: string): Promise<boolean> {
    return (await this.getEvent(hash)) !== undefined;
  }

  /**
   * Reads up to `limit` events after the `from` cursor (an event hash). An
   * unknown or empty cursor starts at the beginning of the log.
   */
  async getEventLogRange(
    from: string | null,
    limit: number,
  ): Promise<{ events: Uint8Array[]; cursor: string }> {
    if (limit <= 0) {
      return { events: [], cursor: '' };
    }

    let startSeq = 0;
    if (from) {
      const seq = await this.getEventSeq(from);
      if (seq !== null) {
        startSeq = seq + 1;
      }
    }

    const events: Uint8Array[] = [];
    let cursor = '';
    for await (const { key, value } of this.store.iterator(PREFIX_LOG_SEQ)) {
      if (decodeSeq(key.slice(PREFIX_LOG_SEQ.length)) < startSeq) {
        continue;
      }
      const hash = bytesToUtf8(value);
      const eventBytes = await this.getEvent(hash);
      if (!eventBytes) {
        continue;
      }
      events.push(eventBytes);
      cursor = hash;
      if (events.length >= limit) {
        break;
      }
    }
    return { events, cursor };
  }

  async getLatestEventHash(): Promise<string | null> {
    const nextSeq = await this.nextLogSeq();
    if (nextSeq <= 0) {
      return null;
    }
    const value = await this.store.get(`${PREFIX_LOG_SEQ}${encodeSeq(nextSeq - 1)}`);
    return value ? bytesToUtf8(value) : null;
  }

  async getLogLength(): Promise<number> {
    return this.nextLogSeq();
  }

  async getEventSeq(hash: string): Promise<number | null> {
    const seqBytes = await this.store.get(`${PREFIX_LOG_HASH}${hash}`);
    if (!seqBytes) {
      return null;
    }
    return decodeSeq(bytesToUtf8(seqBytes));
  }

  async verifyEventLog(): Promise<{ ok: boolean; errors: string[] }> {
    const errors: string[] = [];
    for await (const { value } of this.store.iterator(PREFIX_LOG_SEQ)) {
      const hash = bytesToUtf8(value);
      const eventBytes = await this.getEvent(hash);
      if (!eventBytes) {
        errors.push(`missing event bytes for ${hash}`);
        continue;
      }
      try {
        validateEventBytes(hash, eventBytes);
      } catch (error) {
        errors.push(`${hash}: ${error instanceof Error ? error.message : String(error)}`);
      }
    }
    return { ok: errors.length === 0, errors };
  }

  private async nextLogSeq(): Promise<number> {
    const value = await this.store.get(KEY_LOG_SEQ);
    return value ? Number.parseInt(bytesToUtf8(value), 10) : 0;
  }
}
