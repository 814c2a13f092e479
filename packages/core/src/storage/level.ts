import { Level } from 'level';
import type { KVEntry, KVStore } from './kv.js';

export interface LevelStoreOptions {
  path: string;
}

function toUint8Array(value: Uint8Array): Uint8Array {
  if (Buffer.isBuffer(value)) {
    return new Uint8Array(value.buffer, value.byteOffset, value.byteLength);
  }
  return value;
}

export class LevelStore implements KVStore {
  private readonly db: Level<string, Uint8Array>;

  constructor(options: LevelStoreOptions) {
    this.db = new Level<string, Uint8Array>(options.path, { valueEncoding: 'view' });
  }

  async open(): Promise<void> {
    await this.db.open();
  }

  async get(key: string): Promise<Uint8Array | undefined> {
    try {
      const value = await this.db.get(key);
      if (value === undefined || value === null) {
        return undefined;
      }
      return toUint8Array(value);
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'LEVEL_NOT_FOUND') {
        return undefined;
      }
      throw error;
    }
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    await this.db.put(key, value);
  }

  async del(key: string): Promise<void> {
    await this.db.del(key);
  }

  async *iterator(prefix = ''): AsyncIterable<KVEntry> {
    const range = prefix.length > 0 ? { gte: prefix, lt: `${prefix}\xff` } : {};
    for await (const [key, value] of this.db.iterator(range)) {
      if (value === undefined || value === null) {
        continue;
      }
      yield { key, value: toUint8Array(value) };
    }
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
