import type { KVEntry, KVStore } from './kv.js';

/**
 * Map-backed store. Keys iterate in lexicographic order so prefix scans match
 * what a LevelStore returns for the same data.
 */
export class MemoryStore implements KVStore {
  private store = new Map<string, Uint8Array>();

  async get(key: string): Promise<Uint8Array | undefined> {
    const value = this.store.get(key);
    return value ? value.slice() : undefined;
  }

  async put(key: string, value: Uint8Array): Promise<void> {
    this.store.set(key, value.slice());
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  async *iterator(prefix = ''): AsyncIterable<KVEntry> {
    const keys = [...this.store.keys()]
      .filter((key) => !prefix || key.startsWith(prefix))
      .sort();
    for (const key of keys) {
      const value = this.store.get(key);
      if (value) {
        yield { key, value: value.slice() };
      }
    }
  }

  get size(): number {
    return this.store.size;
  }
}
