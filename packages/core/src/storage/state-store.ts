import { bytesToUtf8, utf8ToBytes } from '../utils/bytes.js';
import { toJsonSafe } from '../crypto/jcs.js';
import type { KVStore } from './kv.js';

const PREFIX_STATE = 'st:';

/** A module's persisted state and the hash of the last event folded into it. */
export interface ModuleStateRecord<T = unknown> {
  at: string | null;
  state: T;
}

export class StateStore {
  constructor(private readonly store: KVStore) {}

  async getModuleState(module: string): Promise<ModuleStateRecord | null> {
    const value = await this.store.get(`${PREFIX_STATE}${module}`);
    if (!value) {
      return null;
    }
    const parsed: unknown = JSON.parse(bytesToUtf8(value));
    if (!parsed || typeof parsed !== 'object' || !('state' in parsed)) {
      throw new Error(`corrupt state record for module ${module}`);
    }
    const at = 'at' in parsed && typeof parsed.at === 'string' ? parsed.at : null;
    return { at, state: parsed.state };
  }

  async setModuleState(module: string, state: unknown, at: string | null): Promise<void> {
    const record: ModuleStateRecord = { at, state: toJsonSafe(state) };
    await this.store.put(`${PREFIX_STATE}${module}`, utf8ToBytes(JSON.stringify(record)));
  }

  async deleteModuleState(module: string): Promise<void> {
    await this.store.del(`${PREFIX_STATE}${module}`);
  }

  async listModules(): Promise<string[]> {
    const modules: string[] = [];
    for await (const { key } of this.store.iterator(PREFIX_STATE)) {
      modules.push(key.slice(PREFIX_STATE.length));
    }
    return modules;
  }
}
