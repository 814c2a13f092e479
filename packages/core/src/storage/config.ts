import { readFile, writeFile } from 'node:fs/promises';
import { parse, stringify } from 'yaml';
import { ensureStorageDirs } from './paths.js';
import type { StoragePaths } from './paths.js';

export type LogLevelName = 'debug' | 'info' | 'warn' | 'error';

export interface NodeConfig {
  v: 1;
  logging?: {
    level?: LogLevelName;
    file?: string | null;
  };
  api?: {
    host?: string;
    port?: number;
  };
  storage?: {
    backend?: 'level' | 'memory';
  };
  /** Raw governance section; validated by the protocol package. */
  governance?: Record<string, unknown>;
  /** Voting power seeded at t=0, keyed by account. */
  voters?: Record<string, string | number>;
  /** Reputation scores keyed by account. */
  reputation?: Record<string, number>;
}

export const DEFAULT_CONFIG: NodeConfig = {
  v: 1,
  logging: {
    level: 'info',
  },
  api: {
    host: '127.0.0.1',
    port: 9630,
  },
  storage: {
    backend: 'level',
  },
  governance: {},
  voters: {},
  reputation: {},
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function section<T extends object>(value: unknown, field: string): Partial<T> {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(`config.${field} must be a mapping`);
  }
  return value as Partial<T>;
}

export function mergeConfig(base: NodeConfig, overrides: Record<string, unknown>): NodeConfig {
  return {
    ...base,
    v: 1,
    logging: { ...base.logging, ...section<NonNullable<NodeConfig['logging']>>(overrides.logging, 'logging') },
    api: { ...base.api, ...section<NonNullable<NodeConfig['api']>>(overrides.api, 'api') },
    storage: { ...base.storage, ...section<NonNullable<NodeConfig['storage']>>(overrides.storage, 'storage') },
    governance: { ...base.governance, ...section<Record<string, unknown>>(overrides.governance, 'governance') },
    voters: { ...base.voters, ...section<Record<string, string | number>>(overrides.voters, 'voters') },
    reputation: {
      ...base.reputation,
      ...section<Record<string, number>>(overrides.reputation, 'reputation'),
    },
  };
}

export async function loadConfig(
  paths: StoragePaths,
  defaults: NodeConfig = DEFAULT_CONFIG,
): Promise<NodeConfig> {
  await ensureStorageDirs(paths);
  try {
    const raw = await readFile(paths.configFile, 'utf8');
    const parsed: unknown = parse(raw) ?? {};
    if (!isRecord(parsed)) {
      throw new Error(`${paths.configFile} must contain a mapping`);
    }
    return mergeConfig(defaults, parsed);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return defaults;
    }
    throw error;
  }
}

export async function saveConfig(paths: StoragePaths, config: NodeConfig): Promise<void> {
  await ensureStorageDirs(paths);
  await writeFile(paths.configFile, stringify(config), 'utf8');
}

export async function ensureConfig(paths: StoragePaths, defaults?: NodeConfig): Promise<NodeConfig> {
  const config = await loadConfig(paths, defaults ?? DEFAULT_CONFIG);
  await saveConfig(paths, config);
  return config;
}
