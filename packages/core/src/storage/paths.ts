import { mkdir } from 'node:fs/promises';
import { homedir } from 'node:os';
import { resolve } from 'node:path';

export interface StoragePaths {
  root: string;
  data: string;
  logs: string;
  eventsDb: string;
  stateDb: string;
  configFile: string;
}

export function defaultStorageRoot(): string {
  return process.env.CONCLAVE_HOME ?? resolve(homedir(), '.conclave');
}

export function resolveStoragePaths(root: string = defaultStorageRoot()): StoragePaths {
  const data = resolve(root, 'data');
  return {
    root,
    data,
    logs: resolve(root, 'logs'),
    eventsDb: resolve(data, 'events.db'),
    stateDb: resolve(data, 'state.db'),
    configFile: resolve(root, 'config.yaml'),
  };
}

export async function ensureStorageDirs(paths: StoragePaths): Promise<void> {
  await mkdir(paths.root, { recursive: true });
  await mkdir(paths.data, { recursive: true });
  await mkdir(paths.logs, { recursive: true });
}
