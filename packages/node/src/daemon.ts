#!/usr/bin/env node

import { pathToFileURL } from 'node:url';
import { loadConfig, resolveStoragePaths } from '@conclave/core';
import { GovernanceNode } from './index.js';
import { createLogger, isLogLevel } from './logger.js';
import type { Logger } from './logger.js';

export interface DaemonArgs {
  dataDir?: string;
  noApi: boolean;
  apiHost?: string;
  apiPort?: number;
  memory: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): DaemonArgs {
  const args: DaemonArgs = { noApi: false, memory: false, help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === '--data-dir') {
      args.dataDir = requireValue(argv, ++i, arg);
      continue;
    }
    if (arg === '--no-api') {
      args.noApi = true;
      continue;
    }
    if (arg === '--api-host') {
      args.apiHost = requireValue(argv, ++i, arg);
      continue;
    }
    if (arg === '--api-port') {
      const port = Number.parseInt(requireValue(argv, ++i, arg), 10);
      if (!Number.isInteger(port) || port < 0 || port > 65_535) {
        throw new Error('invalid --api-port');
      }
      args.apiPort = port;
      continue;
    }
    if (arg === '--memory') {
      args.memory = true;
      continue;
    }
    if (arg === '--help' || arg === '-h') {
      args.help = true;
      continue;
    }
    throw new Error(`unknown option: ${arg}`);
  }
  return args;
}

function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (value === undefined || value.startsWith('--')) {
    throw new Error(`${flag} requires a value`);
  }
  return value;
}

export async function startDaemon(
  argv: string[],
  options: { attachSignals?: boolean } = {},
): Promise<{
  node: GovernanceNode;
  logger: Logger;
  stop: () => Promise<void>;
}> {
  const args = parseArgs(argv);
  const paths = resolveStoragePaths(args.dataDir);
  const config = await loadConfig(paths);
  const level = config.logging?.level;
  const logger = createLogger({
    level: level && isLogLevel(level) ? level : 'info',
    file: config.logging?.file,
    scope: 'conclaved',
  });

  const node = new GovernanceNode({
    dataDir: paths.root,
    storage: args.memory ? 'memory' : undefined,
    logger,
    api: {
      enabled: !args.noApi,
      host: args.apiHost ?? config.api?.host,
      port: args.apiPort ?? config.api?.port,
    },
  });

  if (options.attachSignals !== false) {
    process.on('SIGINT', () => shutdown(node, 'SIGINT', logger));
    process.on('SIGTERM', () => shutdown(node, 'SIGTERM', logger));
  }

  await node.start();
  const engine = node.getEngine();
  const api = node.getApiAddress();
  logger.info(`data dir: ${paths.root}`);
  logger.info(`storage: ${args.memory ? 'memory' : config.storage?.backend ?? 'level'}`);
  logger.info(`weighting: ${engine.config.weighting}, quorum: ${engine.config.quorum}`);
  logger.info(api ? `api: http://${api.host}:${api.port}` : 'api: disabled');

  return { node, logger, stop: () => node.stop() };
}

function shutdown(node: GovernanceNode, signal: string, logger: Logger): void {
  logger.info(`received ${signal}, stopping...`);
  node.stop().then(
    () => process.exit(0),
    (error: unknown) => {
      logger.error('shutdown failed:', error);
      process.exit(1);
    },
  );
}

function printHelp(): void {
  console.log(`
conclaved [options]

Options:
  --data-dir <path>   Override storage root (default: $CONCLAVE_HOME or ~/.conclave)
  --no-api            Disable the HTTP API
  --api-host <host>   API host (default: 127.0.0.1)
  --api-port <port>   API port (default: 9630)
  --memory            Keep events and state in memory
  -h, --help          Show help
`);
}

async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  if (parseArgs(argv).help) {
    printHelp();
    return;
  }
  await startDaemon(argv, { attachSignals: true });
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(entry).href) {
  main().catch((error: unknown) => {
    console.error('[conclaved] fatal error:', error);
    process.exit(1);
  });
}
