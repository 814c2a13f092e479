import {
  bytesToUtf8,
  ensureConfig,
  ensureStorageDirs,
  EventStore,
  LevelStore,
  MemoryStore,
  resolveStoragePaths,
  StateStore,
} from '@conclave/core';
import type { KVStore, NodeConfig } from '@conclave/core';
import {
  CheckpointPowerSource,
  CheckpointReputationSource,
  GENESIS,
  GovernanceEngine,
  GovernanceError,
  GovernanceEventLog,
  ParameterTarget,
  parseGovernanceConfig,
  parseGovernanceEnvelope,
  TargetRegistryGateway,
} from '@conclave/protocol';
import type {
  Clock,
  GovernanceEvent,
  GovernanceEventEnvelope,
  ParameterValue,
} from '@conclave/protocol';
import { ApiServer } from './api/server.js';
import type { ApiServerConfig } from './api/server.js';
import { createLogger, isLogLevel } from './logger.js';
import type { Logger } from './logger.js';

export { ApiServer } from './api/server.js';
export type { ApiServerConfig } from './api/server.js';
export { createLogger } from './logger.js';
export type { Logger, LogLevel } from './logger.js';

export const DEFAULT_API_PORT = 9630;
export const PARAMS_TARGET = 'params';
const REPLAY_PAGE_SIZE = 200;

export interface NodeRuntimeConfig {
  dataDir?: string;
  api?: Partial<ApiServerConfig> & { enabled?: boolean };
  storage?: 'level' | 'memory';
  /** Used instead of `config.yaml` when given; nothing is written to disk. */
  config?: NodeConfig;
  clock?: Clock;
  logger?: Logger;
}

export const DEFAULT_NODE_RUNTIME_CONFIG: NodeRuntimeConfig = {
  api: { enabled: true },
};

function parseSeedPower(account: string, value: string | number): bigint {
  const text = typeof value === 'number' ? String(value) : value.trim();
  if (!/^\d+$/.test(text)) {
    throw new GovernanceError('InvalidConfig', `voters.${account} must be a non-negative integer`);
  }
  return BigInt(text);
}

function isParameterValue(value: unknown): value is ParameterValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    typeof value === 'number'
  );
}

function toParameters(state: unknown): Record<string, ParameterValue> {
  const params: Record<string, ParameterValue> = {};
  if (!state || typeof state !== 'object' || Array.isArray(state)) {
    return params;
  }
  for (const [key, value] of Object.entries(state)) {
    if (isParameterValue(value)) {
      params[key] = value;
    }
  }
  return params;
}

export class GovernanceNode {
  private readonly config: NodeRuntimeConfig;
  private engine?: GovernanceEngine;
  private params?: ParameterTarget;
  private eventDb?: KVStore;
  private stateDb?: KVStore;
  private eventStore?: EventStore;
  private stateStore?: StateStore;
  private apiServer?: ApiServer;
  private logger: Logger;
  private unsubscribe?: () => void;
  private persisting: Promise<void> = Promise.resolve();
  private persistedConfig?: NodeConfig;
  private starting?: Promise<void>;
  private stopping?: Promise<void>;

  constructor(config: NodeRuntimeConfig = {}) {
    this.config = {
      ...DEFAULT_NODE_RUNTIME_CONFIG,
      ...config,
      api: {
        ...DEFAULT_NODE_RUNTIME_CONFIG.api,
        ...config.api,
      },
    };
    this.logger = config.logger ?? createLogger();
  }

  async start(): Promise<void> {
    if (this.starting) {
      return this.starting;
    }
    this.starting = this.startInternal();
    return this.starting;
  }

  private async startInternal(): Promise<void> {
    if (this.engine) {
      return;
    }

    // Init order: config -> storage -> governance -> api
    const paths = resolveStoragePaths(this.config.dataDir);
    const persisted = this.config.config ?? (await ensureConfig(paths));
    this.persistedConfig = persisted;
    if (!this.config.logger) {
      const level = persisted.logging?.level;
      this.logger = createLogger({
        level: level && isLogLevel(level) ? level : 'info',
        file: persisted.logging?.file,
      });
    }

    try {
      const backend = this.config.storage ?? persisted.storage?.backend ?? 'level';
      if (backend === 'memory') {
        this.eventDb = new MemoryStore();
        this.stateDb = new MemoryStore();
      } else {
        await ensureStorageDirs(paths);
        const eventDb = new LevelStore({ path: paths.eventsDb });
        const stateDb = new LevelStore({ path: paths.stateDb });
        this.eventDb = eventDb;
        this.stateDb = stateDb;
        await eventDb.open();
        await stateDb.open();
      }
      this.eventStore = new EventStore(this.eventDb);
      this.stateStore = new StateStore(this.stateDb);

      this.engine = await this.buildEngine(persisted);
      this.unsubscribe = this.engine.events.subscribe((envelope) => this.onEvent(envelope));

      if (this.config.api?.enabled !== false) {
        const apiConfig: ApiServerConfig = {
          host: this.config.api?.host ?? persisted.api?.host ?? '127.0.0.1',
          port: this.config.api?.port ?? persisted.api?.port ?? DEFAULT_API_PORT,
        };
        this.apiServer = new ApiServer(apiConfig, {
          engine: this.engine,
          eventStore: this.eventStore,
          getParams: () => this.params?.snapshot() ?? {},
          logger: this.logger.child('api'),
        });
        await this.apiServer.start();
      }
    } catch (error) {
      await this.stop();
      throw error;
    } finally {
      this.starting = undefined;
    }
  }

  private async buildEngine(persisted: NodeConfig): Promise<GovernanceEngine> {
    const governance = parseGovernanceConfig(persisted.governance ?? {});

    const power = new CheckpointPowerSource();
    for (const [account, value] of Object.entries(persisted.voters ?? {})) {
      power.setPower(account, GENESIS, parseSeedPower(account, value));
    }
    const reputation = new CheckpointReputationSource(persisted.reputation ?? {});

    const saved = await this.stateStore?.getModuleState(PARAMS_TARGET);
    this.params = new ParameterTarget(toParameters(saved?.state));
    const gateway = new TargetRegistryGateway().register(PARAMS_TARGET, this.params);

    const log = this.logger.child('governance');
    const events = new GovernanceEventLog({
      onListenerError: (error, envelope) => {
        log.error('listener failed on %s: %s', envelope.type, String(error));
      },
    });
    const engine = new GovernanceEngine({
      config: governance,
      powerSource: power,
      reputation,
      gateway,
      clock: this.config.clock,
      events,
    });

    const history = await this.readGovernanceLog();
    await engine.restore(history);
    log.info('replayed %d governance events', history.length);
    return engine;
  }

  private async readGovernanceLog(): Promise<GovernanceEvent[]> {
    const history: GovernanceEvent[] = [];
    if (!this.eventStore) {
      return history;
    }
    let cursor: string | null = null;
    while (true) {
      const { events, cursor: next } = await this.eventStore.getEventLogRange(
        cursor,
        REPLAY_PAGE_SIZE,
      );
      for (const bytes of events) {
        const decoded: unknown = JSON.parse(bytesToUtf8(bytes));
        history.push(parseGovernanceEnvelope(decoded));
      }
      if (events.length < REPLAY_PAGE_SIZE || !next) {
        break;
      }
      cursor = next;
    }
    return history;
  }

  private onEvent(envelope: GovernanceEventEnvelope): void {
    const log = this.logger.child('governance');
    log.info('%s seq=%d actor=%s', envelope.type, envelope.seq, envelope.actor || '-');
    const eventStore = this.eventStore;
    const stateStore = this.stateStore;
    const params = this.params;
    this.persisting = this.persisting
      .then(async () => {
        await eventStore?.appendEnvelope({ ...envelope });
        if (envelope.type === 'gov.proposal.executed' && params) {
          await stateStore?.setModuleState(PARAMS_TARGET, params.snapshot(), envelope.hash);
        }
      })
      .catch((error: unknown) => {
        log.error('failed to persist %s: %s', envelope.hash, String(error));
      });
  }

  /** Resolves once every event published so far has been written. */
  async flush(): Promise<void> {
    await this.persisting;
  }

  async stop(): Promise<void> {
    if (this.stopping) {
      return this.stopping;
    }
    this.stopping = this.stopInternal();
    return this.stopping;
  }

  private async stopInternal(): Promise<void> {
    // Shutdown order: api -> pending writes -> storage
    this.unsubscribe?.();
    const tasks: Array<() => Promise<void>> = [
      async () => this.apiServer?.stop(),
      async () => this.flush(),
      async () => this.eventDb?.close?.(),
      async () => this.stateDb?.close?.(),
    ];

    for (const task of tasks) {
      try {
        await task();
      } catch (error) {
        this.logger.warn('shutdown step failed: %s', String(error));
      }
    }

    this.apiServer = undefined;
    this.unsubscribe = undefined;
    this.engine = undefined;
    this.params = undefined;
    this.eventDb = undefined;
    this.stateDb = undefined;
    this.eventStore = undefined;
    this.stateStore = undefined;
    this.stopping = undefined;
  }

  getEngine(): GovernanceEngine {
    if (!this.engine) {
      throw new Error('node not started');
    }
    return this.engine;
  }

  getEventStore(): EventStore {
    if (!this.eventStore) {
      throw new Error('node not started');
    }
    return this.eventStore;
  }

  getParams(): Record<string, ParameterValue> {
    return this.params?.snapshot() ?? {};
  }

  getApiAddress(): { host: string; port: number } | null {
    return this.apiServer?.address() ?? null;
  }

  getConfig(): NodeConfig | undefined {
    return this.persistedConfig;
  }

  getHealth(): { ok: boolean; checks: { engine: boolean; eventStore: boolean; api: boolean } } {
    const engine = Boolean(this.engine);
    const eventStore = Boolean(this.eventStore);
    const apiExpected = this.config.api?.enabled !== false;
    const api = apiExpected ? Boolean(this.apiServer) : true;
    return { ok: engine && eventStore && api, checks: { engine, eventStore, api } };
  }
}
