import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { bytesToHex, utf8ToBytes } from '@conclave/core';
import type { NodeConfig } from '@conclave/core';
import { GovernanceError, ManualClock } from '@conclave/protocol';
import type { GovernanceEngine } from '@conclave/protocol';
import { GovernanceNode } from '../src/index.js';
import type { Logger } from '../src/logger.js';

function recordingLogger(lines: string[]): Logger {
  const push = (level: string) => (...args: unknown[]) => {
    lines.push(`${level} ${args.map(String).join(' ')}`);
  };
  const logger: Logger = {
    debug: push('debug'),
    info: push('info'),
    warn: push('warn'),
    error: push('error'),
    child: () => logger,
  };
  return logger;
}

const CONFIG: NodeConfig = {
  v: 1,
  governance: { votingPeriod: 100, executionDelay: 10, quorum: '500' },
  voters: { alice: '400', bob: 300 },
};

async function runFeeProposal(engine: GovernanceEngine, clock: ManualClock): Promise<string> {
  const { id } = await engine.propose('dave', {
    targets: ['params'],
    values: [0n],
    payloads: [bytesToHex(utf8ToBytes(JSON.stringify({ key: 'fee', value: 25 })))],
    description: 'Set the fee to 25',
  });
  await engine.vote(id, 'alice', 'for');
  await engine.vote(id, 'bob', 'for');
  clock.set(101);
  await engine.queue(id, 'dave');
  clock.set(111);
  await engine.execute(id, 'dave');
  return id;
}

describe('governance node', () => {
  let node: GovernanceNode | null = null;

  afterEach(async () => {
    await node?.stop();
    node = null;
  });

  it('persists every governance event to the event store', async () => {
    const clock = new ManualClock(0);
    const lines: string[] = [];
    node = new GovernanceNode({
      storage: 'memory',
      config: CONFIG,
      clock,
      logger: recordingLogger(lines),
      api: { enabled: false },
    });
    await node.start();
    const engine = node.getEngine();
    await runFeeProposal(engine, clock);
    await node.flush();

    const eventStore = node.getEventStore();
    expect(engine.events.length).toBe(8);
    expect(await eventStore.getLogLength()).toBe(8);
    expect(await eventStore.getLatestEventHash()).toBe(engine.events.latestHash());
    expect(await eventStore.verifyEventLog()).toEqual({ ok: true, errors: [] });
    expect(node.getParams()).toEqual({ fee: 25 });
    expect(lines).toContain('info %s seq=%d actor=%s gov.proposal.executed 7 dave');
    expect(node.getHealth()).toEqual({
      ok: true,
      checks: { engine: true, eventStore: true, api: true },
    });
  });

  it('seeds voting power from the voters section', async () => {
    node = new GovernanceNode({
      storage: 'memory',
      config: CONFIG,
      logger: recordingLogger([]),
      api: { enabled: false },
    });
    await node.start();
    const engine = node.getEngine();
    expect(await engine.powerOf('alice', 0)).toBe(400n);
    expect(await engine.powerOf('bob', 0)).toBe(300n);
    expect(engine.config.quorum).toBe(500n);
  });

  it('refuses to start with invalid governance settings', async () => {
    node = new GovernanceNode({
      storage: 'memory',
      config: { v: 1, voters: { alice: '-5' } },
      logger: recordingLogger([]),
      api: { enabled: false },
    });
    const error = await node.start().then(
      () => undefined,
      (reason: unknown) => reason,
    );
    expect(error).toBeInstanceOf(GovernanceError);
    expect(error instanceof GovernanceError ? error.message : '').toBe(
      'voters.alice must be a non-negative integer',
    );
    expect(node.getHealth().ok).toBe(false);
  });

  it('serves persisted events over the api', async () => {
    const clock = new ManualClock(0);
    node = new GovernanceNode({
      storage: 'memory',
      config: CONFIG,
      clock,
      logger: recordingLogger([]),
      api: { host: '127.0.0.1', port: 0 },
    });
    await node.start();
    await runFeeProposal(node.getEngine(), clock);
    await node.flush();

    const address = node.getApiAddress();
    expect(address).not.toBeNull();
    const res = await fetch(`http://${address?.host}:${address?.port}/api/governance/events?limit=2`);
    const body: unknown = await res.json();
    expect(res.status).toBe(200);
    expect(body).toMatchObject({
      events: [{ type: 'gov.proposal.created', seq: 0 }, { type: 'gov.vote.cast', seq: 1 }],
    });
  });
});

describe('governance node on disk', () => {
  let dataDir: string;

  beforeEach(async () => {
    dataDir = await mkdtemp(join(tmpdir(), 'conclave-node-'));
  });

  afterEach(async () => {
    await rm(dataDir, { recursive: true, force: true });
  });

  it('restores executed parameters and keeps the event log across restarts', async () => {
    const clock = new ManualClock(0);
    const first = new GovernanceNode({
      dataDir,
      storage: 'level',
      config: CONFIG,
      clock,
      logger: recordingLogger([]),
      api: { enabled: false },
    });
    await first.start();
    const id = await runFeeProposal(first.getEngine(), clock);
    const lastHash = first.getEngine().events.latestHash();
    await first.stop();

    const lines: string[] = [];
    const second = new GovernanceNode({
      dataDir,
      storage: 'level',
      config: CONFIG,
      clock,
      logger: recordingLogger(lines),
      api: { enabled: false },
    });
    await second.start();
    try {
      const engine = second.getEngine();
      expect(second.getParams()).toEqual({ fee: 25 });
      expect(await second.getEventStore().getLogLength()).toBe(8);
      expect(lines).toContain('info replayed %d governance events 8');

      const proposal = await engine.getProposal(id);
      expect(proposal.state).toBe('executed');
      expect(proposal.executedAt).toBe(111);
      expect(proposal.tally.for).toBe(700n);
      expect((await engine.receiptOf(id, 'bob')).weight).toBe(300n);
      await expect(engine.vote(id, 'alice', 'against')).rejects.toMatchObject({
        code: 'VotingNotOpen',
      });

      await engine.delegate('alice', 'bob', 50n);
      await second.flush();
      const [latest] = engine.events.list('gov.delegation.changed');
      expect(latest.seq).toBe(8);
      expect(latest.prev).toBe(lastHash);
      expect(await second.getEventStore().getLogLength()).toBe(9);
      expect(await second.getEventStore().verifyEventLog()).toEqual({ ok: true, errors: [] });
    } finally {
      await second.stop();
    }
  });
});
