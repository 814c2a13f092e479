import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { bytesToHex, utf8ToBytes } from '@conclave/core';
import {
  CheckpointPowerSource,
  GENESIS,
  GovernanceEngine,
  GovernanceError,
  ManualClock,
  ParameterTarget,
  TargetRegistryGateway,
} from '@conclave/protocol';
import { ApiServer, statusForError } from '../src/api/server.js';

interface ApiResponse {
  status: number;
  body: unknown;
}

function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!current || typeof current !== 'object' || !(key in current)) {
      return undefined;
    }
    current = Object.entries(current).find(([name]) => name === key)?.[1];
  }
  return current;
}

function paramPayload(key: string, value: unknown): string {
  return bytesToHex(utf8ToBytes(JSON.stringify({ key, value })));
}

describe('governance api', () => {
  let api: ApiServer;
  let baseUrl: string;
  let clock: ManualClock;
  let params: ParameterTarget;

  async function request(method: string, path: string, body?: unknown): Promise<ApiResponse> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { 'content-type': 'application/json' },
      body: body === undefined ? undefined : typeof body === 'string' ? body : JSON.stringify(body),
    });
    return { status: res.status, body: await res.json() };
  }

  async function propose(description = 'Set the fee to 25'): Promise<string> {
    const res = await request('POST', '/api/governance/proposals', {
      proposer: 'dave',
      targets: ['params'],
      values: ['0'],
      payloads: [paramPayload('fee', 25)],
      description,
    });
    expect(res.status).toBe(201);
    const id = field(res.body, 'proposal', 'id');
    if (typeof id !== 'string') {
      throw new Error('proposal id missing');
    }
    return id;
  }

  beforeEach(async () => {
    clock = new ManualClock(0);
    const power = new CheckpointPowerSource();
    power.setPower('alice', GENESIS, 400n);
    power.setPower('bob', GENESIS, 300n);
    params = new ParameterTarget({ fee: 10 });
    const engine = new GovernanceEngine({
      powerSource: power,
      gateway: new TargetRegistryGateway().register('params', params),
      clock,
      config: {
        votingDelay: 0,
        votingPeriod: 100,
        executionDelay: 10,
        quorum: 500n,
        cancellers: ['guardian'],
      },
    });
    api = new ApiServer(
      { host: '127.0.0.1', port: 0 },
      { engine, getParams: () => params.snapshot() },
    );
    await api.start();
    const address = api.address();
    if (!address) {
      throw new Error('api not listening');
    }
    baseUrl = `http://${address.host}:${address.port}`;
  });

  afterEach(async () => {
    await api.stop();
  });

  it('serves the governance config with string amounts', async () => {
    const res = await request('GET', '/api/governance/config');
    expect(res.status).toBe(200);
    expect(field(res.body, 'config', 'quorum')).toBe('500');
    expect(field(res.body, 'config', 'executionDelay')).toBe(10);
    expect(field(res.body, 'config', 'cancellers')).toEqual(['guardian']);
  });

  it('creates and reads proposals', async () => {
    const id = await propose();
    const res = await request('GET', `/api/governance/proposals/${id}`);
    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      proposal: {
        id,
        proposer: 'dave',
        state: 'active',
        values: ['0'],
        votingStart: 0,
        votingEnd: 100,
        quorumRequirement: '500',
        tally: { for: '0', against: '0', abstain: '0' },
        queuedAt: null,
      },
    });

    const active = await request('GET', '/api/governance/proposals?state=active');
    expect(field(active.body, 'proposals')).toHaveLength(1);
    const pending = await request('GET', '/api/governance/proposals?state=pending');
    expect(field(pending.body, 'proposals')).toEqual([]);
  });

  it('runs a proposal from vote to execution', async () => {
    const id = await propose();
    const vote = await request('POST', `/api/governance/proposals/${id}/votes`, {
      voter: 'alice',
      choice: 'for',
    });
    expect(vote.status).toBe(201);
    expect(vote.body).toEqual({
      vote: {
        proposalId: id,
        voter: 'alice',
        choice: 'for',
        power: '400',
        weight: '400',
        reason: null,
        timestamp: 0,
      },
    });
    await request('POST', `/api/governance/proposals/${id}/votes`, { voter: 'bob', choice: 'against' });

    const early = await request('POST', `/api/governance/proposals/${id}/finalize`);
    expect(early.status).toBe(425);
    expect(field(early.body, 'error', 'code')).toBe('VotingNotClosed');
    expect(field(early.body, 'error', 'retryable')).toBe(true);

    clock.set(101);
    const outcome = await request('POST', `/api/governance/proposals/${id}/finalize`);
    expect(outcome.body).toEqual({
      outcome: {
        proposalId: id,
        state: 'succeeded',
        tally: { for: '400', against: '300', abstain: '0' },
        totalVotes: '700',
        quorumRequirement: '500',
        quorumReached: true,
        approvalReached: true,
      },
    });

    const queued = await request('POST', `/api/governance/proposals/${id}/queue`, { actor: 'dave' });
    expect(queued.status).toBe(200);
    expect(field(queued.body, 'proposal', 'executeAfter')).toBe(111);

    const locked = await request('POST', `/api/governance/proposals/${id}/execute`, { actor: 'dave' });
    expect(locked.status).toBe(425);
    expect(field(locked.body, 'error', 'code')).toBe('TimelockNotElapsed');

    clock.set(111);
    const executed = await request('POST', `/api/governance/proposals/${id}/execute`, { actor: 'dave' });
    expect(executed.status).toBe(200);
    expect(field(executed.body, 'proposal', 'state')).toBe('executed');

    const current = await request('GET', '/api/governance/params');
    expect(current.body).toEqual({ params: { fee: 25 } });

    const again = await request('POST', `/api/governance/proposals/${id}/execute`, { actor: 'dave' });
    expect(again.status).toBe(409);
    expect(field(again.body, 'error', 'code')).toBe('AlreadyExecuted');
  });

  it('maps governance errors to status codes', async () => {
    const id = await propose();
    await request('POST', `/api/governance/proposals/${id}/votes`, { voter: 'alice', choice: 'for' });

    const twice = await request('POST', `/api/governance/proposals/${id}/votes`, {
      voter: 'alice',
      choice: 'against',
    });
    expect(twice.status).toBe(409);
    expect(twice.body).toEqual({
      error: {
        code: 'AlreadyVoted',
        category: 'state',
        message: 'alice already voted',
        retryable: false,
        details: { proposalId: id, voter: 'alice' },
      },
    });

    const badChoice = await request('POST', `/api/governance/proposals/${id}/votes`, {
      voter: 'bob',
      choice: 'maybe',
    });
    expect(badChoice.status).toBe(400);
    expect(field(badChoice.body, 'error', 'code')).toBe('InvalidVote');

    const cancel = await request('POST', `/api/governance/proposals/${id}/cancel`, { actor: 'alice' });
    expect(cancel.status).toBe(403);
    expect(field(cancel.body, 'error', 'code')).toBe('NotAuthorized');

    const missing = await request('GET', '/api/governance/proposals/unknown');
    expect(missing.status).toBe(404);
    expect(field(missing.body, 'error', 'code')).toBe('NotFound');

    const receipt = await request('GET', `/api/governance/proposals/${id}/votes/alice`);
    expect(field(receipt.body, 'vote', 'choice')).toBe('for');
    const list = await request('GET', `/api/governance/proposals/${id}/votes`);
    expect(field(list.body, 'votes')).toHaveLength(1);
  });

  it('handles delegation and power queries', async () => {
    const delegated = await request('POST', '/api/governance/delegations', {
      delegator: 'alice',
      delegate: 'bob',
      amount: '100',
    });
    expect(delegated.status).toBe(200);
    expect(delegated.body).toEqual({
      delegation: { delegator: 'alice', delegate: 'bob', amount: '100', delta: '100', at: 0 },
    });

    const power = await request('GET', '/api/governance/power/bob');
    expect(power.body).toEqual({ account: 'bob', at: null, power: '400' });

    const overdrawn = await request('POST', '/api/governance/delegations/revoke', {
      delegator: 'alice',
      delegate: 'bob',
      amount: 101,
    });
    expect(overdrawn.status).toBe(400);
    expect(field(overdrawn.body, 'error', 'code')).toBe('InsufficientDelegation');

    const self = await request('POST', '/api/governance/delegations', {
      delegator: 'alice',
      delegate: 'alice',
      amount: 1,
    });
    expect(field(self.body, 'error', 'code')).toBe('SelfDelegation');
  });

  it('rejects malformed requests', async () => {
    const badJson = await request('POST', '/api/governance/proposals', '{not json');
    expect(badJson.status).toBe(400);
    expect(badJson.body).toEqual({ error: { code: 'INVALID_REQUEST', message: 'invalid json' } });

    const missing = await request('POST', '/api/governance/proposals', { proposer: 'dave' });
    expect(missing.body).toEqual({
      error: { code: 'INVALID_REQUEST', message: 'targets must be an array' },
    });

    const badState = await request('GET', '/api/governance/proposals?state=limbo');
    expect(field(badState.body, 'error', 'message')).toBe('unknown state: limbo');

    const unknown = await request('GET', '/api/wallet/balance');
    expect(unknown.status).toBe(404);
    expect(field(unknown.body, 'error', 'code')).toBe('NOT_FOUND');
  });

  it('pages through the in-memory event trail', async () => {
    const id = await propose();
    await request('POST', `/api/governance/proposals/${id}/votes`, { voter: 'alice', choice: 'for' });
    const first = await request('GET', '/api/governance/events?limit=1');
    const events = field(first.body, 'events');
    expect(Array.isArray(events) ? events.map((event) => field(event, 'type')) : []).toEqual([
      'gov.proposal.created',
    ]);
    const cursor = field(first.body, 'cursor');
    const rest = await request('GET', `/api/governance/events?from=${String(cursor)}`);
    const later = field(rest.body, 'events');
    expect(Array.isArray(later) ? later.map((event) => field(event, 'type')) : []).toEqual([
      'gov.vote.cast',
    ]);
  });
});

describe('error status mapping', () => {
  it('maps categories to http status', () => {
    expect(statusForError(new GovernanceError('InvalidProposal', 'x'))).toBe(400);
    expect(statusForError(new GovernanceError('BelowProposalThreshold', 'x'))).toBe(403);
    expect(statusForError(new GovernanceError('NotFound', 'x'))).toBe(404);
    expect(statusForError(new GovernanceError('IllegalTransition', 'x'))).toBe(409);
    expect(statusForError(new GovernanceError('TimelockNotElapsed', 'x'))).toBe(425);
    expect(statusForError(new GovernanceError('TargetCallFailed', 'x'))).toBe(502);
  });
});
