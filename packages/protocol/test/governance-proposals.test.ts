import { describe, expect, it } from 'vitest';
import { sha256Utf8Hex } from '@conclave/core/crypto';
import {
  GovernanceError,
  ManualClock,
  MemoryProposalStore,
  normalizeAmount,
  proposalIdFor,
  type CreateProposalParams,
} from '../src/governance/index.js';

function params(overrides: Partial<CreateProposalParams> = {}): CreateProposalParams {
  return {
    proposer: 'alice',
    targets: ['params'],
    values: [0n],
    payloads: ['0xAB'],
    description: 'Lower the quorum',
    votingDelay: 10,
    votingPeriod: 100,
    quorumRequirement: 50n,
    approvalThresholdPercent: 50,
    abstainCountsTowardApproval: false,
    weighting: 'linear',
    ...overrides,
  };
}

async function rejection(promise: Promise<unknown>): Promise<GovernanceError> {
  const error = await promise.then(
    () => undefined,
    (reason: unknown) => reason,
  );
  if (!(error instanceof GovernanceError)) {
    throw new Error('expected a GovernanceError');
  }
  return error;
}

describe('proposal store', () => {
  it('creates proposals with derived windows and ids', async () => {
    const clock = new ManualClock(1_000);
    const store = new MemoryProposalStore(clock);
    const id = await store.create(params());
    const proposal = await store.get(id);

    const descriptionHash = sha256Utf8Hex('Lower the quorum');
    expect(id).toBe(proposalIdFor('alice', descriptionHash, 1));
    expect(proposal.descriptionHash).toBe(descriptionHash);
    expect(proposal.payloads).toEqual(['ab']);
    expect(proposal.votingStart).toBe(1_010);
    expect(proposal.votingEnd).toBe(1_110);
    expect(proposal.state).toBe('pending');
    expect(proposal.tally).toEqual({ for: 0n, against: 0n, abstain: 0n });
  });

  it('rejects malformed proposals', async () => {
    const store = new MemoryProposalStore(new ManualClock());
    const cases: Array<[Partial<CreateProposalParams>, string]> = [
      [{ targets: [], values: [], payloads: [] }, 'targets must be a non-empty array'],
      [{ values: [0n, 1n] }, 'targets, values and payloads must have the same length'],
      [{ description: '   ' }, 'description is required'],
      [{ values: [-1n] }, 'values[0] must be >= 0'],
      [{ payloads: ['xyz'] }, 'payloads[0] must be a hex string'],
      [{ votingDelay: -1 }, 'votingDelay must be >= 0'],
      [{ votingPeriod: 0 }, 'votingPeriod must be > 0'],
    ];
    for (const [overrides, message] of cases) {
      const error = await rejection(store.create(params(overrides)));
      expect(error.code).toBe('InvalidProposal');
      expect(error.message).toBe(message);
    }
  });

  it('blocks duplicates only while a sibling is open', async () => {
    const clock = new ManualClock(0);
    const store = new MemoryProposalStore(clock);
    const first = await store.create(params());

    const duplicate = await rejection(store.create(params({ proposer: 'bob' })));
    expect(duplicate.code).toBe('DuplicateProposal');
    expect(duplicate.details).toEqual({ proposalId: first });

    clock.set(111);
    const second = await store.create(params());
    expect(second).not.toBe(first);
    expect((await store.get(second)).sequence).toBe(2);
  });

  it('lists proposals in creation order, filtered by state', async () => {
    const clock = new ManualClock(0);
    const store = new MemoryProposalStore(clock);
    const a = await store.create(params({ description: 'a', votingDelay: 0 }));
    const b = await store.create(params({ description: 'b' }));
    expect((await store.list()).map((proposal) => proposal.id)).toEqual([a, b]);
    expect((await store.list('active')).map((proposal) => proposal.id)).toEqual([a]);
    expect((await store.list('pending')).map((proposal) => proposal.id)).toEqual([b]);
  });

  it('records votes only while active', async () => {
    const clock = new ManualClock(0);
    const store = new MemoryProposalStore(clock);
    const id = await store.create(params());
    expect((await rejection(store.recordVote(id, 'for', 5n))).code).toBe('VotingNotOpen');

    clock.set(10);
    await store.recordVote(id, 'for', 5n);
    const tally = await store.recordVote(id, 'abstain', 2n);
    expect(tally).toEqual({ for: 5n, against: 0n, abstain: 2n });
  });

  it('guards recorded transitions', async () => {
    const clock = new ManualClock(0);
    const store = new MemoryProposalStore(clock);
    const id = await store.create(params());

    const wrongFrom = await rejection(store.transition(id, 'active', 'cancelled'));
    expect(wrongFrom.code).toBe('IllegalTransition');
    expect(wrongFrom.message).toBe('proposal is pending, expected active');

    const cancelled = await store.transition(id, 'pending', 'cancelled');
    expect(cancelled.state).toBe('cancelled');
    expect(cancelled.cancelledAt).toBe(0);

    const terminal = await rejection(store.transition(id, 'cancelled', 'queued'));
    expect(terminal.message).toBe('cannot transition from cancelled to queued');
  });

  it('requires executeAfter when queuing', async () => {
    const clock = new ManualClock(0);
    const store = new MemoryProposalStore(clock);
    const id = await store.create(params({ votingDelay: 0 }));
    await store.recordVote(id, 'for', 60n);
    clock.set(101);

    const missing = await rejection(store.transition(id, 'succeeded', 'queued'));
    expect(missing.message).toBe('queuing requires executeAfter >= now');

    const queued = await store.transition(id, 'succeeded', 'queued', { executeAfter: 150 });
    expect(queued.queuedAt).toBe(101);
    expect(queued.executeAfter).toBe(150);
    expect((await store.get(id)).state).toBe('queued');
  });

  it('reports unknown proposals', async () => {
    const store = new MemoryProposalStore(new ManualClock());
    const error = await rejection(store.get('missing'));
    expect(error.code).toBe('NotFound');
    expect(await store.has('missing')).toBe(false);
  });
});

describe('normalizeAmount', () => {
  it('accepts bigint, safe integers and digit strings', () => {
    expect(normalizeAmount(5n, 'v')).toBe(5n);
    expect(normalizeAmount(7, 'v')).toBe(7n);
    expect(normalizeAmount(' 42 ', 'v')).toBe(42n);
    expect(() => normalizeAmount('1.5', 'v')).toThrow('v must be a non-negative integer string');
    expect(() => normalizeAmount(0.5, 'v')).toThrow('v must be an integer');
  });
});
