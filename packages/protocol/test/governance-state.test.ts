import { describe, expect, it } from 'vitest';
import {
  canTransition,
  emptyTally,
  evaluateOutcome,
  isApprovalReached,
  isQuorumReached,
  resolveProposalState,
  totalVotes,
  type ProposalRecord,
} from '../src/governance/index.js';

function record(overrides: Partial<ProposalRecord> = {}): ProposalRecord {
  return {
    id: 'p-1',
    sequence: 1,
    proposer: 'alice',
    targets: ['params'],
    values: [0n],
    payloads: [''],
    description: 'raise the fee',
    descriptionHash: '00',
    createdAt: 0,
    votingStart: 10,
    votingEnd: 110,
    quorumRequirement: 100n,
    approvalThresholdPercent: 60,
    abstainCountsTowardApproval: false,
    weighting: 'linear',
    tally: emptyTally(),
    executed: false,
    observedState: 'pending',
    ...overrides,
  };
}

describe('governance tally math', () => {
  it('sums all three choices', () => {
    expect(totalVotes({ for: 5n, against: 3n, abstain: 2n })).toBe(10n);
  });

  it('never meets quorum with zero votes', () => {
    expect(isQuorumReached(emptyTally(), 0n)).toBe(false);
    expect(isQuorumReached({ for: 0n, against: 0n, abstain: 1n }, 0n)).toBe(true);
  });

  it('meets quorum at exactly the requirement', () => {
    expect(isQuorumReached({ for: 60n, against: 30n, abstain: 10n }, 100n)).toBe(true);
    expect(isQuorumReached({ for: 60n, against: 30n, abstain: 9n }, 100n)).toBe(false);
  });

  it('passes approval at exact threshold equality', () => {
    const tally = { for: 60n, against: 40n, abstain: 0n };
    expect(isApprovalReached(tally, 60, false)).toBe(true);
    expect(isApprovalReached(tally, 61, false)).toBe(false);
  });

  it('counts abstain toward approval only when configured', () => {
    const tally = { for: 60n, against: 20n, abstain: 20n };
    expect(isApprovalReached(tally, 70, false)).toBe(true);
    expect(isApprovalReached(tally, 70, true)).toBe(false);
  });

  it('rejects approval without any support', () => {
    expect(isApprovalReached({ for: 0n, against: 0n, abstain: 5n }, 1, true)).toBe(false);
    expect(isApprovalReached(emptyTally(), 1, false)).toBe(false);
  });
});

describe('governance state resolution', () => {
  it('follows the voting window', () => {
    const proposal = record();
    expect(resolveProposalState(proposal, 9)).toBe('pending');
    expect(resolveProposalState(proposal, 10)).toBe('active');
    expect(resolveProposalState(proposal, 110)).toBe('active');
    expect(resolveProposalState(proposal, 111)).toBe('defeated');
  });

  it('resolves the 60/40 boundary after voting ends', () => {
    const tally = { for: 60n, against: 40n, abstain: 0n };
    expect(resolveProposalState(record({ tally }), 111)).toBe('succeeded');
    expect(
      resolveProposalState(record({ tally, approvalThresholdPercent: 61 }), 111),
    ).toBe('defeated');
  });

  it('lets recorded flags win over time', () => {
    expect(resolveProposalState(record({ cancelledAt: 5 }), 50)).toBe('cancelled');
    expect(resolveProposalState(record({ queuedAt: 120, executeAfter: 130 }), 200)).toBe('queued');
    expect(
      resolveProposalState(record({ queuedAt: 120, executeAfter: 130, executed: true }), 200),
    ).toBe('executed');
  });

  it('reports the outcome with both checks', () => {
    const outcome = evaluateOutcome(
      record({ tally: { for: 80n, against: 10n, abstain: 5n } }),
      111,
    );
    expect(outcome).toEqual({
      proposalId: 'p-1',
      state: 'defeated',
      tally: { for: 80n, against: 10n, abstain: 5n },
      totalVotes: 95n,
      quorumRequirement: 100n,
      quorumReached: false,
      approvalReached: true,
    });
  });

  it('allows only the recorded edges', () => {
    expect(canTransition('succeeded', 'queued')).toBe(true);
    expect(canTransition('queued', 'executed')).toBe(true);
    expect(canTransition('pending', 'cancelled')).toBe(true);
    expect(canTransition('active', 'cancelled')).toBe(true);
    expect(canTransition('succeeded', 'cancelled')).toBe(false);
    expect(canTransition('defeated', 'queued')).toBe(false);
    expect(canTransition('executed', 'executed')).toBe(false);
  });
});
