/**
 * Governance - Lifecycle Resolution
 *
 * Pure functions deriving a proposal's state from its stored fields and the
 * current time. Nothing here mutates a proposal.
 */

import type {
  ProposalOutcome,
  ProposalRecord,
  ProposalState,
  ProposalTally,
} from './types.js';

// ---------------------------------------------------------------------------
// Tally math
// ---------------------------------------------------------------------------

export function emptyTally(): ProposalTally {
  return { for: 0n, against: 0n, abstain: 0n };
}

export function totalVotes(tally: ProposalTally): bigint {
  return tally.for + tally.against + tally.abstain;
}

/** Zero participation never meets quorum, even when the requirement is 0. */
export function isQuorumReached(tally: ProposalTally, quorumRequirement: bigint): boolean {
  const total = totalVotes(tally);
  return total > 0n && total >= quorumRequirement;
}

/**
 * `for * 100 >= threshold * denominator`, equality passing. The denominator
 * is for + against, plus abstain when abstentions count toward approval. A
 * proposal with no support never passes.
 */
export function isApprovalReached(
  tally: ProposalTally,
  approvalThresholdPercent: number,
  abstainCountsTowardApproval: boolean,
): boolean {
  const denominator =
    tally.for + tally.against + (abstainCountsTowardApproval ? tally.abstain : 0n);
  if (denominator === 0n || tally.for === 0n) {
    return false;
  }
  return tally.for * 100n >= BigInt(approvalThresholdPercent) * denominator;
}

// ---------------------------------------------------------------------------
// State resolution
// ---------------------------------------------------------------------------

/**
 * Time at which voting power is read for a proposal: the last tick before
 * voting opens. Writes made while the window is open, including in its first
 * tick, are never visible to the snapshot.
 */
export function snapshotPoint(proposal: Pick<ProposalRecord, 'votingStart'>): number {
  return proposal.votingStart - 1;
}

export function isVotingOpen(proposal: ProposalRecord, now: number): boolean {
  return now >= proposal.votingStart && now <= proposal.votingEnd;
}

export function isVotingClosed(proposal: ProposalRecord, now: number): boolean {
  return now > proposal.votingEnd;
}

export function resolveProposalState(proposal: ProposalRecord, now: number): ProposalState {
  if (proposal.executed) {
    return 'executed';
  }
  if (proposal.cancelledAt !== undefined) {
    return 'cancelled';
  }
  if (proposal.queuedAt !== undefined) {
    return 'queued';
  }
  if (now < proposal.votingStart) {
    return 'pending';
  }
  if (now <= proposal.votingEnd) {
    return 'active';
  }
  const passed =
    isQuorumReached(proposal.tally, proposal.quorumRequirement) &&
    isApprovalReached(
      proposal.tally,
      proposal.approvalThresholdPercent,
      proposal.abstainCountsTowardApproval,
    );
  return passed ? 'succeeded' : 'defeated';
}

export function evaluateOutcome(proposal: ProposalRecord, now: number): ProposalOutcome {
  return {
    proposalId: proposal.id,
    state: resolveProposalState(proposal, now),
    tally: { ...proposal.tally },
    totalVotes: totalVotes(proposal.tally),
    quorumRequirement: proposal.quorumRequirement,
    quorumReached: isQuorumReached(proposal.tally, proposal.quorumRequirement),
    approvalReached: isApprovalReached(
      proposal.tally,
      proposal.approvalThresholdPercent,
      proposal.abstainCountsTowardApproval,
    ),
  };
}

// ---------------------------------------------------------------------------
// Recorded transitions
// ---------------------------------------------------------------------------

/**
 * Edges that are written to the store. Pending → Active and Active →
 * Succeeded/Defeated follow from time and are never recorded.
 */
export const RECORDED_TRANSITIONS: Record<ProposalState, ProposalState[]> = {
  pending: ['cancelled'],
  active: ['cancelled'],
  succeeded: ['queued'],
  queued: ['executed'],
  defeated: [],
  executed: [],
  cancelled: [],
};

export function canTransition(from: ProposalState, to: ProposalState): boolean {
  return RECORDED_TRANSITIONS[from].includes(to);
}
