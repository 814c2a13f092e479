/**
 * Governance - JSON Views
 *
 * Amounts leave the process as decimal strings.
 */

import type {
  Delegation,
  DelegationChange,
  Proposal,
  ProposalOutcome,
  ProposalTally,
  VoteReceipt,
} from './types.js';

export interface TallyJson {
  for: string;
  against: string;
  abstain: string;
}

export interface ProposalJson {
  id: string;
  sequence: number;
  proposer: string;
  state: string;
  targets: string[];
  values: string[];
  payloads: string[];
  description: string;
  descriptionHash: string;
  createdAt: number;
  votingStart: number;
  votingEnd: number;
  quorumRequirement: string;
  approvalThresholdPercent: number;
  abstainCountsTowardApproval: boolean;
  weighting: string;
  tally: TallyJson;
  executed: boolean;
  queuedAt: number | null;
  executeAfter: number | null;
  executedAt: number | null;
  cancelledAt: number | null;
}

export function tallyToJson(tally: ProposalTally): TallyJson {
  return {
    for: tally.for.toString(),
    against: tally.against.toString(),
    abstain: tally.abstain.toString(),
  };
}

export function proposalToJson(proposal: Proposal): ProposalJson {
  return {
    id: proposal.id,
    sequence: proposal.sequence,
    proposer: proposal.proposer,
    state: proposal.state,
    targets: [...proposal.targets],
    values: proposal.values.map((value) => value.toString()),
    payloads: [...proposal.payloads],
    description: proposal.description,
    descriptionHash: proposal.descriptionHash,
    createdAt: proposal.createdAt,
    votingStart: proposal.votingStart,
    votingEnd: proposal.votingEnd,
    quorumRequirement: proposal.quorumRequirement.toString(),
    approvalThresholdPercent: proposal.approvalThresholdPercent,
    abstainCountsTowardApproval: proposal.abstainCountsTowardApproval,
    weighting: proposal.weighting,
    tally: tallyToJson(proposal.tally),
    executed: proposal.executed,
    queuedAt: proposal.queuedAt ?? null,
    executeAfter: proposal.executeAfter ?? null,
    executedAt: proposal.executedAt ?? null,
    cancelledAt: proposal.cancelledAt ?? null,
  };
}

export function receiptToJson(receipt: VoteReceipt): Record<string, unknown> {
  return {
    proposalId: receipt.proposalId,
    voter: receipt.voter,
    choice: receipt.choice,
    power: receipt.power.toString(),
    weight: receipt.weight.toString(),
    reason: receipt.reason ?? null,
    timestamp: receipt.timestamp,
  };
}

export function outcomeToJson(outcome: ProposalOutcome): Record<string, unknown> {
  return {
    proposalId: outcome.proposalId,
    state: outcome.state,
    tally: tallyToJson(outcome.tally),
    totalVotes: outcome.totalVotes.toString(),
    quorumRequirement: outcome.quorumRequirement.toString(),
    quorumReached: outcome.quorumReached,
    approvalReached: outcome.approvalReached,
  };
}

export function delegationToJson(delegation: Delegation): Record<string, unknown> {
  return { ...delegation, amount: delegation.amount.toString() };
}

export function delegationChangeToJson(change: DelegationChange): Record<string, unknown> {
  return { ...change, amount: change.amount.toString(), delta: change.delta.toString() };
}
