/**
 * Governance - Vote Ledger
 *
 * One immutable receipt per (proposal, voter). Weight is read from the
 * delegation registry at the proposal's snapshot point, never at cast time.
 */

import type { Clock } from './clock.js';
import type { DelegationRegistry } from './delegation.js';
import { GovernanceError } from './errors.js';
import type { ReputationSource } from './power.js';
import type { ProposalStore } from './proposals.js';
import { snapshotPoint } from './state.js';
import { applyWeighting } from './weighting.js';
import type { VoteChoice, VoteReceipt } from './types.js';
import { isVoteChoice } from './types.js';

export interface VoteLedgerDeps {
  proposals: ProposalStore;
  delegations: DelegationRegistry;
  clock: Clock;
  reputation?: ReputationSource;
}

const MAX_REASON_LENGTH = 2000;

export class VoteLedger {
  private readonly receipts = new Map<string, Map<string, VoteReceipt>>();

  constructor(private readonly deps: VoteLedgerDeps) {}

  /**
   * Records a vote at `at` and adds its weight to the proposal's tally.
   * Returns the weight that was tallied.
   */
  async castVote(
    proposalId: string,
    voter: string,
    choice: VoteChoice,
    reason?: string,
    at: number = this.deps.clock.now(),
  ): Promise<bigint> {
    if (!isVoteChoice(choice)) {
      throw new GovernanceError('InvalidVote', `unknown vote choice: ${String(choice)}`);
    }
    if (!voter || voter.trim().length === 0) {
      throw new GovernanceError('InvalidAccount', 'voter is required');
    }
    if (reason !== undefined && reason.length > MAX_REASON_LENGTH) {
      throw new GovernanceError('InvalidVote', `reason exceeds ${MAX_REASON_LENGTH} characters`);
    }

    const proposal = await this.deps.proposals.get(proposalId, at);
    if (proposal.state !== 'active') {
      throw new GovernanceError('VotingNotOpen', `proposal is ${proposal.state}`, {
        proposalId,
        state: proposal.state,
        votingStart: proposal.votingStart,
        votingEnd: proposal.votingEnd,
      });
    }
    if (this.hasVoted(proposalId, voter)) {
      throw new GovernanceError('AlreadyVoted', `${voter} already voted`, { proposalId, voter });
    }

    const snapshot = snapshotPoint(proposal);
    const power = await this.deps.delegations.powerOf(voter, snapshot);
    if (power <= 0n) {
      throw new GovernanceError('NoVotingPower', `${voter} has no voting power at ${snapshot}`, {
        proposalId,
        voter,
        snapshot,
      });
    }

    let reputation = 0;
    if (proposal.weighting === 'reputation') {
      if (!this.deps.reputation) {
        throw new GovernanceError('InvalidConfig', 'reputation weighting needs a reputation source');
      }
      reputation = await this.deps.reputation.getReputation(voter, snapshot);
    }
    const weight = applyWeighting(proposal.weighting, power, reputation);
    if (weight <= 0n) {
      throw new GovernanceError('NoVotingPower', `${voter} has no voting weight`, {
        proposalId,
        voter,
      });
    }

    await this.deps.proposals.recordVote(proposalId, choice, weight, at);

    const receipt: VoteReceipt = {
      proposalId,
      voter,
      choice,
      power,
      weight,
      reason,
      timestamp: at,
    };
    this.store(receipt);
    return weight;
  }

  /** Puts back a receipt read from the event log; the tally is not touched. */
  restore(receipt: VoteReceipt): void {
    if (this.hasVoted(receipt.proposalId, receipt.voter)) {
      throw new GovernanceError('AlreadyVoted', `${receipt.voter} already voted`, {
        proposalId: receipt.proposalId,
        voter: receipt.voter,
      });
    }
    this.store({ ...receipt });
  }

  receiptOf(proposalId: string, voter: string): VoteReceipt {
    const receipt = this.receipts.get(proposalId)?.get(voter);
    if (!receipt) {
      throw new GovernanceError('NotFound', `no vote by ${voter} on ${proposalId}`, {
        proposalId,
        voter,
      });
    }
    return { ...receipt };
  }

  hasVoted(proposalId: string, voter: string): boolean {
    return this.receipts.get(proposalId)?.has(voter) ?? false;
  }

  receiptsFor(proposalId: string): VoteReceipt[] {
    return [...(this.receipts.get(proposalId)?.values() ?? [])].map((receipt) => ({ ...receipt }));
  }

  private store(receipt: VoteReceipt): void {
    let byVoter = this.receipts.get(receipt.proposalId);
    if (!byVoter) {
      byVoter = new Map();
      this.receipts.set(receipt.proposalId, byVoter);
    }
    byVoter.set(receipt.voter, receipt);
  }
}
