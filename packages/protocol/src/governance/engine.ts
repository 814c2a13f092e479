/**
 * Governance - Engine
 *
 * Orchestrates the proposal lifecycle on top of the proposal store, vote
 * ledger, delegation registry and execution gateway:
 *
 *   Pending → Active → Succeeded → Queued → Executed
 *                    ↘ Defeated
 *   Pending | Active → Cancelled
 *
 * Work is serialized per proposal (and per shared index) with a keyed mutex.
 * Time-driven transitions are never scheduled; they are noticed on the next
 * operation that touches the proposal and reported as `gov.proposal.state`.
 * Each operation reads the clock once and uses that time throughout.
 *
 * `restore` rebuilds an empty engine from a persisted event chain.
 */

import { KeyedMutex } from '@conclave/core/utils';
import type { Clock } from './clock.js';
import { MonotonicClock, systemClock } from './clock.js';
import { validateGovernanceConfig } from './config.js';
import { DelegationRegistry } from './delegation.js';
import { GovernanceError } from './errors.js';
import { GovernanceEventLog } from './events.js';
import type { GovernanceEvent } from './events.js';
import type { ExecutionGateway } from './execution.js';
import { VoteLedger } from './ledger.js';
import type { ReputationSource, VotingPowerSource } from './power.js';
import { MemoryProposalStore } from './proposals.js';
import type { AmountInput, ProposalStore } from './proposals.js';
import { replayGovernanceEvents } from './replay.js';
import { evaluateOutcome } from './state.js';
import { DEFAULT_GOVERNANCE_CONFIG } from './types.js';
import type {
  DelegationChange,
  GovernanceConfig,
  Proposal,
  ProposalOutcome,
  ProposalState,
  VoteChoice,
  VoteReceipt,
  WeightingMode,
} from './types.js';

export interface GovernanceEngineOptions {
  powerSource: VotingPowerSource;
  gateway: ExecutionGateway;
  config?: Partial<GovernanceConfig>;
  clock?: Clock;
  reputation?: ReputationSource;
  proposals?: ProposalStore;
  events?: GovernanceEventLog;
}

export interface ProposeParams {
  targets: string[];
  values: AmountInput[];
  payloads: string[];
  description: string;
  /** Overrides the configured delay for this proposal. */
  votingDelay?: number;
  votingPeriod?: number;
  weighting?: WeightingMode;
}

const CREATION_KEY = 'proposals';
const DELEGATION_KEY = 'delegations';

function proposalKey(proposalId: string): string {
  return `proposal:${proposalId}`;
}

function toAmount(value: AmountInput): bigint {
  if (typeof value === 'bigint') {
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value)) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw new GovernanceError('InvalidAmount', 'amount must be an integer');
}

export class GovernanceEngine {
  readonly config: GovernanceConfig;
  readonly clock: MonotonicClock;
  readonly events: GovernanceEventLog;
  readonly delegations: DelegationRegistry;
  readonly ledger: VoteLedger;

  private readonly proposals: ProposalStore;
  private readonly gateway: ExecutionGateway;
  private readonly mutex = new KeyedMutex();

  constructor(options: GovernanceEngineOptions) {
    this.config = validateGovernanceConfig({
      ...DEFAULT_GOVERNANCE_CONFIG,
      ...options.config,
    });
    if (this.config.weighting === 'reputation' && !options.reputation) {
      throw new GovernanceError('InvalidConfig', 'reputation weighting needs a reputation source');
    }
    this.clock = new MonotonicClock(options.clock ?? systemClock);
    this.events = options.events ?? new GovernanceEventLog();
    this.gateway = options.gateway;
    this.proposals = options.proposals ?? new MemoryProposalStore(this.clock);
    this.delegations = new DelegationRegistry(options.powerSource, this.clock);
    this.ledger = new VoteLedger({
      proposals: this.proposals,
      delegations: this.delegations,
      clock: this.clock,
      reputation: options.reputation,
    });
  }

  // -------------------------------------------------------------------------
  // Proposals
  // -------------------------------------------------------------------------

  async propose(proposer: string, params: ProposeParams): Promise<Proposal> {
    return this.mutex.runExclusive(CREATION_KEY, async () => {
      if (!proposer || proposer.trim().length === 0) {
        throw new GovernanceError('InvalidAccount', 'proposer is required');
      }
      const now = this.clock.now();
      const threshold = this.config.proposalThreshold;
      if (threshold > 0n) {
        const power = await this.delegations.powerOf(proposer, now);
        if (power < threshold) {
          throw new GovernanceError('BelowProposalThreshold', 'proposer power is below threshold', {
            proposer,
            power: power.toString(),
            threshold: threshold.toString(),
          });
        }
      }

      const id = await this.proposals.create({
        proposer,
        targets: params.targets,
        values: params.values,
        payloads: params.payloads,
        description: params.description,
        votingDelay: params.votingDelay ?? this.config.votingDelay,
        votingPeriod: params.votingPeriod ?? this.config.votingPeriod,
        quorumRequirement: this.config.quorum,
        approvalThresholdPercent: this.config.approvalThresholdPercent,
        abstainCountsTowardApproval: this.config.abstainCountsTowardApproval,
        weighting: params.weighting ?? this.config.weighting,
        at: now,
      });
      const proposal = await this.proposals.get(id, now);

      this.events.publish('gov.proposal.created', proposer, proposal.createdAt, {
        proposalId: id,
        sequence: proposal.sequence,
        proposer,
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
      });
      return proposal;
    });
  }

  async getProposal(proposalId: string): Promise<Proposal> {
    return this.withProposal(proposalId, async (proposal) => proposal);
  }

  async state(proposalId: string): Promise<ProposalState> {
    return this.withProposal(proposalId, async (proposal) => proposal.state);
  }

  async listProposals(state?: ProposalState): Promise<Proposal[]> {
    const all = await this.proposals.list();
    const observed: Proposal[] = [];
    for (const proposal of all) {
      observed.push(
        proposal.state === proposal.observedState ? proposal : await this.getProposal(proposal.id),
      );
    }
    return state ? observed.filter((proposal) => proposal.state === state) : observed;
  }

  // -------------------------------------------------------------------------
  // Voting
  // -------------------------------------------------------------------------

  async vote(
    proposalId: string,
    voter: string,
    choice: VoteChoice,
    reason?: string,
  ): Promise<VoteReceipt> {
    return this.withProposal(proposalId, async (_proposal, now) => {
      await this.ledger.castVote(proposalId, voter, choice, reason, now);
      const receipt = this.ledger.receiptOf(proposalId, voter);
      this.events.publish('gov.vote.cast', voter, receipt.timestamp, {
        proposalId,
        voter,
        choice,
        power: receipt.power.toString(),
        weight: receipt.weight.toString(),
        ...(reason !== undefined ? { reason } : {}),
      });
      return receipt;
    });
  }

  async receiptOf(proposalId: string, voter: string): Promise<VoteReceipt> {
    if (!(await this.proposals.has(proposalId))) {
      throw new GovernanceError('NotFound', `proposal ${proposalId} not found`, { proposalId });
    }
    return this.ledger.receiptOf(proposalId, voter);
  }

  async finalize(proposalId: string): Promise<ProposalOutcome> {
    return this.withProposal(proposalId, async (proposal, now) => {
      if (proposal.state === 'pending' || proposal.state === 'active') {
        throw new GovernanceError('VotingNotClosed', `voting closes after ${proposal.votingEnd}`, {
          proposalId,
          votingEnd: proposal.votingEnd,
        });
      }
      return evaluateOutcome(proposal, now);
    });
  }

  // -------------------------------------------------------------------------
  // Queue / Execute / Cancel
  // -------------------------------------------------------------------------

  async queue(proposalId: string, actor: string): Promise<Proposal> {
    return this.withProposal(proposalId, async (proposal, now) => {
      if (proposal.state !== 'succeeded') {
        throw new GovernanceError('IllegalTransition', `cannot queue a ${proposal.state} proposal`, {
          proposalId,
          state: proposal.state,
        });
      }
      this.authorize(this.config.queuers, actor, 'queue');

      const queued = await this.proposals.transition(proposalId, 'succeeded', 'queued', {
        at: now,
        executeAfter: now + this.config.executionDelay,
      });
      this.publishState(actor, proposalId, 'succeeded', 'queued', now);
      this.events.publish('gov.proposal.queued', actor, now, {
        proposalId,
        queuedAt: queued.queuedAt ?? now,
        executeAfter: queued.executeAfter ?? now + this.config.executionDelay,
      });
      return queued;
    });
  }

  async execute(proposalId: string, actor: string): Promise<Proposal> {
    return this.withProposal(proposalId, async (proposal, now) => {
      if (proposal.state === 'executed') {
        throw new GovernanceError('AlreadyExecuted', 'proposal already executed', { proposalId });
      }
      if (proposal.state !== 'queued') {
        throw new GovernanceError(
          'IllegalTransition',
          `cannot execute a ${proposal.state} proposal`,
          { proposalId, state: proposal.state },
        );
      }
      this.authorize(this.config.executors, actor, 'execute');

      const executeAfter = proposal.executeAfter ?? now;
      if (now < executeAfter) {
        throw new GovernanceError('TimelockNotElapsed', `executable after ${executeAfter}`, {
          proposalId,
          executeAfter,
        });
      }

      const calls = proposal.targets.map((target, index) => ({
        target,
        value: proposal.values[index],
        payload: proposal.payloads[index],
      }));
      const batch = await this.gateway.invokeAll(calls, proposalId);
      if (!batch.success) {
        throw new GovernanceError('TargetCallFailed', `call ${batch.failedIndex} failed`, {
          proposalId,
          index: batch.failedIndex,
          returnData: batch.returnData,
        });
      }

      const executed = await this.proposals.transition(proposalId, 'queued', 'executed', {
        at: now,
      });
      this.publishState(actor, proposalId, 'queued', 'executed', now);
      this.events.publish('gov.proposal.executed', actor, now, {
        proposalId,
        returnData: batch.results.map((result) => result.returnData),
      });
      return executed;
    });
  }

  async cancel(proposalId: string, actor: string): Promise<Proposal> {
    return this.withProposal(proposalId, async (proposal, now) => {
      if (proposal.state === 'executed') {
        throw new GovernanceError('AlreadyExecuted', 'proposal already executed', { proposalId });
      }
      if (actor !== proposal.proposer && !this.config.cancellers.includes(actor)) {
        throw new GovernanceError('NotAuthorized', `${actor} may not cancel this proposal`, {
          proposalId,
          actor,
        });
      }
      const from = proposal.state;
      if (from !== 'pending' && from !== 'active') {
        throw new GovernanceError('IllegalTransition', `cannot cancel a ${from} proposal`, {
          proposalId,
          state: from,
        });
      }

      const cancelled = await this.proposals.transition(proposalId, from, 'cancelled', { at: now });
      this.publishState(actor, proposalId, from, 'cancelled', now);
      this.events.publish('gov.proposal.cancelled', actor, now, { proposalId });
      return cancelled;
    });
  }

  // -------------------------------------------------------------------------
  // Delegation
  // -------------------------------------------------------------------------

  async delegate(from: string, to: string, amount: AmountInput): Promise<DelegationChange> {
    return this.mutex.runExclusive(DELEGATION_KEY, async () => {
      const change = await this.delegations.delegate(from, to, toAmount(amount));
      this.publishDelegation(change);
      return change;
    });
  }

  async revoke(from: string, to: string, amount: AmountInput): Promise<DelegationChange> {
    return this.mutex.runExclusive(DELEGATION_KEY, async () => {
      const change = await this.delegations.revoke(from, to, toAmount(amount));
      this.publishDelegation(change);
      return change;
    });
  }

  async powerOf(account: string, at?: number): Promise<bigint> {
    return this.delegations.powerOf(account, at ?? this.clock.now());
  }

  // -------------------------------------------------------------------------
  // Restore
  // -------------------------------------------------------------------------

  /**
   * Rebuilds proposals, receipts and delegations from a persisted event chain.
   * Only an engine that has not published anything can be restored; new
   * events continue the restored chain.
   */
  async restore(events: readonly GovernanceEvent[]): Promise<void> {
    if (this.events.length > 0) {
      throw new Error('engine already has events');
    }
    this.events.restore(events);
    const state = replayGovernanceEvents(events);
    for (const record of state.proposals.values()) {
      await this.proposals.restore(record);
    }
    for (const receipt of state.receipts) {
      this.ledger.restore(receipt);
    }
    for (const change of state.delegations) {
      this.delegations.restore(change);
    }
    const last = events[events.length - 1];
    if (last) {
      this.clock.observe(last.ts);
    }
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  /**
   * Runs `task` under the proposal's lock after reporting any time-driven
   * state change since the last observation.
   */
  private async withProposal<T>(
    proposalId: string,
    task: (proposal: Proposal, now: number) => Promise<T>,
  ): Promise<T> {
    return this.mutex.runExclusive(proposalKey(proposalId), async () => {
      const now = this.clock.now();
      const proposal = await this.proposals.get(proposalId, now);
      if (proposal.state !== proposal.observedState) {
        await this.proposals.markObserved(proposalId, proposal.state);
        this.publishState('', proposalId, proposal.observedState, proposal.state, now);
        proposal.observedState = proposal.state;
      }
      return task(proposal, now);
    });
  }

  private authorize(allowed: string[] | undefined, actor: string, action: string): void {
    if (allowed && !allowed.includes(actor)) {
      throw new GovernanceError('NotAuthorized', `${actor} may not ${action}`, { actor });
    }
  }

  private publishState(
    actor: string,
    proposalId: string,
    from: ProposalState,
    to: ProposalState,
    at: number,
  ): void {
    this.events.publish('gov.proposal.state', actor, at, { proposalId, from, to });
  }

  private publishDelegation(change: DelegationChange): void {
    this.events.publish('gov.delegation.changed', change.delegator, change.at, {
      delegator: change.delegator,
      delegate: change.delegate,
      amount: change.amount.toString(),
      delta: change.delta.toString(),
    });
  }
}
