/**
 * Governance - Proposal Store
 *
 * Sole owner of proposal records. Reads return copies with the state derived
 * at the store clock's current time.
 */

import { canonicalizeBytes, sha256Hex, sha256Utf8Hex } from '@conclave/core/crypto';
import { normalizeHex } from '@conclave/core/utils';
import type { Clock } from './clock.js';
import { GovernanceError } from './errors.js';
import { canTransition, emptyTally, resolveProposalState } from './state.js';
import type {
  Proposal,
  ProposalRecord,
  ProposalState,
  ProposalTally,
  VoteChoice,
  WeightingMode,
} from './types.js';

// ---------------------------------------------------------------------------
// Interface
// ---------------------------------------------------------------------------

export type AmountInput = bigint | number | string;

export interface CreateProposalParams {
  proposer: string;
  targets: string[];
  values: AmountInput[];
  payloads: string[];
  description: string;
  votingDelay: number;
  votingPeriod: number;
  quorumRequirement: bigint;
  approvalThresholdPercent: number;
  abstainCountsTowardApproval: boolean;
  weighting: WeightingMode;
  /** Creation time; the store clock is read when omitted. */
  at?: number;
}

export interface TransitionDetail {
  /** Time of the transition; the store clock is read when omitted. */
  at?: number;
  executeAfter?: number;
}

export interface ProposalStore {
  create(params: CreateProposalParams): Promise<string>;
  get(proposalId: string, at?: number): Promise<Proposal>;
  has(proposalId: string): Promise<boolean>;
  list(state?: ProposalState): Promise<Proposal[]>;
  transition(
    proposalId: string,
    from: ProposalState,
    to: ProposalState,
    detail?: TransitionDetail,
  ): Promise<Proposal>;
  recordVote(
    proposalId: string,
    choice: VoteChoice,
    weight: bigint,
    at?: number,
  ): Promise<ProposalTally>;
  markObserved(proposalId: string, state: ProposalState): Promise<void>;
  /** Loads a record rebuilt from the event log. */
  restore(record: ProposalRecord): Promise<void>;
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

function invalid(message: string): GovernanceError {
  return new GovernanceError('InvalidProposal', message);
}

export function normalizeAmount(value: AmountInput, field: string): bigint {
  let parsed: bigint;
  if (typeof value === 'bigint') {
    parsed = value;
  } else if (typeof value === 'number') {
    if (!Number.isSafeInteger(value)) {
      throw invalid(`${field} must be an integer`);
    }
    parsed = BigInt(value);
  } else {
    if (!/^\d+$/.test(value.trim())) {
      throw invalid(`${field} must be a non-negative integer string`);
    }
    parsed = BigInt(value.trim());
  }
  if (parsed < 0n) {
    throw invalid(`${field} must be >= 0`);
  }
  return parsed;
}

function normalizePayload(payload: string, index: number): string {
  try {
    return normalizeHex(payload);
  } catch {
    throw invalid(`payloads[${index}] must be a hex string`);
  }
}

function validateWindow(votingDelay: number, votingPeriod: number): void {
  if (!Number.isFinite(votingDelay) || votingDelay < 0) {
    throw invalid('votingDelay must be >= 0');
  }
  if (!Number.isFinite(votingPeriod) || votingPeriod <= 0) {
    throw invalid('votingPeriod must be > 0');
  }
}

export function proposalIdFor(proposer: string, descriptionHash: string, sequence: number): string {
  return sha256Hex(canonicalizeBytes({ proposer, descriptionHash, sequence }));
}

function contentKeyFor(
  targets: string[],
  values: bigint[],
  payloads: string[],
  descriptionHash: string,
): string {
  return sha256Hex(canonicalizeBytes({ targets, values, payloads, descriptionHash }));
}

function copyRecord(record: ProposalRecord): ProposalRecord {
  return {
    ...record,
    targets: [...record.targets],
    values: [...record.values],
    payloads: [...record.payloads],
    tally: { ...record.tally },
  };
}

// ---------------------------------------------------------------------------
// Memory Implementation
// ---------------------------------------------------------------------------

export class MemoryProposalStore implements ProposalStore {
  private readonly records = new Map<string, ProposalRecord>();
  private readonly byContent = new Map<string, string[]>();
  private sequence = 0;

  constructor(private readonly clock: Clock) {}

  async create(params: CreateProposalParams): Promise<string> {
    const { targets, values, payloads } = params;
    if (targets.length === 0) {
      throw invalid('targets must be a non-empty array');
    }
    if (values.length !== targets.length || payloads.length !== targets.length) {
      throw invalid('targets, values and payloads must have the same length');
    }
    targets.forEach((target, index) => {
      if (!target || target.trim().length === 0) {
        throw invalid(`targets[${index}] is required`);
      }
    });
    if (!params.description || params.description.trim().length === 0) {
      throw invalid('description is required');
    }
    if (!params.proposer || params.proposer.trim().length === 0) {
      throw invalid('proposer is required');
    }
    validateWindow(params.votingDelay, params.votingPeriod);

    const normalizedValues = values.map((value, index) => normalizeAmount(value, `values[${index}]`));
    const normalizedPayloads = payloads.map((payload, index) => normalizePayload(payload, index));
    const descriptionHash = sha256Utf8Hex(params.description);
    const now = params.at ?? this.clock.now();

    const contentKey = contentKeyFor(targets, normalizedValues, normalizedPayloads, descriptionHash);
    const siblings = this.byContent.get(contentKey) ?? [];
    for (const siblingId of siblings) {
      const sibling = this.records.get(siblingId);
      if (!sibling) continue;
      const state = resolveProposalState(sibling, now);
      if (state === 'pending' || state === 'active') {
        throw new GovernanceError(
          'DuplicateProposal',
          `an identical proposal is already ${state}`,
          { proposalId: siblingId },
        );
      }
    }

    const sequence = this.sequence + 1;
    const id = proposalIdFor(params.proposer, descriptionHash, sequence);
    const votingStart = now + params.votingDelay;
    const record: ProposalRecord = {
      id,
      sequence,
      proposer: params.proposer,
      targets: [...targets],
      values: normalizedValues,
      payloads: normalizedPayloads,
      description: params.description,
      descriptionHash,
      createdAt: now,
      votingStart,
      votingEnd: votingStart + params.votingPeriod,
      quorumRequirement: params.quorumRequirement,
      approvalThresholdPercent: params.approvalThresholdPercent,
      abstainCountsTowardApproval: params.abstainCountsTowardApproval,
      weighting: params.weighting,
      tally: emptyTally(),
      executed: false,
      observedState: 'pending',
    };
    record.observedState = resolveProposalState(record, now);

    this.sequence = sequence;
    this.records.set(id, record);
    this.byContent.set(contentKey, [...siblings, id]);
    return id;
  }

  async get(proposalId: string, at: number = this.clock.now()): Promise<Proposal> {
    const record = this.require(proposalId);
    return { ...copyRecord(record), state: resolveProposalState(record, at) };
  }

  async has(proposalId: string): Promise<boolean> {
    return this.records.has(proposalId);
  }

  async list(state?: ProposalState): Promise<Proposal[]> {
    const now = this.clock.now();
    const all = [...this.records.values()]
      .sort((a, b) => a.sequence - b.sequence)
      .map((record) => ({ ...copyRecord(record), state: resolveProposalState(record, now) }));
    return state ? all.filter((proposal) => proposal.state === state) : all;
  }

  async transition(
    proposalId: string,
    from: ProposalState,
    to: ProposalState,
    detail: TransitionDetail = {},
  ): Promise<Proposal> {
    const record = this.require(proposalId);
    const now = detail.at ?? this.clock.now();
    const current = resolveProposalState(record, now);
    if (current !== from) {
      throw new GovernanceError(
        'IllegalTransition',
        `proposal is ${current}, expected ${from}`,
        { proposalId, from, to, current },
      );
    }
    if (!canTransition(from, to)) {
      throw new GovernanceError('IllegalTransition', `cannot transition from ${from} to ${to}`, {
        proposalId,
        from,
        to,
      });
    }

    const next = copyRecord(record);
    switch (to) {
      case 'queued':
        if (detail.executeAfter === undefined || detail.executeAfter < now) {
          throw new GovernanceError('IllegalTransition', 'queuing requires executeAfter >= now', {
            proposalId,
          });
        }
        next.queuedAt = now;
        next.executeAfter = detail.executeAfter;
        break;
      case 'executed':
        next.executed = true;
        next.executedAt = now;
        break;
      case 'cancelled':
        next.cancelledAt = now;
        break;
      default:
        break;
    }
    next.observedState = to;
    this.records.set(proposalId, next);
    return { ...copyRecord(next), state: to };
  }

  async recordVote(
    proposalId: string,
    choice: VoteChoice,
    weight: bigint,
    at: number = this.clock.now(),
  ): Promise<ProposalTally> {
    const record = this.require(proposalId);
    const state = resolveProposalState(record, at);
    if (state !== 'active') {
      throw new GovernanceError('VotingNotOpen', `proposal is ${state}`, { proposalId, state });
    }
    if (weight < 0n) {
      throw new GovernanceError('InvalidAmount', 'weight must be >= 0');
    }
    const tally = { ...record.tally, [choice]: record.tally[choice] + weight };
    this.records.set(proposalId, { ...record, tally });
    return { ...tally };
  }

  async markObserved(proposalId: string, state: ProposalState): Promise<void> {
    const record = this.require(proposalId);
    this.records.set(proposalId, { ...record, observedState: state });
  }

  async restore(record: ProposalRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new GovernanceError('DuplicateProposal', `proposal ${record.id} already exists`, {
        proposalId: record.id,
      });
    }
    const contentKey = contentKeyFor(
      record.targets,
      record.values,
      record.payloads,
      record.descriptionHash,
    );
    this.records.set(record.id, copyRecord(record));
    this.byContent.set(contentKey, [...(this.byContent.get(contentKey) ?? []), record.id]);
    this.sequence = Math.max(this.sequence, record.sequence);
  }

  private require(proposalId: string): ProposalRecord {
    const record = this.records.get(proposalId);
    if (!record) {
      throw new GovernanceError('NotFound', `proposal ${proposalId} not found`, { proposalId });
    }
    return record;
  }
}
