/**
 * Governance - Event Replay
 *
 * Rebuilds proposals, receipts and delegation history from persisted event
 * envelopes. Envelopes are parsed field by field, then folded in order.
 */

import { verifyEventHash } from '@conclave/core/protocol';
import { GovernanceError } from './errors.js';
import type {
  DelegationChangedPayload,
  GovernanceEvent,
  GovernanceEventEnvelope,
  GovernanceEventPayloads,
  GovernanceEventType,
  ProposalCreatedPayload,
  ProposalQueuedPayload,
  ProposalStateChangedPayload,
  VoteCastPayload,
} from './events.js';
import { emptyTally, resolveProposalState } from './state.js';
import type { DelegationChange, ProposalRecord, VoteReceipt } from './types.js';
import { isProposalState, isVoteChoice, isWeightingMode } from './types.js';

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

type Fields = Record<string, unknown>;

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(message: string): Error {
  return new Error(`malformed governance event: ${message}`);
}

function readString(fields: Fields, key: string): string {
  const value = fields[key];
  if (typeof value !== 'string') {
    throw malformed(`${key} must be a string`);
  }
  return value;
}

function readNumber(fields: Fields, key: string): number {
  const value = fields[key];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw malformed(`${key} must be a number`);
  }
  return value;
}

function readBoolean(fields: Fields, key: string): boolean {
  const value = fields[key];
  if (typeof value !== 'boolean') {
    throw malformed(`${key} must be a boolean`);
  }
  return value;
}

function readStrings(fields: Fields, key: string): string[] {
  const value = fields[key];
  if (!Array.isArray(value)) {
    throw malformed(`${key} must be a list`);
  }
  return value.map((item, index) => {
    if (typeof item !== 'string') {
      throw malformed(`${key}[${index}] must be a string`);
    }
    return item;
  });
}

function readAmount(fields: Fields, key: string): bigint {
  const value = readString(fields, key);
  if (!/^-?\d+$/.test(value)) {
    throw malformed(`${key} must be an integer string`);
  }
  return BigInt(value);
}

function readCreated(fields: Fields): ProposalCreatedPayload {
  const weighting = readString(fields, 'weighting');
  if (!isWeightingMode(weighting)) {
    throw malformed(`unknown weighting ${weighting}`);
  }
  return {
    proposalId: readString(fields, 'proposalId'),
    sequence: readNumber(fields, 'sequence'),
    proposer: readString(fields, 'proposer'),
    targets: readStrings(fields, 'targets'),
    values: readStrings(fields, 'values'),
    payloads: readStrings(fields, 'payloads'),
    description: readString(fields, 'description'),
    descriptionHash: readString(fields, 'descriptionHash'),
    createdAt: readNumber(fields, 'createdAt'),
    votingStart: readNumber(fields, 'votingStart'),
    votingEnd: readNumber(fields, 'votingEnd'),
    quorumRequirement: readString(fields, 'quorumRequirement'),
    approvalThresholdPercent: readNumber(fields, 'approvalThresholdPercent'),
    abstainCountsTowardApproval: readBoolean(fields, 'abstainCountsTowardApproval'),
    weighting,
  };
}

function readVote(fields: Fields): VoteCastPayload {
  const choice = readString(fields, 'choice');
  if (!isVoteChoice(choice)) {
    throw malformed(`unknown vote choice ${choice}`);
  }
  return {
    proposalId: readString(fields, 'proposalId'),
    voter: readString(fields, 'voter'),
    choice,
    power: readString(fields, 'power'),
    weight: readString(fields, 'weight'),
    ...(fields.reason !== undefined ? { reason: readString(fields, 'reason') } : {}),
  };
}

function readStateChange(fields: Fields): ProposalStateChangedPayload {
  const from = readString(fields, 'from');
  const to = readString(fields, 'to');
  if (!isProposalState(from) || !isProposalState(to)) {
    throw malformed(`unknown state change ${from} -> ${to}`);
  }
  return { proposalId: readString(fields, 'proposalId'), from, to };
}

function readQueued(fields: Fields): ProposalQueuedPayload {
  return {
    proposalId: readString(fields, 'proposalId'),
    queuedAt: readNumber(fields, 'queuedAt'),
    executeAfter: readNumber(fields, 'executeAfter'),
  };
}

function readDelegation(fields: Fields): DelegationChangedPayload {
  return {
    delegator: readString(fields, 'delegator'),
    delegate: readString(fields, 'delegate'),
    amount: readString(fields, 'amount'),
    delta: readString(fields, 'delta'),
  };
}

interface EnvelopeBase {
  v: 1;
  actor: string;
  ts: number;
  seq: number;
  prev: string | null;
  hash: string;
}

function envelopeOf<T extends GovernanceEventType>(
  base: EnvelopeBase,
  type: T,
  payload: GovernanceEventPayloads[T],
): GovernanceEventEnvelope<T> {
  return { ...base, type, payload };
}

/**
 * Validates a decoded envelope and its hash, returning it typed by event
 * kind. Throws on anything that is not a governance event.
 */
export function parseGovernanceEnvelope(value: unknown): GovernanceEvent {
  if (!isFields(value)) {
    throw malformed('envelope must be an object');
  }
  if (!verifyEventHash(value)) {
    throw malformed('hash mismatch');
  }
  if (value.v !== 1) {
    throw malformed(`unsupported version ${String(value.v)}`);
  }
  const prev = value.prev;
  if (prev !== null && typeof prev !== 'string') {
    throw malformed('prev must be a string or null');
  }
  const payload = value.payload;
  if (!isFields(payload)) {
    throw malformed('payload must be an object');
  }
  const base: EnvelopeBase = {
    v: 1,
    actor: readString(value, 'actor'),
    ts: readNumber(value, 'ts'),
    seq: readNumber(value, 'seq'),
    prev,
    hash: readString(value, 'hash'),
  };

  const type = readString(value, 'type');
  switch (type) {
    case 'gov.proposal.created':
      return envelopeOf(base, type, readCreated(payload));
    case 'gov.vote.cast':
      return envelopeOf(base, type, readVote(payload));
    case 'gov.proposal.state':
      return envelopeOf(base, type, readStateChange(payload));
    case 'gov.proposal.queued':
      return envelopeOf(base, type, readQueued(payload));
    case 'gov.proposal.executed':
      return envelopeOf(base, type, {
        proposalId: readString(payload, 'proposalId'),
        returnData: readStrings(payload, 'returnData'),
      });
    case 'gov.proposal.cancelled':
      return envelopeOf(base, type, { proposalId: readString(payload, 'proposalId') });
    case 'gov.delegation.changed':
      return envelopeOf(base, type, readDelegation(payload));
    default:
      throw malformed(`unknown type ${type}`);
  }
}

// ---------------------------------------------------------------------------
// Reducer
// ---------------------------------------------------------------------------

export interface GovernanceReplayState {
  proposals: Map<string, ProposalRecord>;
  receipts: VoteReceipt[];
  delegations: DelegationChange[];
}

export function createReplayState(): GovernanceReplayState {
  return { proposals: new Map(), receipts: [], delegations: [] };
}

function requireRecord(state: GovernanceReplayState, proposalId: string): ProposalRecord {
  const record = state.proposals.get(proposalId);
  if (!record) {
    throw new GovernanceError('NotFound', `proposal ${proposalId} not found`, { proposalId });
  }
  return record;
}

function applyCreated(state: GovernanceReplayState, payload: ProposalCreatedPayload): void {
  if (state.proposals.has(payload.proposalId)) {
    throw new GovernanceError('DuplicateProposal', `proposal ${payload.proposalId} already exists`, {
      proposalId: payload.proposalId,
    });
  }
  const record: ProposalRecord = {
    id: payload.proposalId,
    sequence: payload.sequence,
    proposer: payload.proposer,
    targets: [...payload.targets],
    values: payload.values.map((value) => BigInt(value)),
    payloads: [...payload.payloads],
    description: payload.description,
    descriptionHash: payload.descriptionHash,
    createdAt: payload.createdAt,
    votingStart: payload.votingStart,
    votingEnd: payload.votingEnd,
    quorumRequirement: BigInt(payload.quorumRequirement),
    approvalThresholdPercent: payload.approvalThresholdPercent,
    abstainCountsTowardApproval: payload.abstainCountsTowardApproval,
    weighting: payload.weighting,
    tally: emptyTally(),
    executed: false,
    observedState: 'pending',
  };
  record.observedState = resolveProposalState(record, payload.createdAt);
  state.proposals.set(record.id, record);
}

function applyVote(state: GovernanceReplayState, payload: VoteCastPayload, ts: number): void {
  const record = requireRecord(state, payload.proposalId);
  const weight = BigInt(payload.weight);
  record.tally = { ...record.tally, [payload.choice]: record.tally[payload.choice] + weight };
  state.receipts.push({
    proposalId: payload.proposalId,
    voter: payload.voter,
    choice: payload.choice,
    power: BigInt(payload.power),
    weight,
    reason: payload.reason,
    timestamp: ts,
  });
}

/** Folds one envelope into `state`, in log order. */
export function applyGovernanceEvent(state: GovernanceReplayState, event: GovernanceEvent): void {
  switch (event.type) {
    case 'gov.proposal.created':
      applyCreated(state, event.payload);
      break;
    case 'gov.vote.cast':
      applyVote(state, event.payload, event.ts);
      break;
    case 'gov.proposal.state':
      requireRecord(state, event.payload.proposalId).observedState = event.payload.to;
      break;
    case 'gov.proposal.queued': {
      const record = requireRecord(state, event.payload.proposalId);
      record.queuedAt = event.payload.queuedAt;
      record.executeAfter = event.payload.executeAfter;
      break;
    }
    case 'gov.proposal.executed': {
      const record = requireRecord(state, event.payload.proposalId);
      record.executed = true;
      record.executedAt = event.ts;
      break;
    }
    case 'gov.proposal.cancelled':
      requireRecord(state, event.payload.proposalId).cancelledAt = event.ts;
      break;
    case 'gov.delegation.changed':
      state.delegations.push({
        delegator: event.payload.delegator,
        delegate: event.payload.delegate,
        amount: BigInt(event.payload.amount),
        delta: BigInt(event.payload.delta),
        at: event.ts,
      });
      break;
  }
}

export function replayGovernanceEvents(events: readonly GovernanceEvent[]): GovernanceReplayState {
  const state = createReplayState();
  for (const event of events) {
    applyGovernanceEvent(state, event);
  }
  return state;
}
