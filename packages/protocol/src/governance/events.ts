/**
 * Governance - Event Envelopes
 *
 * Event types:
 *   gov.proposal.created    - Proposal stored
 *   gov.vote.cast           - Vote recorded
 *   gov.proposal.state      - Derived or recorded state change observed
 *   gov.proposal.queued     - Proposal queued behind the execution delay
 *   gov.proposal.executed   - Proposal effects applied
 *   gov.proposal.cancelled  - Proposal cancelled
 *   gov.delegation.changed  - Delegation edge increased or reduced
 *
 * Envelopes are hash-chained: `prev` is the previous envelope's hash and
 * `hash` covers the canonical JSON of everything else.
 */

import { EventEmitter } from 'node:events';
import { eventHashHex, verifyEventHash } from '@conclave/core/protocol';
import type { ProposalState, VoteChoice, WeightingMode } from './types.js';

// ---------------------------------------------------------------------------
// Payloads
// ---------------------------------------------------------------------------

export interface ProposalCreatedPayload {
  proposalId: string;
  sequence: number;
  proposer: string;
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
  weighting: WeightingMode;
}

export interface VoteCastPayload {
  proposalId: string;
  voter: string;
  choice: VoteChoice;
  power: string;
  weight: string;
  reason?: string;
}

export interface ProposalStateChangedPayload {
  proposalId: string;
  from: ProposalState;
  to: ProposalState;
}

export interface ProposalQueuedPayload {
  proposalId: string;
  queuedAt: number;
  executeAfter: number;
}

export interface ProposalExecutedPayload {
  proposalId: string;
  returnData: string[];
}

export interface ProposalCancelledPayload {
  proposalId: string;
}

export interface DelegationChangedPayload {
  delegator: string;
  delegate: string;
  amount: string;
  delta: string;
}

export interface GovernanceEventPayloads {
  'gov.proposal.created': ProposalCreatedPayload;
  'gov.vote.cast': VoteCastPayload;
  'gov.proposal.state': ProposalStateChangedPayload;
  'gov.proposal.queued': ProposalQueuedPayload;
  'gov.proposal.executed': ProposalExecutedPayload;
  'gov.proposal.cancelled': ProposalCancelledPayload;
  'gov.delegation.changed': DelegationChangedPayload;
}

export type GovernanceEventType = keyof GovernanceEventPayloads;

export const GOVERNANCE_EVENT_TYPES: readonly GovernanceEventType[] = [
  'gov.proposal.created',
  'gov.vote.cast',
  'gov.proposal.state',
  'gov.proposal.queued',
  'gov.proposal.executed',
  'gov.proposal.cancelled',
  'gov.delegation.changed',
];

export interface GovernanceEventEnvelope<T extends GovernanceEventType = GovernanceEventType> {
  v: 1;
  type: T;
  actor: string;
  ts: number;
  seq: number;
  payload: GovernanceEventPayloads[T];
  prev: string | null;
  hash: string;
}

/** Envelope union discriminated on `type`. */
export type GovernanceEvent = {
  [T in GovernanceEventType]: GovernanceEventEnvelope<T>;
}[GovernanceEventType];

export type GovernanceEventListener = (envelope: GovernanceEventEnvelope) => void;

export interface GovernanceEventLogOptions {
  /** Called when a listener throws; the publish itself still succeeds. */
  onListenerError?: (error: unknown, envelope: GovernanceEventEnvelope) => void;
}

function warnListenerError(error: unknown, envelope: GovernanceEventEnvelope): void {
  process.emitWarning(`governance listener failed on ${envelope.type}: ${String(error)}`);
}

// ---------------------------------------------------------------------------
// Log
// ---------------------------------------------------------------------------

const EVENT = 'event';

/**
 * In-process, hash-chained log of governance events. Listeners run
 * synchronously after the envelope is appended; a throwing listener is
 * reported through `onListenerError` and does not affect the others.
 */
export class GovernanceEventLog {
  private readonly emitter = new EventEmitter();
  private readonly envelopes: GovernanceEventEnvelope[] = [];
  private readonly onListenerError: (error: unknown, envelope: GovernanceEventEnvelope) => void;

  constructor(options: GovernanceEventLogOptions = {}) {
    this.onListenerError = options.onListenerError ?? warnListenerError;
  }

  publish<T extends GovernanceEventType>(
    type: T,
    actor: string,
    ts: number,
    payload: GovernanceEventPayloads[T],
  ): GovernanceEventEnvelope<T> {
    const last = this.envelopes[this.envelopes.length - 1];
    const base = {
      v: 1 as const,
      type,
      actor,
      ts,
      seq: this.envelopes.length,
      payload,
      prev: last ? last.hash : null,
    };
    const hash = eventHashHex(base);
    const envelope: GovernanceEventEnvelope<T> = { ...base, hash };
    this.envelopes.push(envelope);
    this.emitter.emit(EVENT, envelope);
    return envelope;
  }

  subscribe(listener: GovernanceEventListener): () => void {
    const guarded = (envelope: GovernanceEventEnvelope): void => {
      try {
        listener(envelope);
      } catch (error) {
        this.onListenerError(error, envelope);
      }
    };
    this.emitter.on(EVENT, guarded);
    return () => {
      this.emitter.off(EVENT, guarded);
    };
  }

  /**
   * Loads a previously persisted chain into an empty log so that new events
   * continue its sequence and `prev` links. Listeners are not called.
   */
  restore(envelopes: readonly GovernanceEventEnvelope[]): void {
    if (this.envelopes.length > 0) {
      throw new Error('event log already has entries');
    }
    let prev: string | null = null;
    envelopes.forEach((envelope, index) => {
      if (envelope.seq !== index || envelope.prev !== prev) {
        throw new Error(`event chain broken at seq ${index}`);
      }
      if (!verifyEventHash({ ...envelope })) {
        throw new Error(`event hash mismatch at seq ${index}`);
      }
      prev = envelope.hash;
    });
    this.envelopes.push(...envelopes);
  }

  list(type?: GovernanceEventType): GovernanceEventEnvelope[] {
    return type ? this.envelopes.filter((envelope) => envelope.type === type) : [...this.envelopes];
  }

  latestHash(): string | null {
    const last = this.envelopes[this.envelopes.length - 1];
    return last ? last.hash : null;
  }

  get length(): number {
    return this.envelopes.length;
  }
}
