/**
 * Governance - Domain Types
 *
 * Proposals carry parallel `targets`/`values`/`payloads` sequences describing
 * the calls to execute on success. Lifecycle state is derived from stored
 * fields and the current time; only queue/execute/cancel facts are recorded.
 */

// ---------------------------------------------------------------------------
// Proposal State
// ---------------------------------------------------------------------------

export const PROPOSAL_STATES = [
  'pending',
  'active',
  'defeated',
  'succeeded',
  'queued',
  'executed',
  'cancelled',
] as const;

export type ProposalState = (typeof PROPOSAL_STATES)[number];

export function isProposalState(value: string): value is ProposalState {
  return PROPOSAL_STATES.some((state) => state === value);
}

export const TERMINAL_STATES: readonly ProposalState[] = ['executed', 'cancelled', 'defeated'];

// ---------------------------------------------------------------------------
// Vote
// ---------------------------------------------------------------------------

export const VOTE_CHOICES = ['against', 'for', 'abstain'] as const;

export type VoteChoice = (typeof VOTE_CHOICES)[number];

export function isVoteChoice(value: string): value is VoteChoice {
  return VOTE_CHOICES.some((choice) => choice === value);
}

export interface VoteReceipt {
  proposalId: string;
  voter: string;
  choice: VoteChoice;
  /** Snapshot power at the proposal's voting start. */
  power: bigint;
  /** Power after the proposal's weighting mode; the tallied amount. */
  weight: bigint;
  reason?: string;
  timestamp: number;
}

// ---------------------------------------------------------------------------
// Weighting
// ---------------------------------------------------------------------------

export const WEIGHTING_MODES = ['linear', 'quadratic', 'reputation'] as const;

export type WeightingMode = (typeof WEIGHTING_MODES)[number];

export function isWeightingMode(value: string): value is WeightingMode {
  return WEIGHTING_MODES.some((mode) => mode === value);
}

// ---------------------------------------------------------------------------
// Proposal
// ---------------------------------------------------------------------------

export interface ProposalTally {
  for: bigint;
  against: bigint;
  abstain: bigint;
}

export interface ProposalRecord {
  id: string;
  sequence: number;
  proposer: string;
  targets: string[];
  values: bigint[];
  payloads: string[];
  description: string;
  descriptionHash: string;
  createdAt: number;
  votingStart: number;
  votingEnd: number;
  quorumRequirement: bigint;
  approvalThresholdPercent: number;
  abstainCountsTowardApproval: boolean;
  weighting: WeightingMode;
  tally: ProposalTally;
  executed: boolean;
  queuedAt?: number;
  executeAfter?: number;
  executedAt?: number;
  cancelledAt?: number;
  /** Last state reported to observers; used to emit lazy transitions once. */
  observedState: ProposalState;
}

export interface Proposal extends ProposalRecord {
  state: ProposalState;
}

export interface ProposalOutcome {
  proposalId: string;
  state: ProposalState;
  tally: ProposalTally;
  totalVotes: bigint;
  quorumRequirement: bigint;
  quorumReached: boolean;
  approvalReached: boolean;
}

// ---------------------------------------------------------------------------
// Delegation
// ---------------------------------------------------------------------------

export interface Delegation {
  delegator: string;
  delegate: string;
  amount: bigint;
  updatedAt: number;
}

export interface DelegationChange {
  delegator: string;
  delegate: string;
  /** Edge amount after the change. */
  amount: bigint;
  /** Signed change applied to the edge. */
  delta: bigint;
  at: number;
}

// ---------------------------------------------------------------------------
// Execution
// ---------------------------------------------------------------------------

export interface ExecutionCall {
  target: string;
  value: bigint;
  payload: string;
}

export interface InvocationResult {
  success: boolean;
  returnData: string;
}

// ---------------------------------------------------------------------------
// Governance Configuration
// ---------------------------------------------------------------------------

export interface GovernanceConfig {
  /** Delay between creation and voting start (ms or block-equivalent units). */
  votingDelay: number;
  votingPeriod: number;
  /** Cooldown between queuing and the earliest execution. */
  executionDelay: number;
  quorum: bigint;
  /** Percentage of the approval denominator that must vote for; 0 < t ≤ 100. */
  approvalThresholdPercent: number;
  /** Minimum effective power a proposer needs at creation time. */
  proposalThreshold: bigint;
  abstainCountsTowardApproval: boolean;
  weighting: WeightingMode;
  /** Accounts allowed to cancel any pending or active proposal. */
  cancellers: string[];
  /** Accounts allowed to queue; undefined lets anyone queue. */
  queuers?: string[];
  /** Accounts allowed to execute; undefined lets anyone execute. */
  executors?: string[];
}

const DAY_MS = 24 * 60 * 60 * 1000;

export const DEFAULT_GOVERNANCE_CONFIG: GovernanceConfig = {
  votingDelay: 0,
  votingPeriod: 3 * DAY_MS,
  executionDelay: 1 * DAY_MS,
  quorum: 1n,
  approvalThresholdPercent: 50,
  proposalThreshold: 0n,
  abstainCountsTowardApproval: false,
  weighting: 'linear',
  cancellers: [],
};
