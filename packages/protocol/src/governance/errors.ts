/**
 * Governance - Errors
 *
 * Every failure is a GovernanceError with a stable code. The category tells
 * callers whether retrying later can help (temporal, execution) or not.
 */

export type GovernanceErrorCategory =
  | 'validation'
  | 'authorization'
  | 'temporal'
  | 'state'
  | 'execution';

export const GOVERNANCE_ERROR_CATEGORIES = {
  InvalidProposal: 'validation',
  DuplicateProposal: 'validation',
  InvalidAmount: 'validation',
  InvalidAccount: 'validation',
  InvalidVote: 'validation',
  SelfDelegation: 'validation',
  InsufficientPower: 'validation',
  InsufficientDelegation: 'validation',
  InvalidConfig: 'validation',
  NotAuthorized: 'authorization',
  BelowProposalThreshold: 'authorization',
  VotingNotOpen: 'temporal',
  VotingNotClosed: 'temporal',
  TimelockNotElapsed: 'temporal',
  NotFound: 'state',
  IllegalTransition: 'state',
  AlreadyVoted: 'state',
  AlreadyExecuted: 'state',
  NoVotingPower: 'state',
  TargetCallFailed: 'execution',
} as const satisfies Record<string, GovernanceErrorCategory>;

export type GovernanceErrorCode = keyof typeof GOVERNANCE_ERROR_CATEGORIES;

export type GovernanceErrorDetails = Record<string, string | number | boolean | null>;

export class GovernanceError extends Error {
  readonly category: GovernanceErrorCategory;

  constructor(
    public readonly code: GovernanceErrorCode,
    message: string,
    public readonly details?: GovernanceErrorDetails,
  ) {
    super(message);
    this.name = 'GovernanceError';
    this.category = GOVERNANCE_ERROR_CATEGORIES[code];
  }

  get retryable(): boolean {
    return this.category === 'temporal' || this.category === 'execution';
  }
}

export function isGovernanceError(
  error: unknown,
  code?: GovernanceErrorCode,
): error is GovernanceError {
  return error instanceof GovernanceError && (code === undefined || error.code === code);
}

/** True when the same call may succeed later without any other change. */
export function isRetryable(error: unknown): boolean {
  return error instanceof GovernanceError && error.retryable;
}
