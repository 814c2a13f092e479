/**
 * Governance - External Power Sources
 *
 * The engine reads raw voting power and reputation from these oracles. Both
 * must return the same answer for the same (account, at) pair.
 */

import { CheckpointHistory, ValueHistory } from './checkpoints.js';

export interface VotingPowerSource {
  getPower(account: string, at: number): Promise<bigint>;
}

export interface ReputationSource {
  getReputation(account: string, at: number): Promise<number>;
}

/** Checkpoint time for balances and scores that hold from the beginning. */
export const GENESIS = Number.MIN_SAFE_INTEGER;

/**
 * In-memory power ledger backed by checkpoint histories, for hosts that seed
 * balances from configuration and for tests.
 */
export class CheckpointPowerSource implements VotingPowerSource {
  private readonly balances = new Map<string, CheckpointHistory>();

  setPower(account: string, at: number, power: bigint): void {
    if (power < 0n) {
      throw new Error('power must be >= 0');
    }
    let history = this.balances.get(account);
    if (!history) {
      history = new CheckpointHistory();
      this.balances.set(account, history);
    }
    history.push(at, power);
  }

  async getPower(account: string, at: number): Promise<bigint> {
    return this.balances.get(account)?.valueAt(at) ?? 0n;
  }

  accounts(): string[] {
    return [...this.balances.keys()];
  }
}

/** Reputation scores with history; initial scores hold from genesis. */
export class CheckpointReputationSource implements ReputationSource {
  private readonly scores = new Map<string, ValueHistory<number>>();

  constructor(initial: Record<string, number> = {}) {
    for (const [account, score] of Object.entries(initial)) {
      this.set(account, GENESIS, score);
    }
  }

  set(account: string, at: number, score: number): void {
    let history = this.scores.get(account);
    if (!history) {
      history = new ValueHistory<number>(0);
      this.scores.set(account, history);
    }
    history.push(at, score);
  }

  async getReputation(account: string, at: number): Promise<number> {
    return this.scores.get(account)?.valueAt(at) ?? 0;
  }
}
