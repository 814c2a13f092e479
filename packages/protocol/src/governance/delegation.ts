/**
 * Governance - Delegation Registry
 *
 * Amount-based, single-hop delegation. Every edge and every per-account total
 * keeps a checkpoint history, so power can be read as of any past point:
 *
 *   powerOf(a, t) = max(0, own(a, t) - delegatedOut(a, t)) + delegatedIn(a, t)
 *
 * Power received through delegation cannot be delegated again.
 */

import { CheckpointHistory } from './checkpoints.js';
import type { Clock } from './clock.js';
import { GovernanceError } from './errors.js';
import type { VotingPowerSource } from './power.js';
import type { Delegation, DelegationChange } from './types.js';

function historyFor(map: Map<string, CheckpointHistory>, key: string): CheckpointHistory {
  let history = map.get(key);
  if (!history) {
    history = new CheckpointHistory();
    map.set(key, history);
  }
  return history;
}

function requireAccount(value: string, field: string): void {
  if (!value || value.trim().length === 0) {
    throw new GovernanceError('InvalidAccount', `${field} is required`);
  }
}

export class DelegationRegistry {
  /** delegator → delegate → edge amount history */
  private readonly edges = new Map<string, Map<string, CheckpointHistory>>();
  private readonly outgoing = new Map<string, CheckpointHistory>();
  private readonly incoming = new Map<string, CheckpointHistory>();
  private readonly lastChange = new Map<string, number>();

  constructor(
    private readonly source: VotingPowerSource,
    private readonly clock: Clock,
  ) {}

  async delegate(from: string, to: string, amount: bigint): Promise<DelegationChange> {
    requireAccount(from, 'delegator');
    requireAccount(to, 'delegate');
    if (from === to) {
      throw new GovernanceError('SelfDelegation', 'cannot delegate to self', { account: from });
    }
    if (amount <= 0n) {
      throw new GovernanceError('InvalidAmount', 'amount must be > 0');
    }
    const now = this.clock.now();
    const available = await this.undelegatedPowerOf(from, now);
    if (amount > available) {
      throw new GovernanceError('InsufficientPower', 'amount exceeds undelegated power', {
        account: from,
        available: available.toString(),
        requested: amount.toString(),
      });
    }
    return this.applyChange(from, to, amount, now);
  }

  async revoke(from: string, to: string, amount: bigint): Promise<DelegationChange> {
    requireAccount(from, 'delegator');
    requireAccount(to, 'delegate');
    if (amount <= 0n) {
      throw new GovernanceError('InvalidAmount', 'amount must be > 0');
    }
    const current = this.delegationOf(from, to);
    if (amount > current) {
      throw new GovernanceError('InsufficientDelegation', 'amount exceeds recorded delegation', {
        delegator: from,
        delegate: to,
        delegated: current.toString(),
        requested: amount.toString(),
      });
    }
    return this.applyChange(from, to, -amount, this.clock.now());
  }

  /** Replays a change read from the event log. */
  restore(change: DelegationChange): DelegationChange {
    requireAccount(change.delegator, 'delegator');
    requireAccount(change.delegate, 'delegate');
    const applied = this.applyChange(change.delegator, change.delegate, change.delta, change.at);
    if (applied.amount !== change.amount || applied.amount < 0n) {
      throw new GovernanceError('InsufficientDelegation', 'replayed delegation does not match', {
        delegator: change.delegator,
        delegate: change.delegate,
        expected: change.amount.toString(),
        actual: applied.amount.toString(),
      });
    }
    return applied;
  }

  async ownPowerOf(account: string, at: number): Promise<bigint> {
    return this.source.getPower(account, at);
  }

  async undelegatedPowerOf(account: string, at: number): Promise<bigint> {
    const own = await this.ownPowerOf(account, at);
    const remaining = own - this.delegatedOut(account, at);
    return remaining > 0n ? remaining : 0n;
  }

  /** Effective voting power of `account` as of `at`. */
  async powerOf(account: string, at: number = this.clock.now()): Promise<bigint> {
    const undelegated = await this.undelegatedPowerOf(account, at);
    return undelegated + this.delegatedIn(account, at);
  }

  delegatedOut(account: string, at: number = this.clock.now()): bigint {
    return this.outgoing.get(account)?.valueAt(at) ?? 0n;
  }

  delegatedIn(account: string, at: number = this.clock.now()): bigint {
    return this.incoming.get(account)?.valueAt(at) ?? 0n;
  }

  delegationOf(from: string, to: string, at: number = this.clock.now()): bigint {
    return this.edges.get(from)?.get(to)?.valueAt(at) ?? 0n;
  }

  /** Active outgoing edges of `delegator`, in first-delegation order. */
  delegationsFrom(delegator: string): Delegation[] {
    const result: Delegation[] = [];
    for (const [delegate, history] of this.edges.get(delegator) ?? []) {
      const amount = history.latest();
      if (amount > 0n) {
        result.push({
          delegator,
          delegate,
          amount,
          updatedAt: this.lastChange.get(`${delegator}\u0000${delegate}`) ?? 0,
        });
      }
    }
    return result;
  }

  /** Active incoming edges of `delegate`. */
  delegationsTo(delegate: string): Delegation[] {
    const result: Delegation[] = [];
    for (const delegator of this.edges.keys()) {
      for (const delegation of this.delegationsFrom(delegator)) {
        if (delegation.delegate === delegate) {
          result.push(delegation);
        }
      }
    }
    return result;
  }

  private applyChange(from: string, to: string, delta: bigint, at: number): DelegationChange {
    let byDelegate = this.edges.get(from);
    if (!byDelegate) {
      byDelegate = new Map();
      this.edges.set(from, byDelegate);
    }
    const edge = historyFor(byDelegate, to);
    const out = historyFor(this.outgoing, from);
    const into = historyFor(this.incoming, to);

    const amount = edge.latest() + delta;
    edge.push(at, amount);
    out.push(at, out.latest() + delta);
    into.push(at, into.latest() + delta);
    this.lastChange.set(`${from}\u0000${to}`, at);

    return { delegator: from, delegate: to, amount, delta, at };
  }
}
