import { describe, expect, it } from 'vitest';
import { eventHashHex, verifyEventHash } from '@conclave/core/protocol';
import { GovernanceEventLog, type GovernanceEventEnvelope } from '../src/governance/index.js';

describe('governance event log', () => {
  it('chains envelopes by hash', () => {
    const log = new GovernanceEventLog();
    const first = log.publish('gov.proposal.cancelled', 'alice', 10, { proposalId: 'p-1' });
    const second = log.publish('gov.proposal.state', 'bob', 11, {
      proposalId: 'p-1',
      from: 'active',
      to: 'cancelled',
    });

    expect(first.seq).toBe(0);
    expect(first.prev).toBeNull();
    expect(second.seq).toBe(1);
    expect(second.prev).toBe(first.hash);
    expect(first.hash).toBe(
      eventHashHex({
        v: 1,
        type: 'gov.proposal.cancelled',
        actor: 'alice',
        ts: 10,
        seq: 0,
        payload: { proposalId: 'p-1' },
        prev: null,
      }),
    );
    expect(verifyEventHash({ ...second })).toBe(true);
    expect(log.latestHash()).toBe(second.hash);
    expect(log.length).toBe(2);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const log = new GovernanceEventLog();
    const seen: GovernanceEventEnvelope[] = [];
    const unsubscribe = log.subscribe((envelope) => seen.push(envelope));
    log.publish('gov.proposal.cancelled', 'alice', 1, { proposalId: 'p-1' });
    unsubscribe();
    log.publish('gov.proposal.cancelled', 'alice', 2, { proposalId: 'p-2' });
    expect(seen.map((envelope) => envelope.seq)).toEqual([0]);
  });

  it('filters by type', () => {
    const log = new GovernanceEventLog();
    log.publish('gov.proposal.cancelled', 'alice', 1, { proposalId: 'p-1' });
    log.publish('gov.delegation.changed', 'alice', 2, {
      delegator: 'alice',
      delegate: 'bob',
      amount: '5',
      delta: '5',
    });
    expect(log.list('gov.delegation.changed').map((envelope) => envelope.seq)).toEqual([1]);
    expect(log.list()).toHaveLength(2);
  });

  it('keeps notifying when one listener throws', () => {
    const failures: Array<[unknown, number]> = [];
    const log = new GovernanceEventLog({
      onListenerError: (error, envelope) => failures.push([error, envelope.seq]),
    });
    const seen: number[] = [];
    log.subscribe(() => {
      throw new Error('listener down');
    });
    log.subscribe((envelope) => seen.push(envelope.seq));

    const envelope = log.publish('gov.proposal.cancelled', 'alice', 1, { proposalId: 'p-1' });

    expect(envelope.seq).toBe(0);
    expect(seen).toEqual([0]);
    expect(failures).toHaveLength(1);
    expect(String(failures[0][0])).toBe('Error: listener down');
    expect(failures[0][1]).toBe(0);
    expect(log.length).toBe(1);
  });

  it('continues a restored chain', () => {
    const original = new GovernanceEventLog();
    original.publish('gov.proposal.cancelled', 'alice', 1, { proposalId: 'p-1' });
    const last = original.publish('gov.proposal.cancelled', 'alice', 2, { proposalId: 'p-2' });

    const restored = new GovernanceEventLog();
    const seen: number[] = [];
    restored.subscribe((envelope) => seen.push(envelope.seq));
    restored.restore(original.list());
    const next = restored.publish('gov.proposal.cancelled', 'bob', 3, { proposalId: 'p-3' });

    expect(seen).toEqual([2]);
    expect(next.seq).toBe(2);
    expect(next.prev).toBe(last.hash);
    expect(() => restored.restore(original.list())).toThrow('event log already has entries');
  });

  it('refuses to restore an altered envelope', () => {
    const original = new GovernanceEventLog();
    const first = original.publish('gov.proposal.cancelled', 'alice', 1, { proposalId: 'p-1' });
    const log = new GovernanceEventLog();
    expect(() => log.restore([{ ...first, ts: 5 }])).toThrow('event hash mismatch at seq 0');
  });
});
