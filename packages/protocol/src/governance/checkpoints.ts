/**
 * Governance - Checkpoint History
 *
 * Append-only (timestamp, value) series answering "what was the value at t"
 * with a binary search. Used for delegation edges, per-account totals and
 * reputation scores so weight can be read as of a proposal's snapshot.
 */

export interface Checkpoint<T = bigint> {
  at: number;
  value: T;
}

export class ValueHistory<T> {
  private readonly checkpoints: Checkpoint<T>[] = [];

  /** `empty` is the value before the first checkpoint. */
  constructor(private readonly empty: T) {}

  /**
   * Records `value` from `at` onwards. A write at the latest timestamp
   * replaces that checkpoint; a write before it throws.
   */
  push(at: number, value: T): void {
    const last = this.checkpoints[this.checkpoints.length - 1];
    if (last && at < last.at) {
      throw new Error(`checkpoint at ${at} precedes latest checkpoint at ${last.at}`);
    }
    if (last && last.at === at) {
      last.value = value;
      return;
    }
    this.checkpoints.push({ at, value });
  }

  /** Value of the last checkpoint with `checkpoint.at <= at`. */
  valueAt(at: number): T {
    let low = 0;
    let high = this.checkpoints.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.checkpoints[mid].at <= at) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    return low === 0 ? this.empty : this.checkpoints[low - 1].value;
  }

  latest(): T {
    const last = this.checkpoints[this.checkpoints.length - 1];
    return last ? last.value : this.empty;
  }

  get length(): number {
    return this.checkpoints.length;
  }

  toArray(): Checkpoint<T>[] {
    return this.checkpoints.map((checkpoint) => ({ ...checkpoint }));
  }
}

/** Amount history starting at 0. */
export class CheckpointHistory extends ValueHistory<bigint> {
  constructor() {
    super(0n);
  }
}
