/**
 * Time source for the engine. Values are milliseconds or block heights; the
 * engine only compares them.
 */
export interface Clock {
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Wraps a clock so readings never go backwards. */
export class MonotonicClock implements Clock {
  private last = Number.NEGATIVE_INFINITY;

  constructor(private readonly source: Clock) {}

  now(): number {
    const value = this.source.now();
    if (value > this.last) {
      this.last = value;
    }
    return this.last;
  }

  /** Raises the floor to `at`, e.g. the last replayed event time. */
  observe(at: number): void {
    if (at > this.last) {
      this.last = at;
    }
  }
}

/** Clock advanced by hand. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(value: number): void {
    this.current = value;
  }

  advance(delta: number): number {
    this.current += delta;
    return this.current;
  }
}
