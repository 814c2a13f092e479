/**
 * Governance - Vote Weighting
 *
 * Maps snapshot power to the weight added to a tally. The mode is fixed on
 * the proposal at creation:
 *
 * - linear:     weight = power
 * - quadratic:  weight = floor(sqrt(power)), reduces whale dominance
 * - reputation: weight = floor(power * (100 + reputation) / 100)
 */

import type { WeightingMode } from './types.js';

/** Largest integer `r` with `r * r <= value`. */
export function integerSqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new Error('cannot take the square root of a negative value');
  }
  if (value < 2n) {
    return value;
  }
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

/**
 * Reputation bonus in whole percent. Negative and non-finite scores count as
 * zero; fractional scores are floored.
 */
export function reputationBonus(reputation: number): bigint {
  if (!Number.isFinite(reputation) || reputation <= 0) {
    return 0n;
  }
  return BigInt(Math.floor(reputation));
}

export function reputationWeight(power: bigint, reputation: number): bigint {
  return (power * (100n + reputationBonus(reputation))) / 100n;
}

export function applyWeighting(mode: WeightingMode, power: bigint, reputation = 0): bigint {
  switch (mode) {
    case 'linear':
      return power;
    case 'quadratic':
      return integerSqrt(power);
    case 'reputation':
      return reputationWeight(power, reputation);
  }
}
