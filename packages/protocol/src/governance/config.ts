/**
 * Governance - Configuration
 *
 * Parses the raw `governance` section of a host configuration file into a
 * GovernanceConfig, filling gaps from DEFAULT_GOVERNANCE_CONFIG.
 */

import { GovernanceError } from './errors.js';
import { DEFAULT_GOVERNANCE_CONFIG, isWeightingMode } from './types.js';
import type { GovernanceConfig } from './types.js';

function fail(message: string): GovernanceError {
  return new GovernanceError('InvalidConfig', message);
}

function readDuration(raw: Record<string, unknown>, field: string, fallback: number): number {
  const value = raw[field];
  if (value === undefined || value === null) {
    return fallback;
  }
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed) || parsed < 0) {
    throw fail(`${field} must be a non-negative integer`);
  }
  return parsed;
}

function readAmount(raw: Record<string, unknown>, field: string, fallback: bigint): bigint {
  const value = raw[field];
  if (value === undefined || value === null) {
    return fallback;
  }
  if (typeof value === 'bigint') {
    if (value < 0n) throw fail(`${field} must be >= 0`);
    return value;
  }
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) {
    return BigInt(value);
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  throw fail(`${field} must be a non-negative integer`);
}

function readAccounts(raw: Record<string, unknown>, field: string): string[] | undefined {
  const value = raw[field];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value) || value.some((item) => typeof item !== 'string' || !item.trim())) {
    throw fail(`${field} must be a list of account names`);
  }
  return value.map((item) => String(item));
}

export function validateGovernanceConfig(config: GovernanceConfig): GovernanceConfig {
  const threshold = config.approvalThresholdPercent;
  if (!Number.isFinite(threshold) || threshold <= 0 || threshold > 100) {
    throw fail('approvalThresholdPercent must be in (0, 100]');
  }
  if (!Number.isInteger(threshold)) {
    throw fail('approvalThresholdPercent must be a whole percent');
  }
  if (config.votingPeriod <= 0) {
    throw fail('votingPeriod must be > 0');
  }
  if (config.votingDelay < 0 || config.executionDelay < 0) {
    throw fail('delays must be >= 0');
  }
  if (config.quorum < 0n || config.proposalThreshold < 0n) {
    throw fail('quorum and proposalThreshold must be >= 0');
  }
  if (!isWeightingMode(config.weighting)) {
    throw fail(`unknown weighting mode: ${String(config.weighting)}`);
  }
  return config;
}

export function parseGovernanceConfig(raw: Record<string, unknown> = {}): GovernanceConfig {
  const defaults = DEFAULT_GOVERNANCE_CONFIG;

  const weighting = raw.weighting ?? defaults.weighting;
  if (typeof weighting !== 'string' || !isWeightingMode(weighting)) {
    throw fail('weighting must be one of linear, quadratic, reputation');
  }

  const thresholdRaw = raw.approvalThresholdPercent ?? defaults.approvalThresholdPercent;
  const approvalThresholdPercent =
    typeof thresholdRaw === 'string' ? Number(thresholdRaw) : thresholdRaw;
  if (typeof approvalThresholdPercent !== 'number') {
    throw fail('approvalThresholdPercent must be a number');
  }

  const abstain = raw.abstainCountsTowardApproval ?? defaults.abstainCountsTowardApproval;
  if (typeof abstain !== 'boolean') {
    throw fail('abstainCountsTowardApproval must be a boolean');
  }

  return validateGovernanceConfig({
    votingDelay: readDuration(raw, 'votingDelay', defaults.votingDelay),
    votingPeriod: readDuration(raw, 'votingPeriod', defaults.votingPeriod),
    executionDelay: readDuration(raw, 'executionDelay', defaults.executionDelay),
    quorum: readAmount(raw, 'quorum', defaults.quorum),
    approvalThresholdPercent,
    proposalThreshold: readAmount(raw, 'proposalThreshold', defaults.proposalThreshold),
    abstainCountsTowardApproval: abstain,
    weighting,
    cancellers: readAccounts(raw, 'cancellers') ?? [],
    queuers: readAccounts(raw, 'queuers'),
    executors: readAccounts(raw, 'executors'),
  });
}

/** JSON-friendly view of a config, amounts as decimal strings. */
export function describeGovernanceConfig(config: GovernanceConfig): Record<string, unknown> {
  return {
    votingDelay: config.votingDelay,
    votingPeriod: config.votingPeriod,
    executionDelay: config.executionDelay,
    quorum: config.quorum.toString(),
    approvalThresholdPercent: config.approvalThresholdPercent,
    proposalThreshold: config.proposalThreshold.toString(),
    abstainCountsTowardApproval: config.abstainCountsTowardApproval,
    weighting: config.weighting,
    cancellers: [...config.cancellers],
    queuers: config.queuers ? [...config.queuers] : null,
    executors: config.executors ? [...config.executors] : null,
  };
}
