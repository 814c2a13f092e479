/**
 * Governance - Parameter Target
 *
 * Execution target holding governed key/value parameters. A call's payload is
 * the hex-encoded UTF-8 JSON `{ "key": string, "value": string | number |
 * boolean | null }`; the call value must be 0.
 */

import { bytesToUtf8, hexToBytes } from '@conclave/core/utils';
import { encodeReturnData } from './execution.js';
import type { ExecutionTarget, StagedCall } from './execution.js';
import type { ExecutionCall } from './types.js';

export type ParameterValue = string | number | boolean | null;

export interface ParameterChange {
  key: string;
  value: ParameterValue;
}

const KEY_PATTERN = /^[A-Za-z][A-Za-z0-9_.-]{0,63}$/;

function isParameterValue(value: unknown): value is ParameterValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  );
}

export function parseParameterChange(payload: string): ParameterChange {
  let parsed: unknown;
  try {
    parsed = JSON.parse(bytesToUtf8(hexToBytes(payload)));
  } catch {
    throw new Error('payload must be hex-encoded JSON');
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error('payload must be a JSON object');
  }
  const key = 'key' in parsed ? parsed.key : undefined;
  const value = 'value' in parsed ? parsed.value : undefined;
  if (typeof key !== 'string' || !KEY_PATTERN.test(key)) {
    throw new Error('payload.key must be a parameter name');
  }
  if (!isParameterValue(value)) {
    throw new Error('payload.value must be a string, number, boolean or null');
  }
  return { key, value };
}

export class ParameterTarget implements ExecutionTarget {
  private readonly params = new Map<string, ParameterValue>();

  constructor(initial: Record<string, ParameterValue> = {}) {
    for (const [key, value] of Object.entries(initial)) {
      this.params.set(key, value);
    }
  }

  async stage(call: ExecutionCall): Promise<StagedCall> {
    if (call.value !== 0n) {
      return { ok: false, returnData: encodeReturnData('parameter calls carry no value') };
    }
    const change = parseParameterChange(call.payload);
    const previous = this.params.get(change.key) ?? null;
    return {
      ok: true,
      returnData: encodeReturnData(JSON.stringify({ key: change.key, previous })),
      commit: () => {
        this.params.set(change.key, change.value);
      },
    };
  }

  get(key: string): ParameterValue | undefined {
    return this.params.get(key);
  }

  snapshot(): Record<string, ParameterValue> {
    return Object.fromEntries(this.params);
  }
}
