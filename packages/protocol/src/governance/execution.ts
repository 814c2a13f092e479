/**
 * Governance - Execution Gateway
 *
 * Thin boundary toward the effects a proposal describes. The engine only
 * looks at success/failure; `invokeAll` applies a batch atomically.
 */

import { bytesToHex, utf8ToBytes } from '@conclave/core/utils';
import type { ExecutionCall, InvocationResult } from './types.js';

export interface ExecutionContext {
  proposalId: string;
  index: number;
}

export type BatchResult =
  | { success: true; results: InvocationResult[] }
  | { success: false; failedIndex: number; returnData: string };

export interface ExecutionGateway {
  invoke(target: string, value: bigint, payload: string): Promise<InvocationResult>;
  /**
   * Invokes every call in order. Either all effects are applied or none are;
   * on failure the index of the first failing call is reported.
   */
  invokeAll(calls: ExecutionCall[], proposalId: string): Promise<BatchResult>;
}

/** A call that passed validation and is waiting to be applied. */
export type StagedCall =
  | { ok: true; returnData: string; commit: () => void }
  | { ok: false; returnData: string };

export interface ExecutionTarget {
  stage(call: ExecutionCall, context: ExecutionContext): Promise<StagedCall>;
}

export function encodeReturnData(message: string): string {
  return bytesToHex(utf8ToBytes(message));
}

/**
 * Gateway dispatching calls to registered targets by name. Calls are staged
 * first; commits run only once every call in the batch has staged cleanly.
 */
export class TargetRegistryGateway implements ExecutionGateway {
  private readonly targets = new Map<string, ExecutionTarget>();

  register(name: string, target: ExecutionTarget): this {
    if (this.targets.has(name)) {
      throw new Error(`target already registered: ${name}`);
    }
    this.targets.set(name, target);
    return this;
  }

  has(name: string): boolean {
    return this.targets.has(name);
  }

  names(): string[] {
    return [...this.targets.keys()];
  }

  async invoke(target: string, value: bigint, payload: string): Promise<InvocationResult> {
    const batch = await this.invokeAll([{ target, value, payload }], '');
    return batch.success
      ? batch.results[0]
      : { success: false, returnData: batch.returnData };
  }

  async invokeAll(calls: ExecutionCall[], proposalId: string): Promise<BatchResult> {
    const staged: Array<{ commit: () => void; returnData: string }> = [];
    for (let index = 0; index < calls.length; index += 1) {
      const result = await this.stage(calls[index], { proposalId, index });
      if (!result.ok) {
        return {
          success: false,
          failedIndex: index,
          returnData: result.returnData,
        };
      }
      staged.push(result);
    }
    for (const call of staged) {
      call.commit();
    }
    return {
      success: true,
      results: staged.map((call) => ({ success: true, returnData: call.returnData })),
    };
  }

  private async stage(call: ExecutionCall, context: ExecutionContext): Promise<StagedCall> {
    const target = this.targets.get(call.target);
    if (!target) {
      return { ok: false, returnData: encodeReturnData(`unknown target: ${call.target}`) };
    }
    try {
      return await target.stage(call, context);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, returnData: encodeReturnData(message) };
    }
  }
}
