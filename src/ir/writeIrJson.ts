import type { IrModel } from './irV1';
import { canonicalizeIrModel } from './canonicalizeIrModel';
import { stableStringify } from './deterministicJson';

export type WriteIrJsonOptions = {
  /** Pretty-print indentation (default 2). */
  space?: number;
};

/**
 * Serialize an IR model to a deterministic JSON string.
 */
export function serializeIrJson(model: IrModel, options: WriteIrJsonOptions = {}): string {
  return stableStringify(canonicalizeIrModel(model), options.space ?? 2);
}
