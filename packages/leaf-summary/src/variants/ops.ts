// ---------------------------------------------------------------------------
// Summary operation contract
// ---------------------------------------------------------------------------

import type { ByteReader, ByteWriter } from '@leafstats/wire-format';
import type { DataMatrix, IndexView, MergedFeature, Summary } from '../types.js';

/** Everything one summary kind knows how to do with its own state. */
export interface SummaryOps<S extends Summary, M extends MergedFeature> {
  /** Summarise `feature` over the exemplars in `view`. */
  create(matrix: DataMatrix, view: IndexView, feature: number): S;
  /** Non-negative, finite loss of `view`'s exemplars against the summary. */
  error(summary: S, matrix: DataMatrix, view: IndexView, feature: number): number;
  /** Consolidate summaries from several trees. */
  merge(summaries: readonly S[]): M;
  /** Row-major exemplars × trees grid; one output per exemplar. */
  mergeMany(exemplars: number, trees: number, summaries: readonly S[]): M[];
  /** Payload bytes, excluding the one-byte tag. */
  payloadSize(summary: S): number;
  encodePayload(summary: S, writer: ByteWriter): void;
  decodePayload(reader: ByteReader): S;
}

/**
 * Add one row's penalty to a running loss, saturating at the largest finite
 * double. A penalty that overflowed (Infinity, or NaN from Infinity - Infinity
 * in a quadratic form) saturates too.
 */
export function addLoss(loss: number, penalty: number): number {
  const next = loss + penalty;
  return Number.isNaN(next) || next > Number.MAX_VALUE ? Number.MAX_VALUE : next;
}

/** Build a grid merge from a single-row merge; rows never share state. */
export function rowWise<S extends Summary, M extends MergedFeature>(
  merge: (summaries: readonly S[]) => M,
): (exemplars: number, trees: number, summaries: readonly S[]) => M[] {
  return (exemplars, trees, summaries) => {
    const out: M[] = [];
    for (let e = 0; e < exemplars; e++) {
      out.push(merge(summaries.slice(e * trees, (e + 1) * trees)));
    }
    return out;
  };
}
