// ---------------------------------------------------------------------------
// Out-of-bag error accumulation
// ---------------------------------------------------------------------------
//
// Each tree contributes the leaves its out-of-bag exemplars reached. Summing
// SummarySet error over every (leaf, exemplars) pair into one vector gives
// the forest's per-feature generalisation estimate.
// ---------------------------------------------------------------------------

import type { DataMatrix, IndexView, SummarySet } from './types.js';
import { summarySetError } from './summary-set.js';

/** A leaf and the out-of-bag exemplars that reached it. */
export interface OutOfBagLeaf {
  set: SummarySet;
  view: IndexView;
}

export interface OutOfBagReport {
  /** Summed loss per feature. */
  loss: Float64Array;
  /** Exemplar visits accumulated (an exemplar counts once per tree). */
  exemplars: number;
  /** loss / exemplars per feature; 0 when nothing was visited. */
  mean: number[];
}

export function createErrorVector(features: number): Float64Array {
  return new Float64Array(features);
}

export function outOfBagError(matrix: DataMatrix, leaves: Iterable<OutOfBagLeaf>): OutOfBagReport {
  const loss = createErrorVector(matrix.featureCount);
  let exemplars = 0;
  for (const { set, view } of leaves) {
    summarySetError(set, matrix, view, loss);
    exemplars += view.size;
  }
  const mean = Array.from(loss, (l) => (exemplars > 0 ? l / exemplars : 0));
  return { loss, exemplars, mean };
}
