// ---------------------------------------------------------------------------
// Categorical: histogram over a discrete feature
// ---------------------------------------------------------------------------

import { settings } from '@leafstats/config';
import { U32_SIZE } from '@leafstats/wire-format';
import type { ByteReader, ByteWriter } from '@leafstats/wire-format';
import type {
  CategoricalSummary,
  DataMatrix,
  IndexView,
  MergedCategorical,
} from '../types.js';
import { AllocationFailureError } from '../errors.js';
import type { SummaryOps } from './ops.js';
import { addLoss, rowWise } from './ops.js';

/**
 * Map a raw cell to a category id in [0, categories), or undefined when the
 * cell is missing (non-finite) or falls outside the declared range.
 */
function categoryId(value: number, categories: number): number | undefined {
  if (!Number.isFinite(value)) return undefined;
  const id = Math.trunc(value);
  return id >= 0 && id < categories ? id : undefined;
}

function freeze(counts: number[], total: number): CategoricalSummary {
  const summary: CategoricalSummary = { code: 'C', counts: Object.freeze(counts), total };
  return Object.freeze(summary);
}

/** Estimated probability of category `id`; an empty histogram is uniform. */
export function categoryProbability(summary: CategoricalSummary, id: number | undefined): number {
  if (id === undefined) return 0;
  if (summary.total === 0) {
    return summary.counts.length > 0 ? 1 / summary.counts.length : 0;
  }
  return (summary.counts[id] ?? 0) / summary.total;
}

/** Zeroed histogram of `categories` cells; a length the runtime refuses is an AllocationFailureError. */
function allocateCounts(categories: number): number[] {
  try {
    return new Array<number>(categories).fill(0);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationFailureError(categories * U32_SIZE, { cause: err });
    }
    throw err;
  }
}

function createCategorical(matrix: DataMatrix, view: IndexView, feature: number): CategoricalSummary {
  const categories = Math.max(0, Math.trunc(matrix.categoryCount(feature)));
  const counts = allocateCounts(categories);
  let total = 0;

  for (const row of view) {
    const id = categoryId(matrix.value(row, feature), categories);
    if (id === undefined) continue;
    counts[id] = (counts[id] ?? 0) + 1;
    total += 1;
  }

  return freeze(counts, total);
}

/**
 * Negative log-likelihood of the actual categories, with each probability
 * floored so an unseen category costs -log(probabilityFloor), not infinity.
 * Missing cells are skipped.
 */
function categoricalError(
  summary: CategoricalSummary,
  matrix: DataMatrix,
  view: IndexView,
  feature: number,
): number {
  let loss = 0;
  for (const row of view) {
    const value = matrix.value(row, feature);
    if (!Number.isFinite(value)) continue;
    const p = categoryProbability(summary, categoryId(value, summary.counts.length));
    loss = addLoss(loss, -Math.log(Math.max(p, settings.probabilityFloor)));
  }
  return loss;
}

/** Pool the raw counts (each summary weighs in by its own total) and normalise. */
function mergeCategorical(summaries: readonly CategoricalSummary[]): MergedCategorical {
  let categories = 0;
  for (const s of summaries) categories = Math.max(categories, s.counts.length);

  const pooled = new Array<number>(categories).fill(0);
  let total = 0;
  for (const s of summaries) {
    for (let k = 0; k < s.counts.length; k++) {
      pooled[k] = (pooled[k] ?? 0) + (s.counts[k] ?? 0);
    }
    total += s.total;
  }

  const probabilities =
    total > 0
      ? pooled.map((c) => c / total)
      : pooled.map(() => 1 / categories);

  return { kind: 'categorical', count: total, probabilities };
}

export const categoricalOps: SummaryOps<CategoricalSummary, MergedCategorical> = {
  create: createCategorical,
  error: categoricalError,
  merge: mergeCategorical,
  mergeMany: rowWise(mergeCategorical),

  payloadSize: (summary) => U32_SIZE + summary.counts.length * U32_SIZE,

  encodePayload(summary: CategoricalSummary, writer: ByteWriter): void {
    writer.writeU32(summary.counts.length);
    for (const c of summary.counts) writer.writeU32(c);
  },

  decodePayload(reader: ByteReader): CategoricalSummary {
    const categories = reader.readU32();
    // Check the whole histogram is present before allocating for it.
    reader.ensure(categories * U32_SIZE);
    const counts = new Array<number>(categories);
    let total = 0;
    for (let k = 0; k < categories; k++) {
      const c = reader.readU32();
      counts[k] = c;
      total += c;
    }
    return freeze(counts, total);
  },
};
