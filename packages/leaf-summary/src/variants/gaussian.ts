// ---------------------------------------------------------------------------
// Gaussian: univariate normal over a continuous feature
// ---------------------------------------------------------------------------
//
// Stores count, mean and the unbiased (n - 1) sample variance, floored at
// settings.varianceFloor. Merging pools the sums of squared deviations so
// that merge(fit(a), fit(b)) equals fit(a ∪ b).
// ---------------------------------------------------------------------------

import { settings } from '@leafstats/config';
import { U32_SIZE, F64_SIZE } from '@leafstats/wire-format';
import type { ByteReader, ByteWriter } from '@leafstats/wire-format';
import type {
  DataMatrix,
  GaussianSummary,
  IndexView,
  MergedGaussian,
} from '../types.js';
import type { SummaryOps } from './ops.js';
import { addLoss, rowWise } from './ops.js';

function freeze(count: number, mean: number, variance: number): GaussianSummary {
  const summary: GaussianSummary = { code: 'G', count, mean, variance };
  return Object.freeze(summary);
}

/** Unbiased variance from a sum of squared deviations, floored. */
export function unbiasedVariance(sumSq: number, count: number): number {
  const variance = count > 1 ? sumSq / (count - 1) : 0;
  return Math.max(variance, settings.varianceFloor);
}

/** Fit count, mean and variance of `values`; non-finite values are skipped. */
export function fitGaussian(values: Iterable<number>): GaussianSummary {
  // Welford's online update
  let count = 0;
  let mean = 0;
  let sumSq = 0;
  for (const x of values) {
    if (!Number.isFinite(x)) continue;
    count += 1;
    const delta = x - mean;
    mean += delta / count;
    sumSq += delta * (x - mean);
  }
  return freeze(count, mean, unbiasedVariance(sumSq, count));
}

function* column(matrix: DataMatrix, view: IndexView, feature: number): Generator<number> {
  for (const row of view) yield matrix.value(row, feature);
}

/**
 * Negative log density ratio -log(p(x) / p(mean)) = (x - mean)² / 2σ².
 * This is the Gaussian negative log-likelihood minus its minimum, so it is
 * zero at the mean and never negative.
 */
function gaussianError(
  summary: GaussianSummary,
  matrix: DataMatrix,
  view: IndexView,
  feature: number,
): number {
  const variance = Math.max(summary.variance, settings.varianceFloor);
  let loss = 0;
  for (const x of column(matrix, view, feature)) {
    if (!Number.isFinite(x)) continue;
    const d = x - summary.mean;
    loss = addLoss(loss, (d * d) / (2 * variance));
  }
  return loss;
}

/** Moment matching weighted by each summary's count. */
function mergeGaussian(summaries: readonly GaussianSummary[]): MergedGaussian {
  let count = 0;
  let weighted = 0;
  for (const s of summaries) {
    count += s.count;
    weighted += s.count * s.mean;
  }
  const mean = count > 0 ? weighted / count : 0;

  // Within-summary scatter (n - 1)s² plus between-summary scatter n(μ - mean)².
  let sumSq = 0;
  for (const s of summaries) {
    if (s.count === 0) continue;
    const d = s.mean - mean;
    sumSq += (s.count - 1) * s.variance + s.count * d * d;
  }

  return { kind: 'gaussian', count, mean, variance: unbiasedVariance(sumSq, count) };
}

export const gaussianOps: SummaryOps<GaussianSummary, MergedGaussian> = {
  create: (matrix, view, feature) => fitGaussian(column(matrix, view, feature)),
  error: gaussianError,
  merge: mergeGaussian,
  mergeMany: rowWise(mergeGaussian),

  payloadSize: () => U32_SIZE + 2 * F64_SIZE,

  encodePayload(summary: GaussianSummary, writer: ByteWriter): void {
    writer.writeU32(summary.count);
    writer.writeF64(summary.mean);
    writer.writeF64(summary.variance);
  },

  decodePayload(reader: ByteReader): GaussianSummary {
    const count = reader.readU32();
    const mean = reader.readF64();
    const variance = reader.readF64();
    return freeze(count, mean, variance);
  },
};
