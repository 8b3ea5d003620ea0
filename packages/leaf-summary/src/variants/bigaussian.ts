// ---------------------------------------------------------------------------
// BiGaussian: bivariate normal over a feature and its successor
// ---------------------------------------------------------------------------
//
// Summarises columns f and f + 1 jointly. The set that owns it must leave
// room for f + 1; a BiGaussian in the last slot is a layout error.
// ---------------------------------------------------------------------------

import { settings } from '@leafstats/config';
import { U32_SIZE, F64_SIZE } from '@leafstats/wire-format';
import type { ByteReader, ByteWriter } from '@leafstats/wire-format';
import type {
  BiGaussianSummary,
  Covariance2,
  DataMatrix,
  IndexView,
  MergedBiGaussian,
} from '../types.js';
import { InvalidFeatureLayoutError } from '../errors.js';
import type { SummaryOps } from './ops.js';
import { addLoss, rowWise } from './ops.js';

function freeze(count: number, mean: [number, number], covariance: [number, number, number]): BiGaussianSummary {
  const summary: BiGaussianSummary = {
    code: 'B',
    count,
    mean: Object.freeze(mean),
    covariance: Object.freeze(covariance),
  };
  return Object.freeze(summary);
}

/** Unbiased covariance from scatter sums, diagonals floored. */
function unbiasedCovariance(sxx: number, sxy: number, syy: number, count: number): [number, number, number] {
  const floor = settings.varianceFloor;
  if (count <= 1) return [floor, 0, floor];
  const n1 = count - 1;
  return [Math.max(sxx / n1, floor), sxy / n1, Math.max(syy / n1, floor)];
}

function* pairs(
  matrix: DataMatrix,
  view: IndexView,
  feature: number,
): Generator<[number, number]> {
  for (const row of view) {
    const x = matrix.value(row, feature);
    const y = matrix.value(row, feature + 1);
    if (Number.isFinite(x) && Number.isFinite(y)) yield [x, y];
  }
}

function createBiGaussian(matrix: DataMatrix, view: IndexView, feature: number): BiGaussianSummary {
  if (feature + 1 >= matrix.featureCount) {
    throw new InvalidFeatureLayoutError(
      `bivariate summary at feature ${feature} needs feature ${feature + 1}, matrix has ${matrix.featureCount}`,
    );
  }

  let count = 0;
  let mx = 0;
  let my = 0;
  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const [x, y] of pairs(matrix, view, feature)) {
    count += 1;
    const dx = x - mx;
    const dy = y - my;
    mx += dx / count;
    my += dy / count;
    sxx += dx * (x - mx);
    syy += dy * (y - my);
    sxy += dx * (y - my);
  }

  return freeze(count, [mx, my], unbiasedCovariance(sxx, sxy, syy, count));
}

/**
 * Inverse of the covariance as [xx, xy, yy] over its determinant. When the
 * matrix is close to singular the correlation is dropped and the diagonal
 * alone is used.
 */
function precision(covariance: Covariance2): { a: number; b: number; c: number; det: number } {
  const floor = settings.varianceFloor;
  const a = Math.max(covariance[0], floor);
  const c = Math.max(covariance[2], floor);
  let b = covariance[1];
  let det = a * c - b * b;
  if (!(det > floor * floor)) {
    b = 0;
    det = a * c;
  }
  return { a, b, c, det };
}

/** Half the squared Mahalanobis distance: -log(p(x) / p(mean)). */
function biGaussianError(
  summary: BiGaussianSummary,
  matrix: DataMatrix,
  view: IndexView,
  feature: number,
): number {
  const { a, b, c, det } = precision(summary.covariance);
  let loss = 0;
  for (const [x, y] of pairs(matrix, view, feature)) {
    const dx = x - summary.mean[0];
    const dy = y - summary.mean[1];
    loss = addLoss(loss, Math.max(0, c * dx * dx - 2 * b * dx * dy + a * dy * dy) / (2 * det));
  }
  return loss;
}

/** Moment matching on 2-vectors, weighted by count. */
function mergeBiGaussian(summaries: readonly BiGaussianSummary[]): MergedBiGaussian {
  let count = 0;
  let wx = 0;
  let wy = 0;
  for (const s of summaries) {
    count += s.count;
    wx += s.count * s.mean[0];
    wy += s.count * s.mean[1];
  }
  const mx = count > 0 ? wx / count : 0;
  const my = count > 0 ? wy / count : 0;

  let sxx = 0;
  let sxy = 0;
  let syy = 0;
  for (const s of summaries) {
    if (s.count === 0) continue;
    const n1 = s.count - 1;
    const dx = s.mean[0] - mx;
    const dy = s.mean[1] - my;
    sxx += n1 * s.covariance[0] + s.count * dx * dx;
    sxy += n1 * s.covariance[1] + s.count * dx * dy;
    syy += n1 * s.covariance[2] + s.count * dy * dy;
  }

  const [xx, xy, yy] = unbiasedCovariance(sxx, sxy, syy, count);
  return {
    kind: 'bigaussian',
    count,
    mean: [mx, my],
    covariance: [[xx, xy], [xy, yy]],
  };
}

export const biGaussianOps: SummaryOps<BiGaussianSummary, MergedBiGaussian> = {
  create: createBiGaussian,
  error: biGaussianError,
  merge: mergeBiGaussian,
  mergeMany: rowWise(mergeBiGaussian),

  payloadSize: () => U32_SIZE + 5 * F64_SIZE,

  encodePayload(summary: BiGaussianSummary, writer: ByteWriter): void {
    writer.writeU32(summary.count);
    writer.writeF64(summary.mean[0]);
    writer.writeF64(summary.mean[1]);
    writer.writeF64(summary.covariance[0]);
    writer.writeF64(summary.covariance[1]);
    writer.writeF64(summary.covariance[2]);
  },

  decodePayload(reader: ByteReader): BiGaussianSummary {
    const count = reader.readU32();
    const mx = reader.readF64();
    const my = reader.readF64();
    const xx = reader.readF64();
    const xy = reader.readF64();
    const yy = reader.readF64();
    return freeze(count, [mx, my], [xx, xy, yy]);
  },
};
