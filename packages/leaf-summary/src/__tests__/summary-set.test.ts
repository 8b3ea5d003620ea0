// ---------------------------------------------------------------------------
// Tests: SummarySet construction, error accumulation, merge and OOB error
// ---------------------------------------------------------------------------

import { describe, it, expect } from 'vitest';
import { ColumnMatrix, indexView, rangeView } from '../data.js';
import {
  AllocationFailureError,
  InvalidFeatureLayoutError,
  LeafSummaryError,
  UnknownSummaryTypeError,
} from '../errors.js';
import {
  createSummarySet,
  mergeSummarySets,
  mergeSummarySetsMany,
  resolveSummaryCodes,
  summarySetCodes,
  summarySetError,
} from '../summary-set.js';
import { createErrorVector, outOfBagError } from '../oob.js';
import type { DataMatrix } from '../types.js';

// f0 discrete over {0, 1}, f1 continuous
function mixedMatrix(): ColumnMatrix {
  return new ColumnMatrix([
    { values: [0, 1, 1, 0], discrete: true },
    { values: [1, 2, 3, 4] },
  ]);
}

/** Wraps a matrix and counts every cell read. */
class CountingMatrix implements DataMatrix {
  reads = 0;

  constructor(private readonly inner: DataMatrix) {}

  get exemplarCount(): number { return this.inner.exemplarCount; }
  get featureCount(): number { return this.inner.featureCount; }

  value(row: number, feature: number): number {
    this.reads += 1;
    return this.inner.value(row, feature);
  }

  isDiscrete(feature: number): boolean { return this.inner.isDiscrete(feature); }
  categoryCount(feature: number): number { return this.inner.categoryCount(feature); }
}

// ===========================================================================
// Construction
// ===========================================================================

describe('createSummarySet', () => {
  it('defaults discrete features to C and continuous ones to G', () => {
    const set = createSummarySet(mixedMatrix(), rangeView(0, 4));
    expect(set.features).toBe(2);
    expect(summarySetCodes(set)).toBe('CG');
  });

  it('fills a short code string from the defaults', () => {
    const set = createSummarySet(mixedMatrix(), rangeView(0, 4), 'N');
    expect(summarySetCodes(set)).toBe('NG');
  });

  it('ignores codes beyond the last feature', () => {
    expect(resolveSummaryCodes(mixedMatrix(), 'CGN')).toEqual(['C', 'G']);
  });

  it('accepts a bivariate summary with a following feature', () => {
    const m = new ColumnMatrix([{ values: [1, 2] }, { values: [3, 4] }]);
    expect(summarySetCodes(createSummarySet(m, rangeView(0, 2), 'BN'))).toBe('BN');
  });

  it('rejects an unknown code before reading any data', () => {
    const m = new CountingMatrix(mixedMatrix());
    expect(() => createSummarySet(m, rangeView(0, 4), 'Z')).toThrow(UnknownSummaryTypeError);
    expect(() => createSummarySet(m, rangeView(0, 4), 'CZ')).toThrow(UnknownSummaryTypeError);
    expect(m.reads).toBe(0);
  });

  it('rejects a bivariate summary in the last slot', () => {
    const m = new CountingMatrix(mixedMatrix());
    expect(() => createSummarySet(m, rangeView(0, 4), 'GB')).toThrow(InvalidFeatureLayoutError);
    expect(m.reads).toBe(0);
  });

  it('reports a histogram too large to allocate as AllocationFailureError', () => {
    const m = new ColumnMatrix([{ values: [0, 5e9], discrete: true }]);
    let caught: unknown;
    try {
      createSummarySet(m, rangeView(0, 2));
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(AllocationFailureError);
    expect(caught).toBeInstanceOf(LeafSummaryError);
    if (caught instanceof AllocationFailureError) {
      expect(caught.bytes).toBe(20_000_000_004);
      expect(caught.cause).toBeInstanceOf(RangeError);
    }
  });

  it('returns a frozen set', () => {
    const set = createSummarySet(mixedMatrix(), rangeView(0, 4));
    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.summaries)).toBe(true);
  });
});

// ===========================================================================
// Error accumulation
// ===========================================================================

describe('summarySetError', () => {
  const m = mixedMatrix();
  const set = createSummarySet(m, rangeView(0, 4));

  it('sums per-feature loss over the view', () => {
    const out = createErrorVector(2);
    summarySetError(set, m, rangeView(0, 4), out);
    // C: four cells at p = 0.5. G: mean 2.5, variance 5/3, Σd² = 5.
    expect(out[0]).toBeCloseTo(4 * Math.LN2, 12);
    expect(out[1]).toBeCloseTo(1.5, 12);
  });

  it('is additive over disjoint views', () => {
    const split = createErrorVector(2);
    summarySetError(set, m, indexView([0, 1]), split);
    summarySetError(set, m, indexView([2, 3]), split);

    const whole = createErrorVector(2);
    summarySetError(set, m, rangeView(0, 4), whole);

    expect(split[0]).toBeCloseTo(whole[0] ?? Number.NaN, 12);
    expect(split[1]).toBeCloseTo(whole[1] ?? Number.NaN, 12);
  });

  it('adds to existing values', () => {
    const out = [10, 20];
    summarySetError(set, m, rangeView(0, 4), out);
    expect(out[0]).toBeCloseTo(10 + 4 * Math.LN2, 12);
    expect(out[1]).toBeCloseTo(21.5, 12);
  });

  it('an empty view adds nothing', () => {
    const out = [1, 2];
    summarySetError(set, m, indexView([]), out);
    expect(out).toEqual([1, 2]);
  });

  it('stays finite when values overflow the squared distance', () => {
    const wide = new ColumnMatrix([{ values: [0, 1e200] }, { values: [0, 0] }]);
    const out = createErrorVector(2);
    summarySetError(createSummarySet(wide, indexView([0]), 'G'), wide, indexView([1]), out);
    summarySetError(createSummarySet(wide, indexView([0]), 'BN'), wide, indexView([1]), out);
    expect(out[0]).toBe(Number.MAX_VALUE);
    expect(out[1]).toBe(0);
  });

  it('rejects a vector shorter than the set', () => {
    expect(() => summarySetError(set, m, rangeView(0, 4), [0])).toThrow(InvalidFeatureLayoutError);
  });
});

// ===========================================================================
// Merge
// ===========================================================================

describe('mergeSummarySets', () => {
  const m = mixedMatrix();

  it('merges every feature across trees', () => {
    const a = createSummarySet(m, indexView([0, 1]));
    const b = createSummarySet(m, indexView([2, 3]));
    const result = mergeSummarySets([a, b]);

    expect(result.features).toBe(2);
    expect(result.outputs[0]).toEqual({ kind: 'categorical', count: 4, probabilities: [0.5, 0.5] });

    const g = result.outputs[1];
    if (g?.kind !== 'gaussian') throw new Error('expected a gaussian merge');
    expect(g.count).toBe(4);
    expect(g.mean).toBe(2.5);
    expect(g.variance).toBeCloseTo(5 / 3, 12);
  });

  it('rejects an empty list', () => {
    expect(() => mergeSummarySets([])).toThrow(InvalidFeatureLayoutError);
  });

  it('rejects sets whose types differ', () => {
    const a = createSummarySet(m, rangeView(0, 4), 'CG');
    const b = createSummarySet(m, rangeView(0, 4), 'NG');
    expect(() => mergeSummarySets([a, b])).toThrow(/set 1 has types "NG", expected "CG"/);
  });

  it('rejects sets whose feature counts differ', () => {
    const narrow = new ColumnMatrix([{ values: [1, 2, 3, 4] }]);
    const a = createSummarySet(m, rangeView(0, 4));
    const b = createSummarySet(narrow, rangeView(0, 4));
    expect(() => mergeSummarySets([a, b])).toThrow(/set 1 has 1 features, expected 2/);
  });
});

describe('mergeSummarySetsMany', () => {
  const m = mixedMatrix();
  const a = createSummarySet(m, indexView([0, 3]));
  const b = createSummarySet(m, indexView([1, 2]));

  it('merges each exemplar row of the grid on its own', () => {
    const results = mergeSummarySetsMany(2, 2, [a, b, a, a]);

    expect(results).toHaveLength(2);
    expect(results[0]).toEqual(mergeSummarySets([a, b]));
    expect(results[1]).toEqual(mergeSummarySets([a, a]));
  });

  it('row values match a direct computation', () => {
    const [first, second] = mergeSummarySetsMany(2, 2, [a, b, a, a]);

    const g0 = first?.outputs[1];
    if (g0?.kind !== 'gaussian') throw new Error('expected a gaussian merge');
    expect(g0.mean).toBe(2.5);
    expect(g0.variance).toBeCloseTo(5 / 3, 12);

    expect(second?.outputs[0]).toEqual({ kind: 'categorical', count: 4, probabilities: [1, 0] });
    const g1 = second?.outputs[1];
    if (g1?.kind !== 'gaussian') throw new Error('expected a gaussian merge');
    expect(g1.variance).toBe(3);
  });

  it('rejects a grid of the wrong size', () => {
    expect(() => mergeSummarySetsMany(2, 2, [a, b, a])).toThrow(InvalidFeatureLayoutError);
  });

  it('returns nothing for zero exemplars', () => {
    expect(mergeSummarySetsMany(0, 3, [])).toEqual([]);
  });
});

// ===========================================================================
// Out-of-bag error
// ===========================================================================

describe('outOfBagError', () => {
  const m = mixedMatrix();
  const set = createSummarySet(m, rangeView(0, 4));

  it('accumulates every leaf and reports the per-exemplar mean', () => {
    const report = outOfBagError(m, [
      { set, view: indexView([0, 1]) },
      { set, view: indexView([2, 3]) },
    ]);

    expect(report.exemplars).toBe(4);
    expect(report.loss[0]).toBeCloseTo(4 * Math.LN2, 12);
    expect(report.loss[1]).toBeCloseTo(1.5, 12);
    expect(report.mean[0]).toBeCloseTo(Math.LN2, 12);
    expect(report.mean[1]).toBeCloseTo(0.375, 12);
  });

  it('reports zero means when nothing was visited', () => {
    const report = outOfBagError(m, []);
    expect(report.exemplars).toBe(0);
    expect(Array.from(report.loss)).toEqual([0, 0]);
    expect(report.mean).toEqual([0, 0]);
  });
});
