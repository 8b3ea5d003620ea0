// ---------------------------------------------------------------------------
// Summary dispatch
// ---------------------------------------------------------------------------
//
// Every operation switches on the summary's `code`. The switches are
// exhaustive over SummaryCode, so adding a kind without handling it here is
// a compile error.
// ---------------------------------------------------------------------------

import type {
  DataMatrix,
  IndexView,
  MergedFeature,
  Projection,
  Summary,
  SummaryCode,
  SummaryOf,
} from './types.js';
import { InvalidFeatureLayoutError, UnknownSummaryTypeError } from './errors.js';
import { SUMMARY_TYPES, isSummaryCode } from './registry.js';

// ---------------------------------------------------------------------------
// Construction & error
// ---------------------------------------------------------------------------

/** Summarise one feature of `view` with the type selected by `code`. */
export function createSummary(
  code: string,
  matrix: DataMatrix,
  view: IndexView,
  feature: number,
): Summary {
  if (!isSummaryCode(code)) throw new UnknownSummaryTypeError(code);
  return SUMMARY_TYPES[code].ops.create(matrix, view, feature);
}

/** Loss of `view`'s exemplars against `summary`, summed. Always finite and >= 0. */
export function summaryError(
  summary: Summary,
  matrix: DataMatrix,
  view: IndexView,
  feature: number,
): number {
  switch (summary.code) {
    case 'N': return SUMMARY_TYPES.N.ops.error(summary, matrix, view, feature);
    case 'C': return SUMMARY_TYPES.C.ops.error(summary, matrix, view, feature);
    case 'G': return SUMMARY_TYPES.G.ops.error(summary, matrix, view, feature);
    case 'B': return SUMMARY_TYPES.B.ops.error(summary, matrix, view, feature);
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

function hasCode<K extends SummaryCode>(summary: Summary, code: K): summary is SummaryOf<K> {
  return summary.code === code;
}

/** Narrow a list to one kind, failing on the first summary of another kind. */
function ofKind<K extends SummaryCode>(summaries: readonly Summary[], code: K): SummaryOf<K>[] {
  const out: SummaryOf<K>[] = [];
  summaries.forEach((summary, i) => {
    if (!hasCode(summary, code)) {
      throw new InvalidFeatureLayoutError(
        `cannot merge summary ${i} of type '${summary.code}' with type '${code}'`,
      );
    }
    out.push(summary);
  });
  return out;
}

/** Check a row-major exemplars × trees grid and return its first cell. */
function gridHead(exemplars: number, trees: number, summaries: readonly Summary[]): Summary | undefined {
  if (!Number.isInteger(exemplars) || exemplars < 0 || !Number.isInteger(trees) || trees < 1) {
    throw new InvalidFeatureLayoutError(`bad grid shape ${exemplars} × ${trees}`);
  }
  if (summaries.length !== exemplars * trees) {
    throw new InvalidFeatureLayoutError(
      `grid of ${exemplars} × ${trees} needs ${exemplars * trees} summaries, got ${summaries.length}`,
    );
  }
  return summaries[0];
}

/** Consolidate one feature's summaries from several trees. */
export function mergeSummaries(summaries: readonly Summary[]): MergedFeature {
  const first = summaries[0];
  if (first === undefined) throw new InvalidFeatureLayoutError('no summaries to merge');

  switch (first.code) {
    case 'N': return SUMMARY_TYPES.N.ops.merge(ofKind(summaries, 'N'));
    case 'C': return SUMMARY_TYPES.C.ops.merge(ofKind(summaries, 'C'));
    case 'G': return SUMMARY_TYPES.G.ops.merge(ofKind(summaries, 'G'));
    case 'B': return SUMMARY_TYPES.B.ops.merge(ofKind(summaries, 'B'));
  }
}

/** As mergeSummaries, reaching each summary through `project`. */
export function mergeProjected<T>(items: readonly T[], project: Projection<T>): MergedFeature {
  return mergeSummaries(items.map((item, i) => project(item, i)));
}

/**
 * Batched merge over a row-major exemplars × trees grid: one output per
 * exemplar, each computed from its own row only.
 */
export function mergeSummariesMany(
  exemplars: number,
  trees: number,
  summaries: readonly Summary[],
): MergedFeature[] {
  const first = gridHead(exemplars, trees, summaries);
  if (first === undefined) return [];

  switch (first.code) {
    case 'N': return SUMMARY_TYPES.N.ops.mergeMany(exemplars, trees, ofKind(summaries, 'N'));
    case 'C': return SUMMARY_TYPES.C.ops.mergeMany(exemplars, trees, ofKind(summaries, 'C'));
    case 'G': return SUMMARY_TYPES.G.ops.mergeMany(exemplars, trees, ofKind(summaries, 'G'));
    case 'B': return SUMMARY_TYPES.B.ops.mergeMany(exemplars, trees, ofKind(summaries, 'B'));
  }
}

export function mergeProjectedMany<T>(
  exemplars: number,
  trees: number,
  items: readonly T[],
  project: Projection<T>,
): MergedFeature[] {
  return mergeSummariesMany(exemplars, trees, items.map((item, i) => project(item, i)));
}
