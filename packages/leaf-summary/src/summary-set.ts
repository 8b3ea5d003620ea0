// ---------------------------------------------------------------------------
// SummarySet: one leaf's summaries, indexed by output feature
// ---------------------------------------------------------------------------

import { createLogger } from '@leafstats/config';
import type {
  DataMatrix,
  ErrorVector,
  IndexView,
  MergedFeature,
  MergeResult,
  Summary,
  SummaryCode,
  SummarySet,
} from './types.js';
import { InvalidFeatureLayoutError, UnknownSummaryTypeError } from './errors.js';
import { isSummaryCode } from './registry.js';
import {
  createSummary,
  mergeProjected,
  mergeSummariesMany,
  summaryError,
} from './summary.js';
import { addLoss } from './variants/ops.js';

const log = createLogger('summary-set');

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/** A bivariate summary reads feature + 1, so it cannot take the last slot. */
function checkLayout(codes: readonly SummaryCode[]): void {
  const last = codes.length - 1;
  if (codes[last] === 'B') {
    throw new InvalidFeatureLayoutError(
      `bivariate summary in last slot (feature ${last}) has no following feature`,
    );
  }
}

/**
 * Resolve one code per feature. Missing or short `codes` fall back to
 * 'C' for discrete columns and 'G' for continuous ones.
 */
export function resolveSummaryCodes(matrix: DataMatrix, codes = ''): SummaryCode[] {
  const features = matrix.featureCount;
  if (codes.length > features) {
    log.warn('ignoring type codes beyond the last feature', {
      features,
      codes: codes.length,
    });
  }

  const resolved: SummaryCode[] = [];
  for (let f = 0; f < features; f++) {
    const code = codes[f];
    if (code === undefined) {
      resolved.push(matrix.isDiscrete(f) ? 'C' : 'G');
    } else if (isSummaryCode(code)) {
      resolved.push(code);
    } else {
      throw new UnknownSummaryTypeError(code);
    }
  }
  checkLayout(resolved);
  return resolved;
}

/** Validate and freeze a list of summaries as a set. */
export function freezeSummarySet(summaries: Summary[]): SummarySet {
  checkLayout(summaries.map((s) => s.code));
  const set: SummarySet = { features: summaries.length, summaries: Object.freeze(summaries) };
  return Object.freeze(set);
}

/** The per-feature code string of a set, e.g. "CGBN". */
export function summarySetCodes(set: SummarySet): string {
  return set.summaries.map((s) => s.code).join('');
}

function summaryAt(set: SummarySet, feature: number): Summary {
  const summary = set.summaries[feature];
  if (summary === undefined) {
    throw new InvalidFeatureLayoutError(`set has no summary for feature ${feature}`);
  }
  return summary;
}

/** Every set must match the first in feature count and per-feature type. */
function assertSameLayout(sets: readonly SummarySet[]): number {
  const first = sets[0];
  if (first === undefined) throw new InvalidFeatureLayoutError('no summary sets to merge');
  const codes = summarySetCodes(first);

  sets.forEach((set, i) => {
    if (set.features !== first.features) {
      throw new InvalidFeatureLayoutError(
        `set ${i} has ${set.features} features, expected ${first.features}`,
      );
    }
    const other = summarySetCodes(set);
    if (other !== codes) {
      throw new InvalidFeatureLayoutError(`set ${i} has types "${other}", expected "${codes}"`);
    }
  });
  return first.features;
}

// ---------------------------------------------------------------------------
// Construction
// ---------------------------------------------------------------------------

/**
 * Summarise every feature of `matrix` over the exemplars in `view`.
 *
 * @param codes  One type code per feature; see resolveSummaryCodes.
 * @throws UnknownSummaryTypeError for a code outside N/C/G/B
 * @throws InvalidFeatureLayoutError for a bivariate summary in the last slot
 */
export function createSummarySet(matrix: DataMatrix, view: IndexView, codes?: string): SummarySet {
  const resolved = resolveSummaryCodes(matrix, codes);
  const summaries = resolved.map((code, f) => createSummary(code, matrix, view, f));
  log.debug('summary set created', { codes: resolved.join(''), exemplars: view.size });
  return freezeSummarySet(summaries);
}

// ---------------------------------------------------------------------------
// Error
// ---------------------------------------------------------------------------

/**
 * Add each feature's loss over `view` into `out[f]`. Existing values are
 * kept, so calls over several views or trees accumulate.
 */
export function summarySetError(
  set: SummarySet,
  matrix: DataMatrix,
  view: IndexView,
  out: ErrorVector,
): void {
  if (out.length < set.features) {
    throw new InvalidFeatureLayoutError(
      `error vector has ${out.length} slots, set has ${set.features} features`,
    );
  }
  for (let f = 0; f < set.features; f++) {
    out[f] = addLoss(out[f] ?? 0, summaryError(summaryAt(set, f), matrix, view, f));
  }
}

// ---------------------------------------------------------------------------
// Merge
// ---------------------------------------------------------------------------

/** Consolidate the sets reached in each tree into one prediction. */
export function mergeSummarySets(sets: readonly SummarySet[]): MergeResult {
  const features = assertSameLayout(sets);
  const outputs: MergedFeature[] = [];
  for (let f = 0; f < features; f++) {
    outputs.push(mergeProjected(sets, (set) => summaryAt(set, f)));
  }
  return { features, outputs };
}

/**
 * Batched form over a row-major exemplars × trees grid of sets; returns one
 * consolidated prediction per exemplar.
 */
export function mergeSummarySetsMany(
  exemplars: number,
  trees: number,
  sets: readonly SummarySet[],
): MergeResult[] {
  if (sets.length !== exemplars * trees) {
    throw new InvalidFeatureLayoutError(
      `grid of ${exemplars} × ${trees} needs ${exemplars * trees} sets, got ${sets.length}`,
    );
  }
  if (exemplars === 0) return [];

  const features = assertSameLayout(sets);
  const results: MergeResult[] = [];
  for (let e = 0; e < exemplars; e++) results.push({ features, outputs: [] });

  for (let f = 0; f < features; f++) {
    const merged = mergeSummariesMany(exemplars, trees, sets.map((set) => summaryAt(set, f)));
    merged.forEach((output, e) => {
      results[e]?.outputs.push(output);
    });
  }
  return results;
}
