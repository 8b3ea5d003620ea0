// ---------------------------------------------------------------------------
// Leaf Summaries: Core Types
// ---------------------------------------------------------------------------

// ---------------------------------------------------------------------------
// Data accessors (borrowed, read-only)
// ---------------------------------------------------------------------------

/** Read access to a dataset: rows are exemplars, columns are features. */
export interface DataMatrix {
  readonly exemplarCount: number;
  readonly featureCount: number;
  value(row: number, feature: number): number;
  isDiscrete(feature: number): boolean;
  /** Number of category ids (0..n-1) a discrete feature may take. */
  categoryCount(feature: number): number;
}

/**
 * The exemplars reaching a node. Every call to `[Symbol.iterator]()` starts
 * the sequence again from the beginning.
 */
export interface IndexView extends Iterable<number> {
  readonly size: number;
}

// ---------------------------------------------------------------------------
// Summary variants
// ---------------------------------------------------------------------------

export type SummaryCode = 'N' | 'C' | 'G' | 'B';

export interface NothingSummary {
  readonly code: 'N';
}

export interface CategoricalSummary {
  readonly code: 'C';
  /** counts[k] = exemplars whose category id is k. */
  readonly counts: readonly number[];
  readonly total: number;
}

export interface GaussianSummary {
  readonly code: 'G';
  readonly count: number;
  readonly mean: number;
  /** Unbiased sample variance, never below the variance floor. */
  readonly variance: number;
}

/** Upper triangle of a symmetric 2×2 matrix: [xx, xy, yy]. */
export type Covariance2 = readonly [xx: number, xy: number, yy: number];

export interface BiGaussianSummary {
  readonly code: 'B';
  readonly count: number;
  readonly mean: readonly [x: number, y: number];
  readonly covariance: Covariance2;
}

/** Discriminated union of every summary kind; `code` is the only tag. */
export type Summary =
  | NothingSummary
  | CategoricalSummary
  | GaussianSummary
  | BiGaussianSummary;

export type SummaryOf<K extends SummaryCode> = Extract<Summary, { code: K }>;

/** One leaf's summaries, one per output feature. */
export interface SummarySet {
  readonly features: number;
  readonly summaries: readonly Summary[];
}

/** Resolves a caller's record to the summary it carries. */
export type Projection<T> = (item: T, index: number) => Summary;

// ---------------------------------------------------------------------------
// Merge output
// ---------------------------------------------------------------------------

export interface MergedNothing {
  kind: 'nothing';
}

export interface MergedCategorical {
  kind: 'categorical';
  /** Exemplars behind the estimate, summed over all merged summaries. */
  count: number;
  probabilities: number[];
}

export interface MergedGaussian {
  kind: 'gaussian';
  count: number;
  mean: number;
  variance: number;
}

export interface MergedBiGaussian {
  kind: 'bigaussian';
  count: number;
  mean: [number, number];
  covariance: [[number, number], [number, number]];
}

export type MergedFeature =
  | MergedNothing
  | MergedCategorical
  | MergedGaussian
  | MergedBiGaussian;

/** Merge output produced by each summary code. */
export interface MergedByCode {
  N: MergedNothing;
  C: MergedCategorical;
  G: MergedGaussian;
  B: MergedBiGaussian;
}

export type MergedOf<K extends SummaryCode> = MergedByCode[K];

/** The consolidated prediction for one query, indexed by feature. */
export interface MergeResult {
  features: number;
  outputs: MergedFeature[];
}

/** Caller-owned per-feature loss accumulator. */
export type ErrorVector = number[] | Float64Array;
