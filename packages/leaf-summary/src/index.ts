// ---------------------------------------------------------------------------
// @leafstats/leaf-summary: per-leaf statistical summaries for random forests
// ---------------------------------------------------------------------------

// Types
export * from './types.js';

// Errors
export * from './errors.js';

// Data accessors
export { ColumnMatrix, indexView, rangeView, type ColumnSpec } from './data.js';

// Type registry
export {
  SUMMARY_TYPES,
  SUMMARY_CODES,
  isSummaryCode,
  summaryType,
  listSummaryTypes,
  type SummaryType,
  type SummaryTypeTable,
} from './registry.js';

// Variants
export { NOTHING, categoryProbability, fitGaussian, type SummaryOps } from './variants/index.js';

// Summary
export {
  createSummary,
  summaryError,
  mergeSummaries,
  mergeProjected,
  mergeSummariesMany,
  mergeProjectedMany,
} from './summary.js';

// SummarySet
export {
  createSummarySet,
  resolveSummaryCodes,
  summarySetCodes,
  summarySetError,
  mergeSummarySets,
  mergeSummarySetsMany,
} from './summary-set.js';

// Serialization
export {
  summarySize,
  encodeSummary,
  encodeSummaryInto,
  decodeSummary,
  summarySetSize,
  encodeSummarySet,
  encodeSummarySetInto,
  decodeSummarySet,
  type DecodedSummary,
  type DecodedSummarySet,
} from './codec.js';

// Forest persistence
export { forestSize, encodeForest, decodeForest, type DecodedForest } from './forest.js';

// Out-of-bag error
export {
  createErrorVector,
  outOfBagError,
  type OutOfBagLeaf,
  type OutOfBagReport,
} from './oob.js';
