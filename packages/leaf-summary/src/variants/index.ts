// ---------------------------------------------------------------------------
// Summary variants: barrel export
// ---------------------------------------------------------------------------

export type { SummaryOps } from './ops.js';
export { NOTHING, nothingOps } from './nothing.js';
export { categoricalOps, categoryProbability } from './categorical.js';
export { gaussianOps, fitGaussian } from './gaussian.js';
export { biGaussianOps } from './bigaussian.js';
