// ---------------------------------------------------------------------------
// Summary type registry
// ---------------------------------------------------------------------------

import type { MergedOf, SummaryCode, SummaryOf } from './types.js';
import type { SummaryOps } from './variants/index.js';
import { nothingOps, categoricalOps, gaussianOps, biGaussianOps } from './variants/index.js';

/** Descriptor for one summary kind, selected by its one-character code. */
export interface SummaryType<K extends SummaryCode> {
  readonly code: K;
  readonly name: string;
  readonly description: string;
  readonly ops: SummaryOps<SummaryOf<K>, MergedOf<K>>;
}

export type SummaryTypeTable = { readonly [K in SummaryCode]: SummaryType<K> };

const table: SummaryTypeTable = {
  N: {
    code: 'N',
    name: 'nothing',
    description: 'Stores nothing; a placeholder for a feature covered by a neighbouring bivariate summary.',
    ops: nothingOps,
  },
  C: {
    code: 'C',
    name: 'categorical',
    description: 'Histogram over the category ids of a discrete feature; merges to a probability vector.',
    ops: categoricalOps,
  },
  G: {
    code: 'G',
    name: 'gaussian',
    description: 'Count, mean and unbiased variance of a continuous feature; merges by moment matching.',
    ops: gaussianOps,
  },
  B: {
    code: 'B',
    name: 'bigaussian',
    description: 'Bivariate Gaussian over a feature and the one after it; must not sit in the last slot.',
    ops: biGaussianOps,
  },
};

for (const type of Object.values(table)) Object.freeze(type);

/** Built once at load; read-only for the process lifetime. */
export const SUMMARY_TYPES: SummaryTypeTable = Object.freeze(table);

const codes: SummaryCode[] = ['N', 'C', 'G', 'B'];

/** Every code, in registry order. */
export const SUMMARY_CODES: readonly SummaryCode[] = Object.freeze(codes);

export function isSummaryCode(code: string): code is SummaryCode {
  return code === 'N' || code === 'C' || code === 'G' || code === 'B';
}

export function summaryType<K extends SummaryCode>(code: K): SummaryType<K> {
  return SUMMARY_TYPES[code];
}

/** Code, name and description of every registered type. */
export function listSummaryTypes(): Array<{ code: SummaryCode; name: string; description: string }> {
  return SUMMARY_CODES.map((code) => {
    const { name, description } = SUMMARY_TYPES[code];
    return { code, name, description };
  });
}
