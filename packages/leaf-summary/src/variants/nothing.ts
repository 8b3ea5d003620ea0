// ---------------------------------------------------------------------------
// Nothing: placeholder summary
// ---------------------------------------------------------------------------
//
// Holds no state. Useful for a feature already covered by its neighbour's
// bivariate summary.
// ---------------------------------------------------------------------------

import type { MergedNothing, NothingSummary } from '../types.js';
import type { SummaryOps } from './ops.js';
import { rowWise } from './ops.js';

const nothing: NothingSummary = { code: 'N' };

export const NOTHING = Object.freeze(nothing);

function mergeNothing(): MergedNothing {
  return { kind: 'nothing' };
}

export const nothingOps: SummaryOps<NothingSummary, MergedNothing> = {
  create: () => NOTHING,
  error: () => 0,
  merge: mergeNothing,
  mergeMany: rowWise(mergeNothing),
  payloadSize: () => 0,
  encodePayload: () => undefined,
  decodePayload: () => NOTHING,
};
