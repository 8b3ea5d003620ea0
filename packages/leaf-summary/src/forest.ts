// ---------------------------------------------------------------------------
// Forest persistence
// ---------------------------------------------------------------------------
//
// Saves the leaf summaries of a whole forest as one buffer:
//   [4B set count] [SummarySet 1] ... [SummarySet n]
// Leaf order is the caller's; reload yields the sets in the same order.
// ---------------------------------------------------------------------------

import { createLogger } from '@leafstats/config';
import { ByteReader, U32_SIZE } from '@leafstats/wire-format';
import type { ByteSource } from '@leafstats/wire-format';
import type { SummarySet } from './types.js';
import {
  allocateWriter,
  encodeSummarySetInto,
  guardTruncation,
  readSummarySet,
  summarySetSize,
} from './codec.js';

const log = createLogger('forest');

export function forestSize(sets: readonly SummarySet[]): number {
  let size = U32_SIZE;
  for (const set of sets) size += summarySetSize(set);
  return size;
}

export function encodeForest(sets: readonly SummarySet[]): Uint8Array {
  const writer = allocateWriter(forestSize(sets));
  writer.writeU32(sets.length);
  for (const set of sets) encodeSummarySetInto(set, writer);
  log.debug('forest encoded', { sets: sets.length, bytes: writer.offset });
  return writer.bytes();
}

export interface DecodedForest {
  sets: SummarySet[];
  bytesRead: number;
}

export function decodeForest(source: ByteSource, offset = 0): DecodedForest {
  const reader = new ByteReader(source, offset);
  const sets = guardTruncation(() => {
    const count = reader.readU32();
    // Every set is at least its feature count.
    reader.ensure(count * U32_SIZE);
    const out: SummarySet[] = [];
    for (let i = 0; i < count; i++) out.push(readSummarySet(reader));
    return out;
  });
  const bytesRead = reader.offset - offset;
  log.debug('forest decoded', { sets: sets.length, bytes: bytesRead });
  return { sets, bytesRead };
}
