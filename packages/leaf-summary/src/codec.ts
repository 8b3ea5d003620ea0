// ---------------------------------------------------------------------------
// Binary codec for summaries and summary sets
// ---------------------------------------------------------------------------
//
// Summary:    [1B type code] [type-specific payload]
// SummarySet: [4B feature count] [Summary 1] ... [Summary n]
//
// Payloads (all little-endian):
//   N  (tag only)
//   C  [4B categories] [4B count × categories]
//   G  [4B count] [8B mean] [8B variance]
//   B  [4B count] [8B mean x] [8B mean y] [8B xx] [8B xy] [8B yy]
//
// Summaries are self-describing, so a set carries no separate code table.
// ---------------------------------------------------------------------------

import {
  ByteReader,
  ByteUnderflowError,
  ByteWriter,
  U8_SIZE,
  U32_SIZE,
} from '@leafstats/wire-format';
import type { ByteSource } from '@leafstats/wire-format';
import type { Summary, SummarySet } from './types.js';
import {
  AllocationFailureError,
  TruncatedDataError,
  UnknownSummaryTypeError,
} from './errors.js';
import { SUMMARY_TYPES, isSummaryCode } from './registry.js';
import { freezeSummarySet } from './summary-set.js';

// ---------------------------------------------------------------------------
// Error translation
// ---------------------------------------------------------------------------

/** Run a decode, reporting a short buffer as TruncatedDataError. */
export function guardTruncation<T>(decode: () => T): T {
  try {
    return decode();
  } catch (err) {
    if (err instanceof ByteUnderflowError) {
      throw new TruncatedDataError(err.needed, err.available, err.offset, { cause: err });
    }
    throw err;
  }
}

/** Allocate an exactly-sized writer, reporting a refused buffer as AllocationFailureError. */
export function allocateWriter(size: number): ByteWriter {
  try {
    return ByteWriter.allocate(size);
  } catch (err) {
    if (err instanceof RangeError) {
      throw new AllocationFailureError(size, { cause: err });
    }
    throw err;
  }
}

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/** Encoded size in bytes: tag plus payload. */
export function summarySize(summary: Summary): number {
  switch (summary.code) {
    case 'N': return U8_SIZE + SUMMARY_TYPES.N.ops.payloadSize(summary);
    case 'C': return U8_SIZE + SUMMARY_TYPES.C.ops.payloadSize(summary);
    case 'G': return U8_SIZE + SUMMARY_TYPES.G.ops.payloadSize(summary);
    case 'B': return U8_SIZE + SUMMARY_TYPES.B.ops.payloadSize(summary);
  }
}

/** Write tag then payload. */
export function encodeSummaryInto(summary: Summary, writer: ByteWriter): void {
  writer.writeChar(summary.code);
  switch (summary.code) {
    case 'N': SUMMARY_TYPES.N.ops.encodePayload(summary, writer); break;
    case 'C': SUMMARY_TYPES.C.ops.encodePayload(summary, writer); break;
    case 'G': SUMMARY_TYPES.G.ops.encodePayload(summary, writer); break;
    case 'B': SUMMARY_TYPES.B.ops.encodePayload(summary, writer); break;
  }
}

export function encodeSummary(summary: Summary): Uint8Array {
  const writer = allocateWriter(summarySize(summary));
  encodeSummaryInto(summary, writer);
  return writer.bytes();
}

/** Read one summary at the reader's cursor. Underflow propagates raw. */
export function readSummary(reader: ByteReader): Summary {
  const tag = reader.readChar();
  if (!isSummaryCode(tag)) throw new UnknownSummaryTypeError(tag);
  return SUMMARY_TYPES[tag].ops.decodePayload(reader);
}

export interface DecodedSummary {
  summary: Summary;
  bytesRead: number;
}

export function decodeSummary(source: ByteSource, offset = 0): DecodedSummary {
  const reader = new ByteReader(source, offset);
  const summary = guardTruncation(() => readSummary(reader));
  return { summary, bytesRead: reader.offset - offset };
}

// ---------------------------------------------------------------------------
// SummarySet
// ---------------------------------------------------------------------------

export function summarySetSize(set: SummarySet): number {
  let size = U32_SIZE;
  for (const summary of set.summaries) size += summarySize(summary);
  return size;
}

export function encodeSummarySetInto(set: SummarySet, writer: ByteWriter): void {
  writer.writeU32(set.features);
  for (const summary of set.summaries) encodeSummaryInto(summary, writer);
}

export function encodeSummarySet(set: SummarySet): Uint8Array {
  const writer = allocateWriter(summarySetSize(set));
  encodeSummarySetInto(set, writer);
  return writer.bytes();
}

/** Read one set at the reader's cursor; nothing is returned unless it all decodes. */
export function readSummarySet(reader: ByteReader): SummarySet {
  const features = reader.readU32();
  // Every summary is at least its tag byte.
  reader.ensure(features * U8_SIZE);
  const summaries: Summary[] = [];
  for (let f = 0; f < features; f++) {
    summaries.push(readSummary(reader));
  }
  return freezeSummarySet(summaries);
}

export interface DecodedSummarySet {
  set: SummarySet;
  bytesRead: number;
}

export function decodeSummarySet(source: ByteSource, offset = 0): DecodedSummarySet {
  const reader = new ByteReader(source, offset);
  const set = guardTruncation(() => readSummarySet(reader));
  return { set, bytesRead: reader.offset - offset };
}
