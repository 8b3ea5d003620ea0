// ---------------------------------------------------------------------------
// In-memory data accessors
// ---------------------------------------------------------------------------
//
// The summaries only ever read a dataset through DataMatrix and IndexView.
// These are plain column-backed implementations for callers (and tests)
// that hold their data as arrays.
// ---------------------------------------------------------------------------

import type { DataMatrix, IndexView } from './types.js';
import { InvalidFeatureLayoutError } from './errors.js';

export interface ColumnSpec {
  values: readonly number[];
  discrete?: boolean;
  /** Declared category count; defaults to the largest id seen plus one. */
  categories?: number;
}

interface Column {
  values: readonly number[];
  discrete: boolean;
  categories: number;
}

/** Column-major, read-only DataMatrix over number arrays. */
export class ColumnMatrix implements DataMatrix {
  readonly exemplarCount: number;
  readonly featureCount: number;
  private readonly columns: readonly Column[];

  constructor(columns: readonly ColumnSpec[]) {
    const exemplars = columns[0]?.values.length ?? 0;
    this.columns = columns.map((spec, feature) => {
      if (spec.values.length !== exemplars) {
        throw new InvalidFeatureLayoutError(
          `column ${feature} has ${spec.values.length} rows, expected ${exemplars}`,
        );
      }
      const discrete = spec.discrete ?? false;
      return {
        values: [...spec.values],
        discrete,
        categories: discrete ? spec.categories ?? inferCategories(spec.values) : 0,
      };
    });
    this.exemplarCount = exemplars;
    this.featureCount = columns.length;
  }

  /** Build from row-major data; `discrete[f]` marks categorical columns. */
  static fromRows(rows: readonly (readonly number[])[], discrete: readonly boolean[] = []): ColumnMatrix {
    const features = rows[0]?.length ?? discrete.length;
    const columns: ColumnSpec[] = [];
    for (let f = 0; f < features; f++) {
      columns.push({
        values: rows.map((row) => row[f] ?? Number.NaN),
        discrete: discrete[f] ?? false,
      });
    }
    return new ColumnMatrix(columns);
  }

  value(row: number, feature: number): number {
    const value = this.column(feature).values[row];
    if (value === undefined) {
      throw new RangeError(`Row ${row} out of range (${this.exemplarCount} exemplars)`);
    }
    return value;
  }

  isDiscrete(feature: number): boolean {
    return this.column(feature).discrete;
  }

  categoryCount(feature: number): number {
    return this.column(feature).categories;
  }

  private column(feature: number): Column {
    const column = this.columns[feature];
    if (column === undefined) {
      throw new RangeError(`Feature ${feature} out of range (${this.featureCount} features)`);
    }
    return column;
  }
}

function inferCategories(values: readonly number[]): number {
  let max = -1;
  for (const v of values) {
    if (Number.isFinite(v) && v > max) max = Math.trunc(v);
  }
  return max + 1;
}

// ---------------------------------------------------------------------------
// Index views
// ---------------------------------------------------------------------------

/** A restartable view over an explicit list of row indices. */
export function indexView(rows: Iterable<number>): IndexView {
  const copy = Object.freeze([...rows]);
  return {
    size: copy.length,
    [Symbol.iterator]: () => copy[Symbol.iterator](),
  };
}

/** A view over rows start, start+1, ..., end-1. */
export function rangeView(start: number, end: number): IndexView {
  const size = Math.max(0, end - start);
  return {
    size,
    *[Symbol.iterator]() {
      for (let row = start; row < end; row++) yield row;
    },
  };
}
