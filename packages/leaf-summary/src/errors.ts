// ---------------------------------------------------------------------------
// Leaf Summary Errors
// ---------------------------------------------------------------------------

export type LeafSummaryErrorKind =
  | 'UnknownSummaryType'
  | 'TruncatedData'
  | 'InvalidFeatureLayout'
  | 'AllocationFailure';

/** Base class for every failure this package reports. */
export abstract class LeafSummaryError extends Error {
  abstract readonly kind: LeafSummaryErrorKind;
}

/** A construction code or decoded tag names no registered summary type. */
export class UnknownSummaryTypeError extends LeafSummaryError {
  readonly kind = 'UnknownSummaryType' as const;

  constructor(public readonly code: string) {
    super(`Unknown summary type code: ${JSON.stringify(code)}`);
    this.name = 'UnknownSummaryTypeError';
  }
}

/** A buffer ended before the structure it encodes did. */
export class TruncatedDataError extends LeafSummaryError {
  readonly kind = 'TruncatedData' as const;

  constructor(
    public readonly needed: number,
    public readonly available: number,
    public readonly offset: number,
    options?: { cause?: unknown },
  ) {
    super(
      `Truncated summary data at offset ${offset}: needed ${needed} bytes, ${available} available`,
      options,
    );
    this.name = 'TruncatedDataError';
  }
}

/** Feature layout is unusable: bad slot, mismatched sets or a malformed grid. */
export class InvalidFeatureLayoutError extends LeafSummaryError {
  readonly kind = 'InvalidFeatureLayout' as const;

  constructor(public readonly reason: string) {
    super(`Invalid feature layout: ${reason}`);
    this.name = 'InvalidFeatureLayoutError';
  }
}

/** The runtime refused a buffer of the requested size. */
export class AllocationFailureError extends LeafSummaryError {
  readonly kind = 'AllocationFailure' as const;

  constructor(
    public readonly bytes: number,
    options?: { cause?: unknown },
  ) {
    super(`Failed to allocate ${bytes} bytes`, options);
    this.name = 'AllocationFailureError';
  }
}
