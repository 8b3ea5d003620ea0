/**
 * Fixed-width field sizes for the little-endian binary format.
 *
 * Every multi-byte value is little-endian. Integers are unsigned 32-bit,
 * reals are IEEE-754 float64 so a value survives encode/decode bit-for-bit.
 */

// ─── Field sizes ────────────────────────────────────────────────────────────

export const U8_SIZE  = 1
export const U32_SIZE = 4
export const F64_SIZE = 8

export const LITTLE_ENDIAN = true

/** Largest value a u32 field can carry. */
export const U32_MAX = 0xFFFFFFFF

/** Anything a reader can be constructed over. */
export type ByteSource = ArrayBuffer | Uint8Array
