/**
 * Binary reader: ArrayBuffer → values via DataView.
 *
 * Reads the format produced by writer.ts. Every read is bounds-checked so a
 * short buffer surfaces as ByteUnderflowError rather than a bare RangeError.
 */

import type { ByteSource } from './types'
import { U8_SIZE, U32_SIZE, F64_SIZE, LITTLE_ENDIAN } from './types'

/** Thrown when a read needs more bytes than the buffer holds. */
export class ByteUnderflowError extends Error {
  constructor(
    public readonly needed: number,
    public readonly available: number,
    public readonly offset: number,
  ) {
    super(`Buffer underflow at offset ${offset}: needed ${needed} bytes, ${available} available`)
    this.name = 'ByteUnderflowError'
  }
}

function toView(source: ByteSource): DataView {
  if (source instanceof Uint8Array) {
    return new DataView(source.buffer, source.byteOffset, source.byteLength)
  }
  return new DataView(source)
}

export class ByteReader {
  private readonly view: DataView
  private cursor: number

  constructor(source: ByteSource | DataView, offset = 0) {
    this.view = source instanceof DataView ? source : toView(source)
    this.cursor = offset
  }

  get offset(): number { return this.cursor }

  get remaining(): number { return Math.max(0, this.view.byteLength - this.cursor) }

  readU8(): number {
    this.ensure(U8_SIZE)
    const value = this.view.getUint8(this.cursor)
    this.cursor += U8_SIZE
    return value
  }

  readU32(): number {
    this.ensure(U32_SIZE)
    const value = this.view.getUint32(this.cursor, LITTLE_ENDIAN)
    this.cursor += U32_SIZE
    return value
  }

  readF64(): number {
    this.ensure(F64_SIZE)
    const value = this.view.getFloat64(this.cursor, LITTLE_ENDIAN)
    this.cursor += F64_SIZE
    return value
  }

  /** Read one byte as an ASCII character. */
  readChar(): string {
    return String.fromCharCode(this.readU8())
  }

  /** Fail now if fewer than `size` bytes remain, without consuming any. */
  ensure(size: number): void {
    if (size > this.remaining) {
      throw new ByteUnderflowError(size, this.remaining, this.cursor)
    }
  }
}
