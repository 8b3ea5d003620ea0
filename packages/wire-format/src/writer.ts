/**
 * Binary writer: values → ArrayBuffer via DataView.
 *
 * The writer never grows: callers size the buffer up front (every format
 * built on it can report its exact encoded size) and write into it.
 */

import { U8_SIZE, U32_SIZE, F64_SIZE, U32_MAX, LITTLE_ENDIAN } from './types'

export class ByteWriter {
  private readonly view: DataView
  private cursor: number

  /** Write into an existing DataView starting at `offset`. */
  constructor(view: DataView, offset = 0) {
    this.view = view
    this.cursor = offset
  }

  /** Allocate a fresh buffer of exactly `size` bytes. */
  static allocate(size: number): ByteWriter {
    return new ByteWriter(new DataView(new ArrayBuffer(size)))
  }

  get offset(): number { return this.cursor }

  get remaining(): number { return this.view.byteLength - this.cursor }

  writeU8(value: number): this {
    this.ensure(U8_SIZE)
    this.view.setUint8(this.cursor, value)
    this.cursor += U8_SIZE
    return this
  }

  writeU32(value: number): this {
    if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
      throw new RangeError(`Value out of u32 range: ${value}`)
    }
    this.ensure(U32_SIZE)
    this.view.setUint32(this.cursor, value, LITTLE_ENDIAN)
    this.cursor += U32_SIZE
    return this
  }

  writeF64(value: number): this {
    this.ensure(F64_SIZE)
    this.view.setFloat64(this.cursor, value, LITTLE_ENDIAN)
    this.cursor += F64_SIZE
    return this
  }

  /** Write a single ASCII character as one byte. */
  writeChar(char: string): this {
    const code = char.charCodeAt(0)
    if (char.length !== 1 || code > 0x7F) {
      throw new RangeError(`Not a single ASCII character: ${JSON.stringify(char)}`)
    }
    return this.writeU8(code)
  }

  /** Bytes written so far, as a view over the underlying buffer. */
  bytes(): Uint8Array {
    return new Uint8Array(this.view.buffer, this.view.byteOffset, this.cursor)
  }

  private ensure(size: number): void {
    if (this.cursor + size > this.view.byteLength) {
      throw new RangeError(
        `Write of ${size} bytes at offset ${this.cursor} overruns buffer of ${this.view.byteLength}`,
      )
    }
  }
}
