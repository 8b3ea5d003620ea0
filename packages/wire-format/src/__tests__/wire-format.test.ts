import { describe, it, expect } from 'vitest'
import fc from 'fast-check'

import { U8_SIZE, U32_SIZE, F64_SIZE, U32_MAX } from '../types'
import { ByteWriter } from '../writer'
import { ByteReader, ByteUnderflowError } from '../reader'

// ─── Writer ─────────────────────────────────────────────────────────────────

describe('ByteWriter', () => {
  it('writes little-endian fields in order', () => {
    const writer = ByteWriter.allocate(U8_SIZE + U32_SIZE)
    writer.writeU8(0x47).writeU32(0x01020304)

    expect(Array.from(writer.bytes())).toEqual([0x47, 0x04, 0x03, 0x02, 0x01])
    expect(writer.offset).toBe(5)
    expect(writer.remaining).toBe(0)
  })

  it('writes into an existing view at an offset', () => {
    const view = new DataView(new ArrayBuffer(6))
    const writer = new ByteWriter(view, 2)
    writer.writeU32(7)
    expect(view.getUint32(2, true)).toBe(7)
    expect(writer.offset).toBe(6)
  })

  it('rejects values outside the u32 range', () => {
    const writer = ByteWriter.allocate(U32_SIZE)
    expect(() => writer.writeU32(-1)).toThrow(RangeError)
    expect(() => writer.writeU32(U32_MAX + 1)).toThrow(RangeError)
    expect(() => writer.writeU32(1.5)).toThrow(RangeError)
    expect(writer.offset).toBe(0)
  })

  it('refuses to overrun the buffer', () => {
    const writer = ByteWriter.allocate(F64_SIZE - 1)
    expect(() => writer.writeF64(1)).toThrow(/overruns buffer of 7/)
  })

  it('writes ASCII characters only', () => {
    const writer = ByteWriter.allocate(2)
    writer.writeChar('G')
    expect(() => writer.writeChar('é')).toThrow(RangeError)
    expect(() => writer.writeChar('GG')).toThrow(RangeError)
    expect(Array.from(writer.bytes())).toEqual([71])
  })
})

// ─── Reader ─────────────────────────────────────────────────────────────────

describe('ByteReader', () => {
  it('reads back what the writer wrote', () => {
    fc.assert(fc.property(
      fc.integer({ min: 0, max: 255 }),
      fc.integer({ min: 0, max: U32_MAX }),
      fc.double(),
      (u8, u32, f64) => {
        const writer = ByteWriter.allocate(U8_SIZE + U32_SIZE + F64_SIZE)
        writer.writeU8(u8).writeU32(u32).writeF64(f64)

        const reader = new ByteReader(writer.bytes())
        expect(reader.readU8()).toBe(u8)
        expect(reader.readU32()).toBe(u32)
        expect(Object.is(reader.readF64(), f64)).toBe(true)
        expect(reader.remaining).toBe(0)
      },
    ))
  })

  it('honours the byte offset of a Uint8Array slice', () => {
    const backing = new Uint8Array([9, 9, 0x42, 5, 0, 0, 0])
    const reader = new ByteReader(backing.subarray(2))
    expect(reader.readChar()).toBe('B')
    expect(reader.readU32()).toBe(5)
  })

  it('throws ByteUnderflowError on a short read without consuming', () => {
    const reader = new ByteReader(new Uint8Array([1, 2, 3]))
    reader.readU8()

    let caught: unknown
    try {
      reader.readU32()
    } catch (err) {
      caught = err
    }
    expect(caught).toBeInstanceOf(ByteUnderflowError)
    if (caught instanceof ByteUnderflowError) {
      expect(caught.needed).toBe(4)
      expect(caught.available).toBe(2)
      expect(caught.offset).toBe(1)
    }
    expect(reader.offset).toBe(1)
  })

  it('ensure() checks without reading', () => {
    const reader = new ByteReader(new ArrayBuffer(8))
    expect(() => reader.ensure(8)).not.toThrow()
    expect(() => reader.ensure(9)).toThrow(ByteUnderflowError)
    expect(reader.offset).toBe(0)
  })

  it('reports zero remaining past the end', () => {
    const reader = new ByteReader(new ArrayBuffer(2), 5)
    expect(reader.remaining).toBe(0)
    expect(() => reader.readU8()).toThrow(ByteUnderflowError)
  })
})
