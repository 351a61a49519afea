import { describe, it, expect } from 'vitest'
import { ByteCursor } from '../src/shared/cursor'
import { computeChecksum, computeHeadChecksum } from '../src/shared/checksum'
import { stringToTag, tagToString } from '../src/shared/tags'
import { expectFontError } from './helpers/errors'

const bytes = new Uint8Array([0x12, 0x34, 0xff, 0xfe, 0x80, 0x00, 0x00, 0x01])

describe('ByteCursor', () => {
  it('reads big-endian integers', () => {
    const cursor = new ByteCursor(bytes, 'test data')
    expect(cursor.readU16()).toBe(0x1234)
    expect(cursor.readS16()).toBe(-2)
    expect(cursor.readU32()).toBe(2147483649)
    expect(cursor.remaining).toBe(0)
  })

  it('reads signed bytes', () => {
    const cursor = new ByteCursor(new Uint8Array([0xff, 0x7f]), 'test data')
    expect(cursor.readS8()).toBe(-1)
    expect(cursor.readS8()).toBe(127)
  })

  it('reads F2Dot14 values', () => {
    const cursor = new ByteCursor(new Uint8Array([0x40, 0x00, 0xc0, 0x00, 0x20, 0x00, 0x7f, 0xff]), 'test data')
    expect(cursor.readF2Dot14()).toBe(1)
    expect(cursor.readF2Dot14()).toBe(-1)
    expect(cursor.readF2Dot14()).toBe(0.5)
    expect(cursor.readF2Dot14()).toBe(1.99993896484375)
  })

  it('throws TruncatedBuffer labelled with the table', () => {
    const cursor = new ByteCursor(bytes, 'hmtx table', { tag: 'hmtx' })
    cursor.skip(7)
    const err = expectFontError(() => cursor.readU16(), 'TruncatedBuffer')
    expect(err.tag).toBe('hmtx')
    expect(err.message).toBe('Unexpected end of data in hmtx table')
  })

  it('does not move on a failed read', () => {
    const cursor = new ByteCursor(bytes, 'test data')
    cursor.skip(6)
    expectFontError(() => cursor.readU32(), 'TruncatedBuffer')
    expect(cursor.offset).toBe(6)
    expect(cursor.readU16()).toBe(1)
  })

  it('returns views for byte runs', () => {
    const cursor = new ByteCursor(bytes, 'test data')
    cursor.seek(2)
    const run = cursor.readBytes(3)
    expect(Array.from(run)).toEqual([0xff, 0xfe, 0x80])
    expect(run.buffer).toBe(bytes.buffer)
  })

  it('slices independent cursors', () => {
    const cursor = new ByteCursor(bytes, 'test data')
    const slice = cursor.slice(4, 4)
    expect(slice.readU32()).toBe(0x80000001)
    expect(cursor.offset).toBe(0)
    expectFontError(() => cursor.slice(6, 4), 'TruncatedBuffer')
  })

  it('rejects seeks outside the data', () => {
    const cursor = new ByteCursor(bytes, 'test data')
    expectFontError(() => cursor.seek(9), 'TruncatedBuffer')
    cursor.seek(8)
    expect(cursor.remaining).toBe(0)
  })
})

describe('checksums', () => {
  it('sums big-endian words', () => {
    expect(computeChecksum(new Uint8Array([0, 0, 0, 1, 0, 0, 0, 2]))).toBe(3)
  })

  it('pads a trailing partial word with zeros', () => {
    expect(computeChecksum(new Uint8Array([0x01]))).toBe(0x01000000)
    expect(computeChecksum(new Uint8Array([0, 0, 0, 1, 0x02, 0x03]))).toBe(0x02030001)
  })

  it('wraps at 32 bits', () => {
    expect(computeChecksum(new Uint8Array([0xff, 0xff, 0xff, 0xff, 0, 0, 0, 2]))).toBe(1)
  })

  it('ignores checkSumAdjustment in head', () => {
    const head = new Uint8Array([0, 0, 0, 1, 0, 0, 0, 0, 0, 0, 0, 5])
    expect(computeHeadChecksum(head)).toBe(1)
  })
})

describe('tags', () => {
  it('converts between strings and numbers', () => {
    expect(stringToTag('glyf')).toBe(0x676c7966)
    expect(tagToString(0x636d6170)).toBe('cmap')
    expect(tagToString(stringToTag('cvt '))).toBe('cvt ')
  })
})
