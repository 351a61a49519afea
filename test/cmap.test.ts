import { describe, it, expect } from 'vitest'
import { parse } from '../src/font'
import { ByteCursor } from '../src/shared/cursor'
import { WriteBuffer } from '../src/shared/write-buffer'
import { NOTDEF, parseCmap, type CharacterMap } from '../src/tables/cmap'
import {
  GLYPH_A,
  GLYPH_B,
  GLYPH_O,
  LATIN_CMAP,
  buildFont,
  cmapFormat12,
  cmapFormat4,
  cmapTable,
  latinFont,
  type CmapRecord,
} from './helpers/font-builder'
import { expectFontError } from './helpers/errors'

function cmapOf(records: CmapRecord[]): CharacterMap {
  return parseCmap(new ByteCursor(cmapTable(records), 'cmap table', { tag: 'cmap' }))
}

function format0(glyphs: Record<number, number>): Uint8Array {
  const out = new WriteBuffer()
  out.writeU16(0)
  out.writeU16(262)
  out.writeU16(0)
  for (let code = 0; code < 256; code++) out.writeU8(glyphs[code] ?? 0)
  return out.getBytes()
}

function format6(firstCode: number, glyphIds: number[]): Uint8Array {
  const out = new WriteBuffer()
  out.writeU16(6)
  out.writeU16(10 + glyphIds.length * 2)
  out.writeU16(0)
  out.writeU16(firstCode)
  out.writeU16(glyphIds.length)
  for (const glyphId of glyphIds) out.writeU16(glyphId)
  return out.getBytes()
}

// 'a'..'c' through glyphIdArray [10, 0, 12] with idDelta 5, then the 0xFFFF sentinel
function format4WithRangeOffsets(): Uint8Array {
  const out = new WriteBuffer()
  const words = [
    4, 38, 0, 4, 4, 1, 0,
    0x63, 0xffff, 0,
    0x61, 0xffff,
    5, 1,
    4, 0,
    10, 0, 12,
  ]
  for (const word of words) out.writeU16(word)
  return out.getBytes()
}

describe('cmap format 4', () => {
  const cmap = cmapOf([{ platformId: 3, encodingId: 1, subtable: cmapFormat4(LATIN_CMAP) }])

  it('maps code points through idDelta', () => {
    expect(cmap.format).toBe(4)
    expect(cmap.glyphIndex(0x41)).toBe(GLYPH_A)
    expect(cmap.glyphIndex(0x42)).toBe(GLYPH_B)
    expect(cmap.glyphIndex(0x4f)).toBe(GLYPH_O)
  })

  it('maps gaps, the sentinel and astral code points to glyph 0', () => {
    expect(cmap.glyphIndex(0x43)).toBe(NOTDEF)
    expect(cmap.glyphIndex(0x10)).toBe(NOTDEF)
    expect(cmap.glyphIndex(0xffff)).toBe(NOTDEF)
    expect(cmap.glyphIndex(0x1f600)).toBe(NOTDEF)
  })

  it('lists every mapping', () => {
    expect([...cmap.mappings()]).toEqual(LATIN_CMAP)
  })

  it('follows idRangeOffset into the glyph id array', () => {
    const ranged = cmapOf([{ platformId: 3, encodingId: 1, subtable: format4WithRangeOffsets() }])
    expect(ranged.glyphIndex(0x61)).toBe(15)
    expect(ranged.glyphIndex(0x62)).toBe(NOTDEF)
    expect(ranged.glyphIndex(0x63)).toBe(17)
    expect([...ranged.mappings()]).toEqual([
      [0x61, 15],
      [0x63, 17],
    ])
  })
})

describe('cmap format 12', () => {
  const cmap = cmapOf([
    {
      platformId: 3,
      encodingId: 10,
      subtable: cmapFormat12([
        [0x41, GLYPH_A],
        [0x42, GLYPH_B],
        [0x1f600, GLYPH_O],
      ]),
    },
  ])

  it('covers code points beyond the BMP', () => {
    expect(cmap.format).toBe(12)
    expect(cmap.glyphIndex(0x42)).toBe(GLYPH_B)
    expect(cmap.glyphIndex(0x1f600)).toBe(GLYPH_O)
    expect(cmap.glyphIndex(0x1f601)).toBe(NOTDEF)
  })

  it('lists every mapping', () => {
    expect([...cmap.mappings()]).toEqual([
      [0x41, GLYPH_A],
      [0x42, GLYPH_B],
      [0x1f600, GLYPH_O],
    ])
  })

  it('rejects group counts past the end of the table', () => {
    const subtable = cmapFormat12([[0x41, GLYPH_A]]).slice()
    subtable[15] = 9
    const err = expectFontError(
      () => cmapOf([{ platformId: 3, encodingId: 10, subtable }]),
      'MalformedTable'
    )
    expect(err.tag).toBe('cmap')
  })
})

describe('cmap formats 0 and 6', () => {
  it('reads the byte encoding table', () => {
    const cmap = cmapOf([{ platformId: 1, encodingId: 0, subtable: format0({ 0x41: 2 }) }])
    expect(cmap.format).toBe(0)
    expect(cmap.glyphIndex(0x41)).toBe(2)
    expect(cmap.glyphIndex(0x100)).toBe(NOTDEF)
    expect([...cmap.mappings()]).toEqual([[0x41, 2]])
  })

  it('reads the trimmed table', () => {
    const cmap = cmapOf([{ platformId: 0, encodingId: 3, subtable: format6(0x30, [7, 8, 0]) }])
    expect(cmap.format).toBe(6)
    expect(cmap.glyphIndex(0x2f)).toBe(NOTDEF)
    expect(cmap.glyphIndex(0x30)).toBe(7)
    expect(cmap.glyphIndex(0x31)).toBe(8)
    expect(cmap.glyphIndex(0x32)).toBe(NOTDEF)
    expect([...cmap.mappings()]).toEqual([
      [0x30, 7],
      [0x31, 8],
    ])
  })
})

describe('cmap subtable choice', () => {
  it('prefers Windows Unicode BMP over Macintosh Roman', () => {
    const cmap = cmapOf([
      { platformId: 1, encodingId: 0, subtable: format0({ 0x41: 9 }) },
      { platformId: 3, encodingId: 1, subtable: cmapFormat4([[0x41, GLYPH_A]]) },
    ])
    expect(cmap.glyphIndex(0x41)).toBe(GLYPH_A)
  })

  it('prefers a full-repertoire format 12 subtable', () => {
    const cmap = cmapOf([
      { platformId: 3, encodingId: 1, subtable: cmapFormat4([[0x41, GLYPH_A]]) },
      { platformId: 3, encodingId: 10, subtable: cmapFormat12([[0x41, GLYPH_B]]) },
    ])
    expect(cmap.format).toBe(12)
    expect(cmap.glyphIndex(0x41)).toBe(GLYPH_B)
  })

  it('falls back to a symbol subtable', () => {
    const cmap = cmapOf([{ platformId: 3, encodingId: 0, subtable: cmapFormat4([[0xf041, GLYPH_A]]) }])
    expect(cmap.glyphIndex(0xf041)).toBe(GLYPH_A)
  })

  it('skips encoding records that point past the table', () => {
    const bytes = cmapTable([
      { platformId: 3, encodingId: 10, subtable: cmapFormat12([[0x41, GLYPH_B]]) },
      { platformId: 3, encodingId: 1, subtable: cmapFormat4([[0x41, GLYPH_A]]) },
    ])
    // First record's offset
    new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint32(8, 0x00ffff00)
    const cmap = parseCmap(new ByteCursor(bytes, 'cmap table', { tag: 'cmap' }))
    expect(cmap.format).toBe(4)
    expect(cmap.glyphIndex(0x41)).toBe(GLYPH_A)
  })

  it('rejects a cmap whose only record points past the table', () => {
    const bytes = cmapTable([{ platformId: 3, encodingId: 1, subtable: cmapFormat4([[0x41, GLYPH_A]]) }])
    new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength).setUint32(8, bytes.byteLength)
    const err = expectFontError(
      () => parseCmap(new ByteCursor(bytes, 'cmap table', { tag: 'cmap' })),
      'MalformedTable'
    )
    expect(err.message).toBe('Malformed cmap table: no supported Unicode subtable')
  })

  it('rejects a cmap with nothing usable', () => {
    const format2 = new Uint8Array([0, 2, 0, 6, 0, 0])
    const err = expectFontError(
      () =>
        cmapOf([
          { platformId: 3, encodingId: 1, subtable: format2 },
          { platformId: 1, encodingId: 0, subtable: cmapFormat4([[0x41, GLYPH_A]]) },
        ]),
      'MalformedTable'
    )
    expect(err.message).toBe('Malformed cmap table: no supported Unicode subtable')
  })
})

describe('font cmap', () => {
  it('resolves code points through the font', () => {
    const font = parse(buildFont(latinFont({ cmapFormat: 12, cmap: [...LATIN_CMAP, [0x1f600, GLYPH_O]] })))
    expect(font.cmap.format).toBe(12)
    expect(font.glyphIndex(0x1f600)).toBe(GLYPH_O)
    expect(font.glyphForCodePoint(0x42).id).toBe(GLYPH_B)
    expect(font.glyphIndex(0x5a)).toBe(NOTDEF)
  })
})
