import { describe, it, expect } from 'vitest'
import { parse } from '../src/font'
import { GlyphDescription } from '../src/glyf/glyph'
import {
  GLYPH_A_DIAERESIS,
  GLYPH_B,
  GLYPH_SPACE,
  buildFont,
  latinFont,
} from './helpers/font-builder'
import { expectFontError } from './helpers/errors'

describe('Font', () => {
  it('accepts an ArrayBuffer', () => {
    const bytes = buildFont(latinFont())
    const buffer = new ArrayBuffer(bytes.byteLength)
    new Uint8Array(buffer).set(bytes)
    const font = parse(buffer)
    expect(font.glyphCount()).toBe(7)
  })

  it('always decodes glyph 0', () => {
    const font = parse(buildFont(latinFont()))
    const notdef = font.glyph(0)
    expect(notdef.isSimple()).toBe(true)
    expect(notdef.description).toEqual(new GlyphDescription(50, 0, 450, 700))
    expect(notdef.description.width).toBe(400)
    expect(notdef.description.height).toBe(700)
    expect(notdef.advanceWidth).toBe(500)
    expect(notdef.leftSideBearing).toBe(50)
  })

  it('keeps contour ends consistent with the points of every simple glyph', () => {
    const font = parse(buildFont(latinFont()))
    for (let glyphId = 0; glyphId < font.glyphCount(); glyphId++) {
      const { data } = font.glyph(glyphId)
      if (data.kind !== 'simple') continue
      const ends = data.endPointsOfContours
      expect(data.coordinates.length).toBe(ends[ends.length - 1] + 1)
      for (let i = 1; i < ends.length; i++) {
        expect(ends[i]).toBeGreaterThan(ends[i - 1])
      }
    }
  })

  it('decodes zero-length entries as empty glyphs', () => {
    const font = parse(buildFont(latinFont()))
    const space = font.glyph(GLYPH_SPACE)
    expect(space.isEmpty()).toBe(true)
    expect(space.isSimple()).toBe(false)
    expect(space.description).toBe(GlyphDescription.EMPTY)
    expect(space.advanceWidth).toBe(250)
    expect(font.outlinePath(space)).toEqual([])
  })

  it('decodes compound glyphs without resolving them', () => {
    const font = parse(buildFont(latinFont()))
    const glyph = font.glyph(GLYPH_A_DIAERESIS)
    expect(glyph.isCompound()).toBe(true)
    expect(glyph.data.kind === 'compound' && glyph.data.components.map((c) => c.glyphId)).toEqual([2, 6])
  })

  it('rejects glyph ids past the end and stays usable', () => {
    const font = parse(buildFont(latinFont()))
    const err = expectFontError(() => font.glyph(7), 'InvalidGlyphIndex')
    expect(err.glyphId).toBe(7)
    expect(font.glyph(GLYPH_B).isSimple()).toBe(true)
  })

  it('decodes glyphs afresh on every call', () => {
    const font = parse(buildFont(latinFont()))
    const first = font.glyph(GLYPH_B)
    const second = font.glyph(GLYPH_B)
    expect(first).not.toBe(second)
    expect(first).toEqual(second)
  })

  it('outlines by glyph or by id', () => {
    const font = parse(buildFont(latinFont()))
    expect(font.outlinePath(GLYPH_B)).toEqual(font.outlinePath(font.glyph(GLYPH_B)))
    expect(font.outlinePath(GLYPH_B)).toEqual([
      { type: 'moveTo', x: 100, y: 0 },
      { type: 'lineTo', x: 100, y: 700 },
      { type: 'lineTo', x: 300, y: 700 },
      { type: 'quadraticCurveTo', cpx: 500, cpy: 700, x: 500, y: 350 },
      { type: 'quadraticCurveTo', cpx: 500, cpy: 0, x: 300, y: 0 },
      { type: 'lineTo', x: 100, y: 0 },
    ])
  })

  it('is frozen', () => {
    const font = parse(buildFont(latinFont()))
    expect(Object.isFrozen(font)).toBe(true)
  })

  it('leaves the input untouched', () => {
    const bytes = buildFont(latinFont())
    const copy = bytes.slice()
    const font = parse(bytes, { verifyChecksums: true })
    for (let glyphId = 0; glyphId < font.glyphCount(); glyphId++) {
      font.outlinePath(glyphId)
    }
    expect(Array.from(bytes)).toEqual(Array.from(copy))
  })
})
