// loca: glyph id -> byte range inside glyf

import type { ByteCursor } from '../shared/cursor'
import type { IndexToLocFormat } from './head'
import { truncated, malformedTable, invalidGlyphIndex } from '../shared/errors'

export interface GlyphRange {
  start: number
  end: number
}

export function parseLoca(
  cursor: ByteCursor,
  numGlyphs: number,
  format: IndexToLocFormat
): Uint32Array {
  const offsets = new Uint32Array(numGlyphs + 1)

  if (format === 'short') {
    // Short format: uint16, multiply by 2
    for (let i = 0; i <= numGlyphs; i++) {
      offsets[i] = cursor.readU16() * 2
    }
  } else {
    for (let i = 0; i <= numGlyphs; i++) {
      offsets[i] = cursor.readU32()
    }
  }

  return offsets
}

// Byte range of one glyph; start === end means an empty glyph
export function glyphRange(loca: Uint32Array, glyfLength: number, glyphId: number): GlyphRange {
  const numGlyphs = loca.length - 1
  if (!Number.isInteger(glyphId) || glyphId < 0 || glyphId >= numGlyphs) {
    throw invalidGlyphIndex(glyphId, numGlyphs)
  }

  const start = loca[glyphId]
  const end = loca[glyphId + 1]

  if (end < start) {
    throw malformedTable('loca', `offsets decrease at glyph ${glyphId} (${start} > ${end})`)
  }
  if (end > glyfLength) {
    throw truncated('glyf table', { tag: 'glyf', glyphId })
  }

  return { start, end }
}
