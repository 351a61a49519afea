// glyf: decode one glyph's bytes into a simple or compound outline
// https://learn.microsoft.com/en-us/typography/opentype/spec/glyf

import { ByteCursor } from '../shared/cursor'
import { FontFormatError, malformedGlyph, invalidGlyphIndex } from '../shared/errors'
import {
  FLAG_ON_CURVE,
  FLAG_X_SHORT,
  FLAG_Y_SHORT,
  FLAG_REPEAT,
  FLAG_X_SAME_OR_POSITIVE,
  FLAG_Y_SAME_OR_POSITIVE,
  FLAG_OVERLAP_SIMPLE,
  COMP_ARG_1_AND_2_ARE_WORDS,
  COMP_ARGS_ARE_XY_VALUES,
  COMP_WE_HAVE_A_SCALE,
  COMP_MORE_COMPONENTS,
  COMP_WE_HAVE_AN_X_AND_Y_SCALE,
  COMP_WE_HAVE_A_TWO_BY_TWO,
} from './flags'
import {
  GlyphDescription,
  type Component,
  type ComponentTransform,
  type CompoundGlyphData,
  type GlyphData,
  type Point,
  type SimpleGlyphData,
} from './glyph'

export interface DecodedGlyph {
  description: GlyphDescription
  data: GlyphData
}

// Decode a non-empty glyf entry
export function decodeGlyph(bytes: Uint8Array, glyphId: number, numGlyphs: number): DecodedGlyph {
  const cursor = new ByteCursor(bytes, `glyf entry for glyph ${glyphId}`, { tag: 'glyf', glyphId })

  const numberOfContours = cursor.readS16()
  const description = new GlyphDescription(
    cursor.readS16(),
    cursor.readS16(),
    cursor.readS16(),
    cursor.readS16()
  )

  if (numberOfContours >= 0) {
    return { description, data: decodeSimpleGlyph(cursor, glyphId, numberOfContours) }
  }
  if (numberOfContours === -1) {
    return { description, data: decodeCompoundGlyph(cursor, glyphId, numGlyphs) }
  }

  throw malformedGlyph(glyphId, `invalid numberOfContours ${numberOfContours}`)
}

function decodeSimpleGlyph(
  cursor: ByteCursor,
  glyphId: number,
  numberOfContours: number
): SimpleGlyphData {
  const endPointsOfContours: number[] = []
  for (let i = 0; i < numberOfContours; i++) {
    const end = cursor.readU16()
    if (i > 0 && end <= endPointsOfContours[i - 1]) {
      throw malformedGlyph(
        glyphId,
        `contour end points not increasing (${endPointsOfContours[i - 1]} then ${end})`
      )
    }
    endPointsOfContours.push(end)
  }

  const numPoints = numberOfContours > 0 ? endPointsOfContours[numberOfContours - 1] + 1 : 0

  // A bare header with no contours is an empty outline
  if (numPoints === 0 && cursor.remaining === 0) {
    return { kind: 'simple', endPointsOfContours, coordinates: [], instructions: new Uint8Array(0), overlap: false }
  }

  const instructionLength = cursor.readU16()
  const instructions = cursor.readBytes(instructionLength)

  // Flags (run-length encoded)
  const flags = new Uint8Array(numPoints)
  let flagIndex = 0
  while (flagIndex < numPoints) {
    const flag = cursor.readU8()
    flags[flagIndex++] = flag

    if (flag & FLAG_REPEAT) {
      const repeatCount = cursor.readU8()
      for (let j = 0; j < repeatCount && flagIndex < numPoints; j++) {
        flags[flagIndex++] = flag
      }
    }
  }

  const xs = readCoordinates(cursor, flags, FLAG_X_SHORT, FLAG_X_SAME_OR_POSITIVE)
  const ys = readCoordinates(cursor, flags, FLAG_Y_SHORT, FLAG_Y_SAME_OR_POSITIVE)

  const coordinates: Point[] = []
  for (let i = 0; i < numPoints; i++) {
    coordinates.push({ x: xs[i], y: ys[i], onCurve: (flags[i] & FLAG_ON_CURVE) !== 0 })
  }

  return {
    kind: 'simple',
    endPointsOfContours,
    coordinates,
    instructions,
    overlap: numPoints > 0 && (flags[0] & FLAG_OVERLAP_SIMPLE) !== 0,
  }
}

// One axis of deltas, accumulated into absolute positions.
// short: one unsigned byte, sign taken from sameOrPositive
// long: int16, unless sameOrPositive marks a zero delta
function readCoordinates(
  cursor: ByteCursor,
  flags: Uint8Array,
  short: number,
  sameOrPositive: number
): Int32Array {
  const values = new Int32Array(flags.length)
  let value = 0
  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i]
    if (flag & short) {
      const delta = cursor.readU8()
      value += flag & sameOrPositive ? delta : -delta
    } else if (!(flag & sameOrPositive)) {
      value += cursor.readS16()
    }
    values[i] = value
  }
  return values
}

function decodeCompoundGlyph(
  cursor: ByteCursor,
  glyphId: number,
  numGlyphs: number
): CompoundGlyphData {
  const components: Component[] = []
  let flags = COMP_MORE_COMPONENTS

  while (flags & COMP_MORE_COMPONENTS) {
    flags = cursor.readU16()
    const componentId = cursor.readU16()

    if (!(flags & COMP_ARGS_ARE_XY_VALUES)) {
      throw new FontFormatError(
        'UnsupportedCompoundEncoding',
        `Glyph ${glyphId} places component ${componentId} by point matching`,
        { glyphId }
      )
    }

    let dx: number
    let dy: number
    if (flags & COMP_ARG_1_AND_2_ARE_WORDS) {
      dx = cursor.readS16()
      dy = cursor.readS16()
    } else {
      dx = cursor.readS8()
      dy = cursor.readS8()
    }

    let transform: ComponentTransform | null = null
    if (flags & COMP_WE_HAVE_A_SCALE) {
      const scale = cursor.readF2Dot14()
      transform = [scale, 0, 0, scale]
    } else if (flags & COMP_WE_HAVE_AN_X_AND_Y_SCALE) {
      const xScale = cursor.readF2Dot14()
      const yScale = cursor.readF2Dot14()
      transform = [xScale, 0, 0, yScale]
    } else if (flags & COMP_WE_HAVE_A_TWO_BY_TWO) {
      transform = [
        cursor.readF2Dot14(),
        cursor.readF2Dot14(),
        cursor.readF2Dot14(),
        cursor.readF2Dot14(),
      ]
    }

    if (componentId === glyphId) {
      throw new FontFormatError('CompoundCycle', `Glyph ${glyphId} references itself`, {
        glyphId,
      })
    }
    if (componentId >= numGlyphs) {
      throw invalidGlyphIndex(componentId, numGlyphs)
    }

    components.push({ glyphId: componentId, dx, dy, transform, flags })
  }

  // Trailing instructions (WE_HAVE_INSTRUCTIONS) are hinting only
  return { kind: 'compound', components }
}
