// Simple glyph encoder: the inverse of decodeSimpleGlyph.
// Zero deltas use the "same" bit, |delta| <= 255 the short form, anything
// else an int16; identical consecutive flags collapse into repeat runs.

import { WriteBuffer } from '../shared/write-buffer'
import {
  FLAG_ON_CURVE,
  FLAG_X_SHORT,
  FLAG_Y_SHORT,
  FLAG_REPEAT,
  FLAG_X_SAME_OR_POSITIVE,
  FLAG_Y_SAME_OR_POSITIVE,
  FLAG_OVERLAP_SIMPLE,
} from './flags'
import { computeBounds, type BoundingBox, type Point, type SimpleGlyphData } from './glyph'

export interface EncodedPoints {
  flags: Uint8Array
  xCoordinates: Uint8Array
  yCoordinates: Uint8Array
}

interface FlagRun {
  flag: number
  count: number
}

const MAX_RUN = 256

export function encodePoints(points: readonly Point[], overlap: boolean = false): EncodedPoints {
  const xOut = new WriteBuffer(points.length * 2)
  const yOut = new WriteBuffer(points.length * 2)
  const runs: FlagRun[] = []

  let x = 0
  let y = 0
  for (let i = 0; i < points.length; i++) {
    const point = points[i]
    const dx = point.x - x
    const dy = point.y - y
    x = point.x
    y = point.y

    let flag = point.onCurve ? FLAG_ON_CURVE : 0
    if (overlap && i === 0) flag |= FLAG_OVERLAP_SIMPLE
    flag |= encodeDelta(dx, xOut, FLAG_X_SHORT, FLAG_X_SAME_OR_POSITIVE)
    flag |= encodeDelta(dy, yOut, FLAG_Y_SHORT, FLAG_Y_SAME_OR_POSITIVE)

    const last = runs[runs.length - 1]
    if (last && last.flag === flag && last.count < MAX_RUN) {
      last.count++
    } else {
      runs.push({ flag, count: 1 })
    }
  }

  const flagOut = new WriteBuffer(points.length)
  for (const { flag, count } of runs) {
    if (count === 1) {
      flagOut.writeU8(flag)
    } else {
      flagOut.writeU8(flag | FLAG_REPEAT)
      flagOut.writeU8(count - 1)
    }
  }

  return {
    flags: flagOut.getBytes(),
    xCoordinates: xOut.getBytes(),
    yCoordinates: yOut.getBytes(),
  }
}

// Writes the delta bytes and returns the flag bits describing them
function encodeDelta(delta: number, out: WriteBuffer, short: number, sameOrPositive: number): number {
  if (delta === 0) {
    return sameOrPositive
  }
  if (delta >= -255 && delta <= 255) {
    out.writeU8(delta > 0 ? delta : -delta)
    return delta > 0 ? short | sameOrPositive : short
  }
  out.writeS16(delta)
  return 0
}

export function encodeSimpleGlyph(
  glyph: SimpleGlyphData,
  bounds: BoundingBox = computeBounds(glyph.coordinates)
): Uint8Array {
  const { flags, xCoordinates, yCoordinates } = encodePoints(glyph.coordinates, glyph.overlap)
  const out = new WriteBuffer(
    10 +
      glyph.endPointsOfContours.length * 2 +
      2 +
      glyph.instructions.byteLength +
      flags.byteLength +
      xCoordinates.byteLength +
      yCoordinates.byteLength
  )

  out.writeS16(glyph.endPointsOfContours.length)
  out.writeS16(bounds.xMin)
  out.writeS16(bounds.yMin)
  out.writeS16(bounds.xMax)
  out.writeS16(bounds.yMax)

  for (const end of glyph.endPointsOfContours) {
    out.writeU16(end)
  }

  out.writeU16(glyph.instructions.byteLength)
  out.writeBytes(glyph.instructions)
  out.writeBytes(flags)
  out.writeBytes(xCoordinates)
  out.writeBytes(yCoordinates)

  return out.getBytes()
}
