// hmtx: horizontal metrics, expanded to one record per glyph

import type { ByteCursor } from '../shared/cursor'

export interface HorizontalMetric {
  advanceWidth: number
  leftSideBearing: number
}

export interface HorizontalMetrics {
  advanceWidths: Uint16Array
  leftSideBearings: Int16Array
}

export function parseHmtx(
  cursor: ByteCursor,
  numGlyphs: number,
  numberOfHMetrics: number
): HorizontalMetrics {
  const advanceWidths = new Uint16Array(numGlyphs)
  const leftSideBearings = new Int16Array(numGlyphs)

  // longHorMetric records must all be present
  for (let i = 0; i < numberOfHMetrics; i++) {
    advanceWidths[i] = cursor.readU16()
    leftSideBearings[i] = cursor.readS16()
  }

  // Monospaced tail: last advance, own lsb where the table provides one
  const lastAdvance = advanceWidths[numberOfHMetrics - 1]
  const lastLsb = leftSideBearings[numberOfHMetrics - 1]
  for (let i = numberOfHMetrics; i < numGlyphs; i++) {
    advanceWidths[i] = lastAdvance
    leftSideBearings[i] = cursor.remaining >= 2 ? cursor.readS16() : lastLsb
  }

  return { advanceWidths, leftSideBearings }
}
