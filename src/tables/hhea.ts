// hhea: horizontal header
// https://learn.microsoft.com/en-us/typography/opentype/spec/hhea

import type { ByteCursor } from '../shared/cursor'
import { malformedTable } from '../shared/errors'

export interface HheaTable {
  ascender: number
  descender: number
  lineGap: number
  advanceWidthMax: number
  numberOfHMetrics: number
}

export function parseHhea(cursor: ByteCursor, numGlyphs: number): HheaTable {
  // version
  cursor.skip(4)
  const ascender = cursor.readS16()
  const descender = cursor.readS16()
  const lineGap = cursor.readS16()
  const advanceWidthMax = cursor.readU16()

  // minLeftSideBearing .. metricDataFormat
  cursor.skip(22)

  const numberOfHMetrics = cursor.readU16()
  if (numberOfHMetrics === 0) {
    throw malformedTable('hhea', 'numberOfHMetrics is zero')
  }

  return {
    ascender,
    descender,
    lineGap,
    advanceWidthMax,
    numberOfHMetrics: Math.min(numberOfHMetrics, numGlyphs),
  }
}
