// head: font header
// https://learn.microsoft.com/en-us/typography/opentype/spec/head

import type { ByteCursor } from '../shared/cursor'
import { malformedTable } from '../shared/errors'

const HEAD_MAGIC = 0x5f0f3cf5

export type IndexToLocFormat = 'short' | 'long'

export interface HeadTable {
  unitsPerEm: number
  xMin: number
  yMin: number
  xMax: number
  yMax: number
  indexToLocFormat: IndexToLocFormat
}

export function parseHead(cursor: ByteCursor): HeadTable {
  // version, fontRevision, checkSumAdjustment
  cursor.skip(12)

  const magic = cursor.readU32()
  if (magic !== HEAD_MAGIC) {
    throw malformedTable('head', `bad magic number 0x${magic.toString(16)}`)
  }

  // flags
  cursor.skip(2)
  const unitsPerEm = cursor.readU16()
  if (unitsPerEm === 0) {
    throw malformedTable('head', 'unitsPerEm is zero')
  }

  // created, modified
  cursor.skip(16)

  const xMin = cursor.readS16()
  const yMin = cursor.readS16()
  const xMax = cursor.readS16()
  const yMax = cursor.readS16()

  // macStyle, lowestRecPPEM, fontDirectionHint
  cursor.skip(6)

  const format = cursor.readS16()
  if (format !== 0 && format !== 1) {
    throw malformedTable('head', `indexToLocFormat ${format} is neither 0 nor 1`)
  }

  // glyphDataFormat
  cursor.skip(2)

  return {
    unitsPerEm,
    xMin,
    yMin,
    xMax,
    yMax,
    indexToLocFormat: format === 0 ? 'short' : 'long',
  }
}
