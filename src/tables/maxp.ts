// maxp: maximum profile. Only numGlyphs matters for outline decoding.

import type { ByteCursor } from '../shared/cursor'
import { malformedTable } from '../shared/errors'

export function parseNumGlyphs(cursor: ByteCursor): number {
  // version
  cursor.skip(4)
  const numGlyphs = cursor.readU16()
  if (numGlyphs === 0) {
    throw malformedTable('maxp', 'font declares no glyphs')
  }
  return numGlyphs
}
