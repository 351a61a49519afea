// WOFF2 transformed hmtx (section 5.4).
// Left side bearings equal to the glyph's xMin may be dropped from the
// stream; flag bit 0 covers proportional glyphs, bit 1 the monospaced tail.

import { ByteCursor } from '../shared/cursor'
import { WriteBuffer } from '../shared/write-buffer'

export function reconstructHmtx(
  data: Uint8Array,
  numGlyphs: number,
  numberOfHMetrics: number,
  xMins: Int16Array
): Uint8Array {
  const stream = new ByteCursor(data, 'WOFF2 hmtx stream', { tag: 'hmtx' })
  const flags = stream.readU8()
  const hasProportionalLsbs = (flags & 1) === 0
  const hasMonospaceLsbs = (flags & 2) === 0

  const advanceWidths: number[] = []
  for (let i = 0; i < numberOfHMetrics; i++) {
    advanceWidths.push(stream.readU16())
  }

  const out = new WriteBuffer(numberOfHMetrics * 4 + (numGlyphs - numberOfHMetrics) * 2)
  for (let i = 0; i < numGlyphs; i++) {
    const proportional = i < numberOfHMetrics
    const stored = proportional ? hasProportionalLsbs : hasMonospaceLsbs
    const lsb = stored ? stream.readS16() : xMins[i]

    if (proportional) out.writeU16(advanceWidths[i])
    out.writeS16(lsb)
  }

  return out.getBytes()
}
