// cmap: character to glyph index mapping
// https://learn.microsoft.com/en-us/typography/opentype/spec/cmap

import type { ByteCursor } from '../shared/cursor'
import { malformedTable } from '../shared/errors'

export const NOTDEF = 0

export interface CharacterMap {
  readonly format: number
  // Unmapped code points resolve to NOTDEF
  glyphIndex(codePoint: number): number
  // Every mapped (codePoint, glyphId) pair in code point order
  mappings(): Generator<[number, number]>
}

interface EncodingRecord {
  platformId: number
  encodingId: number
  offset: number
  format: number
}

// Lower is better; null means we cannot use the subtable
function subtablePriority(record: EncodingRecord): number | null {
  const { platformId, encodingId, format } = record
  const unicode = platformId === 0
  const windows = platformId === 3

  if (format === 12 && (unicode || (windows && encodingId === 10))) return 0
  if (format === 4 && (unicode || (windows && encodingId === 1))) return 1
  if ((format === 6 || format === 0) && unicode) return 2
  if (format === 4 && windows && encodingId === 0) return 3
  if ((format === 0 || format === 6) && platformId === 1 && encodingId === 0) return 4
  return null
}

export function parseCmap(cursor: ByteCursor): CharacterMap {
  // version
  cursor.skip(2)
  const numTables = cursor.readU16()

  const records: EncodingRecord[] = []
  for (let i = 0; i < numTables; i++) {
    const platformId = cursor.readU16()
    const encodingId = cursor.readU16()
    const offset = cursor.readU32()
    records.push({ platformId, encodingId, offset, format: -1 })
  }

  let best: EncodingRecord | null = null
  let bestPriority = Infinity
  for (const record of records) {
    // Unusable, not fatal: another subtable may still serve
    if (record.offset + 2 > cursor.length) continue
    cursor.seek(record.offset)
    record.format = cursor.readU16()
    const priority = subtablePriority(record)
    if (priority !== null && priority < bestPriority) {
      best = record
      bestPriority = priority
    }
  }

  if (!best) {
    throw malformedTable('cmap', 'no supported Unicode subtable')
  }

  const subtable = cursor.slice(best.offset, cursor.length - best.offset)
  switch (best.format) {
    case 0:
      return new CmapFormat0(subtable)
    case 4:
      return new CmapFormat4(subtable)
    case 6:
      return new CmapFormat6(subtable)
    default:
      return new CmapFormat12(subtable)
  }
}

// Byte encoding table: 256 one-byte glyph ids
export class CmapFormat0 implements CharacterMap {
  readonly format = 0
  private readonly glyphIds: Uint8Array

  constructor(cursor: ByteCursor) {
    // format, length, language
    cursor.skip(6)
    this.glyphIds = cursor.readBytes(256)
  }

  glyphIndex(codePoint: number): number {
    if (codePoint < 0 || codePoint > 0xff) return NOTDEF
    return this.glyphIds[codePoint]
  }

  *mappings(): Generator<[number, number]> {
    for (let codePoint = 0; codePoint < 256; codePoint++) {
      const glyphId = this.glyphIds[codePoint]
      if (glyphId !== NOTDEF) yield [codePoint, glyphId]
    }
  }
}

// Segment mapping to delta values, BMP only
export class CmapFormat4 implements CharacterMap {
  readonly format = 4
  private readonly segCount: number
  private readonly endCodes: Uint16Array
  private readonly startCodes: Uint16Array
  private readonly idDeltas: Uint16Array
  private readonly idRangeOffsets: Uint16Array
  private readonly glyphIdArray: Uint16Array

  constructor(cursor: ByteCursor) {
    // format
    cursor.skip(2)
    const length = cursor.readU16()
    // language
    cursor.skip(2)

    const segCountX2 = cursor.readU16()
    if (segCountX2 % 2 !== 0) {
      throw malformedTable('cmap', `odd segCountX2 ${segCountX2} in format 4 subtable`)
    }
    this.segCount = segCountX2 / 2

    // searchRange, entrySelector, rangeShift
    cursor.skip(6)

    this.endCodes = readU16Array(cursor, this.segCount)
    // reservedPad
    cursor.skip(2)
    this.startCodes = readU16Array(cursor, this.segCount)
    this.idDeltas = readU16Array(cursor, this.segCount)
    this.idRangeOffsets = readU16Array(cursor, this.segCount)

    // Some fonts overstate the length; the glyphIdArray ends where the table does
    const end = Math.min(Math.max(length, cursor.offset), cursor.length)
    this.glyphIdArray = readU16Array(cursor, (end - cursor.offset) >> 1)
  }

  private findSegment(codePoint: number): number {
    // First segment whose endCode >= codePoint
    let lo = 0
    let hi = this.segCount - 1
    let found = -1
    while (lo <= hi) {
      const mid = (lo + hi) >> 1
      if (this.endCodes[mid] >= codePoint) {
        found = mid
        hi = mid - 1
      } else {
        lo = mid + 1
      }
    }
    return found
  }

  private lookup(segment: number, codePoint: number): number {
    const rangeOffset = this.idRangeOffsets[segment]
    if (rangeOffset === 0) {
      return (this.idDeltas[segment] + codePoint) & 0xffff
    }

    // idRangeOffset counts bytes from its own slot; the glyphIdArray follows
    // directly after the segCount slots of idRangeOffset
    const index =
      segment + rangeOffset / 2 + (codePoint - this.startCodes[segment]) - this.segCount
    if (!Number.isInteger(index) || index < 0 || index >= this.glyphIdArray.length) {
      return NOTDEF
    }

    const glyphId = this.glyphIdArray[index]
    if (glyphId === NOTDEF) return NOTDEF
    return (glyphId + this.idDeltas[segment]) & 0xffff
  }

  glyphIndex(codePoint: number): number {
    if (codePoint < 0 || codePoint > 0xffff) return NOTDEF
    const segment = this.findSegment(codePoint)
    if (segment < 0 || this.startCodes[segment] > codePoint) return NOTDEF
    return this.lookup(segment, codePoint)
  }

  *mappings(): Generator<[number, number]> {
    for (let segment = 0; segment < this.segCount; segment++) {
      const start = this.startCodes[segment]
      const end = this.endCodes[segment]
      for (let codePoint = start; codePoint <= end; codePoint++) {
        const glyphId = this.lookup(segment, codePoint)
        if (glyphId !== NOTDEF) yield [codePoint, glyphId]
      }
    }
  }
}

// Trimmed table mapping: one dense run of 16-bit code points
export class CmapFormat6 implements CharacterMap {
  readonly format = 6
  private readonly firstCode: number
  private readonly glyphIds: Uint16Array

  constructor(cursor: ByteCursor) {
    // format, length, language
    cursor.skip(6)
    this.firstCode = cursor.readU16()
    const entryCount = cursor.readU16()
    this.glyphIds = readU16Array(cursor, entryCount)
  }

  glyphIndex(codePoint: number): number {
    const index = codePoint - this.firstCode
    if (index < 0 || index >= this.glyphIds.length) return NOTDEF
    return this.glyphIds[index]
  }

  *mappings(): Generator<[number, number]> {
    for (let i = 0; i < this.glyphIds.length; i++) {
      if (this.glyphIds[i] !== NOTDEF) yield [this.firstCode + i, this.glyphIds[i]]
    }
  }
}

// Segmented coverage over the full Unicode range
export class CmapFormat12 implements CharacterMap {
  readonly format = 12
  private readonly startCharCodes: Uint32Array
  private readonly endCharCodes: Uint32Array
  private readonly startGlyphIds: Uint32Array

  constructor(cursor: ByteCursor) {
    // format, reserved, length, language
    cursor.skip(12)
    const numGroups = cursor.readU32()
    if (numGroups * 12 > cursor.remaining) {
      throw malformedTable('cmap', `format 12 declares ${numGroups} groups past the end of the table`)
    }

    this.startCharCodes = new Uint32Array(numGroups)
    this.endCharCodes = new Uint32Array(numGroups)
    this.startGlyphIds = new Uint32Array(numGroups)
    for (let i = 0; i < numGroups; i++) {
      this.startCharCodes[i] = cursor.readU32()
      this.endCharCodes[i] = cursor.readU32()
      this.startGlyphIds[i] = cursor.readU32()
    }
  }

  glyphIndex(codePoint: number): number {
    let lo = 0
    let hi = this.startCharCodes.length - 1
    while (lo <= hi) {
      const mid = (lo + hi) >> 1
      if (codePoint < this.startCharCodes[mid]) {
        hi = mid - 1
      } else if (codePoint > this.endCharCodes[mid]) {
        lo = mid + 1
      } else {
        return this.startGlyphIds[mid] + (codePoint - this.startCharCodes[mid])
      }
    }
    return NOTDEF
  }

  *mappings(): Generator<[number, number]> {
    for (let i = 0; i < this.startCharCodes.length; i++) {
      for (let codePoint = this.startCharCodes[i]; codePoint <= this.endCharCodes[i]; codePoint++) {
        const glyphId = this.startGlyphIds[i] + (codePoint - this.startCharCodes[i])
        if (glyphId !== NOTDEF) yield [codePoint, glyphId]
      }
    }
  }
}

function readU16Array(cursor: ByteCursor, count: number): Uint16Array {
  const values = new Uint16Array(count)
  for (let i = 0; i < count; i++) {
    values[i] = cursor.readU16()
  }
  return values
}
