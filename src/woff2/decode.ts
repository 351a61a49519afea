// WOFF2 container -> sfnt tables
// https://www.w3.org/TR/WOFF2/

import { brotliDecompressSync } from 'node:zlib'
import { ByteCursor } from '../shared/cursor'
import { FontFormatError } from '../shared/errors'
import {
  TAG_GLYF,
  TAG_HHEA,
  TAG_HMTX,
  TAG_LOCA,
  TAG_MAXP,
  WOFF2_SIGNATURE,
  stringToTag,
  tagToString,
} from '../shared/tags'
import { checkFlavor, type TableDirectory, type TableRecord } from '../sfnt/directory'
import { parseNumGlyphs } from '../tables/maxp'
import { parseHhea } from '../tables/hhea'
import { readBase128 } from './variable-length'
import { reconstructGlyf } from './glyf'
import { reconstructHmtx } from './hmtx'
import knownTagNames from './known-tags.json'

const WOFF2_HEADER_SIZE = 48

// Index < 63 uses single-byte encoding
const KNOWN_TAGS: readonly number[] = knownTagNames.map(stringToTag)

interface Woff2Table {
  tag: number
  transformed: boolean
  origLength: number
  data: Uint8Array
}

function malformedWoff2(reason: string, tag?: string): FontFormatError {
  return new FontFormatError('MalformedTable', `Malformed WOFF2 file: ${reason}`, { tag })
}

function decompress(data: Uint8Array): Uint8Array {
  try {
    const result = brotliDecompressSync(data)
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw malformedWoff2(`table stream does not decompress (${reason})`)
  }
}

/**
 * Unwrap WOFF2 into the sfnt tables it carries, undoing the glyf/loca and
 * hmtx transforms. WOFF2 stores no table checksums.
 */
export function unwrapWoff2(input: Uint8Array): TableDirectory {
  const cursor = new ByteCursor(input, 'WOFF2 header')

  if (cursor.readU32() !== WOFF2_SIGNATURE) {
    throw new FontFormatError('BadMagic', 'Invalid WOFF2 signature')
  }

  const flavor = cursor.readU32()
  checkFlavor(flavor)

  const length = cursor.readU32()
  if (length !== input.byteLength) {
    throw malformedWoff2(`header length ${length} does not match file size ${input.byteLength}`)
  }

  const numTables = cursor.readU16()
  if (numTables === 0) {
    throw malformedWoff2('no tables')
  }
  // reserved, totalSfntSize
  cursor.skip(6)
  const compressedLength = cursor.readU32()
  // version, metadata and private blocks
  cursor.seek(WOFF2_HEADER_SIZE)

  const entries = readTableDirectory(cursor, numTables)

  const compressed = cursor.readBytes(compressedLength)
  const stream = decompress(compressed)

  const totalLength = entries.reduce((sum, entry) => sum + entry.length, 0)
  if (stream.byteLength !== totalLength) {
    throw malformedWoff2(`table stream is ${stream.byteLength} bytes, directory expects ${totalLength}`)
  }

  const tables: Woff2Table[] = []
  let offset = 0
  for (const entry of entries) {
    tables.push({
      tag: entry.tag,
      transformed: entry.transformed,
      origLength: entry.origLength,
      data: stream.subarray(offset, offset + entry.length),
    })
    offset += entry.length
  }

  return { flavor, tables: undoTransforms(tables) }
}

interface DirectoryEntry {
  tag: number
  transformed: boolean
  origLength: number
  // Bytes occupied in the decompressed stream
  length: number
}

function readTableDirectory(cursor: ByteCursor, numTables: number): DirectoryEntry[] {
  const entries: DirectoryEntry[] = []

  for (let i = 0; i < numTables; i++) {
    const flagByte = cursor.readU8()
    const tag = (flagByte & 0x3f) === 0x3f ? cursor.readU32() : KNOWN_TAGS[flagByte & 0x3f]
    const xformVersion = (flagByte >> 6) & 0x03

    // glyf/loca: version 0 is the transform, 3 is null
    // others: version 0 is null
    const transformed =
      tag === TAG_GLYF || tag === TAG_LOCA ? xformVersion === 0 : xformVersion !== 0

    const origLength = readBase128(cursor)
    let length = origLength
    if (transformed) {
      length = readBase128(cursor)
      if (tag === TAG_LOCA && length !== 0) {
        throw malformedWoff2('transformed loca must have zero length', 'loca')
      }
      if (tag !== TAG_LOCA && tag !== TAG_GLYF && tag !== TAG_HMTX) {
        throw malformedWoff2(`unknown transform for ${tagToString(tag)}`, tagToString(tag))
      }
    }

    entries.push({ tag, transformed, origLength, length })
  }

  return entries
}

function undoTransforms(tables: Woff2Table[]): Map<number, TableRecord> {
  const records = new Map<number, TableRecord>()
  const byTag = new Map(tables.map((table) => [table.tag, table]))

  let xMins: Int16Array | null = null
  const glyf = byTag.get(TAG_GLYF)
  if (glyf?.transformed) {
    if (!byTag.has(TAG_LOCA)) {
      throw malformedWoff2('transformed glyf without loca', 'glyf')
    }
    const rebuilt = reconstructGlyf(glyf.data)
    xMins = rebuilt.xMins
    records.set(TAG_GLYF, { tag: TAG_GLYF, checksum: null, data: rebuilt.glyf })
    records.set(TAG_LOCA, { tag: TAG_LOCA, checksum: null, data: rebuilt.loca })
  }

  for (const table of tables) {
    if (records.has(table.tag)) continue

    if (table.tag === TAG_HMTX && table.transformed) {
      records.set(TAG_HMTX, { tag: TAG_HMTX, checksum: null, data: rebuildHmtx(table, byTag, xMins) })
      continue
    }
    if (table.transformed) {
      throw malformedWoff2(`${tagToString(table.tag)} is transformed without glyf`, tagToString(table.tag))
    }

    records.set(table.tag, { tag: table.tag, checksum: null, data: table.data })
  }

  return records
}

function rebuildHmtx(
  hmtx: Woff2Table,
  byTag: Map<number, Woff2Table>,
  xMins: Int16Array | null
): Uint8Array {
  const maxp = byTag.get(TAG_MAXP)
  const hhea = byTag.get(TAG_HHEA)
  if (!maxp || !hhea || !xMins) {
    throw malformedWoff2('transformed hmtx needs maxp, hhea and a transformed glyf', 'hmtx')
  }

  const numGlyphs = parseNumGlyphs(new ByteCursor(maxp.data, 'maxp table', { tag: 'maxp' }))
  const { numberOfHMetrics } = parseHhea(
    new ByteCursor(hhea.data, 'hhea table', { tag: 'hhea' }),
    numGlyphs
  )

  const data = reconstructHmtx(hmtx.data, numGlyphs, numberOfHMetrics, xMins)
  if (data.byteLength !== hmtx.origLength) {
    throw malformedWoff2(`hmtx rebuilt to ${data.byteLength} bytes, expected ${hmtx.origLength}`, 'hmtx')
  }
  return data
}
