// SFNT header and table directory
// https://learn.microsoft.com/en-us/typography/opentype/spec/otff#table-directory

import { ByteCursor } from '../shared/cursor'
import { FontFormatError, truncated, malformedTable } from '../shared/errors'
import { computeChecksum, computeHeadChecksum } from '../shared/checksum'
import {
  TAG_HEAD,
  SFNT_CFF,
  TTC_FLAVOR,
  isTrueTypeFlavor,
  tagToString,
} from '../shared/tags'

const SFNT_HEADER_SIZE = 12
const SFNT_ENTRY_SIZE = 16

export interface TableRecord {
  tag: number
  // Stored checksum; null where the container does not carry one
  checksum: number | null
  data: Uint8Array
}

export interface TableDirectory {
  flavor: number
  tables: Map<number, TableRecord>
}

// Rejects anything that is not a TrueType-outline sfnt
export function checkFlavor(flavor: number): void {
  if (isTrueTypeFlavor(flavor)) return
  if (flavor === SFNT_CFF) {
    throw new FontFormatError('BadMagic', 'CFF-flavored (OTTO) fonts are not supported')
  }
  if (flavor === TTC_FLAVOR) {
    throw new FontFormatError('BadMagic', 'Font collections (ttcf) are not supported')
  }
  throw new FontFormatError('BadMagic', `Unknown sfnt version: 0x${flavor.toString(16).padStart(8, '0')}`)
}

// Parse the table directory of a bare sfnt. Table data are zero-copy views.
export function parseTableDirectory(data: Uint8Array): TableDirectory {
  const cursor = new ByteCursor(data, 'sfnt header')
  const flavor = cursor.readU32()
  checkFlavor(flavor)

  const numTables = cursor.readU16()
  // searchRange, entrySelector, rangeShift
  cursor.skip(6)

  if (SFNT_HEADER_SIZE + numTables * SFNT_ENTRY_SIZE > data.byteLength) {
    throw truncated('table directory')
  }

  const tables = new Map<number, TableRecord>()
  for (let i = 0; i < numTables; i++) {
    const tag = cursor.readU32()
    const checksum = cursor.readU32()
    const offset = cursor.readU32()
    const length = cursor.readU32()

    if (offset + length > data.byteLength) {
      const name = tagToString(tag)
      throw truncated(`${name} table`, { tag: name })
    }

    tables.set(tag, { tag, checksum, data: data.subarray(offset, offset + length) })
  }

  return { flavor, tables }
}

export function requireTable(directory: TableDirectory, tag: number): Uint8Array {
  const record = directory.tables.get(tag)
  if (!record) {
    const name = tagToString(tag)
    throw new FontFormatError('MissingTable', `Missing required ${name} table`, { tag: name })
  }
  return record.data
}

export function tableCursor(directory: TableDirectory, tag: number): ByteCursor {
  const name = tagToString(tag)
  return new ByteCursor(requireTable(directory, tag), `${name} table`, { tag: name })
}

// Compare stored checksums against the table data
export function verifyChecksums(directory: TableDirectory): void {
  for (const record of directory.tables.values()) {
    if (record.checksum === null) continue
    const actual =
      record.tag === TAG_HEAD ? computeHeadChecksum(record.data) : computeChecksum(record.data)
    if (actual !== record.checksum) {
      throw malformedTable(
        tagToString(record.tag),
        `checksum 0x${actual.toString(16)} does not match stored 0x${record.checksum.toString(16)}`
      )
    }
  }
}
