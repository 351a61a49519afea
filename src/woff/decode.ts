// WOFF container -> sfnt tables
// https://www.w3.org/TR/WOFF/

import { inflateSync } from 'node:zlib'
import { ByteCursor } from '../shared/cursor'
import { FontFormatError, truncated } from '../shared/errors'
import { WOFF_SIGNATURE, tagToString } from '../shared/tags'
import { checkFlavor, type TableDirectory, type TableRecord } from '../sfnt/directory'

const WOFF_HEADER_SIZE = 44

function malformedWoff(reason: string, tag?: string): FontFormatError {
  return new FontFormatError('MalformedTable', `Malformed WOFF file: ${reason}`, { tag })
}

function inflate(data: Uint8Array, tag: string): Uint8Array {
  try {
    const result = inflateSync(data)
    return new Uint8Array(result.buffer, result.byteOffset, result.byteLength)
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err)
    throw malformedWoff(`${tag} table does not inflate (${reason})`, tag)
  }
}

/**
 * Unwrap WOFF 1.0 into the sfnt tables it carries. Compressed tables are
 * inflated with zlib; stored checksums are kept for verification.
 */
export function unwrapWoff(input: Uint8Array): TableDirectory {
  const cursor = new ByteCursor(input, 'WOFF header')

  if (cursor.readU32() !== WOFF_SIGNATURE) {
    throw new FontFormatError('BadMagic', 'Invalid WOFF signature')
  }

  const flavor = cursor.readU32()
  checkFlavor(flavor)

  const length = cursor.readU32()
  if (length !== input.byteLength) {
    throw malformedWoff(`header length ${length} does not match file size ${input.byteLength}`)
  }

  const numTables = cursor.readU16()
  // reserved, totalSfntSize, version, metadata and private blocks
  cursor.seek(WOFF_HEADER_SIZE)

  const tables = new Map<number, TableRecord>()
  for (let i = 0; i < numTables; i++) {
    const tag = cursor.readU32()
    const offset = cursor.readU32()
    const compLength = cursor.readU32()
    const origLength = cursor.readU32()
    const checksum = cursor.readU32()
    const name = tagToString(tag)

    if (offset + compLength > input.byteLength) {
      throw truncated(`${name} table`, { tag: name })
    }
    if (compLength > origLength) {
      throw malformedWoff(`${name} compressed length exceeds original length`, name)
    }

    const stored = input.subarray(offset, offset + compLength)
    const data = compLength === origLength ? stored : inflate(stored, name)
    if (data.byteLength !== origLength) {
      throw malformedWoff(
        `${name} inflated to ${data.byteLength} bytes, expected ${origLength}`,
        name
      )
    }

    tables.set(tag, { tag, checksum, data })
  }

  return { flavor, tables }
}
