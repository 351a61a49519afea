// Font: immutable view of a TrueType font's outline and metrics tables

import { invalidGlyphIndex } from './shared/errors'
import {
  TAG_CMAP,
  TAG_GLYF,
  TAG_HEAD,
  TAG_HHEA,
  TAG_HMTX,
  TAG_LOCA,
  TAG_MAXP,
  REQUIRED_TABLES,
  WOFF_SIGNATURE,
  WOFF2_SIGNATURE,
} from './shared/tags'
import {
  parseTableDirectory,
  requireTable,
  tableCursor,
  verifyChecksums,
  type TableDirectory,
} from './sfnt/directory'
import { unwrapWoff } from './woff/decode'
import { unwrapWoff2 } from './woff2/decode'
import { parseHead, type HeadTable, type IndexToLocFormat } from './tables/head'
import { parseNumGlyphs } from './tables/maxp'
import { parseHhea, type HheaTable } from './tables/hhea'
import { parseHmtx, type HorizontalMetric, type HorizontalMetrics } from './tables/hmtx'
import { parseLoca, glyphRange } from './tables/loca'
import { parseCmap, type CharacterMap } from './tables/cmap'
import { decodeGlyph } from './glyf/decode'
import { EMPTY_GLYPH_DATA, Glyph, GlyphDescription, type GlyphSource } from './glyf/glyph'
import { checkComponents } from './outline/compose'
import { outlinePath, type PathCommand } from './outline/path'

export interface FontOptions {
  // Reject tables whose stored checksum does not match (sfnt and WOFF only)
  verifyChecksums?: boolean
}

export class Font implements GlyphSource {
  readonly flavor: number
  readonly unitsPerEm: number
  readonly numGlyphs: number
  readonly indexToLocFormat: IndexToLocFormat
  readonly head: Readonly<HeadTable>
  readonly hhea: Readonly<HheaTable>
  readonly cmap: CharacterMap

  private readonly loca: Uint32Array
  private readonly glyf: Uint8Array
  private readonly metrics: HorizontalMetrics

  constructor(directory: TableDirectory, options: FontOptions = {}) {
    for (const tag of REQUIRED_TABLES) {
      requireTable(directory, tag)
    }
    if (options.verifyChecksums) {
      verifyChecksums(directory)
    }

    this.flavor = directory.flavor
    this.head = Object.freeze(parseHead(tableCursor(directory, TAG_HEAD)))
    this.unitsPerEm = this.head.unitsPerEm
    this.indexToLocFormat = this.head.indexToLocFormat
    this.numGlyphs = parseNumGlyphs(tableCursor(directory, TAG_MAXP))
    this.hhea = Object.freeze(parseHhea(tableCursor(directory, TAG_HHEA), this.numGlyphs))
    this.metrics = parseHmtx(
      tableCursor(directory, TAG_HMTX),
      this.numGlyphs,
      this.hhea.numberOfHMetrics
    )
    this.loca = parseLoca(tableCursor(directory, TAG_LOCA), this.numGlyphs, this.indexToLocFormat)
    this.glyf = requireTable(directory, TAG_GLYF)
    this.cmap = parseCmap(tableCursor(directory, TAG_CMAP))

    Object.freeze(this)
  }

  glyphCount(): number {
    return this.numGlyphs
  }

  horizontalMetrics(glyphId: number): HorizontalMetric {
    if (!Number.isInteger(glyphId) || glyphId < 0 || glyphId >= this.numGlyphs) {
      throw invalidGlyphIndex(glyphId, this.numGlyphs)
    }
    return {
      advanceWidth: this.metrics.advanceWidths[glyphId],
      leftSideBearing: this.metrics.leftSideBearings[glyphId],
    }
  }

  // Decoded on every call; nothing is cached
  glyph(glyphId: number): Glyph {
    const glyph = this.decode(glyphId)
    // Longer cycles and over-deep chains only show across glyphs
    if (glyph.isCompound()) {
      checkComponents(glyph, { glyph: (componentId) => this.decode(componentId) })
    }
    return glyph
  }

  private decode(glyphId: number): Glyph {
    const { start, end } = glyphRange(this.loca, this.glyf.byteLength, glyphId)
    const { advanceWidth, leftSideBearing } = this.horizontalMetrics(glyphId)

    if (start === end) {
      return new Glyph(glyphId, GlyphDescription.EMPTY, EMPTY_GLYPH_DATA, advanceWidth, leftSideBearing)
    }

    const { description, data } = decodeGlyph(
      this.glyf.subarray(start, end),
      glyphId,
      this.numGlyphs
    )
    return new Glyph(glyphId, description, data, advanceWidth, leftSideBearing)
  }

  glyphIndex(codePoint: number): number {
    return this.cmap.glyphIndex(codePoint)
  }

  glyphForCodePoint(codePoint: number): Glyph {
    return this.glyph(this.glyphIndex(codePoint))
  }

  outlinePath(glyph: Glyph | number): PathCommand[] {
    return outlinePath(typeof glyph === 'number' ? this.glyph(glyph) : glyph, this)
  }
}

function readTables(input: Uint8Array): TableDirectory {
  if (input.byteLength >= 4) {
    const signature = new DataView(input.buffer, input.byteOffset, input.byteLength).getUint32(0)
    if (signature === WOFF_SIGNATURE) return unwrapWoff(input)
    if (signature === WOFF2_SIGNATURE) return unwrapWoff2(input)
  }
  return parseTableDirectory(input)
}

/**
 * Parse a TrueType font (bare sfnt, WOFF or WOFF2). Table-level problems
 * throw a FontFormatError; no partially parsed Font is ever returned.
 */
export function parse(data: ArrayBuffer | Uint8Array, options: FontOptions = {}): Font {
  const input = data instanceof Uint8Array ? data : new Uint8Array(data)
  return new Font(readTables(input), options)
}
