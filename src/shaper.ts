// Shaper: string -> glyphs on a single horizontal pen line.
// No kerning, no ligatures, no bidi; scaling is left to the caller.

import { FontFormatError, isFontFormatError } from './shared/errors'
import { EMPTY_GLYPH_DATA, Glyph, GlyphDescription } from './glyf/glyph'
import { NOTDEF } from './tables/cmap'
import type { Font } from './font'

export interface ShapedGlyph {
  glyph: Glyph
  codePoint: number
  penX: number
  penY: number
  // Set when the glyph failed to decode and a fallback was substituted
  error?: FontFormatError
}

export type GlyphFallback = 'empty' | 'notdef'

export interface ShaperLogger {
  warn(message: string): void
}

export interface ShaperOptions {
  // 'empty': blank outline with the failing glyph's metrics
  // 'notdef': glyph 0 in its place
  fallback?: GlyphFallback
  logger?: ShaperLogger
}

export class Shaper {
  private readonly fallback: GlyphFallback
  private readonly logger: ShaperLogger

  constructor(
    private readonly font: Font,
    options: ShaperOptions = {}
  ) {
    this.fallback = options.fallback ?? 'empty'
    this.logger = options.logger ?? console
  }

  shape(text: string): ShapedGlyph[] {
    const shaped: ShapedGlyph[] = []
    let penX = 0

    for (const char of text) {
      // for..of walks code points, so surrogate pairs arrive whole
      const codePoint = char.codePointAt(0) ?? 0
      const glyphId = this.font.glyphIndex(codePoint)

      let entry: ShapedGlyph
      try {
        entry = { glyph: this.font.glyph(glyphId), codePoint, penX, penY: 0 }
      } catch (err) {
        if (!isFontFormatError(err)) throw err
        entry = { glyph: this.substitute(glyphId, err), codePoint, penX, penY: 0, error: err }
        this.logger.warn(
          `[ttf-outline] U+${hex(codePoint)} -> glyph ${glyphId}: ${err.kind} (${err.message}); using ${this.fallback} fallback`
        )
      }

      shaped.push(entry)
      penX += entry.glyph.advanceWidth
    }

    return shaped
  }

  private substitute(glyphId: number, err: FontFormatError): Glyph {
    if (this.fallback === 'notdef' && glyphId !== NOTDEF) {
      try {
        return this.font.glyph(NOTDEF)
      } catch (notdefErr) {
        if (!isFontFormatError(notdefErr)) throw notdefErr
      }
    }

    // Keep the failing glyph's advance when its metrics are readable
    if (err.kind !== 'InvalidGlyphIndex') {
      const { advanceWidth, leftSideBearing } = this.font.horizontalMetrics(glyphId)
      return new Glyph(glyphId, GlyphDescription.EMPTY, EMPTY_GLYPH_DATA, advanceWidth, leftSideBearing)
    }
    const { advanceWidth, leftSideBearing } = this.font.horizontalMetrics(NOTDEF)
    return new Glyph(NOTDEF, GlyphDescription.EMPTY, EMPTY_GLYPH_DATA, advanceWidth, leftSideBearing)
  }
}

function hex(codePoint: number): string {
  return codePoint.toString(16).toUpperCase().padStart(4, '0')
}
