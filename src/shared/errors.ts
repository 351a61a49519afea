// Font format errors

export type FontErrorKind =
  | 'BadMagic'
  | 'MissingTable'
  | 'TruncatedBuffer'
  | 'InvalidGlyphIndex'
  | 'MalformedGlyph'
  | 'MalformedTable'
  | 'UnsupportedCompoundEncoding'
  | 'CompoundCycle'

export interface FontErrorDetails {
  tag?: string
  glyphId?: number
}

export class FontFormatError extends Error {
  readonly kind: FontErrorKind
  readonly tag: string | undefined
  readonly glyphId: number | undefined

  constructor(kind: FontErrorKind, message: string, details: FontErrorDetails = {}) {
    super(message)
    this.name = 'FontFormatError'
    this.kind = kind
    this.tag = details.tag
    this.glyphId = details.glyphId
  }
}

export function isFontFormatError(
  value: unknown,
  kind?: FontErrorKind
): value is FontFormatError {
  if (!(value instanceof FontFormatError)) return false
  return kind === undefined || value.kind === kind
}

export function truncated(label: string, details: FontErrorDetails = {}): FontFormatError {
  return new FontFormatError('TruncatedBuffer', `Unexpected end of data in ${label}`, details)
}

export function malformedTable(tag: string, reason: string): FontFormatError {
  return new FontFormatError('MalformedTable', `Malformed ${tag} table: ${reason}`, { tag })
}

export function malformedGlyph(glyphId: number, reason: string): FontFormatError {
  return new FontFormatError('MalformedGlyph', `Malformed glyph ${glyphId}: ${reason}`, {
    glyphId,
  })
}

export function invalidGlyphIndex(glyphId: number, numGlyphs: number): FontFormatError {
  return new FontFormatError(
    'InvalidGlyphIndex',
    `Glyph id ${glyphId} out of range (font has ${numGlyphs} glyphs)`,
    { glyphId }
  )
}
