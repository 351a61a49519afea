// Font
export { Font, parse, type FontOptions } from './font'
export type { HeadTable, IndexToLocFormat } from './tables/head'
export type { HheaTable } from './tables/hhea'
export type { HorizontalMetric } from './tables/hmtx'
export { NOTDEF, type CharacterMap } from './tables/cmap'

// Glyphs
export {
  Glyph,
  GlyphDescription,
  type BoundingBox,
  type Component,
  type ComponentTransform,
  type CompoundGlyphData,
  type EmptyGlyphData,
  type GlyphData,
  type GlyphSource,
  type Point,
  type SimpleGlyphData,
} from './glyf/glyph'
export { encodeSimpleGlyph } from './glyf/encode'

// Outlines
export {
  contourPath,
  contoursPath,
  midpoint,
  outlinePath,
  type LineTo,
  type MoveTo,
  type PathCommand,
  type QuadraticCurveTo,
} from './outline/path'
export { glyphContours, MAX_COMPONENT_DEPTH } from './outline/compose'

// Shaping
export {
  Shaper,
  type GlyphFallback,
  type ShapedGlyph,
  type ShaperLogger,
  type ShaperOptions,
} from './shaper'

// Rendering
export { toSvgPath, type SvgPathOptions } from './render/svg'
export { toCanvasScript, type CanvasScriptOptions } from './render/canvas'
export type { CurveMode } from './render/flatten'

// Containers
export { unwrapWoff } from './woff/decode'
export { unwrapWoff2 } from './woff2/decode'
export type { TableDirectory, TableRecord } from './sfnt/directory'

// Errors
export { FontFormatError, isFontFormatError, type FontErrorKind } from './shared/errors'
