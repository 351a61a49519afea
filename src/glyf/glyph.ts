// Decoded glyph model

export interface Point {
  x: number
  y: number
  onCurve: boolean
}

export interface BoundingBox {
  xMin: number
  yMin: number
  xMax: number
  yMax: number
}

export class GlyphDescription implements BoundingBox {
  static readonly EMPTY = new GlyphDescription(0, 0, 0, 0)

  constructor(
    readonly xMin: number,
    readonly yMin: number,
    readonly xMax: number,
    readonly yMax: number
  ) {}

  get width(): number {
    return this.xMax - this.xMin
  }

  get height(): number {
    return this.yMax - this.yMin
  }
}

export interface SimpleGlyphData {
  kind: 'simple'
  // Strictly increasing; the last entry is coordinates.length - 1
  endPointsOfContours: readonly number[]
  coordinates: readonly Point[]
  // Hinting bytecode, kept verbatim and never executed
  instructions: Uint8Array
  overlap: boolean
}

// Row-major [a, b, c, d]: x' = a*x + c*y + dx, y' = b*x + d*y + dy
export type ComponentTransform = readonly [number, number, number, number]

export interface Component {
  glyphId: number
  dx: number
  dy: number
  transform: ComponentTransform | null
  flags: number
}

export interface CompoundGlyphData {
  kind: 'compound'
  components: readonly Component[]
}

export interface EmptyGlyphData {
  kind: 'empty'
}

export type GlyphData = SimpleGlyphData | CompoundGlyphData | EmptyGlyphData

export const EMPTY_GLYPH_DATA: EmptyGlyphData = { kind: 'empty' }

export class Glyph {
  constructor(
    readonly id: number,
    readonly description: GlyphDescription,
    readonly data: GlyphData,
    readonly advanceWidth: number,
    readonly leftSideBearing: number
  ) {}

  isSimple(): boolean {
    return this.data.kind === 'simple'
  }

  isCompound(): boolean {
    return this.data.kind === 'compound'
  }

  isEmpty(): boolean {
    return this.data.kind === 'empty'
  }
}

// Anything that can hand out glyphs by id, usually a Font
export interface GlyphSource {
  glyph(glyphId: number): Glyph
}

// Split the flat point list at each contour end point
export function splitContours(data: SimpleGlyphData): Point[][] {
  const contours: Point[][] = []
  let start = 0
  for (const end of data.endPointsOfContours) {
    contours.push(data.coordinates.slice(start, end + 1))
    start = end + 1
  }
  return contours
}

export function computeBounds(points: readonly Point[]): GlyphDescription {
  if (points.length === 0) return GlyphDescription.EMPTY

  let xMin = points[0].x
  let yMin = points[0].y
  let xMax = xMin
  let yMax = yMin
  for (const { x, y } of points) {
    if (x < xMin) xMin = x
    if (x > xMax) xMax = x
    if (y < yMin) yMin = y
    if (y > yMax) yMax = y
  }
  return new GlyphDescription(xMin, yMin, xMax, yMax)
}
