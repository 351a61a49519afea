// Flatten a glyph, compound or not, into absolute contours

import { FontFormatError } from '../shared/errors'
import { COMP_SCALED_COMPONENT_OFFSET, COMP_UNSCALED_COMPONENT_OFFSET } from '../glyf/flags'
import { splitContours, type Component, type Glyph, type GlyphSource, type Point } from '../glyf/glyph'

// Longest chain of glyphs from the outer compound down to a simple glyph
export const MAX_COMPONENT_DEPTH = 8

export function glyphContours(glyph: Glyph, source: GlyphSource): Point[][] {
  return collectContours(glyph, source, [glyph.id])
}

// Walk every component below a compound glyph, throwing on cycles and over-deep chains
export function checkComponents(glyph: Glyph, source: GlyphSource): void {
  walkComponents(glyph, source, [glyph.id])
}

function walkComponents(glyph: Glyph, source: GlyphSource, chain: readonly number[]): void {
  if (glyph.data.kind !== 'compound') return
  for (const component of glyph.data.components) {
    enterComponent(chain, component.glyphId)
    walkComponents(source.glyph(component.glyphId), source, [...chain, component.glyphId])
  }
}

function collectContours(glyph: Glyph, source: GlyphSource, chain: readonly number[]): Point[][] {
  const { data } = glyph
  switch (data.kind) {
    case 'empty':
      return []
    case 'simple':
      return splitContours(data)
    case 'compound': {
      const contours: Point[][] = []
      for (const component of data.components) {
        enterComponent(chain, component.glyphId)
        const child = source.glyph(component.glyphId)
        for (const contour of collectContours(child, source, [...chain, component.glyphId])) {
          contours.push(contour.map((point) => placePoint(point, component)))
        }
      }
      return contours
    }
  }
}

function enterComponent(chain: readonly number[], componentId: number): void {
  if (chain.includes(componentId)) {
    throw new FontFormatError(
      'CompoundCycle',
      `Component cycle through glyphs ${[...chain, componentId].join(' -> ')}`,
      { glyphId: chain[0] }
    )
  }
  if (chain.length >= MAX_COMPONENT_DEPTH) {
    throw new FontFormatError(
      'CompoundCycle',
      `Glyph ${chain[0]} nests components deeper than ${MAX_COMPONENT_DEPTH} levels`,
      { glyphId: chain[0] }
    )
  }
}

function placePoint(point: Point, component: Component): Point {
  const { transform, flags } = component
  if (transform === null) {
    return { x: point.x + component.dx, y: point.y + component.dy, onCurve: point.onCurve }
  }

  const [a, b, c, d] = transform
  let dx = component.dx
  let dy = component.dy
  if (flags & COMP_SCALED_COMPONENT_OFFSET && !(flags & COMP_UNSCALED_COMPONENT_OFFSET)) {
    dx = a * component.dx + c * component.dy
    dy = b * component.dx + d * component.dy
  }

  return {
    x: a * point.x + c * point.y + dx,
    y: b * point.x + d * point.y + dy,
    onCurve: point.onCurve,
  }
}
