// Quadratic B-spline contours -> drawable path commands.
//
// On-curve points are segment end points, off-curve points are control
// points. Two off-curve points in a row imply an on-curve point halfway
// between them. Contours are closed: the last point connects to the first.

import type { Glyph, GlyphSource, Point } from '../glyf/glyph'
import { glyphContours } from './compose'

export interface MoveTo {
  type: 'moveTo'
  x: number
  y: number
}

export interface LineTo {
  type: 'lineTo'
  x: number
  y: number
}

export interface QuadraticCurveTo {
  type: 'quadraticCurveTo'
  cpx: number
  cpy: number
  x: number
  y: number
}

export type PathCommand = MoveTo | LineTo | QuadraticCurveTo

// Implied on-curve point between two control points
export function midpoint(a: Point, b: Point): Point {
  return { x: (a.x + b.x) / 2, y: (a.y + b.y) / 2, onCurve: true }
}

export function contourPath(points: readonly Point[]): PathCommand[] {
  const count = points.length
  if (count === 0) return []

  const first = points[0]
  const last = points[count - 1]

  // Pick an on-curve start and the points still to visit after it
  let start: Point
  let rest: readonly Point[]
  if (first.onCurve) {
    start = first
    rest = points.slice(1)
  } else if (last.onCurve) {
    start = last
    rest = points.slice(0, count - 1)
  } else {
    start = midpoint(last, first)
    rest = points
  }

  const commands: PathCommand[] = [{ type: 'moveTo', x: start.x, y: start.y }]
  let control: Point | null = null

  for (const point of [...rest, start]) {
    if (point.onCurve) {
      if (control) {
        commands.push(quadTo(control, point))
        control = null
      } else {
        commands.push({ type: 'lineTo', x: point.x, y: point.y })
      }
    } else {
      if (control) {
        commands.push(quadTo(control, midpoint(control, point)))
      }
      control = point
    }
  }

  return commands
}

function quadTo(control: Point, end: Point): QuadraticCurveTo {
  return { type: 'quadraticCurveTo', cpx: control.x, cpy: control.y, x: end.x, y: end.y }
}

export function contoursPath(contours: readonly (readonly Point[])[]): PathCommand[] {
  return contours.flatMap(contourPath)
}

// Full outline of a glyph; compound components are resolved through source
export function outlinePath(glyph: Glyph, source: GlyphSource): PathCommand[] {
  return contoursPath(glyphContours(glyph, source))
}
