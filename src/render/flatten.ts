// Shared helpers for the path renderers

import type { PathCommand } from '../outline/path'

export type CurveMode = 'quadratic' | 'lines'

// Line segments per quadratic when curves are flattened
export const DEFAULT_CURVE_STEPS = 8

// Replace every quadratic with `steps` line segments along the curve
export function flattenCurves(commands: readonly PathCommand[], steps: number = DEFAULT_CURVE_STEPS): PathCommand[] {
  const out: PathCommand[] = []
  let x = 0
  let y = 0

  for (const command of commands) {
    if (command.type === 'quadraticCurveTo') {
      for (let i = 1; i <= steps; i++) {
        const t = i / steps
        const mt = 1 - t
        out.push({
          type: 'lineTo',
          x: mt * mt * x + 2 * mt * t * command.cpx + t * t * command.x,
          y: mt * mt * y + 2 * mt * t * command.cpy + t * t * command.y,
        })
      }
    } else {
      out.push(command)
    }
    x = command.x
    y = command.y
  }

  return out
}

// Two decimals at most, no trailing zeros, never "-0"
export function formatNumber(value: number): string {
  const rounded = Math.round(value * 100) / 100
  return String(rounded === 0 ? 0 : rounded)
}
