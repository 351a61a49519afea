// PathCommand[] -> CanvasRenderingContext2D statements.
// Font units are mapped to canvas units with y' = baseline - y.

import type { PathCommand } from '../outline/path'
import { flattenCurves, formatNumber, type CurveMode } from './flatten'

export interface CanvasScriptOptions {
  // Name of the 2D context variable
  context?: string
  curves?: CurveMode
  curveSteps?: number
  originX?: number
  baseline?: number
}

export function toCanvasScript(commands: readonly PathCommand[], options: CanvasScriptOptions = {}): string {
  const { context = 'ctx', curves = 'quadratic', curveSteps, originX = 0, baseline = 0 } = options
  if (commands.length === 0) return ''

  const source = curves === 'lines' ? flattenCurves(commands, curveSteps) : commands
  const px = (x: number): string => formatNumber(originX + x)
  const py = (y: number): string => formatNumber(baseline - y)

  const lines = [`${context}.beginPath();`]
  let open = false
  for (const command of source) {
    switch (command.type) {
      case 'moveTo':
        if (open) lines.push(`${context}.closePath();`)
        lines.push(`${context}.moveTo(${px(command.x)}, ${py(command.y)});`)
        open = true
        break
      case 'lineTo':
        lines.push(`${context}.lineTo(${px(command.x)}, ${py(command.y)});`)
        break
      case 'quadraticCurveTo':
        lines.push(
          `${context}.quadraticCurveTo(${px(command.cpx)}, ${py(command.cpy)}, ${px(command.x)}, ${py(command.y)});`
        )
        break
    }
  }
  if (open) lines.push(`${context}.closePath();`)
  lines.push(`${context}.fill();`)

  return lines.join('\n')
}
