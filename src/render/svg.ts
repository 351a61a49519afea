// PathCommand[] -> SVG path data ("d" attribute)

import type { PathCommand } from '../outline/path'
import { flattenCurves, formatNumber, type CurveMode } from './flatten'

export interface SvgPathOptions {
  curves?: CurveMode
  // Segments per curve in 'lines' mode
  curveSteps?: number
  // Font units grow upward, SVG units downward
  flipY?: boolean
}

export function toSvgPath(commands: readonly PathCommand[], options: SvgPathOptions = {}): string {
  const { curves = 'quadratic', curveSteps, flipY = false } = options
  const source = curves === 'lines' ? flattenCurves(commands, curveSteps) : commands
  const fy = (y: number): string => formatNumber(flipY ? -y : y)

  const parts: string[] = []
  for (const command of source) {
    switch (command.type) {
      case 'moveTo':
        if (parts.length > 0) parts.push('Z')
        parts.push(`M${formatNumber(command.x)} ${fy(command.y)}`)
        break
      case 'lineTo':
        parts.push(`L${formatNumber(command.x)} ${fy(command.y)}`)
        break
      case 'quadraticCurveTo':
        parts.push(
          `Q${formatNumber(command.cpx)} ${fy(command.cpy)} ${formatNumber(command.x)} ${fy(command.y)}`
        )
        break
    }
  }
  if (parts.length > 0) parts.push('Z')

  return parts.join(' ')
}
