import type { PriorityColorMap, PriorityLabel, PriorityLevel } from './types'

export const PRIORITY_LEVELS: Record<PriorityLabel, PriorityLevel> = {
  ALTA: 'HIGH',
  MEDIA: 'MEDIUM',
  BAJA: 'LOW'
}

export const PRIORITY_COLORS: PriorityColorMap = {
  ALTA: 'red',
  MEDIA: 'orange',
  BAJA: 'green'
}

/**
 * Colors handed to priorities the color map does not name. The n-th color
 * assigned on a chart, counting the mapped entries first, takes index
 * `n % DEFAULT_COLORWAY.length`.
 */
export const DEFAULT_COLORWAY = [
  '#636efa',
  '#EF553B',
  '#00cc96',
  '#ab63fa',
  '#FFA15A',
  '#19d3f3',
  '#FF6692',
  '#B6E880',
  '#FF97FF',
  '#FECB52'
] as const

const isPriorityLabel = (label: string): label is PriorityLabel =>
  Object.prototype.hasOwnProperty.call(PRIORITY_LEVELS, label)

export const toPriorityLevel = (label: string): PriorityLevel | null =>
  isPriorityLabel(label) ? PRIORITY_LEVELS[label] : null
