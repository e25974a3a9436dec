import { buildTimelineChart, type TimelineChartSpec } from './buildTimelineChart'
import { filterActivities } from './filterActivities'
import { PRIORITY_COLORS } from './priority'
import type { ActivityTable, PriorityColorMap } from './types'

export type SelectionHandler = (equipmentKey: string | null | undefined) => TimelineChartSpec

/** Binds the table loaded at startup; the returned handler is pure. */
export const createSelectionHandler = (
  table: ActivityTable,
  colorMap: PriorityColorMap = PRIORITY_COLORS
): SelectionHandler => {
  return equipmentKey =>
    buildTimelineChart(filterActivities(table, equipmentKey), colorMap, {
      equipment: equipmentKey || null
    })
}

export const equipmentOptions = (table: ActivityTable): string[] => {
  const seen = new Set<string>()
  table.forEach(record => {
    if (record.equipment !== null) seen.add(record.equipment)
  })
  return Array.from(seen)
}

export const initialSelection = (options: readonly string[]): string | null => options[0] ?? null
