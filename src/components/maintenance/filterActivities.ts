import { ascending } from 'd3'
import type { ActivityRecord, ActivityTable, FilteredView, TimelineRow } from './types'

const toTimelineRow = (record: ActivityRecord, equipment: string): TimelineRow => ({
  Task: record.task,
  Start: record.start,
  Finish: record.end,
  Resource: record.person,
  Priority: record.priority,
  Equipment: equipment
})

export const toActivityRecord = (row: TimelineRow): ActivityRecord => ({
  equipment: row.Equipment,
  task: row.Task,
  person: row.Resource,
  priority: row.Priority,
  start: row.Start,
  end: row.Finish
})

// Unassigned rows go after every named resource.
const compareResource = (a: string | null, b: string | null): number => {
  if (a === b) return 0
  if (a === null) return 1
  if (b === null) return -1
  return ascending(a, b)
}

const compareRows = (a: TimelineRow, b: TimelineRow): number =>
  compareResource(a.Resource, b.Resource) || ascending(a.Start, b.Start)

/**
 * Selects one equipment's activities, renamed to presentation roles and
 * sorted by (Resource, Start). The sort is stable, so rows that tie keep
 * their table order.
 */
export const filterActivities = (table: ActivityTable, equipmentKey: string | null | undefined): FilteredView => {
  if (!equipmentKey) return []

  return table
    .filter(record => record.equipment === equipmentKey)
    .map(record => toTimelineRow(record, equipmentKey))
    .sort(compareRows)
}
