export type PriorityLabel = 'ALTA' | 'MEDIA' | 'BAJA'

export type PriorityLevel = 'HIGH' | 'MEDIUM' | 'LOW'

export interface ActivityRecord {
  equipment: string | null
  task: string
  person: string | null
  /** Label as written in the source file, e.g. `ALTA`. */
  priority: string
  start: Date
  end: Date
}

/** Loaded once at startup and never mutated afterwards. */
export type ActivityTable = readonly ActivityRecord[]

/** An activity renamed to its presentation roles. */
export interface TimelineRow {
  Task: string
  Start: Date
  Finish: Date
  Resource: string | null
  Priority: string
  Equipment: string
}

export type FilteredView = readonly TimelineRow[]

export type PriorityColorMap = Readonly<Record<string, string>>
