import type { DSVRowString } from 'd3'
import { ACTIVITY_COLUMNS, REQUIRED_COLUMNS } from '../../config'
import { parseCsv, readCell, readOptionalCell, toTimestamp } from '../../utils/csv'
import { LoadError, MalformedTimestampError, MissingColumnError, MissingFileError } from './loadErrors'
import type { ActivityRecord, ActivityTable } from './types'

export interface FetchResponseLike {
  ok: boolean
  status: number
  text: () => Promise<string>
}

export type FetchFile = (path: string) => Promise<FetchResponseLike>

export interface LoadOptions {
  fetch?: FetchFile
}

export type LoadDiagnostic =
  | { kind: 'loaded'; path: string; rows: number }
  | { kind: 'missing-file'; path: string; message: string }

export interface LoadResult {
  table: ActivityTable
  diagnostic: LoadDiagnostic
}

export const EMPTY_TABLE: ActivityTable = []

const fetchFile: FetchFile = path => fetch(path)

const readTimestamp = (row: DSVRowString<string>, column: string, rowNumber: number, path: string): Date => {
  const raw = readCell(row, column)
  const parsed = toTimestamp(raw)
  if (parsed === null) {
    throw new MalformedTimestampError(path, rowNumber, column, raw)
  }
  return parsed
}

/**
 * Parses CSV text into activity records. Fails on the first timestamp that
 * does not parse; there is no per-row recovery.
 */
export const parseActivityTable = (text: string, path: string): ActivityTable => {
  if (text.trim().length === 0) return EMPTY_TABLE

  const rows = parseCsv(text)
  const missingColumn = REQUIRED_COLUMNS.find(column => !rows.columns.includes(column))
  if (missingColumn !== undefined) {
    throw new MissingColumnError(path, missingColumn)
  }

  return rows.map((row, index): ActivityRecord => {
    const rowNumber = index + 1
    return {
      equipment: readOptionalCell(row, ACTIVITY_COLUMNS.equipment),
      task: readCell(row, ACTIVITY_COLUMNS.task),
      person: readOptionalCell(row, ACTIVITY_COLUMNS.person),
      priority: readCell(row, ACTIVITY_COLUMNS.priority),
      start: readTimestamp(row, ACTIVITY_COLUMNS.start, rowNumber, path),
      end: readTimestamp(row, ACTIVITY_COLUMNS.end, rowNumber, path)
    }
  })
}

export async function loadActivityTable(path: string, options: LoadOptions = {}): Promise<ActivityTable> {
  const load = options.fetch ?? fetchFile
  const response = await load(path)

  if (response.status === 404) {
    throw new MissingFileError(path)
  }
  if (!response.ok) {
    throw new LoadError('http', path, `Failed to load ${path} (${response.status})`)
  }

  const table = parseActivityTable(await response.text(), path)
  console.info(`Activity table loaded: ${table.length} rows from ${path}`)
  return table
}

/** Substitutes an empty table when the file is absent; every other failure propagates. */
export async function loadActivityTableOrEmpty(path: string, options: LoadOptions = {}): Promise<LoadResult> {
  try {
    const table = await loadActivityTable(path, options)
    return { table, diagnostic: { kind: 'loaded', path, rows: table.length } }
  } catch (loadError) {
    if (!(loadError instanceof MissingFileError)) throw loadError

    console.error(`Error: ${loadError.message}`)
    return {
      table: EMPTY_TABLE,
      diagnostic: { kind: 'missing-file', path, message: loadError.message }
    }
  }
}
