import { csvParse, timeFormat, timeParse, utcFormat, utcParse, type DSVRowArray, type DSVRowString } from 'd3'

export const parseCsv = (text: string): DSVRowArray<string> => csvParse(text)

export const readCell = (row: DSVRowString<string>, column: string): string => (row[column] ?? '').trim()

export const readOptionalCell = (row: DSVRowString<string>, column: string): string | null => {
  const value = readCell(row, column)
  return value.length > 0 ? value : null
}

// Milliseconds before microseconds: %f also accepts a three-digit fraction.
const TIME_FORMATS = ['%H:%M:%S.%L', '%H:%M:%S.%f', '%H:%M:%S', '%H:%M']

// A parser only matches when it consumes the whole string.
const TIMESTAMP_FORMATS = [
  ...['T', ' '].flatMap(separator =>
    TIME_FORMATS.flatMap(time => [`%Y-%m-%d${separator}${time}`, `%Y-%m-%d${separator}${time}%Z`])
  ),
  '%Y-%m-%d'
]

const timestampParsers = TIMESTAMP_FORMATS.map(format => timeParse(format))

const WALL_CLOCK_PREFIX = /^\d{4}-\d{2}-\d{2}(?:[ T]\d{2}:\d{2}(?::\d{2})?)?/

// Checked in UTC so that local DST gaps do not reject a valid wall-clock time.
const wallClockFormats = ['%Y-%m-%dT%H:%M:%S', '%Y-%m-%d %H:%M:%S', '%Y-%m-%dT%H:%M', '%Y-%m-%d %H:%M', '%Y-%m-%d'].map(
  format => ({ parse: utcParse(format), format: utcFormat(format) })
)

/** False when a date or clock field is out of range, e.g. `2024-02-30` or hour `25`. */
const hasValidFields = (value: string): boolean => {
  const prefix = WALL_CLOCK_PREFIX.exec(value)?.[0]
  if (prefix === undefined) return false

  return wallClockFormats.some(({ parse, format }) => {
    const parsed = parse(prefix)
    return parsed !== null && format(parsed) === prefix
  })
}

export const toTimestamp = (value: string): Date | null => {
  const trimmed = value.trim()
  if (trimmed.length === 0 || !hasValidFields(trimmed)) return null

  for (const parse of timestampParsers) {
    const parsed = parse(trimmed)
    if (parsed !== null) return parsed
  }
  return null
}

export const formatTimestamp = timeFormat('%Y-%m-%d %H:%M')
