import { describe, expect, it } from 'vitest'
import { formatTimestamp, parseCsv, readCell, readOptionalCell, toTimestamp } from './csv'

describe('toTimestamp', () => {
  it('parses ISO date-times with a T separator', () => {
    expect(toTimestamp('2024-01-01T08:00')).toEqual(new Date(2024, 0, 1, 8, 0))
    expect(toTimestamp('2024-01-01T08:00:45')).toEqual(new Date(2024, 0, 1, 8, 0, 45))
  })

  it('parses space-separated date-times and bare dates', () => {
    expect(toTimestamp('2024-03-04 09:15:30.250')).toEqual(new Date(2024, 2, 4, 9, 15, 30, 250))
    expect(toTimestamp(' 2024-03-04 09:15 ')).toEqual(new Date(2024, 2, 4, 9, 15))
    expect(toTimestamp('2024-03-04')).toEqual(new Date(2024, 2, 4))
  })

  it('parses UTC and offset suffixes', () => {
    expect(toTimestamp('2024-01-01T08:00:00Z')).toEqual(new Date(Date.UTC(2024, 0, 1, 8, 0, 0)))
    expect(toTimestamp('2024-01-01T08:00+02:00')).toEqual(new Date(Date.UTC(2024, 0, 1, 6, 0)))
    expect(toTimestamp('2024-01-01 08:00:00.250-0300')).toEqual(new Date(Date.UTC(2024, 0, 1, 11, 0, 0, 250)))
  })

  it('parses microsecond fractions to millisecond precision', () => {
    expect(toTimestamp('2024-01-01 08:00:00.123456')).toEqual(new Date(2024, 0, 1, 8, 0, 0, 123))
    expect(toTimestamp('2024-01-01T08:00:00.123456Z')).toEqual(new Date(Date.UTC(2024, 0, 1, 8, 0, 0, 123)))
  })

  it('rejects out-of-range date and clock fields', () => {
    expect(toTimestamp('2024-02-30 08:00')).toBeNull()
    expect(toTimestamp('2024-13-01 08:00')).toBeNull()
    expect(toTimestamp('2024-01-01 25:00')).toBeNull()
    expect(toTimestamp('2024-01-01T08:61:00Z')).toBeNull()
    expect(toTimestamp('2023-02-29')).toBeNull()
    expect(toTimestamp('2024-02-29')).toEqual(new Date(2024, 1, 29))
  })

  it('returns null for blank or unparseable values', () => {
    expect(toTimestamp('')).toBeNull()
    expect(toTimestamp('   ')).toBeNull()
    expect(toTimestamp('yesterday')).toBeNull()
    expect(toTimestamp('2024-01-01 08:00 extra')).toBeNull()
  })
})

describe('formatTimestamp', () => {
  it('renders minutes precision', () => {
    expect(formatTimestamp(new Date(2024, 0, 1, 8, 5, 59))).toBe('2024-01-01 08:05')
  })
})

describe('readCell', () => {
  const [row] = parseCsv('name,note\n  Bob  ,')

  it('trims values', () => {
    expect(readCell(row, 'name')).toBe('Bob')
  })

  it('treats blank and absent cells as missing', () => {
    expect(readCell(row, 'note')).toBe('')
    expect(readCell(row, 'absent')).toBe('')
    expect(readOptionalCell(row, 'note')).toBeNull()
    expect(readOptionalCell(row, 'name')).toBe('Bob')
  })
})
