// @vitest-environment jsdom
import { afterEach, describe, expect, it, vi } from 'vitest'
import { cleanup, fireEvent, render, screen, waitFor } from '@testing-library/react'
import MaintenanceGantt, { GanttDashboard } from './MaintenanceGantt'
import type { ActivityRecord } from './types'

const at = (hour: number): Date => new Date(2024, 0, 1, hour, 0)

const TABLE: ActivityRecord[] = [
  { equipment: 'A', task: 'Inspect', person: 'Bob', priority: 'ALTA', start: at(8), end: at(10) },
  { equipment: 'A', task: 'Repair', person: 'Ann', priority: 'MEDIA', start: at(9), end: at(11) },
  { equipment: 'B', task: 'Clean', person: 'Cid', priority: 'BAJA', start: at(8), end: at(9) }
]

const CSV_TEXT = [
  'EQUIPO,ACTIVIDAD A EJECUTAR,PERSONA ASIGNADA A LA ACTIVIDAD,Prioridad,start_time,end_time',
  'A,Inspect,Bob,ALTA,2024-01-01T08:00,2024-01-01T10:00'
].join('\n')

const barCount = (container: HTMLElement): number => container.querySelectorAll('rect.timeline-bar').length

afterEach(() => {
  cleanup()
  vi.restoreAllMocks()
  vi.unstubAllGlobals()
})

describe('GanttDashboard', () => {
  it('selects the first equipment on mount', () => {
    const { container } = render(<GanttDashboard table={TABLE} />)

    expect(screen.getByDisplayValue('A')).toBe(screen.getByRole('combobox'))
    expect(screen.getAllByRole('option').map(option => option.textContent)).toEqual([
      'Seleccione un equipo',
      'A',
      'B'
    ])
    expect(screen.getByRole('heading', { name: 'Gantt Chart para A (por Persona)' })).toBeTruthy()
    expect(barCount(container)).toBe(2)
    expect(screen.getByText('Prioridad')).toBeTruthy()
  })

  it('redraws the chart when the selection changes', () => {
    const { container } = render(<GanttDashboard table={TABLE} />)

    fireEvent.change(screen.getByRole('combobox'), { target: { value: 'B' } })

    expect(screen.getByRole('heading', { name: 'Gantt Chart para B (por Persona)' })).toBeTruthy()
    expect(barCount(container)).toBe(1)
  })

  it('shows an empty chart when the selection is cleared', () => {
    const { container } = render(<GanttDashboard table={TABLE} />)

    fireEvent.change(screen.getByRole('combobox'), { target: { value: '' } })

    expect(screen.queryByRole('heading')).toBeNull()
    expect(barCount(container)).toBe(0)
    expect(container.querySelector('svg.timeline-svg')).not.toBeNull()
  })

  it('shows hover details for a bar', () => {
    const { container } = render(<GanttDashboard table={TABLE} />)
    const [firstBar] = Array.from(container.querySelectorAll('rect.timeline-bar'))

    fireEvent.mouseOver(firstBar)

    expect(screen.getByRole('tooltip').textContent).toBe(
      'Task: RepairPerson: AnnStart: 2024-01-01 09:00Finish: 2024-01-01 11:00Priority: MEDIA'
    )
  })

  it('drops the selector for an empty table', () => {
    const { container } = render(<GanttDashboard table={[]} error="bad data" />)

    expect(screen.queryByRole('combobox')).toBeNull()
    expect(screen.getByText('Error: bad data')).toBeTruthy()
    expect(barCount(container)).toBe(0)
  })
})

describe('MaintenanceGantt', () => {
  it('loads the activity file and renders its first equipment', async () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined)
    const fetchFile = vi.fn(async () => ({ ok: true, status: 200, text: async () => CSV_TEXT }))
    vi.stubGlobal('fetch', fetchFile)

    render(<MaintenanceGantt />)

    expect(screen.getByText('Loading data...')).toBeTruthy()
    expect(await screen.findByRole('heading', { name: 'Gantt Chart para A (por Persona)' })).toBeTruthy()
    expect(fetchFile).toHaveBeenCalledWith('/unified_gantt_data.csv')
  })

  it('degrades to an empty chart when the file is missing', async () => {
    const logError = vi.spyOn(console, 'error').mockImplementation(() => undefined)
    vi.stubGlobal('fetch', vi.fn(async () => ({ ok: false, status: 404, text: async () => '' })))

    const { container } = render(<MaintenanceGantt />)

    await waitFor(() => expect(screen.queryByText('Loading data...')).toBeNull())
    expect(screen.queryByRole('combobox')).toBeNull()
    expect(barCount(container)).toBe(0)
    expect(logError).toHaveBeenCalledWith("Error: The file '/unified_gantt_data.csv' was not found.")
  })
})
