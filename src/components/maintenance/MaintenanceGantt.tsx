import { useMemo, useState, type ChangeEvent } from 'react'
import { LABELS } from '../../config'
import { createSelectionHandler, equipmentOptions, initialSelection } from './selection'
import TimelineChart from './TimelineChart'
import type { ActivityTable } from './types'
import { useActivityTable } from './useActivityTable'
import './MaintenanceGantt.css'

interface GanttDashboardProps {
  table: ActivityTable
  error?: string | null
}

export function GanttDashboard({ table, error = null }: GanttDashboardProps) {
  const options = useMemo(() => equipmentOptions(table), [table])
  const onSelectionChanged = useMemo(() => createSelectionHandler(table), [table])
  const [selected, setSelected] = useState<string | null>(() => initialSelection(options))

  const spec = useMemo(() => onSelectionChanged(selected), [onSelectionChanged, selected])

  const handleChange = (event: ChangeEvent<HTMLSelectElement>) => {
    setSelected(event.target.value || null)
  }

  return (
    <div className="gantt-dashboard">
      {error && <div className="error">Error: {error}</div>}

      {options.length > 0 && (
        <div className="gantt-controls">
          <label htmlFor="equipment-dropdown">{LABELS.selectLabel}</label>
          <select id="equipment-dropdown" value={selected ?? ''} onChange={handleChange}>
            <option value="">{LABELS.selectPlaceholder}</option>
            {options.map(equipment => (
              <option key={equipment} value={equipment}>
                {equipment}
              </option>
            ))}
          </select>
        </div>
      )}

      <div className="gantt-chart-layout">
        <div className="gantt-chart-main">
          {spec.title && <h2 className="gantt-chart-title">{spec.title}</h2>}
          <TimelineChart spec={spec} />
        </div>
        {spec.legend.length > 0 && (
          <div className="gantt-legend">
            <div className="gantt-legend-title">{spec.legendTitle}</div>
            {spec.legend.map(entry => (
              <div key={entry.priority} className="gantt-legend-item">
                <span className="gantt-legend-swatch" style={{ background: entry.color }}></span>
                <span>{entry.priority || '(vacío)'}</span>
              </div>
            ))}
          </div>
        )}
      </div>
    </div>
  )
}

export default function MaintenanceGantt() {
  const { loading, error, table } = useActivityTable()

  if (loading) return <div className="loading">Loading data...</div>

  return <GanttDashboard table={table} error={error} />
}
