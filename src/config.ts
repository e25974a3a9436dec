export const ACTIVITY_COLUMNS = {
  equipment: 'EQUIPO',
  task: 'ACTIVIDAD A EJECUTAR',
  person: 'PERSONA ASIGNADA A LA ACTIVIDAD',
  priority: 'Prioridad',
  start: 'start_time',
  end: 'end_time'
} as const

export type ActivityColumn = typeof ACTIVITY_COLUMNS[keyof typeof ACTIVITY_COLUMNS]

export const REQUIRED_COLUMNS: ActivityColumn[] = Object.values(ACTIVITY_COLUMNS)

export const ACTIVITY_CSV_FILE = import.meta.env.VITE_ACTIVITY_CSV || 'unified_gantt_data.csv'

export const resolveDataPath = (fileName: string): string => `${import.meta.env.BASE_URL}${fileName}`

export const LABELS = {
  pageTitle: 'Gantt Chart de Mantenimiento por Equipo',
  selectLabel: 'Seleccionar Equipo:',
  selectPlaceholder: 'Seleccione un equipo',
  xAxisTitle: 'Tiempo',
  yAxisTitle: 'Persona Asignada',
  legendTitle: 'Prioridad',
  unassignedResource: 'Sin asignar'
} as const

export const chartTitleFor = (equipment: string): string => `Gantt Chart para ${equipment} (por Persona)`
