import { max, min, rollup } from 'd3'
import { chartTitleFor, LABELS } from '../../config'
import { formatTimestamp } from '../../utils/csv'
import { DEFAULT_COLORWAY, toPriorityLevel } from './priority'
import type { FilteredView, PriorityColorMap, PriorityLevel, TimelineRow } from './types'

export interface HoverLine {
  label: string
  value: string
}

export interface TimelineBar {
  id: string
  task: string
  /** Null for unassigned rows; `resourceLabel` is display text only. */
  resource: string | null
  resourceLabel: string
  start: Date
  finish: Date
  priority: string
  level: PriorityLevel | null
  color: string
  text: string
  hover: HoverLine[]
}

export interface TimelineCategory {
  resource: string | null
  label: string
  count: number
}

export interface LegendEntry {
  priority: string
  level: PriorityLevel | null
  color: string
  /** False when the color came from the default colorway. */
  mapped: boolean
}

export interface TimelineChartSpec {
  title: string | null
  bars: TimelineBar[]
  /** Category axis order, bottom to top. */
  categories: TimelineCategory[]
  timeDomain: [Date, Date] | null
  legend: LegendEntry[]
  xAxis: { title: string; type: 'date' }
  yAxis: { title: string; type: 'category'; categoryOrder: 'total ascending' }
  legendTitle: string
  hoverMode: 'closest'
  margin: { l: number; r: number; t: number; b: number }
}

export interface TimelineChartOptions {
  equipment?: string | null
}

const CHART_MARGIN = { l: 0, r: 0, t: 50, b: 0 }

const resourceLabel = (resource: string | null): string => resource ?? LABELS.unassignedResource

const buildLegend = (view: FilteredView, colorMap: PriorityColorMap): LegendEntry[] => {
  const assigned = new Map<string, string>(Object.entries(colorMap))
  const legend: LegendEntry[] = []
  const seen = new Set<string>()

  view.forEach(row => {
    if (seen.has(row.Priority)) return
    seen.add(row.Priority)

    const mappedColor = assigned.get(row.Priority)
    const color = mappedColor ?? DEFAULT_COLORWAY[assigned.size % DEFAULT_COLORWAY.length]
    if (mappedColor === undefined) {
      assigned.set(row.Priority, color)
    }

    legend.push({
      priority: row.Priority,
      level: toPriorityLevel(row.Priority),
      color,
      mapped: mappedColor !== undefined
    })
  })

  return legend
}

// Fewest tasks first; resources with equal counts keep first-seen order.
const orderCategories = (bars: TimelineBar[]): TimelineCategory[] =>
  Array.from(rollup(bars, group => group.length, bar => bar.resource), ([resource, count]) => ({
    resource,
    label: resourceLabel(resource),
    count
  })).sort((a, b) => a.count - b.count)

const buildHover = (row: TimelineRow): HoverLine[] => [
  { label: 'Task', value: row.Task },
  { label: 'Person', value: resourceLabel(row.Resource) },
  { label: 'Start', value: formatTimestamp(row.Start) },
  { label: 'Finish', value: formatTimestamp(row.Finish) },
  { label: 'Priority', value: row.Priority }
]

export const buildTimelineChart = (
  view: FilteredView,
  colorMap: PriorityColorMap,
  options: TimelineChartOptions = {}
): TimelineChartSpec => {
  const legend = buildLegend(view, colorMap)
  const colorByPriority = new Map(legend.map(entry => [entry.priority, entry.color] as const))

  const bars = view.map((row, index): TimelineBar => ({
    id: `bar-${index}`,
    task: row.Task,
    resource: row.Resource,
    resourceLabel: resourceLabel(row.Resource),
    start: row.Start,
    finish: row.Finish,
    priority: row.Priority,
    level: toPriorityLevel(row.Priority),
    color: colorByPriority.get(row.Priority) ?? DEFAULT_COLORWAY[0],
    text: row.Task,
    hover: buildHover(row)
  }))

  const earliest = min(view, row => row.Start)
  const latest = max(view, row => row.Finish)

  return {
    title: options.equipment ? chartTitleFor(options.equipment) : null,
    bars,
    categories: orderCategories(bars),
    timeDomain: earliest !== undefined && latest !== undefined ? [earliest, latest] : null,
    legend,
    xAxis: { title: LABELS.xAxisTitle, type: 'date' },
    yAxis: { title: LABELS.yAxisTitle, type: 'category', categoryOrder: 'total ascending' },
    legendTitle: LABELS.legendTitle,
    hoverMode: 'closest',
    margin: { ...CHART_MARGIN }
  }
}
