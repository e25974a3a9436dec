import { useEffect, useRef, useState } from 'react'
import * as d3 from 'd3'
import type { TimelineBar, TimelineChartSpec } from './buildTimelineChart'

interface TimelineChartProps {
  spec: TimelineChartSpec
}

interface TooltipData {
  x: number
  y: number
  bar: TimelineBar
}

const DEFAULT_SVG_WIDTH = 1100
const MIN_SVG_WIDTH = 640
const ROW_HEIGHT = 56
const MIN_PLOT_HEIGHT = 240
const AXIS_SPACE = { top: 20, right: 24, bottom: 56, left: 140 }
const TEXT_PADDING = 6

// Axes still need a domain when there is nothing to draw.
const emptyDomain = (): [Date, Date] => {
  const today = d3.timeDay.floor(new Date())
  return [today, d3.timeDay.offset(today, 1)]
}

function TimelineChart({ spec }: TimelineChartProps) {
  const svgRef = useRef<SVGSVGElement>(null)
  const hostRef = useRef<HTMLDivElement>(null)
  const [svgWidth, setSvgWidth] = useState(DEFAULT_SVG_WIDTH)
  const [tooltip, setTooltip] = useState<TooltipData | null>(null)

  const margin = {
    top: AXIS_SPACE.top + spec.margin.t,
    right: AXIS_SPACE.right + spec.margin.r,
    bottom: AXIS_SPACE.bottom + spec.margin.b,
    left: AXIS_SPACE.left + spec.margin.l
  }
  const plotHeight = Math.max(MIN_PLOT_HEIGHT, spec.categories.length * ROW_HEIGHT)
  const svgHeight = plotHeight + margin.top + margin.bottom

  useEffect(() => {
    const host = hostRef.current
    if (!host || typeof ResizeObserver === 'undefined') return

    const updateWidth = () => {
      const hostWidth = host.clientWidth
      if (!hostWidth) return
      const nextWidth = Math.max(MIN_SVG_WIDTH, Math.round(hostWidth))
      setSvgWidth(prev => (prev === nextWidth ? prev : nextWidth))
    }

    updateWidth()
    const observer = new ResizeObserver(updateWidth)
    observer.observe(host)
    return () => observer.disconnect()
  }, [])

  useEffect(() => {
    setTooltip(null)

    const width = svgWidth - margin.left - margin.right
    const height = plotHeight

    const xScale = d3.scaleTime()
      .domain(spec.timeDomain ?? emptyDomain())
      .range([0, width])

    // Bands are keyed by category index; band 0 is drawn at the bottom of the axis.
    const categoryIndex = new Map(spec.categories.map((category, index) => [category.resource, index] as const))
    const yScale = d3.scaleBand<number>()
      .domain(d3.range(spec.categories.length).reverse())
      .range([0, height])
      .padding(0.25)

    const svg = d3.select(svgRef.current)
    svg.selectAll('*').remove()
    svg
      .attr('width', svgWidth)
      .attr('height', svgHeight)

    const defs = svg.append('defs')

    const g = svg
      .append('g')
      .attr('transform', `translate(${margin.left},${margin.top})`)

    g.append('g')
      .attr('class', 'grid-x')
      .call(d3.axisBottom(xScale).tickSize(height).tickFormat(() => ''))
      .selectAll('line')
      .attr('stroke', '#e0e0e0')
      .attr('stroke-dasharray', '4')

    const xAxisGroup = g.append('g')
      .attr('class', 'x-axis')
      .attr('transform', `translate(0,${height})`)
      .call(d3.axisBottom(xScale))

    xAxisGroup.append('text')
      .attr('x', width / 2)
      .attr('y', 44)
      .attr('fill', 'black')
      .style('font-size', '13px')
      .style('text-anchor', 'middle')
      .text(spec.xAxis.title)

    const yAxisGroup = g.append('g')
      .attr('class', 'y-axis')
      .call(d3.axisLeft(yScale).tickFormat(index => spec.categories[index]?.label ?? ''))

    yAxisGroup.append('text')
      .attr('transform', 'rotate(-90)')
      .attr('x', -height / 2)
      .attr('y', -margin.left + 18)
      .attr('fill', 'black')
      .style('font-size', '13px')
      .style('text-anchor', 'middle')
      .text(spec.yAxis.title)

    const barX = (bar: TimelineBar): number => Math.min(xScale(bar.start), xScale(bar.finish))
    const barWidth = (bar: TimelineBar): number => Math.max(1, Math.abs(xScale(bar.finish) - xScale(bar.start)))
    const barY = (bar: TimelineBar): number => yScale(categoryIndex.get(bar.resource) ?? -1) ?? 0

    spec.bars.forEach(bar => {
      defs.append('clipPath')
        .attr('id', `timeline-clip-${bar.id}`)
        .append('rect')
        .attr('x', barX(bar))
        .attr('y', barY(bar))
        .attr('width', barWidth(bar))
        .attr('height', yScale.bandwidth())
    })

    const barsGroup = g.append('g').attr('class', 'timeline-bars')

    barsGroup.selectAll<SVGRectElement, TimelineBar>('.timeline-bar')
      .data(spec.bars)
      .join('rect')
      .attr('class', 'timeline-bar')
      .attr('x', barX)
      .attr('y', barY)
      .attr('width', barWidth)
      .attr('height', yScale.bandwidth())
      .attr('fill', bar => bar.color)
      .attr('fill-opacity', 0.85)
      .attr('stroke', '#ffffff')
      .style('cursor', 'pointer')
      .on('mouseover', (_event, bar) => {
        setTooltip({
          x: barX(bar) + barWidth(bar) / 2 + margin.left,
          y: barY(bar) + margin.top,
          bar
        })
      })
      .on('mouseout', () => {
        setTooltip(null)
      })

    barsGroup.selectAll<SVGTextElement, TimelineBar>('.timeline-bar-text')
      .data(spec.bars)
      .join('text')
      .attr('class', 'timeline-bar-text')
      .attr('clip-path', bar => `url(#timeline-clip-${bar.id})`)
      .attr('x', bar => barX(bar) + TEXT_PADDING)
      .attr('y', bar => barY(bar) + yScale.bandwidth() / 2)
      .attr('dy', '0.35em')
      .attr('fill', '#ffffff')
      .style('font-size', '11px')
      .style('pointer-events', 'none')
      .text(bar => bar.text)
  }, [margin.bottom, margin.left, margin.right, margin.top, plotHeight, spec, svgHeight, svgWidth])

  return (
    <div className="timeline-chart" ref={hostRef}>
      <div className="timeline-chart-wrapper" style={{ width: svgWidth }}>
        <svg ref={svgRef} className="timeline-svg" data-bars={spec.bars.length}></svg>
        {tooltip && (
          <div
            className="tooltip"
            role="tooltip"
            style={{
              position: 'absolute',
              left: `${tooltip.x + 10}px`,
              top: `${tooltip.y + 10}px`
            }}
          >
            {tooltip.bar.hover.map(line => (
              <div key={line.label}>
                <strong>{line.label}:</strong> {line.value}
              </div>
            ))}
          </div>
        )}
      </div>
    </div>
  )
}

export default TimelineChart
