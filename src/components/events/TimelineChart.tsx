// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { useEffect, useMemo, useRef, useState } from 'react'
import { layoutChart } from '@/lib/chartLayout'
import { formatParsedDate } from '@/lib/dates'
import { buildChartRows } from '@/lib/sorting'
import { pluralize } from '@/lib/utils'
import type { ChartRow, TimelineEvent } from '@/types'

interface TimelineChartProps {
  events: TimelineEvent[]
  onSelect?: (event: TimelineEvent) => void
}

const DEFAULT_WIDTH = 960

const PALETTE = [
  '#2563eb',
  '#d97706',
  '#059669',
  '#dc2626',
  '#7c3aed',
  '#0891b2',
  '#db2777',
  '#65a30d',
]

export function colorForKey(key: string, keys: string[]): string {
  const index = keys.indexOf(key)
  return PALETTE[(index === -1 ? 0 : index) % PALETTE.length] ?? '#6b7280'
}

function describeRow({ event, start, end }: ChartRow) {
  const span =
    end.date.getTime() === start.date.getTime()
      ? formatParsedDate(start)
      : `${formatParsedDate(start)} to ${formatParsedDate(end)}`
  return [event.title, event.date_text, span, event.era].filter(Boolean).join('\n')
}

export function TimelineChart({ events, onSelect }: TimelineChartProps) {
  const containerRef = useRef<HTMLDivElement>(null)
  const [width, setWidth] = useState(DEFAULT_WIDTH)

  const rows = useMemo(() => buildChartRows(events), [events])
  const layout = useMemo(() => layoutChart(rows, { width }), [rows, width])
  const colorKeys = useMemo(() => Array.from(new Set(rows.map((row) => row.colorKey))), [rows])
  const hasRows = rows.length > 0

  // Track the container width; jsdom and first paint fall back to the default
  useEffect(() => {
    const element = containerRef.current
    if (!element || typeof ResizeObserver === 'undefined') return
    const observer = new ResizeObserver(([entry]) => {
      if (entry && entry.contentRect.width > 0) setWidth(entry.contentRect.width)
    })
    observer.observe(element)
    return () => observer.disconnect()
  }, [hasRows])

  if (!hasRows) {
    return (
      <p className="text-gray-500 text-center py-8">
        Add ISO-like dates (YYYY, YYYY-MM or YYYY-MM-DD) to see events on the chart.
      </p>
    )
  }

  return (
    <div ref={containerRef} className="w-full overflow-x-auto">
      <svg
        width={layout.width}
        height={layout.height}
        role="img"
        aria-label={`Timeline chart with ${pluralize(rows.length, 'event')}`}
        className="text-gray-500"
      >
        {layout.ticks.map((tick) => (
          <g key={`${tick.label}-${tick.x}`}>
            <line x1={tick.x} x2={tick.x} y1={20} y2={layout.height} stroke="#e5e7eb" />
            <text x={tick.x} y={14} textAnchor="middle" fontSize={11} fill="currentColor">
              {tick.label}
            </text>
          </g>
        ))}

        {layout.lanes.map((lane) => (
          <text key={lane.name} x={8} y={lane.y + 22} fontSize={12} fill="#374151" fontWeight={600}>
            {lane.name}
          </text>
        ))}

        {layout.bars.map((bar) => {
          const color = colorForKey(bar.row.colorKey, colorKeys)
          return (
            <g
              key={bar.row.event.id}
              data-testid="chart-bar"
              data-event-id={bar.row.event.id}
              data-x={bar.x}
              onClick={() => onSelect?.(bar.row.event)}
              className={onSelect ? 'cursor-pointer' : undefined}
            >
              <title>{describeRow(bar.row)}</title>
              {bar.isPoint ? (
                <circle
                  cx={bar.x}
                  cy={bar.y + bar.height / 2}
                  r={Math.min(bar.height / 2, 7)}
                  fill={color}
                />
              ) : (
                <rect x={bar.x} y={bar.y} width={bar.width} height={bar.height} rx={4} fill={color} />
              )}
            </g>
          )
        })}
      </svg>

      <ul className="mt-3 flex flex-wrap gap-4 text-xs text-gray-600">
        {colorKeys.map((key) => (
          <li key={key} className="flex items-center gap-1.5">
            <span className="inline-block h-3 w-3 rounded-sm" style={{ backgroundColor: colorForKey(key, colorKeys) }} />
            {key}
          </li>
        ))}
      </ul>
    </div>
  )
}
