// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type { ChartRow, SortMode, TimelineEvent } from '@/types'
import { UNASSIGNED_LANE, UNCATEGORIZED } from './constants'
import { safeParseDate } from './dates'

const byManualIndex = (a: TimelineEvent, b: TimelineEvent) => a.sort_index - b.sort_index

// Undated events go last, then sort_index, then title
const byStartDate = (a: TimelineEvent, b: TimelineEvent) => {
  const aTime = safeParseDate(a.start_date)?.date.getTime() ?? Number.POSITIVE_INFINITY
  const bTime = safeParseDate(b.start_date)?.date.getTime() ?? Number.POSITIVE_INFINITY
  if (aTime !== bTime) return aTime < bTime ? -1 : 1
  return byManualIndex(a, b) || a.title.toLowerCase().localeCompare(b.title.toLowerCase())
}

/**
 * Order events for display. Array.prototype.sort is stable, so events that
 * compare equal keep their insertion order.
 */
export function sortEvents(events: TimelineEvent[], mode: SortMode = 'manual'): TimelineEvent[] {
  return [...events].sort(mode === 'chronological' ? byStartDate : byManualIndex)
}

/**
 * Rows for the chart: events whose start date parses, or that have no start
 * date and an end date that parses. A start date that is set but unreadable
 * keeps the event off the chart.
 */
export function buildChartRows(events: TimelineEvent[]): ChartRow[] {
  const rows: ChartRow[] = []
  for (const event of events) {
    const parsedEnd = safeParseDate(event.end_date)
    const start = event.start_date === undefined ? parsedEnd : safeParseDate(event.start_date)
    if (!start) continue

    // An end before the start is drawn as a single point
    const end = parsedEnd && parsedEnd.date >= start.date ? parsedEnd : start

    rows.push({
      event,
      start,
      end,
      lane: event.story ?? UNASSIGNED_LANE,
      colorKey: event.categories[0] ?? UNCATEGORIZED,
    })
  }
  return rows.sort((a, b) => a.start.date.getTime() - b.start.date.getTime())
}
