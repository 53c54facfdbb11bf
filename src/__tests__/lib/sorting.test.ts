// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { describe, expect, it } from 'vitest'
import { normalizeEvent } from '@/lib/eventStore'
import { buildChartRows, sortEvents } from '@/lib/sorting'
import type { TimelineEventCreate } from '@/types'

let counter = 0
const makeEvent = (fields: Partial<TimelineEventCreate> & { title: string }) =>
  normalizeEvent(`evt-${++counter}`, { date_text: 'sometime', ...fields })

const titles = (list: Array<{ title: string }>) => list.map((event) => event.title)

describe('sortEvents', () => {
  it('should order by sort index and keep insertion order for ties', () => {
    const events = [
      makeEvent({ title: 'C', sort_index: 2 }),
      makeEvent({ title: 'A', sort_index: 1 }),
      makeEvent({ title: 'B', sort_index: 1 }),
      makeEvent({ title: 'D', sort_index: -0.5 }),
    ]
    expect(titles(sortEvents(events))).toEqual(['D', 'A', 'B', 'C'])
  })

  it('should not reorder the input array', () => {
    const events = [makeEvent({ title: 'Later', sort_index: 5 }), makeEvent({ title: 'Sooner' })]
    sortEvents(events)
    expect(titles(events)).toEqual(['Later', 'Sooner'])
  })

  it('should order chronologically with undated events last', () => {
    const events = [
      makeEvent({ title: 'Undated', sort_index: 0 }),
      makeEvent({ title: 'War Begins', start_date: '1997-03', sort_index: 2 }),
      makeEvent({ title: 'Founding', start_date: '1997', sort_index: 1 }),
      makeEvent({ title: 'armistice', start_date: '1997-03-01', sort_index: 2 }),
      makeEvent({ title: 'Prose date', start_date: 'March 1997', sort_index: -1 }),
    ]
    expect(titles(sortEvents(events, 'chronological'))).toEqual([
      'Founding',
      'armistice',
      'War Begins',
      'Prose date',
      'Undated',
    ])
  })
})

describe('buildChartRows', () => {
  it('should leave out events without a usable date', () => {
    const events = [
      makeEvent({ title: 'Prose date', start_date: 'March 1997' }),
      makeEvent({ title: 'No date' }),
      makeEvent({ title: 'Dated', start_date: '1997' }),
    ]
    expect(titles(buildChartRows(events).map((row) => row.event))).toEqual(['Dated'])
    expect(sortEvents(events)).toHaveLength(3)
  })

  it('should fall back to the end date for the start', () => {
    const [row] = buildChartRows([makeEvent({ title: 'Ending', end_date: '2001-06' })])
    expect(row?.start.date.toISOString()).toBe('2001-06-01T00:00:00.000Z')
    expect(row?.end).toBe(row?.start)
  })

  it('should not fall back to the end date when the start date is unreadable', () => {
    const rows = buildChartRows([
      makeEvent({ title: 'Prose start', start_date: 'March 1997', end_date: '1998' }),
    ])
    expect(rows).toHaveLength(0)
  })

  it('should draw an end before the start as a point', () => {
    const [row] = buildChartRows([
      makeEvent({ title: 'Backwards', start_date: '2001', end_date: '1999' }),
    ])
    expect(row?.end).toBe(row?.start)
  })

  it('should keep an unparseable end date out of the span', () => {
    const [row] = buildChartRows([
      makeEvent({ title: 'Open', start_date: '2001', end_date: 'forever' }),
    ])
    expect(row?.end.date.toISOString()).toBe('2001-01-01T00:00:00.000Z')
  })

  it('should assign lanes by story and colours by first category', () => {
    const [plain, tagged] = buildChartRows([
      makeEvent({ title: 'Plain', start_date: '1990' }),
      makeEvent({
        title: 'Tagged',
        start_date: '1991',
        story: 'Book One',
        categories: ['battle', 'omen'],
      }),
    ])
    expect(plain).toMatchObject({ lane: 'Unassigned', colorKey: 'Uncategorized' })
    expect(tagged).toMatchObject({ lane: 'Book One', colorKey: 'battle' })
  })

  it('should sort rows by start date', () => {
    const rows = buildChartRows([
      makeEvent({ title: 'Late', start_date: '2005', sort_index: 0 }),
      makeEvent({ title: 'Early', start_date: '1890-12-31', sort_index: 9 }),
    ])
    expect(titles(rows.map((row) => row.event))).toEqual(['Early', 'Late'])
    expect(rows[1]?.end.precision).toBe('year')
  })
})
