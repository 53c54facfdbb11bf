// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { describe, expect, it } from 'vitest'
import { axisTicks, layoutChart, timeDomain } from '@/lib/chartLayout'
import { utcDate } from '@/lib/dates'
import { normalizeEvent } from '@/lib/eventStore'
import { buildChartRows } from '@/lib/sorting'

const rows = buildChartRows([
  normalizeEvent('a', { title: 'Founding', date_text: 'Year of Ash', start_date: '2000', story: 'One' }),
  normalizeEvent('b', {
    title: 'Long War',
    date_text: 'Ten winters',
    start_date: '2010',
    end_date: '2020',
    story: 'Two',
  }),
])

describe('timeDomain', () => {
  it('should span the earliest start to the latest end', () => {
    const domain = timeDomain(rows)
    expect(domain?.map((date) => date.toISOString())).toEqual([
      '2000-01-01T00:00:00.000Z',
      '2020-01-01T00:00:00.000Z',
    ])
  })

  it('should widen a single instant by a year each way', () => {
    const single = buildChartRows([normalizeEvent('x', { title: 'T', date_text: 'D', start_date: '1997' })])
    expect(timeDomain(single)?.map((date) => date.getUTCFullYear())).toEqual([1996, 1998])
  })

  it('should be empty without rows', () => {
    expect(timeDomain([])).toBeNull()
  })
})

describe('axisTicks', () => {
  it('should use year ticks on a round step for long spans', () => {
    expect(axisTicks([utcDate(2000), utcDate(2020)]).map((tick) => tick.label)).toEqual([
      '2000',
      '2005',
      '2010',
      '2015',
      '2020',
    ])
  })

  it('should use month ticks within a year', () => {
    expect(axisTicks([utcDate(1997), utcDate(1997, 7)]).map((tick) => tick.label)).toEqual([
      '1997',
      'Feb 1997',
      'Mar 1997',
      'Apr 1997',
      'May 1997',
      'Jun 1997',
      'Jul 1997',
    ])
  })

  it('should keep ticks inside the domain', () => {
    expect(axisTicks([utcDate(1997, 3, 15), utcDate(1997, 5, 2)]).map((tick) => tick.label)).toEqual([
      'Apr 1997',
      'May 1997',
    ])
  })
})

describe('layoutChart', () => {
  const layout = layoutChart(rows, { width: 1000 })

  it('should reserve room for lane labels and padding', () => {
    expect(layout.plotLeft).toBe(152)
    expect(layout.plotRight).toBe(988)
    expect(layout.height).toBe(28 + 2 * 36)
    expect(layout.lanes).toEqual([
      { name: 'One', y: 28 },
      { name: 'Two', y: 64 },
    ])
  })

  it('should place bars on the time scale', () => {
    const [founding, war] = layout.bars
    const warX = 152 + (836 * 3653) / 7305

    expect(founding).toMatchObject({ x: 152, y: 36, width: 6, height: 20, isPoint: true })
    expect(war?.x).toBeCloseTo(warX)
    expect(war?.width).toBeCloseTo(988 - warX)
    expect(war).toMatchObject({ y: 72, isPoint: false })
  })

  it('should put the first and last ticks on the plot edges', () => {
    expect(layout.ticks[0]).toEqual({ x: 152, label: '2000' })
    expect(layout.ticks.at(-1)).toEqual({ x: 988, label: '2020' })
  })

  it('should lay out nothing for no rows', () => {
    expect(layoutChart([], { width: 400 })).toMatchObject({ bars: [], lanes: [], ticks: [], height: 28 })
  })
})
