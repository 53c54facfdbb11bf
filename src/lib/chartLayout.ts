// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type { ChartRow } from '@/types'
import { getMonthName, utcDate } from './dates'

export interface ChartLayoutOptions {
  width: number
  laneHeight?: number
  laneLabelWidth?: number
  axisHeight?: number
  minBarWidth?: number
}

export interface ChartBar {
  row: ChartRow
  x: number
  y: number
  width: number
  height: number
  isPoint: boolean
}

export interface ChartTick {
  x: number
  label: string
}

export interface ChartLane {
  name: string
  y: number
}

export interface ChartLayout {
  width: number
  height: number
  plotLeft: number
  plotRight: number
  lanes: ChartLane[]
  bars: ChartBar[]
  ticks: ChartTick[]
}

const LANE_HEIGHT = 36
const LANE_LABEL_WIDTH = 140
const AXIS_HEIGHT = 28
const MIN_BAR_WIDTH = 6
const BAR_PADDING = 8
const PLOT_PADDING = 12
const MAX_TICKS = 8

const YEAR_STEPS = [1, 2, 5, 10, 20, 25, 50, 100, 200, 250, 500, 1000]
const MONTH_STEPS = [1, 2, 3, 6]

const addYears = (date: Date, years: number) => utcDate(date.getUTCFullYear() + years)

/** Lanes in order of first appearance, which is start order for sorted rows. */
function collectLanes(rows: ChartRow[]): string[] {
  const lanes: string[] = []
  for (const row of rows) {
    if (!lanes.includes(row.lane)) lanes.push(row.lane)
  }
  return lanes
}

/**
 * Time domain covering every bar. A single instant is widened by a year on
 * each side so it lands mid-axis.
 */
export function timeDomain(rows: ChartRow[]): [Date, Date] | null {
  if (rows.length === 0) return null
  let min = rows[0].start.date
  let max = rows[0].end.date
  for (const row of rows) {
    if (row.start.date < min) min = row.start.date
    if (row.end.date > max) max = row.end.date
  }
  if (min.getTime() === max.getTime()) {
    return [addYears(min, -1), addYears(max, 1)]
  }
  return [min, max]
}

export function axisTicks(domain: [Date, Date]): Array<{ date: Date; label: string }> {
  const [min, max] = domain
  const firstYear = min.getUTCFullYear()
  const lastYear = max.getUTCFullYear()
  const spanYears = lastYear - firstYear

  if (spanYears >= 2) {
    const step = YEAR_STEPS.find((s) => spanYears / s <= MAX_TICKS) ?? Math.ceil(spanYears / MAX_TICKS)
    const ticks: Array<{ date: Date; label: string }> = []
    for (let year = Math.ceil(firstYear / step) * step; year <= lastYear; year += step) {
      const date = utcDate(year)
      if (date >= min && date <= max) ticks.push({ date, label: String(year) })
    }
    return ticks
  }

  const firstMonth = firstYear * 12 + min.getUTCMonth()
  const lastMonth = lastYear * 12 + max.getUTCMonth()
  const spanMonths = lastMonth - firstMonth
  const step = MONTH_STEPS.find((s) => spanMonths / s <= MAX_TICKS) ?? 12
  const ticks: Array<{ date: Date; label: string }> = []
  for (let index = Math.ceil(firstMonth / step) * step; index <= lastMonth; index += step) {
    const year = Math.floor(index / 12)
    const month = (index % 12) + 1
    const date = utcDate(year, month)
    if (date >= min && date <= max) {
      ticks.push({ date, label: month === 1 ? String(year) : `${getMonthName(month)} ${year}` })
    }
  }
  return ticks
}

export function layoutChart(rows: ChartRow[], options: ChartLayoutOptions): ChartLayout {
  const laneHeight = options.laneHeight ?? LANE_HEIGHT
  const laneLabelWidth = options.laneLabelWidth ?? LANE_LABEL_WIDTH
  const axisHeight = options.axisHeight ?? AXIS_HEIGHT
  const minBarWidth = options.minBarWidth ?? MIN_BAR_WIDTH

  const lanes = collectLanes(rows)
  const plotLeft = laneLabelWidth + PLOT_PADDING
  const plotRight = Math.max(plotLeft + 1, options.width - PLOT_PADDING)
  const height = axisHeight + lanes.length * laneHeight

  const domain = timeDomain(rows)
  if (!domain) {
    return { width: options.width, height, plotLeft, plotRight, lanes: [], bars: [], ticks: [] }
  }

  const [min, max] = domain
  const span = max.getTime() - min.getTime()
  const scale = (date: Date) => plotLeft + ((date.getTime() - min.getTime()) / span) * (plotRight - plotLeft)

  const bars = rows.map((row) => {
    const laneIndex = lanes.indexOf(row.lane)
    const x = scale(row.start.date)
    const isPoint = row.end.date.getTime() === row.start.date.getTime()
    return {
      row,
      x,
      y: axisHeight + laneIndex * laneHeight + BAR_PADDING,
      width: Math.max(scale(row.end.date) - x, minBarWidth),
      height: laneHeight - BAR_PADDING * 2,
      isPoint,
    }
  })

  return {
    width: options.width,
    height,
    plotLeft,
    plotRight,
    lanes: lanes.map((name, index) => ({ name, y: axisHeight + index * laneHeight })),
    bars,
    ticks: axisTicks(domain).map(({ date, label }) => ({ x: scale(date), label })),
  }
}
