// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type { DatePrecision, ParsedDate } from '@/types'
import { DateParseError } from './errors'

const ISO_LIKE_DATE = /^(\d{4})(?:-(\d{2})(?:-(\d{2}))?)?$/

const MONTH_NAMES = [
  'Jan',
  'Feb',
  'Mar',
  'Apr',
  'May',
  'Jun',
  'Jul',
  'Aug',
  'Sep',
  'Oct',
  'Nov',
  'Dec',
]

export const isLeapYear = (year: number): boolean =>
  (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0

export const getDaysInMonth = (year: number, month: number): number => {
  // Month is 1-based (1=Jan)
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month] ?? 0
}

export const getMonthName = (month: number): string => MONTH_NAMES[month - 1] ?? ''

/**
 * Build a UTC midnight date. Date.UTC maps years 0-99 onto 1900-1999,
 * so the year is set separately.
 */
export function utcDate(year: number, month = 1, day = 1): Date {
  const date = new Date(Date.UTC(2000, month - 1, day))
  date.setUTCFullYear(year)
  return date
}

/**
 * Parse `YYYY`, `YYYY-MM` or `YYYY-MM-DD` into a UTC date at the given precision.
 * Year-only values land on 1 January, year-month values on the first of the month.
 *
 * @throws DateParseError for anything else, including impossible days such as `1997-02-30`
 */
export function parseIsoLikeDate(input: string): ParsedDate {
  const value = input.trim()
  const match = ISO_LIKE_DATE.exec(value)
  if (!match) {
    throw new DateParseError(input)
  }

  const [, yearText, monthText, dayText] = match
  const year = Number(yearText)
  const month = monthText ? Number(monthText) : 1
  const day = dayText ? Number(dayText) : 1

  if (year < 1 || month < 1 || month > 12 || day < 1 || day > getDaysInMonth(year, month)) {
    throw new DateParseError(input)
  }

  const precision: DatePrecision = dayText ? 'day' : monthText ? 'month' : 'year'
  return { date: utcDate(year, month, day), precision }
}

export function safeParseDate(input: string | null | undefined): ParsedDate | null {
  if (!input?.trim()) return null
  try {
    return parseIsoLikeDate(input)
  } catch (e) {
    if (e instanceof DateParseError) return null
    throw e
  }
}

export function isIsoLikeDate(input: string | null | undefined): boolean {
  return safeParseDate(input) !== null
}

export function formatParsedDate({ date, precision }: ParsedDate): string {
  const year = String(date.getUTCFullYear()).padStart(4, '0')
  if (precision === 'year') return year
  const month = getMonthName(date.getUTCMonth() + 1)
  if (precision === 'month') return `${month} ${year}`
  return `${date.getUTCDate()} ${month} ${year}`
}
