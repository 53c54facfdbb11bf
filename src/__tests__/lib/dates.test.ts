// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { describe, expect, it } from 'vitest'
import {
  formatParsedDate,
  getDaysInMonth,
  isIsoLikeDate,
  parseIsoLikeDate,
  safeParseDate,
  utcDate,
} from '@/lib/dates'
import { DateParseError } from '@/lib/errors'

describe('ISO-like date parsing', () => {
  describe('parseIsoLikeDate', () => {
    it('should treat a bare year as 1 January', () => {
      const parsed = parseIsoLikeDate('1997')
      expect(parsed.precision).toBe('year')
      expect(parsed.date.toISOString()).toBe('1997-01-01T00:00:00.000Z')
    })

    it('should treat year-month as the first of the month', () => {
      const parsed = parseIsoLikeDate('1997-03')
      expect(parsed.precision).toBe('month')
      expect(parsed.date.toISOString()).toBe('1997-03-01T00:00:00.000Z')
    })

    it('should keep the exact day', () => {
      const parsed = parseIsoLikeDate('1997-03-14')
      expect(parsed.precision).toBe('day')
      expect(parsed.date.toISOString()).toBe('1997-03-14T00:00:00.000Z')
    })

    it('should ignore surrounding whitespace', () => {
      expect(parseIsoLikeDate('  1842-05 ').date.toISOString()).toBe('1842-05-01T00:00:00.000Z')
    })

    it('should keep early years instead of mapping them to the 1900s', () => {
      expect(parseIsoLikeDate('0042').date.getUTCFullYear()).toBe(42)
    })

    it('should reject freeform text', () => {
      expect(() => parseIsoLikeDate('March 1997')).toThrow(DateParseError)
    })

    it('should reject impossible calendar values', () => {
      expect(() => parseIsoLikeDate('1997-13')).toThrow(DateParseError)
      expect(() => parseIsoLikeDate('1997-02-30')).toThrow(DateParseError)
      expect(() => parseIsoLikeDate('0000')).toThrow(DateParseError)
    })

    it('should accept 29 February only in leap years', () => {
      expect(parseIsoLikeDate('2024-02-29').precision).toBe('day')
      expect(() => parseIsoLikeDate('2023-02-29')).toThrow(DateParseError)
    })

    it('should reject other separators and short years', () => {
      expect(() => parseIsoLikeDate('1997/03/14')).toThrow(DateParseError)
      expect(() => parseIsoLikeDate('97')).toThrow(DateParseError)
      expect(() => parseIsoLikeDate('1997-3')).toThrow(DateParseError)
    })
  })

  describe('safeParseDate', () => {
    it('should return null for blank or unparseable values', () => {
      expect(safeParseDate(undefined)).toBeNull()
      expect(safeParseDate('   ')).toBeNull()
      expect(safeParseDate('Year of Ash')).toBeNull()
    })

    it('should return the parsed date otherwise', () => {
      expect(safeParseDate('2001-09')?.precision).toBe('month')
      expect(isIsoLikeDate('2001-09-11')).toBe(true)
      expect(isIsoLikeDate('Second Spring')).toBe(false)
    })
  })

  describe('helpers', () => {
    it('should return days in month', () => {
      expect(getDaysInMonth(2024, 2)).toBe(29)
      expect(getDaysInMonth(1900, 2)).toBe(28)
      expect(getDaysInMonth(2000, 2)).toBe(29)
      expect(getDaysInMonth(1997, 4)).toBe(30)
    })

    it('should build UTC dates for any year', () => {
      expect(utcDate(5, 6, 7).toISOString()).toBe('0005-06-07T00:00:00.000Z')
    })

    it('should format at the parsed precision', () => {
      expect(formatParsedDate(parseIsoLikeDate('1997'))).toBe('1997')
      expect(formatParsedDate(parseIsoLikeDate('1997-03'))).toBe('Mar 1997')
      expect(formatParsedDate(parseIsoLikeDate('1997-03-14'))).toBe('14 Mar 1997')
    })
  })
})
