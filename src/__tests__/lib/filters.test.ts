// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { describe, expect, it } from 'vitest'
import { normalizeEvent } from '@/lib/eventStore'
import { collectFilterOptions, filterEvents, hasActiveFilters, matchesFilters } from '@/lib/filters'

const events = [
  normalizeEvent('1', {
    title: 'Founding',
    date_text: 'Year of Ash',
    story: 'Book One',
    era: 'Ash Age',
    characters: ['Mara', 'Tobin'],
    categories: ['politics'],
    notes: 'The council meets at the river.',
  }),
  normalizeEvent('2', {
    title: 'War Begins',
    date_text: 'Second Spring',
    story: 'Book Two',
    era: 'Ash Age',
    characters: ['Tobin'],
    categories: ['Battle'],
  }),
  normalizeEvent('3', {
    title: 'Quiet years',
    date_text: 'after the river war',
    characters: [],
    categories: [],
  }),
]

const titles = (list: typeof events) => list.map((event) => event.title)

describe('filters', () => {
  describe('hasActiveFilters', () => {
    it('should ignore blank criteria', () => {
      expect(hasActiveFilters({})).toBe(false)
      expect(hasActiveFilters({ story: '', keyword: '   ' })).toBe(false)
      expect(hasActiveFilters({ era: 'Ash Age' })).toBe(true)
    })
  })

  describe('filterEvents', () => {
    it('should return every event in order when nothing is set', () => {
      const result = filterEvents(events, { story: '' })
      expect(titles(result)).toEqual(['Founding', 'War Begins', 'Quiet years'])
      expect(result).not.toBe(events)
    })

    it('should match story and era exactly', () => {
      expect(titles(filterEvents(events, { story: 'Book Two' }))).toEqual(['War Begins'])
      expect(titles(filterEvents(events, { story: 'book two' }))).toEqual([])
      expect(titles(filterEvents(events, { era: 'Ash Age' }))).toEqual(['Founding', 'War Begins'])
    })

    it('should match characters and categories ignoring case', () => {
      expect(titles(filterEvents(events, { character: 'tobin' }))).toEqual(['Founding', 'War Begins'])
      expect(titles(filterEvents(events, { category: 'battle' }))).toEqual(['War Begins'])
      expect(titles(filterEvents(events, { character: 'Tob' }))).toEqual([])
    })

    it('should search title, date text and notes for the keyword', () => {
      expect(titles(filterEvents(events, { keyword: 'RIVER' }))).toEqual(['Founding', 'Quiet years'])
      expect(titles(filterEvents(events, { keyword: 'spring' }))).toEqual(['War Begins'])
      expect(titles(filterEvents(events, { keyword: 'Book' }))).toEqual([])
    })

    it('should require every criterion to match', () => {
      expect(titles(filterEvents(events, { era: 'Ash Age', character: 'Mara' }))).toEqual(['Founding'])
      expect(titles(filterEvents(events, { story: 'Book One', category: 'battle' }))).toEqual([])
    })
  })

  describe('matchesFilters', () => {
    it('should trim criteria before comparing', () => {
      const [founding] = events
      expect(founding && matchesFilters(founding, { story: ' Book One ' })).toBe(true)
    })
  })

  describe('collectFilterOptions', () => {
    it('should list the distinct values in sorted order', () => {
      expect(collectFilterOptions(events)).toEqual({
        stories: ['Book One', 'Book Two'],
        eras: ['Ash Age'],
        characters: ['Mara', 'Tobin'],
        categories: ['Battle', 'politics'],
      })
    })
  })
})
