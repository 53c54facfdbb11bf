// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type { EventFilterCriteria, EventFilterOptions, TimelineEvent } from '@/types'

const includesIgnoringCase = (values: string[], wanted: string) => {
  const needle = wanted.toLowerCase()
  return values.some((value) => value.toLowerCase() === needle)
}

export function hasActiveFilters(criteria: EventFilterCriteria): boolean {
  return Object.values(criteria).some((value) => typeof value === 'string' && value.trim() !== '')
}

export function matchesFilters(event: TimelineEvent, criteria: EventFilterCriteria): boolean {
  const story = criteria.story?.trim()
  if (story && event.story !== story) return false

  const era = criteria.era?.trim()
  if (era && event.era !== era) return false

  const character = criteria.character?.trim()
  if (character && !includesIgnoringCase(event.characters, character)) return false

  const category = criteria.category?.trim()
  if (category && !includesIgnoringCase(event.categories, category)) return false

  const keyword = criteria.keyword?.trim().toLowerCase()
  if (keyword) {
    const haystack = [event.title, event.date_text, event.notes ?? '']
    if (!haystack.some((text) => text.toLowerCase().includes(keyword))) return false
  }

  return true
}

/** Keep the events matching every given criterion, in their original order. */
export function filterEvents(events: TimelineEvent[], criteria: EventFilterCriteria): TimelineEvent[] {
  if (!hasActiveFilters(criteria)) return [...events]
  return events.filter((event) => matchesFilters(event, criteria))
}

const sortedUnique = (values: Iterable<string>) =>
  Array.from(new Set(values)).sort((a, b) => a.localeCompare(b))

export function collectFilterOptions(events: TimelineEvent[]): EventFilterOptions {
  return {
    stories: sortedUnique(events.flatMap((e) => (e.story ? [e.story] : []))),
    eras: sortedUnique(events.flatMap((e) => (e.era ? [e.era] : []))),
    characters: sortedUnique(events.flatMap((e) => e.characters)),
    categories: sortedUnique(events.flatMap((e) => e.categories)),
  }
}
