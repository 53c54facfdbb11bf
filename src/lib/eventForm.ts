// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { z } from 'zod'
import type { TimelineEvent, TimelineEventCreate } from '@/types'
import { isIsoLikeDate } from './dates'
import { ensureList } from './utils'

export const eventFormSchema = z.object({
  title: z.string().trim().min(1, 'Title is required').max(200, 'Title is too long'),
  date_text: z.string().trim().min(1, 'Date text is required'),
  start_date: z.string(),
  end_date: z.string(),
  era: z.string(),
  story: z.string(),
  characters: z.string(),
  categories: z.string(),
  notes: z.string(),
  sort_index: z.number({ invalid_type_error: 'Sort index must be a number' }).finite(),
})

export type EventFormData = z.infer<typeof eventFormSchema>

export const emptyEventForm: EventFormData = {
  title: '',
  date_text: '',
  start_date: '',
  end_date: '',
  era: '',
  story: '',
  characters: '',
  categories: '',
  notes: '',
  sort_index: 0,
}

export function eventToForm(event: TimelineEvent): EventFormData {
  return {
    title: event.title,
    date_text: event.date_text,
    start_date: event.start_date || '',
    end_date: event.end_date || '',
    era: event.era || '',
    story: event.story || '',
    characters: event.characters.join(', '),
    categories: event.categories.join(', '),
    notes: event.notes || '',
    sort_index: event.sort_index,
  }
}

/** Form values to store input. Blank optional fields are sent as null so an edit clears them. */
export function formToEvent(data: EventFormData): Required<TimelineEventCreate> {
  const optional = (value: string) => value.trim() || null
  return {
    title: data.title.trim(),
    date_text: data.date_text.trim(),
    start_date: optional(data.start_date),
    end_date: optional(data.end_date),
    era: optional(data.era),
    story: optional(data.story),
    characters: ensureList(data.characters),
    categories: ensureList(data.categories),
    notes: optional(data.notes),
    sort_index: data.sort_index,
  }
}

/** Hint shown under a date field whose value the chart cannot plot. */
export function chartDateHint(value: string): string | undefined {
  if (!value.trim() || isIsoLikeDate(value)) return undefined
  return 'Not a YYYY, YYYY-MM or YYYY-MM-DD date: this event will only appear in the card view'
}
