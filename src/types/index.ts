// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
export type Uuid = string

// Timeline event types
// start_date / end_date are ISO-like (YYYY, YYYY-MM, YYYY-MM-DD) and only feed the chart;
// date_text is what the reader sees.
export interface TimelineEvent {
  id: Uuid
  title: string
  date_text: string
  start_date?: string
  end_date?: string
  era?: string
  story?: string
  characters: string[]
  categories: string[]
  notes?: string
  sort_index: number
}

export interface TimelineEventCreate {
  title: string
  date_text: string
  start_date?: string | null
  end_date?: string | null
  era?: string | null
  story?: string | null
  characters?: string[]
  categories?: string[]
  notes?: string | null
  sort_index?: number
}

export interface TimelineEventUpdate {
  title?: string
  date_text?: string
  start_date?: string | null
  end_date?: string | null
  era?: string | null
  story?: string | null
  characters?: string[]
  categories?: string[]
  notes?: string | null
  sort_index?: number
}

// Imported records may lack an id; the store assigns one
export type TimelineEventImport = TimelineEventCreate & { id?: Uuid }

export type ImportMode = 'replace' | 'merge'

export const IMPORT_MODE_LABELS: Record<ImportMode, string> = {
  replace: 'Replace current events',
  merge: 'Merge into current events',
}

// Filter types
export interface EventFilterCriteria {
  story?: string
  era?: string
  character?: string
  category?: string
  keyword?: string
}

export interface EventFilterOptions {
  stories: string[]
  eras: string[]
  characters: string[]
  categories: string[]
}

// Sorting and presentation
export type SortMode = 'manual' | 'chronological'

export const SORT_MODE_LABELS: Record<SortMode, string> = {
  manual: 'Sort index',
  chronological: 'Start date',
}

export type ViewMode = 'cards' | 'chart'

export type DatePrecision = 'year' | 'month' | 'day'

export interface ParsedDate {
  date: Date
  precision: DatePrecision
}

export interface ChartRow {
  event: TimelineEvent
  start: ParsedDate
  end: ParsedDate
  lane: string
  colorKey: string
}
