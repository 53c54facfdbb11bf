// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { Search, X } from 'lucide-react'
import { hasActiveFilters } from '@/lib/filters'
import type { EventFilterCriteria, EventFilterOptions, SortMode } from '@/types'
import { SORT_MODE_LABELS } from '@/types'

export interface EventFiltersState extends Required<EventFilterCriteria> {
  sort: SortMode
}

export const EMPTY_FILTERS: EventFiltersState = {
  story: '',
  era: '',
  character: '',
  category: '',
  keyword: '',
  sort: 'manual',
}

interface EventFiltersProps {
  filters: EventFiltersState
  onFiltersChange: (filters: EventFiltersState) => void
  options: EventFilterOptions
}

type PickerKey = 'story' | 'era' | 'character' | 'category'

const PICKERS: Array<{ key: PickerKey; label: string; all: string; options: keyof EventFilterOptions }> = [
  { key: 'story', label: 'Story', all: 'All Stories', options: 'stories' },
  { key: 'era', label: 'Era', all: 'All Eras', options: 'eras' },
  { key: 'character', label: 'Character', all: 'All Characters', options: 'characters' },
  { key: 'category', label: 'Category', all: 'All Categories', options: 'categories' },
]

const SORT_OPTIONS = Object.entries(SORT_MODE_LABELS).map(([value, label]) => ({ value, label }))

const isSortMode = (value: string): value is SortMode => value in SORT_MODE_LABELS

const selectClassName =
  'px-3 py-2 text-sm border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-transparent'

export function EventFilters({ filters, onFiltersChange, options }: EventFiltersProps) {
  const { sort: _sort, ...criteria } = filters

  const handleSortChange = (e: React.ChangeEvent<HTMLSelectElement>) => {
    if (isSortMode(e.target.value)) {
      onFiltersChange({ ...filters, sort: e.target.value })
    }
  }

  return (
    <div className="flex flex-wrap items-center gap-4 mb-6">
      {PICKERS.map((picker) => (
        <select
          key={picker.key}
          aria-label={picker.label}
          value={filters[picker.key]}
          onChange={(e) => onFiltersChange({ ...filters, [picker.key]: e.target.value })}
          className={selectClassName}
        >
          <option value="">{picker.all}</option>
          {options[picker.options].map((value) => (
            <option key={value} value={value}>
              {value}
            </option>
          ))}
        </select>
      ))}

      {/* Search Input */}
      <div className="relative flex-1 min-w-[200px] max-w-xs">
        <Search className="absolute left-3 top-1/2 -translate-y-1/2 h-4 w-4 text-gray-400" />
        <input
          type="text"
          placeholder="Search title, date or notes..."
          value={filters.keyword}
          onChange={(e) => onFiltersChange({ ...filters, keyword: e.target.value })}
          className="w-full pl-9 pr-3 py-2 text-sm border border-gray-300 rounded-lg focus:outline-none focus:ring-2 focus:ring-blue-500 focus:border-transparent"
        />
      </div>

      <select aria-label="Sort by" value={filters.sort} onChange={handleSortChange} className={selectClassName}>
        {SORT_OPTIONS.map((option) => (
          <option key={option.value} value={option.value}>
            Sort: {option.label}
          </option>
        ))}
      </select>

      {hasActiveFilters(criteria) && (
        <button
          type="button"
          onClick={() => onFiltersChange({ ...EMPTY_FILTERS, sort: filters.sort })}
          className="inline-flex items-center gap-1 text-sm text-gray-500 hover:text-gray-900"
        >
          <X className="h-4 w-4" />
          Clear filters
        </button>
      )}
    </div>
  )
}
