// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { CalendarRange, LayoutList, Plus } from 'lucide-react'
import { useEffect, useMemo, useState } from 'react'
import { useSearchParams } from 'react-router-dom'
import { EventFormModal } from '@/components/EventFormModal'
import {
  EventCard,
  EventFilters,
  type EventFiltersState,
  ImportExportPanel,
  TimelineChart,
} from '@/components/events'
import { Button } from '@/components/ui/Button'
import { Card, CardContent, CardHeader, CardTitle } from '@/components/ui/Card'
import { Tab, TabList, TabPanel, Tabs } from '@/components/ui/Tabs'
import { useEventActions } from '@/hooks/useEventActions'
import { type EventFormData, formToEvent } from '@/lib/eventForm'
import { collectFilterOptions, filterEvents } from '@/lib/filters'
import { buildChartRows, sortEvents } from '@/lib/sorting'
import { pluralize } from '@/lib/utils'
import { useTimeline } from '@/stores/timeline'
import type { TimelineEvent, ViewMode } from '@/types'

const FILTER_PARAMS = {
  story: 'story',
  era: 'era',
  character: 'character',
  category: 'category',
  keyword: 'q',
} as const

const FILTER_KEYS = ['story', 'era', 'character', 'category', 'keyword'] as const

function filtersFromParams(params: URLSearchParams): EventFiltersState {
  return {
    story: params.get(FILTER_PARAMS.story) || '',
    era: params.get(FILTER_PARAMS.era) || '',
    character: params.get(FILTER_PARAMS.character) || '',
    category: params.get(FILTER_PARAMS.category) || '',
    keyword: params.get(FILTER_PARAMS.keyword) || '',
    sort: params.get('sort') === 'chronological' ? 'chronological' : 'manual',
  }
}

export function Timeline() {
  const [searchParams, setSearchParams] = useSearchParams()
  const events = useTimeline((s) => s.events)
  const { add, update, remove, importFile } = useEventActions()
  const [isModalOpen, setIsModalOpen] = useState(false)
  const [editingEvent, setEditingEvent] = useState<TimelineEvent | null>(null)

  // Filters state - initialize from URL params
  const [filters, setFilters] = useState<EventFiltersState>(() => filtersFromParams(searchParams))
  const [view, setView] = useState<ViewMode>(() =>
    searchParams.get('view') === 'chart' ? 'chart' : 'cards',
  )

  // Sync filters and view to URL
  useEffect(() => {
    const params = new URLSearchParams()
    for (const key of FILTER_KEYS) {
      if (filters[key]) params.set(FILTER_PARAMS[key], filters[key])
    }
    if (filters.sort !== 'manual') params.set('sort', filters.sort)
    if (view !== 'cards') params.set('view', view)
    setSearchParams(params, { replace: true })
  }, [filters, view, setSearchParams])

  const filterOptions = useMemo(() => collectFilterOptions(events), [events])

  const visibleEvents = useMemo(() => {
    const { sort, ...criteria } = filters
    return sortEvents(filterEvents(events, criteria), sort)
  }, [events, filters])

  const chartCount = useMemo(() => buildChartRows(visibleEvents).length, [visibleEvents])

  const handleCreate = (data: EventFormData) => add(formToEvent(data))

  const handleUpdate = (data: EventFormData) => {
    if (!editingEvent) return false
    return update(editingEvent.id, formToEvent(data))
  }

  const openEditModal = (event: TimelineEvent) => {
    setEditingEvent(event)
  }

  return (
    <div>
      <div className="flex flex-wrap items-center justify-between gap-4 mb-6">
        <h1 className="text-2xl font-bold text-gray-900">Timeline</h1>
        <div className="flex flex-wrap items-center gap-3">
          <ImportExportPanel events={events} onImport={importFile} />
          <Button onClick={() => setIsModalOpen(true)}>
            <Plus className="h-4 w-4 mr-2" />
            New Event
          </Button>
        </div>
      </div>

      {/* Filters */}
      <EventFilters filters={filters} onFiltersChange={setFilters} options={filterOptions} />

      <Card>
        <CardHeader>
          <CardTitle>{pluralize(visibleEvents.length, 'Event')}</CardTitle>
        </CardHeader>
        <Tabs value={view} onChange={(tab) => setView(tab === 'chart' ? 'chart' : 'cards')}>
          <TabList className="px-6">
            <Tab value="cards" icon={<LayoutList className="h-4 w-4" />}>
              Event Cards
            </Tab>
            <Tab value="chart" icon={<CalendarRange className="h-4 w-4" />} badge={chartCount}>
              Timeline Chart
            </Tab>
          </TabList>
          <CardContent>
            <TabPanel value="cards">
              {visibleEvents.length === 0 ? (
                <p className="text-gray-500 text-center py-8">
                  {events.length === 0
                    ? 'No events yet. Add your first event to get started.'
                    : 'No events match your filters.'}
                </p>
              ) : (
                <div className="space-y-3">
                  {visibleEvents.map((event) => (
                    <EventCard key={event.id} event={event} onEdit={openEditModal} onDelete={remove} />
                  ))}
                </div>
              )}
            </TabPanel>
            <TabPanel value="chart">
              <TimelineChart events={visibleEvents} onSelect={openEditModal} />
            </TabPanel>
          </CardContent>
        </Tabs>
      </Card>

      {/* Create Event Modal */}
      <EventFormModal
        isOpen={isModalOpen}
        onClose={() => setIsModalOpen(false)}
        onSubmit={handleCreate}
      />

      {/* Edit Event Modal */}
      <EventFormModal
        isOpen={!!editingEvent}
        onClose={() => setEditingEvent(null)}
        onSubmit={handleUpdate}
        event={editingEvent}
      />
    </div>
  )
}
