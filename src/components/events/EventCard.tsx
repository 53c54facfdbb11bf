// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { ChevronDown, ChevronRight, Pencil, Trash2 } from 'lucide-react'
import { useState } from 'react'
import { Badge } from '@/components/ui/Badge'
import type { TimelineEvent, Uuid } from '@/types'

interface EventCardProps {
  event: TimelineEvent
  onEdit: (event: TimelineEvent) => void
  onDelete: (eventId: Uuid) => void
}

function Field({ label, value }: { label: string; value?: string }) {
  if (!value) return null
  return (
    <div>
      <dt className="text-xs font-medium uppercase tracking-wider text-gray-400">{label}</dt>
      <dd className="text-sm text-gray-700">{value}</dd>
    </div>
  )
}

export function EventCard({ event, onEdit, onDelete }: EventCardProps) {
  const [isOpen, setIsOpen] = useState(false)
  const dateRange = [event.start_date, event.end_date].filter(Boolean).join(' to ')

  return (
    <article className="rounded-lg bg-gray-50 hover:bg-gray-100 transition-colors" aria-label={event.title}>
      <div className="flex items-center justify-between p-4">
        <button
          type="button"
          onClick={() => setIsOpen(!isOpen)}
          aria-expanded={isOpen}
          className="flex min-w-0 flex-1 items-center gap-2 text-left"
        >
          {isOpen ? (
            <ChevronDown className="h-4 w-4 shrink-0 text-gray-400" />
          ) : (
            <ChevronRight className="h-4 w-4 shrink-0 text-gray-400" />
          )}
          <div className="min-w-0">
            <h3 className="font-medium text-gray-900 truncate">{event.title}</h3>
            <p className="text-sm text-gray-500">
              {event.date_text}
              {event.story && <span> &middot; {event.story}</span>}
            </p>
          </div>
        </button>
        <div className="flex items-center gap-3 ml-4">
          {event.era && <Badge variant="info">{event.era}</Badge>}
          <button
            type="button"
            onClick={() => onEdit(event)}
            className="p-1 text-gray-400 hover:text-gray-600"
            title="Edit event"
          >
            <Pencil className="h-4 w-4" />
          </button>
          <button
            type="button"
            onClick={() => onDelete(event.id)}
            className="p-1 text-gray-400 hover:text-red-600"
            title="Delete event"
          >
            <Trash2 className="h-4 w-4" />
          </button>
        </div>
      </div>

      {isOpen && (
        <div className="border-t border-gray-200 px-4 pb-4 pt-3">
          <dl className="grid grid-cols-1 gap-3 sm:grid-cols-3">
            <Field label="Date" value={event.date_text} />
            <Field label="Dates" value={dateRange} />
            <Field label="Story" value={event.story} />
            <Field label="Era" value={event.era} />
            <Field label="Characters" value={event.characters.join(', ')} />
            <Field label="Categories" value={event.categories.join(', ')} />
            <Field label="Sort index" value={String(event.sort_index)} />
          </dl>
          {event.notes && <p className="mt-3 whitespace-pre-line text-sm text-gray-700">{event.notes}</p>}
        </div>
      )}
    </article>
  )
}
