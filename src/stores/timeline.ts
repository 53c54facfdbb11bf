// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { create } from 'zustand'
import { EventStore } from '@/lib/eventStore'
import { FormatError, ValidationError } from '@/lib/errors'
import type {
  ImportMode,
  TimelineEvent,
  TimelineEventCreate,
  TimelineEventImport,
  TimelineEventUpdate,
  Uuid,
} from '@/types'

interface TimelineState {
  events: TimelineEvent[]
  addEvent: (data: TimelineEventCreate) => Uuid
  updateEvent: (id: Uuid, changes: TimelineEventUpdate) => TimelineEvent
  deleteEvent: (id: Uuid) => void
  importEvents: (records: TimelineEventImport[], mode: ImportMode) => void
  getEvent: (id: Uuid) => TimelineEvent | undefined
  clear: () => void
}

/**
 * Session store over an {@link EventStore}. Every action either completes or
 * throws with the store untouched; `events` is refreshed after each change.
 */
export const createTimelineStore = (store: EventStore = new EventStore()) =>
  create<TimelineState>((set) => ({
    events: store.list(),

    addEvent: (data: TimelineEventCreate) => {
      const id = store.add(data)
      set({ events: store.list() })
      return id
    },

    updateEvent: (id: Uuid, changes: TimelineEventUpdate) => {
      const updated = store.update(id, changes)
      set({ events: store.list() })
      return updated
    },

    deleteEvent: (id: Uuid) => {
      store.delete(id)
      set({ events: store.list() })
    },

    importEvents: (records: TimelineEventImport[], mode: ImportMode) => {
      try {
        if (mode === 'replace') {
          store.replaceAll(records)
        } else {
          store.merge(records)
        }
      } catch (e) {
        if (e instanceof ValidationError) {
          throw new FormatError(e.message)
        }
        throw e
      }
      set({ events: store.list() })
    },

    getEvent: (id: Uuid) => store.get(id),

    clear: () => {
      store.replaceAll([])
      set({ events: [] })
    },
  }))

export const useTimeline = createTimelineStore()
