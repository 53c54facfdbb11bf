// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { useCallback } from 'react'
import { toast } from 'sonner'
import { isTimelineError } from '@/lib/errors'
import { parseCsv, parseJson } from '@/lib/serialization'
import { pluralize } from '@/lib/utils'
import { useTimeline } from '@/stores/timeline'
import type { ImportMode, TimelineEventCreate, TimelineEventUpdate, Uuid } from '@/types'

/** User-facing message for a failed action. Unexpected errors are logged. */
export function describeError(e: unknown, fallback: string): string {
  if (isTimelineError(e)) {
    return e.message
  }
  console.error(`[Timeline] ${fallback}:`, e)
  return fallback
}

export function parseImportFile(name: string, text: string) {
  return name.toLowerCase().endsWith('.csv') ? parseCsv(text) : parseJson(text)
}

/**
 * Add, edit, delete and import with errors reported as toasts.
 * Each returns whether the action went through.
 */
export function useEventActions() {
  const addEvent = useTimeline((s) => s.addEvent)
  const updateEvent = useTimeline((s) => s.updateEvent)
  const deleteEvent = useTimeline((s) => s.deleteEvent)
  const importEvents = useTimeline((s) => s.importEvents)

  const add = useCallback(
    (data: TimelineEventCreate) => {
      try {
        addEvent(data)
        toast.success('Event added')
        return true
      } catch (e) {
        toast.error(describeError(e, 'Failed to add event'))
        return false
      }
    },
    [addEvent],
  )

  const update = useCallback(
    (id: Uuid, changes: TimelineEventUpdate) => {
      try {
        updateEvent(id, changes)
        toast.success('Event updated')
        return true
      } catch (e) {
        toast.error(describeError(e, 'Failed to update event'))
        return false
      }
    },
    [updateEvent],
  )

  const remove = useCallback(
    (id: Uuid) => {
      try {
        deleteEvent(id)
        toast.success('Event deleted')
        return true
      } catch (e) {
        toast.error(describeError(e, 'Failed to delete event'))
        return false
      }
    },
    [deleteEvent],
  )

  const importFile = useCallback(
    async (file: File, mode: ImportMode) => {
      try {
        const records = parseImportFile(file.name, await file.text())
        importEvents(records, mode)
        toast.success(`Loaded ${pluralize(records.length, 'event')} from ${file.name}`)
        return true
      } catch (e) {
        toast.error(describeError(e, 'Failed to load file'))
        return false
      }
    },
    [importEvents],
  )

  return { add, update, remove, importFile }
}
