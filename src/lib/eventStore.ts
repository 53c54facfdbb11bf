// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type {
  TimelineEvent,
  TimelineEventCreate,
  TimelineEventImport,
  TimelineEventUpdate,
  Uuid,
} from '@/types'
import { NotFoundError, ValidationError } from './errors'
import { blankToUndefined, ensureList } from './utils'

export interface EventStoreOptions {
  generateId?: () => Uuid
}

const OPTIONAL_TEXT_FIELDS = ['start_date', 'end_date', 'era', 'story', 'notes'] as const

const defaultGenerateId = (): Uuid => crypto.randomUUID()

/**
 * Validate and normalize user input into a stored record.
 * Strings are trimmed and blank optional fields become absent.
 */
export function normalizeEvent(id: Uuid, input: TimelineEventCreate): TimelineEvent {
  const title = input.title.trim()
  if (!title) {
    throw new ValidationError('title', 'Title is required')
  }
  const dateText = input.date_text.trim()
  if (!dateText) {
    throw new ValidationError('date_text', 'Date text is required')
  }
  const sortIndex = input.sort_index ?? 0
  if (!Number.isFinite(sortIndex)) {
    throw new ValidationError('sort_index', 'Sort index must be a number')
  }

  const event: TimelineEvent = {
    id,
    title,
    date_text: dateText,
    characters: ensureList(input.characters),
    categories: ensureList(input.categories),
    // -0 would come back from JSON as 0
    sort_index: sortIndex === 0 ? 0 : sortIndex,
  }

  for (const key of OPTIONAL_TEXT_FIELDS) {
    const value = blankToUndefined(input[key])
    if (value !== undefined) event[key] = value
  }

  return event
}

function toCreate(event: TimelineEvent): TimelineEventCreate {
  const { id: _id, ...fields } = event
  return fields
}

/**
 * Ordered, id-keyed collection of timeline events. Insertion order is the
 * list order; updates keep a record in place.
 */
export class EventStore {
  private readonly events = new Map<Uuid, TimelineEvent>()
  // Every id this store has issued or loaded, so a deleted id is never handed out again
  private readonly knownIds = new Set<Uuid>()
  private readonly generateId: () => Uuid

  constructor(initial: TimelineEventImport[] = [], options: EventStoreOptions = {}) {
    this.generateId = options.generateId ?? defaultGenerateId
    this.replaceAll(initial)
  }

  get size() {
    return this.events.size
  }

  add(input: TimelineEventCreate): Uuid {
    const id = this.nextId()
    const event = normalizeEvent(id, input)
    this.events.set(id, event)
    this.knownIds.add(id)
    return id
  }

  update(id: Uuid, changes: TimelineEventUpdate): TimelineEvent {
    const current = this.events.get(id)
    if (!current) {
      throw new NotFoundError(id)
    }
    const updated = normalizeEvent(id, { ...toCreate(current), ...changes })
    this.events.set(id, updated)
    return updated
  }

  delete(id: Uuid): void {
    if (!this.events.delete(id)) {
      throw new NotFoundError(id)
    }
  }

  get(id: Uuid): TimelineEvent | undefined {
    return this.events.get(id)
  }

  has(id: Uuid): boolean {
    return this.events.has(id)
  }

  list(): TimelineEvent[] {
    return Array.from(this.events.values())
  }

  /** Swap the whole collection. Nothing changes if any record is invalid. */
  replaceAll(records: TimelineEventImport[]): void {
    const next = this.prepare(records)
    this.events.clear()
    for (const event of next) {
      this.events.set(event.id, event)
      this.knownIds.add(event.id)
    }
  }

  /**
   * Records whose id is already present replace that record in place;
   * the rest are appended in order. Nothing changes if any record is invalid.
   */
  merge(records: TimelineEventImport[]): void {
    const next = this.prepare(records)
    for (const event of next) {
      this.events.set(event.id, event)
      this.knownIds.add(event.id)
    }
  }

  private prepare(records: TimelineEventImport[]): TimelineEvent[] {
    const reserved = new Set<Uuid>()
    for (const record of records) {
      const id = record.id?.trim()
      if (!id) continue
      if (reserved.has(id)) {
        throw new ValidationError('id', `Duplicate event id "${id}"`)
      }
      reserved.add(id)
    }

    return records.map(({ id, ...fields }) => {
      let recordId = id?.trim()
      if (!recordId) {
        recordId = this.nextId(reserved)
        reserved.add(recordId)
      }
      return normalizeEvent(recordId, fields)
    })
  }

  private nextId(reserved?: Set<Uuid>): Uuid {
    let id = this.generateId()
    while (this.knownIds.has(id) || reserved?.has(id)) {
      id = this.generateId()
    }
    return id
  }
}
