// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { z } from 'zod'
import type { TimelineEvent, TimelineEventImport } from '@/types'
import { EVENT_KEYS, LIST_DELIMITER } from './constants'
import { FormatError, ValidationError } from './errors'
import { normalizeEvent } from './eventStore'
import { ensureList } from './utils'

// --- JSON ---

// Older files stored list fields as comma-separated text
const listField = z
  .union([z.array(z.string()), z.string(), z.null()])
  .optional()
  .transform((value) => ensureList(value))

const optionalText = z.string().nullable().optional()

export const importedEventSchema = z.object({
  id: z.union([z.string(), z.number().transform(String)]).optional(),
  title: z.string({ required_error: 'title is required', invalid_type_error: 'title must be text' }),
  date_text: z.string({
    required_error: 'date_text is required',
    invalid_type_error: 'date_text must be text',
  }),
  start_date: optionalText,
  end_date: optionalText,
  era: optionalText,
  story: optionalText,
  characters: listField,
  categories: listField,
  notes: optionalText,
  sort_index: z.number({ invalid_type_error: 'sort_index must be a number' }).finite().optional(),
})

export const importedEventListSchema = z.array(importedEventSchema, {
  invalid_type_error: 'expected a list of events',
})

function describeIssue(issue: z.ZodIssue): string {
  const [index] = issue.path
  if (typeof index !== 'number') return issue.message
  return `event ${index + 1}: ${issue.message}`
}

/**
 * Validate every record against the store's rules without touching a store,
 * so a bad file is rejected before anything is replaced.
 */
function checkRecords(records: TimelineEventImport[]): TimelineEventImport[] {
  const ids = new Set<string>()
  records.forEach((record, index) => {
    try {
      normalizeEvent(record.id ?? '', record)
    } catch (e) {
      if (e instanceof ValidationError) {
        throw new FormatError(`event ${index + 1}: ${e.message}`)
      }
      throw e
    }
    const id = record.id?.trim()
    if (!id) return
    if (ids.has(id)) {
      throw new FormatError(`event ${index + 1}: duplicate id "${id}"`)
    }
    ids.add(id)
  })
  return records
}

export function exportJson(events: TimelineEvent[]): string {
  const rows = events.map((event) => ({
    id: event.id,
    title: event.title,
    date_text: event.date_text,
    start_date: event.start_date ?? '',
    end_date: event.end_date ?? '',
    era: event.era ?? '',
    story: event.story ?? '',
    characters: [...event.characters],
    categories: [...event.categories],
    notes: event.notes ?? '',
    sort_index: event.sort_index,
  }))
  return JSON.stringify(rows, null, 2)
}

/**
 * @throws FormatError when the text is not a JSON list of valid events
 */
export function parseJson(text: string): TimelineEventImport[] {
  let data: unknown
  try {
    data = JSON.parse(text)
  } catch (e) {
    throw new FormatError(`Invalid JSON: ${e instanceof Error ? e.message : String(e)}`)
  }

  const result = importedEventListSchema.safeParse(data)
  if (!result.success) {
    const issue = result.error.issues[0]
    throw new FormatError(issue ? describeIssue(issue) : 'Invalid event list')
  }
  return checkRecords(result.data)
}

// --- CSV ---

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`
  }
  return value
}

function toCsvCells(event: TimelineEvent): string[] {
  return EVENT_KEYS.map((key) => {
    const value = event[key]
    if (value === undefined) return ''
    if (Array.isArray(value)) return value.join(`${LIST_DELIMITER} `)
    return String(value)
  })
}

export function exportCsv(events: TimelineEvent[]): string {
  const lines = [EVENT_KEYS.join(',')]
  for (const event of events) {
    lines.push(toCsvCells(event).map(escapeCsvField).join(','))
  }
  return `${lines.join('\r\n')}\r\n`
}

/** Split CSV text into rows of cells. Quoted fields may hold commas, quotes and line breaks. */
export function parseCsvRows(text: string): string[][] {
  const rows: string[][] = []
  let row: string[] = []
  let field = ''
  let inQuotes = false
  let i = 0

  // Strip a byte order mark left by spreadsheet exports
  const source = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text

  while (i < source.length) {
    const char = source[i]
    if (inQuotes) {
      if (char === '"') {
        if (source[i + 1] === '"') {
          field += '"'
          i += 2
          continue
        }
        inQuotes = false
      } else {
        field += char
      }
      i++
      continue
    }

    if (char === '"') {
      inQuotes = true
    } else if (char === ',') {
      row.push(field)
      field = ''
    } else if (char === '\n' || char === '\r') {
      row.push(field)
      rows.push(row)
      row = []
      field = ''
      if (char === '\r' && source[i + 1] === '\n') i++
    } else {
      field += char
    }
    i++
  }

  if (inQuotes) {
    throw new FormatError('Invalid CSV: unterminated quoted field')
  }
  if (field !== '' || row.length > 0) {
    row.push(field)
    rows.push(row)
  }
  return rows.filter((cells) => cells.some((cell) => cell.trim() !== ''))
}

/**
 * Read events back from the CSV layout written by {@link exportCsv}.
 * List cells are split on the list delimiter, so a name containing it comes back as two entries.
 *
 * @throws FormatError on a missing header column, broken quoting or an invalid row
 */
export function parseCsv(text: string): TimelineEventImport[] {
  const [header, ...body] = parseCsvRows(text)
  if (!header) {
    throw new FormatError('Invalid CSV: no header row')
  }

  const columns = header.map((name) => name.trim())
  for (const required of ['title', 'date_text']) {
    if (!columns.includes(required)) {
      throw new FormatError(`Invalid CSV: missing "${required}" column`)
    }
  }

  const records = body.map((cells, index) => {
    const cell = (key: string) => {
      const position = columns.indexOf(key)
      return position === -1 ? '' : (cells[position] ?? '')
    }

    const sortText = cell('sort_index').trim()
    const sortIndex = sortText === '' ? 0 : Number(sortText)
    if (!Number.isFinite(sortIndex)) {
      throw new FormatError(`event ${index + 1}: sort_index must be a number`)
    }

    const record: TimelineEventImport = {
      title: cell('title'),
      date_text: cell('date_text'),
      start_date: cell('start_date'),
      end_date: cell('end_date'),
      era: cell('era'),
      story: cell('story'),
      characters: ensureList(cell('characters').split(LIST_DELIMITER)),
      categories: ensureList(cell('categories').split(LIST_DELIMITER)),
      notes: cell('notes'),
      sort_index: sortIndex,
    }
    const id = cell('id').trim()
    if (id) record.id = id
    return record
  })

  return checkRecords(records)
}
