// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type { TimelineEvent } from '@/types'
import { EXPORT_BASENAME } from './constants'
import { exportCsv, exportJson } from './serialization'

export type ExportFormat = 'json' | 'csv'

const MIME_TYPES: Record<ExportFormat, string> = {
  json: 'application/json',
  csv: 'text/csv;charset=utf-8',
}

export function exportFileName(format: ExportFormat) {
  return `${EXPORT_BASENAME}.${format}`
}

export function serializeEvents(events: TimelineEvent[], format: ExportFormat): string {
  return format === 'json' ? exportJson(events) : exportCsv(events)
}

export function downloadText(content: string, filename: string, type: string) {
  const blob = new Blob([content], { type })
  const url = window.URL.createObjectURL(blob)
  const a = document.createElement('a')
  a.href = url
  a.download = filename
  document.body.appendChild(a)
  try {
    a.click()
  } finally {
    document.body.removeChild(a)
    window.URL.revokeObjectURL(url)
  }
}

export function downloadEvents(events: TimelineEvent[], format: ExportFormat) {
  downloadText(serializeEvents(events, format), exportFileName(format), MIME_TYPES[format])
}
