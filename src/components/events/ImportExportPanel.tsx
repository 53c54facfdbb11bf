// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

import { Download, Upload } from 'lucide-react'
import { useState } from 'react'
import { toast } from 'sonner'
import { Button } from '@/components/ui/Button'
import { Select } from '@/components/ui/Select'
import { downloadEvents, type ExportFormat } from '@/lib/download'
import type { ImportMode, TimelineEvent } from '@/types'
import { IMPORT_MODE_LABELS } from '@/types'

interface ImportExportPanelProps {
  events: TimelineEvent[]
  onImport: (file: File, mode: ImportMode) => Promise<boolean>
}

const IMPORT_MODES: ImportMode[] = ['replace', 'merge']

const IMPORT_MODE_OPTIONS = IMPORT_MODES.map((value) => ({ value, label: IMPORT_MODE_LABELS[value] }))

export function ImportExportPanel({ events, onImport }: ImportExportPanelProps) {
  const [mode, setMode] = useState<ImportMode>('replace')
  const [isImporting, setIsImporting] = useState(false)

  const handleExport = (format: ExportFormat) => {
    try {
      downloadEvents(events, format)
    } catch (e) {
      console.error(`[Timeline] Failed to export ${format}:`, e)
      toast.error(`Failed to export ${format.toUpperCase()}`)
    }
  }

  const handleFileUpload = async (e: React.ChangeEvent<HTMLInputElement>) => {
    const file = e.target.files?.[0]
    if (!file) return

    setIsImporting(true)
    try {
      await onImport(file, mode)
    } finally {
      setIsImporting(false)
      // Reset file input so the same file can be loaded again
      e.target.value = ''
    }
  }

  return (
    <div className="flex flex-wrap items-center gap-3">
      <Button variant="secondary" size="sm" onClick={() => handleExport('json')}>
        <Download className="h-4 w-4 mr-2" />
        JSON
      </Button>
      <Button variant="secondary" size="sm" onClick={() => handleExport('csv')}>
        <Download className="h-4 w-4 mr-2" />
        CSV
      </Button>

      <span className="hidden sm:inline text-gray-300">|</span>

      <div className="w-56">
        <Select
          aria-label="Import mode"
          value={mode}
          onChange={(e) => setMode(e.target.value === 'merge' ? 'merge' : 'replace')}
          options={IMPORT_MODE_OPTIONS}
          disabled={isImporting}
        />
      </div>
      <label
        htmlFor="timeline-upload"
        className="inline-flex items-center px-3 py-1.5 text-sm font-medium rounded-md border border-gray-300 bg-white text-gray-700 hover:bg-gray-50 cursor-pointer"
      >
        <Upload className="h-4 w-4 mr-2" />
        {isImporting ? 'Loading...' : 'Load JSON / CSV'}
        <input
          id="timeline-upload"
          type="file"
          accept=".json,.csv,application/json,text/csv"
          onChange={handleFileUpload}
          className="hidden"
          disabled={isImporting}
        />
      </label>
    </div>
  )
}
