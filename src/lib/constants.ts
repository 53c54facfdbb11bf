// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import type { TimelineEvent } from '@/types'

export const APP_NAME = 'Timeline Creator'
export const APP_VERSION = '1.0.0'

export const EXPORT_BASENAME = 'timeline_data'

// Joins characters/categories in a CSV cell
export const LIST_DELIMITER = ';'

// Column order for both file formats
export const EVENT_KEYS = [
  'id',
  'title',
  'date_text',
  'start_date',
  'end_date',
  'era',
  'story',
  'characters',
  'categories',
  'notes',
  'sort_index',
] as const satisfies ReadonlyArray<keyof TimelineEvent>

export const UNASSIGNED_LANE = 'Unassigned'
export const UNCATEGORIZED = 'Uncategorized'
