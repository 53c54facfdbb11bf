// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

export { EventCard } from './EventCard'
export { EventFilters, type EventFiltersState } from './EventFilters'
export { ImportExportPanel } from './ImportExportPanel'
export { colorForKey, TimelineChart } from './TimelineChart'
