// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only
import { type ClassValue, clsx } from 'clsx'
import { twMerge } from 'tailwind-merge'

export function cn(...inputs: ClassValue[]) {
  return twMerge(clsx(inputs))
}

/**
 * Normalize a list field. Arrays keep their entries (trimmed, blanks dropped);
 * delimited text is split and de-duplicated case-insensitively, first spelling wins.
 */
export function ensureList(value: string | string[] | null | undefined, delimiter = ','): string[] {
  if (value == null) return []
  if (Array.isArray(value)) {
    return value.map((entry) => entry.trim()).filter(Boolean)
  }

  const seen = new Set<string>()
  const out: string[] = []
  for (const part of value.split(delimiter)) {
    const entry = part.trim()
    if (!entry || seen.has(entry.toLowerCase())) continue
    seen.add(entry.toLowerCase())
    out.push(entry)
  }
  return out
}

export function blankToUndefined(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function pluralize(count: number, noun: string) {
  return `${count} ${noun}${count !== 1 ? 's' : ''}`
}
