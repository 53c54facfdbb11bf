// SPDX-FileCopyrightText: 2025 Roland Knall <rknall@gmail.com>
// SPDX-License-Identifier: GPL-2.0-only

export type TimelineErrorKind = 'validation' | 'format' | 'date_parse' | 'not_found'

export class TimelineError extends Error {
  constructor(
    public kind: TimelineErrorKind,
    message: string,
  ) {
    super(message)
    this.name = 'TimelineError'
  }
}

export class ValidationError extends TimelineError {
  constructor(
    public field: string,
    message: string,
  ) {
    super('validation', message)
    this.name = 'ValidationError'
  }
}

export class FormatError extends TimelineError {
  constructor(message: string) {
    super('format', message)
    this.name = 'FormatError'
  }
}

export class DateParseError extends TimelineError {
  constructor(public input: string) {
    super('date_parse', `"${input}" is not a YYYY, YYYY-MM or YYYY-MM-DD date`)
    this.name = 'DateParseError'
  }
}

export class NotFoundError extends TimelineError {
  constructor(public id: string) {
    super('not_found', 'This event no longer exists')
    this.name = 'NotFoundError'
  }
}

export function isTimelineError(e: unknown): e is TimelineError {
  return e instanceof TimelineError
}
