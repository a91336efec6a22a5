/**
 * Calendar Engine contract
 *
 * Every supported calendar is a set of pure functions converting its
 * (year, month, day) triples to and from the shared AbsoluteDay count.
 * Engines signal bad input by throwing; they never catch or clamp.
 */

import { InvalidDateError, OutOfRangeError } from './errors'
import type { AbsoluteDay, CalendarKind, YearMonthDay } from './types'

export interface CalendarEngine {
  readonly kind: CalendarKind
  /** First and last supported year, inclusive. */
  readonly minYear: number
  readonly maxYear: number
  /** First and last supported AbsoluteDay, inclusive. */
  readonly minDay: AbsoluteDay
  readonly maxDay: AbsoluteDay

  isLeapYear(year: number): boolean
  monthsPerYear(year: number): number
  daysInMonth(year: number, month: number): number
  daysInYear(year: number): number
  toAbsoluteDay(year: number, month: number, day: number): AbsoluteDay
  fromAbsoluteDay(day: AbsoluteDay): YearMonthDay
}

// ============================================================================
// Shared Validation
// ============================================================================

type YearSpan = {
  readonly kind: CalendarKind
  readonly minYear: number
  readonly maxYear: number
}

export function validateYear(span: YearSpan, year: number): void {
  if (!Number.isInteger(year)) {
    throw new InvalidDateError(`Year must be an integer, got ${year}`, 'year')
  }
  if (year < span.minYear || year > span.maxYear) {
    throw new OutOfRangeError(
      `Year ${year} is outside the ${span.kind} range ${span.minYear}..${span.maxYear}`,
      'year'
    )
  }
}

export function validateMonth(span: YearSpan, year: number, month: number, monthsInYear: number): void {
  if (!Number.isInteger(month) || month < 1 || month > monthsInYear) {
    throw new InvalidDateError(
      `Month ${month} does not exist in ${span.kind} year ${year} (1..${monthsInYear})`,
      'month'
    )
  }
}

/**
 * Full triple check, in field order, so the reported field is the first bad one.
 */
export function validateDate(engine: CalendarEngine, year: number, month: number, day: number): void {
  validateYear(engine, year)
  validateMonth(engine, year, month, engine.monthsPerYear(year))
  const length = engine.daysInMonth(year, month)
  if (!Number.isInteger(day) || day < 1 || day > length) {
    throw new InvalidDateError(
      `Day ${day} does not exist in ${engine.kind} ${year}-${month} (1..${length})`,
      'day'
    )
  }
}

export function validateAbsoluteDay(engine: CalendarEngine, day: number): void {
  if (!Number.isInteger(day) || day < engine.minDay || day > engine.maxDay) {
    throw new OutOfRangeError(
      `Absolute day ${day} is outside the ${engine.kind} range ${engine.minDay}..${engine.maxDay}`,
      'absoluteDay'
    )
  }
}
