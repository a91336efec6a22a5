/**
 * Gregorian calendar engine (proleptic, astronomical year numbering).
 *
 * Year 0 is 1 BCE and there is no Julian cutover: every date, however early,
 * follows the 400-year rule. Day numbers come from the closed-form
 * Julian Day Number formulas, so conversion is O(1) at any year.
 */

import { type CalendarEngine, validateAbsoluteDay, validateDate, validateMonth, validateYear } from './calendar-engine'
import { type AbsoluteDay, type YearMonthDay, CalendarKind, asAbsoluteDay } from './types'

const MIN_YEAR = -999_999
const MAX_YEAR = 999_999

const span = { kind: CalendarKind.Gregorian, minYear: MIN_YEAR, maxYear: MAX_YEAR }

// ============================================================================
// Helpers
// ============================================================================

/** Month lengths shared by the Gregorian and Julian calendars. */
export function solarMonthLength(month: number, isLeap: boolean): number {
  if (month === 2) return isLeap ? 29 : 28
  if (month === 4 || month === 6 || month === 9 || month === 11) return 30
  return 31
}

function leap(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function daysInMonth(year: number, month: number): number {
  validateYear(span, year)
  validateMonth(span, year, month, 12)
  return solarMonthLength(month, leap(year))
}

// ============================================================================
// Julian Day Number
// ============================================================================

// Years are counted from March so the leap day falls at the end of the shifted year.
function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): YearMonthDay {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor((146097 * b) / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Engine
// ============================================================================

export const gregorianEngine: CalendarEngine = Object.freeze({
  ...span,
  minDay: asAbsoluteDay(dateToJDN(MIN_YEAR, 1, 1)),
  maxDay: asAbsoluteDay(dateToJDN(MAX_YEAR, 12, 31)),

  daysInMonth,

  isLeapYear(year: number): boolean {
    validateYear(span, year)
    return leap(year)
  },

  monthsPerYear(year: number): number {
    validateYear(span, year)
    return 12
  },

  daysInYear(year: number): number {
    validateYear(span, year)
    return leap(year) ? 366 : 365
  },

  toAbsoluteDay(year: number, month: number, day: number): AbsoluteDay {
    validateDate(gregorianEngine, year, month, day)
    return asAbsoluteDay(dateToJDN(year, month, day))
  },

  fromAbsoluteDay(day: AbsoluteDay): YearMonthDay {
    validateAbsoluteDay(gregorianEngine, day)
    return jdnToDate(day)
  },
})
