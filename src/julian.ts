/**
 * Julian calendar engine (proleptic, astronomical year numbering).
 *
 * Same month structure as the Gregorian calendar with a leap day every fourth
 * year. The drift against the Gregorian calendar is not stored anywhere; it is
 * the difference between the two day-number formulas.
 */

import { type CalendarEngine, validateAbsoluteDay, validateDate, validateMonth, validateYear } from './calendar-engine'
import { solarMonthLength } from './gregorian'
import { type AbsoluteDay, type YearMonthDay, CalendarKind, asAbsoluteDay } from './types'

const MIN_YEAR = -999_999
const MAX_YEAR = 999_999

const span = { kind: CalendarKind.Julian, minYear: MIN_YEAR, maxYear: MAX_YEAR }

function leap(year: number): boolean {
  return year % 4 === 0
}

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return day + Math.floor((153 * m + 2) / 5) + 365 * y + Math.floor(y / 4) - 32083
}

function jdnToDate(jdn: number): YearMonthDay {
  const c = jdn + 32082
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor((1461 * d) / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

export const julianEngine: CalendarEngine = Object.freeze({
  ...span,
  minDay: asAbsoluteDay(dateToJDN(MIN_YEAR, 1, 1)),
  maxDay: asAbsoluteDay(dateToJDN(MAX_YEAR, 12, 31)),

  isLeapYear(year: number): boolean {
    validateYear(span, year)
    return leap(year)
  },

  monthsPerYear(year: number): number {
    validateYear(span, year)
    return 12
  },

  daysInMonth(year: number, month: number): number {
    validateYear(span, year)
    validateMonth(span, year, month, 12)
    return solarMonthLength(month, leap(year))
  },

  daysInYear(year: number): number {
    validateYear(span, year)
    return leap(year) ? 366 : 365
  },

  toAbsoluteDay(year: number, month: number, day: number): AbsoluteDay {
    validateDate(julianEngine, year, month, day)
    return asAbsoluteDay(dateToJDN(year, month, day))
  },

  fromAbsoluteDay(day: AbsoluteDay): YearMonthDay {
    validateAbsoluteDay(julianEngine, day)
    return jdnToDate(day)
  },
})
