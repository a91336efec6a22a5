/**
 * French Republican calendar engine.
 *
 * Year I began on 1 Vendémiaire = 22 September 1792 (Gregorian). Months 1–12
 * have 30 days; month 13 holds the complementary days (sansculottides),
 * 5 of them, 6 in a leap year.
 *
 * Leap years follow Romme's arithmetic rule on the Republican year number:
 * divisible by 4, except centuries not divisible by 400. While the calendar was
 * in force (years I–XIV) leap years were set by the autumn equinox instead
 * (III, VII, XI were sextile, against IV, VIII, XII here), so around those
 * year ends the result can differ from period documents by one day.
 */

import { type CalendarEngine, validateAbsoluteDay, validateDate, validateMonth, validateYear } from './calendar-engine'
import { type AbsoluteDay, type YearMonthDay, CalendarKind, asAbsoluteDay } from './types'

/** 1 Vendémiaire an I. */
export const FRENCH_REPUBLICAN_EPOCH = asAbsoluteDay(2375840)

const MIN_YEAR = 1
const MAX_YEAR = 999_999

const COMPLEMENTARY_MONTH = 13

const span = { kind: CalendarKind.FrenchRepublican, minYear: MIN_YEAR, maxYear: MAX_YEAR }

// Day counts of the 400, 100 and 4 year cycles under the Romme rule.
const DAYS_PER_400_YEARS = 146097
const DAYS_PER_100_YEARS = 36524
const DAYS_PER_4_YEARS = 1461

function leap(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function monthLength(year: number, month: number): number {
  if (month < COMPLEMENTARY_MONTH) return 30
  return leap(year) ? 6 : 5
}

function daysBeforeYear(year: number): number {
  const p = year - 1
  return 365 * p + Math.floor(p / 4) - Math.floor(p / 100) + Math.floor(p / 400)
}

function toDayNumber(year: number, month: number, day: number): number {
  return FRENCH_REPUBLICAN_EPOCH + daysBeforeYear(year) + 30 * (month - 1) + day - 1
}

function fromDayNumber(jdn: number): YearMonthDay {
  const elapsed = jdn - FRENCH_REPUBLICAN_EPOCH
  const n400 = Math.floor(elapsed / DAYS_PER_400_YEARS)
  const d1 = elapsed - n400 * DAYS_PER_400_YEARS
  const n100 = Math.floor(d1 / DAYS_PER_100_YEARS)
  const d2 = d1 - n100 * DAYS_PER_100_YEARS
  const n4 = Math.floor(d2 / DAYS_PER_4_YEARS)
  const d3 = d2 - n4 * DAYS_PER_4_YEARS
  const n1 = Math.floor(d3 / 365)
  let year = 400 * n400 + 100 * n100 + 4 * n4 + n1
  // n100 or n1 reaching 4 means the last day of a leap year.
  if (n100 !== 4 && n1 !== 4) year += 1

  const dayOfYear = elapsed - daysBeforeYear(year)
  return {
    year,
    month: Math.floor(dayOfYear / 30) + 1,
    day: (dayOfYear % 30) + 1,
  }
}

export const frenchRepublicanEngine: CalendarEngine = Object.freeze({
  ...span,
  minDay: FRENCH_REPUBLICAN_EPOCH,
  maxDay: asAbsoluteDay(toDayNumber(MAX_YEAR, COMPLEMENTARY_MONTH, monthLength(MAX_YEAR, COMPLEMENTARY_MONTH))),

  isLeapYear(year: number): boolean {
    validateYear(span, year)
    return leap(year)
  },

  monthsPerYear(year: number): number {
    validateYear(span, year)
    return COMPLEMENTARY_MONTH
  },

  daysInMonth(year: number, month: number): number {
    validateYear(span, year)
    validateMonth(span, year, month, COMPLEMENTARY_MONTH)
    return monthLength(year, month)
  },

  daysInYear(year: number): number {
    validateYear(span, year)
    return leap(year) ? 366 : 365
  },

  toAbsoluteDay(year: number, month: number, day: number): AbsoluteDay {
    validateDate(frenchRepublicanEngine, year, month, day)
    return asAbsoluteDay(toDayNumber(year, month, day))
  },

  fromAbsoluteDay(day: AbsoluteDay): YearMonthDay {
    validateAbsoluteDay(frenchRepublicanEngine, day)
    return fromDayNumber(day)
  },
})
