/**
 * Hebrew calendar engine.
 *
 * Months are numbered from the civil new year so that they stay contiguous:
 *
 *   common year: 1 Tishrei … 5 Shevat, 6 Adar,                 7 Nisan … 12 Elul
 *   leap year:   1 Tishrei … 5 Shevat, 6 Adar I, 7 Adar II,    8 Nisan … 13 Elul
 *
 * Year starts are derived from the molad of Tishrei with the four postponement
 * rules. Heshvan and Kislev are the only months whose length depends on the
 * year (deficient 353/383, regular 354/384, complete 355/385 days).
 */

import { type CalendarEngine, validateAbsoluteDay, validateDate, validateMonth, validateYear } from './calendar-engine'
import { type CacheStats, createYearCache } from './internal/year-cache'
import { type AbsoluteDay, type YearMonthDay, CalendarKind, asAbsoluteDay } from './types'

/** 1 Tishrei AM 1. */
export const HEBREW_EPOCH = asAbsoluteDay(347998)

const MIN_YEAR = 1
const MAX_YEAR = 999_999

export const DEFAULT_HEBREW_CACHE_SIZE = 512

const span = { kind: CalendarKind.Hebrew, minYear: MIN_YEAR, maxYear: MAX_YEAR }

// Mean year length is 35975351/98496 days (235 lunations of 29d 12h 793p per 19 years).
const MEAN_YEAR_NUMERATOR = 98496
const MEAN_YEAR_DENOMINATOR = 35975351

const PARTS_PER_DAY = 25920
const PARTS_PER_MONTH = 13753
const MOLAD_OF_CREATION_PARTS = 12084

const HESHVAN = 2
const KISLEV = 3

// ============================================================================
// Year Arithmetic
// ============================================================================

function leap(year: number): boolean {
  return (7 * year + 1) % 19 < 7
}

function monthsIn(year: number): number {
  return leap(year) ? 13 : 12
}

/** Days from the epoch's eve to the molad-based new year, with the lo ADU rosh delay. */
function elapsedDays(year: number): number {
  const monthsElapsed = Math.floor((235 * year - 234) / 19)
  const partsElapsed = MOLAD_OF_CREATION_PARTS + PARTS_PER_MONTH * monthsElapsed
  const days = 29 * monthsElapsed + Math.floor(partsElapsed / PARTS_PER_DAY)
  return (3 * (days + 1)) % 7 < 3 ? days + 1 : days
}

/** Delay keeping every year length within 353–355 or 383–385 days. */
function yearLengthCorrection(year: number): number {
  const before = elapsedDays(year - 1)
  const start = elapsedDays(year)
  const after = elapsedDays(year + 1)
  if (after - start === 356) return 2
  if (start - before === 382) return 1
  return 0
}

function newYearDay(year: number): number {
  return HEBREW_EPOCH + elapsedDays(year) + yearLengthCorrection(year)
}

type HebrewYear = {
  readonly newYear: number
  readonly length: number
}

function computeYear(year: number): HebrewYear {
  const newYear = newYearDay(year)
  return { newYear, length: newYearDay(year + 1) - newYear }
}

function monthLength(year: number, info: HebrewYear, month: number): number {
  if (month === HESHVAN) return info.length % 10 === 5 ? 30 : 29
  if (month === KISLEV) return info.length % 10 === 3 ? 29 : 30
  if (month < 6) return month % 2 === 1 ? 30 : 29
  // From Adar (I) on months alternate: 30-day months are even in a leap year, odd otherwise.
  const long = leap(year) ? month % 2 === 0 : month % 2 === 1
  return long ? 30 : 29
}

// ============================================================================
// Engine
// ============================================================================

export type HebrewEngineOptions = {
  /** Number of years whose start and length are memoized. 0 disables the cache. */
  cacheSize?: number
}

export type HebrewEngine = CalendarEngine & {
  cacheStats(): CacheStats
}

export function createHebrewEngine(options: HebrewEngineOptions = {}): HebrewEngine {
  const cache = createYearCache<HebrewYear>(options.cacheSize ?? DEFAULT_HEBREW_CACHE_SIZE)

  function yearInfo(year: number): HebrewYear {
    return cache.get(year, computeYear)
  }

  function daysInMonth(year: number, month: number): number {
    validateYear(span, year)
    validateMonth(span, year, month, monthsIn(year))
    return monthLength(year, yearInfo(year), month)
  }

  function toAbsoluteDay(year: number, month: number, day: number): AbsoluteDay {
    validateDate(engine, year, month, day)
    const info = yearInfo(year)
    let start = info.newYear
    for (let m = 1; m < month; m++) start += monthLength(year, info, m)
    return asAbsoluteDay(start + day - 1)
  }

  function fromAbsoluteDay(day: AbsoluteDay): YearMonthDay {
    validateAbsoluteDay(engine, day)

    // The mean-length estimate is within one year of the answer either way.
    const estimate = Math.floor(((day - HEBREW_EPOCH) * MEAN_YEAR_NUMERATOR) / MEAN_YEAR_DENOMINATOR) + 1
    let year = Math.max(MIN_YEAR, estimate - 1)
    while (year < MAX_YEAR && yearInfo(year + 1).newYear <= day) year++

    const info = yearInfo(year)
    let month = 1
    let start = info.newYear
    let length = monthLength(year, info, month)
    while (start + length <= day) {
      start += length
      month++
      length = monthLength(year, info, month)
    }
    return { year, month, day: day - start + 1 }
  }

  const engine: HebrewEngine = Object.freeze({
    ...span,
    minDay: HEBREW_EPOCH,
    maxDay: asAbsoluteDay(newYearDay(MAX_YEAR + 1) - 1),

    isLeapYear(year: number): boolean {
      validateYear(span, year)
      return leap(year)
    },

    monthsPerYear(year: number): number {
      validateYear(span, year)
      return monthsIn(year)
    },

    daysInYear(year: number): number {
      validateYear(span, year)
      return yearInfo(year).length
    },

    daysInMonth,
    toAbsoluteDay,
    fromAbsoluteDay,

    cacheStats: () => cache.stats(),
  })

  return engine
}
