/**
 * Calendar Converter
 *
 * Owns the dispatch table from CalendarKind to engine and converts plain
 * { year, month, day, calendar } records between calendars. CivilDate goes
 * through `defaultConverter`; callers that convert many raw records (imports,
 * migrations) can create their own with a differently sized Hebrew cache.
 */

import type { CalendarEngine } from './calendar-engine'
import { UnsupportedCalendarError, ValidationError } from './errors'
import { frenchRepublicanEngine } from './french-republican'
import { gregorianEngine } from './gregorian'
import { DEFAULT_HEBREW_CACHE_SIZE, createHebrewEngine } from './hebrew'
import type { CacheStats } from './internal/year-cache'
import { julianEngine } from './julian'
import { type AbsoluteDay, type CivilDateFields, CalendarKind, isCalendarKind } from './types'

// ============================================================================
// Types
// ============================================================================

export type CalendarConverterConfig = {
  /** Hebrew years kept in the year-start cache (default 512, 0 disables). */
  hebrewCacheSize?: number
}

export type CalendarConverter = {
  engine(kind: CalendarKind): CalendarEngine
  toAbsoluteDay(fields: CivilDateFields): AbsoluteDay
  fromAbsoluteDay(day: AbsoluteDay, kind: CalendarKind): CivilDateFields
  convert(fields: CivilDateFields, target: CalendarKind): CivilDateFields
  getCacheStats(): CacheStats
}

// ============================================================================
// Factory
// ============================================================================

export function createCalendarConverter(config: CalendarConverterConfig = {}): CalendarConverter {
  const hebrewCacheSize = config.hebrewCacheSize ?? DEFAULT_HEBREW_CACHE_SIZE
  if (!Number.isInteger(hebrewCacheSize) || hebrewCacheSize < 0) {
    throw new ValidationError(`hebrewCacheSize must be a non-negative integer, got ${hebrewCacheSize}`)
  }

  const hebrew = createHebrewEngine({ cacheSize: hebrewCacheSize })

  const engines: Readonly<Record<CalendarKind, CalendarEngine>> = Object.freeze({
    [CalendarKind.Gregorian]: gregorianEngine,
    [CalendarKind.Julian]: julianEngine,
    [CalendarKind.FrenchRepublican]: frenchRepublicanEngine,
    [CalendarKind.Hebrew]: hebrew,
  })

  // Checked at runtime: tags may come from untyped input.
  function engine(kind: CalendarKind): CalendarEngine {
    if (!isCalendarKind(kind)) {
      throw new UnsupportedCalendarError(`Unsupported calendar: '${String(kind)}'`)
    }
    return engines[kind]
  }

  function toAbsoluteDay(fields: CivilDateFields): AbsoluteDay {
    return engine(fields.calendar).toAbsoluteDay(fields.year, fields.month, fields.day)
  }

  function fromAbsoluteDay(day: AbsoluteDay, kind: CalendarKind): CivilDateFields {
    const { year, month, day: dayOfMonth } = engine(kind).fromAbsoluteDay(day)
    return { year, month, day: dayOfMonth, calendar: kind }
  }

  return Object.freeze({
    engine,
    toAbsoluteDay,
    fromAbsoluteDay,
    convert(fields: CivilDateFields, target: CalendarKind): CivilDateFields {
      // An unknown target fails before the source date is read.
      engine(target)
      return fromAbsoluteDay(toAbsoluteDay(fields), target)
    },
    getCacheStats: () => hebrew.cacheStats(),
  })
}

export const defaultConverter: CalendarConverter = createCalendarConverter()
