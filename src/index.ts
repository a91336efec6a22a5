/**
 * civil-calendars
 *
 * Public API exports
 */

// Error system
export {
  CalendarError, CalendarErrorCode,
  InvalidDateError, OutOfRangeError, UnsupportedCalendarError,
  ValidationError, ParseError,
} from './errors'
export type { ErrorField } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err } from './result'

// Calendar tags & shared shapes
export type { AbsoluteDay, YearMonthDay, CivilDateFields, Comparison, Weekday } from './types'
export { CalendarKind, CALENDAR_KINDS, isCalendarKind, asAbsoluteDay } from './types'

// Calendar engines
export type { CalendarEngine } from './calendar-engine'
export { gregorianEngine } from './gregorian'
export { julianEngine } from './julian'
export { frenchRepublicanEngine, FRENCH_REPUBLICAN_EPOCH } from './french-republican'
export type { HebrewEngine, HebrewEngineOptions } from './hebrew'
export { createHebrewEngine, HEBREW_EPOCH, DEFAULT_HEBREW_CACHE_SIZE } from './hebrew'
export type { CacheStats } from './internal/year-cache'

// Converter
export type { CalendarConverter, CalendarConverterConfig } from './converter'
export { createCalendarConverter, defaultConverter } from './converter'

// Date value
export { CivilDate } from './civil-date'
