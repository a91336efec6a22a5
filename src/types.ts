/**
 * Shared Types
 *
 * Calendar tags, the canonical day count, and the plain shapes passed between
 * engines, the converter and CivilDate.
 */

// ============================================================================
// Calendar Kinds
// ============================================================================

export const CalendarKind = {
  Gregorian: 'gregorian',
  Julian: 'julian',
  FrenchRepublican: 'french',
  Hebrew: 'hebrew',
} as const

export type CalendarKind = (typeof CalendarKind)[keyof typeof CalendarKind]

export const CALENDAR_KINDS: readonly CalendarKind[] = Object.freeze(Object.values(CalendarKind))

export function isCalendarKind(value: unknown): value is CalendarKind {
  return CALENDAR_KINDS.some((kind) => kind === value)
}

// ============================================================================
// Branded Types
// ============================================================================

declare const __absoluteDay: unique symbol

/**
 * Julian Day Number: day 0 is 1 January 4713 BCE (proleptic Julian).
 * Gregorian 0001-01-01 is day 1721426.
 */
export type AbsoluteDay = number & { readonly [__absoluteDay]: true }

export function asAbsoluteDay(n: number): AbsoluteDay {
  return n as AbsoluteDay
}

// ============================================================================
// Plain Shapes
// ============================================================================

export type YearMonthDay = {
  readonly year: number
  readonly month: number
  readonly day: number
}

/** Serialized form of a CivilDate. */
export type CivilDateFields = YearMonthDay & {
  readonly calendar: CalendarKind
}

export type Comparison = 'before' | 'same' | 'after'

export type Weekday = 'mon' | 'tue' | 'wed' | 'thu' | 'fri' | 'sat' | 'sun'
