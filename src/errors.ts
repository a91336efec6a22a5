/**
 * Consolidated error system for civil-calendars.
 *
 * All error classes extend CalendarError, which carries a typed error code and,
 * when a single input is at fault, the name of the offending field.
 */

// ============================================================================
// Error Codes
// ============================================================================

export const CalendarErrorCode = {
  // Calendar engines
  INVALID_DATE: 'INVALID_DATE',
  OUT_OF_RANGE: 'OUT_OF_RANGE',
  UNSUPPORTED_CALENDAR: 'UNSUPPORTED_CALENDAR',

  // Configuration & arguments
  VALIDATION: 'VALIDATION',

  // Deserialization
  PARSE_ERROR: 'PARSE_ERROR',
} as const

export type CalendarErrorCode = (typeof CalendarErrorCode)[keyof typeof CalendarErrorCode]

export type ErrorField = 'year' | 'month' | 'day' | 'calendar' | 'absoluteDay' | 'days'

// ============================================================================
// Base Class
// ============================================================================

export class CalendarError extends Error {
  readonly code: CalendarErrorCode
  readonly field: ErrorField | undefined

  constructor(code: CalendarErrorCode, message: string, field?: ErrorField) {
    super(message)
    this.name = 'CalendarError'
    this.code = code
    this.field = field
  }
}

// ============================================================================
// Engine Errors
// ============================================================================

export class InvalidDateError extends CalendarError {
  constructor(message: string, field?: ErrorField) {
    super(CalendarErrorCode.INVALID_DATE, message, field)
    this.name = 'InvalidDateError'
  }
}

export class OutOfRangeError extends CalendarError {
  constructor(message: string, field?: ErrorField) {
    super(CalendarErrorCode.OUT_OF_RANGE, message, field)
    this.name = 'OutOfRangeError'
  }
}

export class UnsupportedCalendarError extends CalendarError {
  constructor(message: string) {
    super(CalendarErrorCode.UNSUPPORTED_CALENDAR, message, 'calendar')
    this.name = 'UnsupportedCalendarError'
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

export class ValidationError extends CalendarError {
  constructor(message: string, field?: ErrorField) {
    super(CalendarErrorCode.VALIDATION, message, field)
    this.name = 'ValidationError'
  }
}

// ============================================================================
// Parse Errors
// ============================================================================

export class ParseError extends CalendarError {
  constructor(message: string, field?: ErrorField) {
    super(CalendarErrorCode.PARSE_ERROR, message, field)
    this.name = 'ParseError'
  }
}
