/**
 * CivilDate
 *
 * Immutable (year, month, day) triple tagged with its calendar. The absolute
 * day is computed once at construction; comparison and arithmetic work on it,
 * so dates from different calendars order correctly against each other.
 */

import { defaultConverter } from './converter'
import { CalendarError, ParseError, UnsupportedCalendarError, ValidationError } from './errors'
import { Err, Ok, type Result } from './result'
import {
  type AbsoluteDay,
  type CivilDateFields,
  type Comparison,
  type Weekday,
  type CalendarKind,
  asAbsoluteDay,
  isCalendarKind,
} from './types'

// JDN 0 fell on a Monday.
const WEEKDAYS: readonly Weekday[] = ['mon', 'tue', 'wed', 'thu', 'fri', 'sat', 'sun']

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
}

export class CivilDate {
  readonly year: number
  readonly month: number
  readonly day: number
  readonly calendar: CalendarKind
  readonly absoluteDay: AbsoluteDay

  private constructor(fields: CivilDateFields, absoluteDay: AbsoluteDay) {
    this.year = fields.year
    this.month = fields.month
    this.day = fields.day
    this.calendar = fields.calendar
    this.absoluteDay = absoluteDay
    Object.freeze(this)
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * @throws InvalidDateError when the month or day does not exist in that year
   * @throws OutOfRangeError when the year is outside the calendar's span
   * @throws UnsupportedCalendarError for an unknown calendar tag
   */
  static create(year: number, month: number, day: number, calendar: CalendarKind): CivilDate {
    const fields = { year, month, day, calendar }
    return new CivilDate(fields, defaultConverter.toAbsoluteDay(fields))
  }

  /** Same checks as `create`, with the failure returned instead of thrown. */
  static tryCreate(
    year: number,
    month: number,
    day: number,
    calendar: CalendarKind
  ): Result<CivilDate, CalendarError> {
    try {
      return Ok(CivilDate.create(year, month, day, calendar))
    } catch (e) {
      if (e instanceof CalendarError) return Err(e)
      throw e
    }
  }

  static fromAbsoluteDay(day: number, calendar: CalendarKind): CivilDate {
    const absoluteDay = asAbsoluteDay(day)
    return new CivilDate(defaultConverter.fromAbsoluteDay(absoluteDay, calendar), absoluteDay)
  }

  /** Rebuilds a date from its `toJSON` form, validating every field. */
  static fromJSON(value: unknown): CivilDate {
    if (typeof value !== 'object' || value === null) {
      throw new ParseError('CivilDate JSON must be an object')
    }
    const year = readNumber('year' in value ? value.year : undefined, 'year')
    const month = readNumber('month' in value ? value.month : undefined, 'month')
    const day = readNumber('day' in value ? value.day : undefined, 'day')

    const calendar = 'calendar' in value ? value.calendar : undefined
    if (typeof calendar !== 'string') {
      throw new ParseError(`Expected calendar to be a string, got ${typeof calendar}`, 'calendar')
    }
    if (!isCalendarKind(calendar)) {
      throw new UnsupportedCalendarError(`Unsupported calendar: '${calendar}'`)
    }
    return CivilDate.create(year, month, day, calendar)
  }

  // ==========================================================================
  // Conversion & Arithmetic
  // ==========================================================================

  /**
   * Re-expresses the same day in another calendar.
   * @throws OutOfRangeError when the day is outside the target calendar's range
   */
  convertTo(target: CalendarKind): CivilDate {
    if (target === this.calendar) return this
    return CivilDate.fromAbsoluteDay(this.absoluteDay, target)
  }

  addDays(n: number): CivilDate {
    if (!Number.isInteger(n)) {
      throw new ValidationError(`Day offset must be an integer, got ${n}`, 'days')
    }
    if (n === 0) return this
    return CivilDate.fromAbsoluteDay(this.absoluteDay + n, this.calendar)
  }

  /** Signed number of days from this date to `other`. */
  daysUntil(other: CivilDate): number {
    return other.absoluteDay - this.absoluteDay
  }

  // ==========================================================================
  // Comparison
  // ==========================================================================

  compare(other: CivilDate): Comparison {
    if (this.absoluteDay < other.absoluteDay) return 'before'
    if (this.absoluteDay > other.absoluteDay) return 'after'
    return 'same'
  }

  /** Same day, possibly written in different calendars. */
  isSameDay(other: CivilDate): boolean {
    return this.absoluteDay === other.absoluteDay
  }

  /** Same day written in the same calendar. */
  equals(other: CivilDate): boolean {
    return this.calendar === other.calendar && this.absoluteDay === other.absoluteDay
  }

  isBefore(other: CivilDate): boolean {
    return this.absoluteDay < other.absoluteDay
  }

  isAfter(other: CivilDate): boolean {
    return this.absoluteDay > other.absoluteDay
  }

  // ==========================================================================
  // Introspection
  // ==========================================================================

  isLeapYear(): boolean {
    return defaultConverter.engine(this.calendar).isLeapYear(this.year)
  }

  daysInMonth(): number {
    return defaultConverter.engine(this.calendar).daysInMonth(this.year, this.month)
  }

  monthsPerYear(): number {
    return defaultConverter.engine(this.calendar).monthsPerYear(this.year)
  }

  daysInYear(): number {
    return defaultConverter.engine(this.calendar).daysInYear(this.year)
  }

  dayOfWeek(): Weekday {
    const index = ((this.absoluteDay % 7) + 7) % 7
    return WEEKDAYS[index]!
  }

  // ==========================================================================
  // Serialization
  // ==========================================================================

  toJSON(): CivilDateFields {
    return { year: this.year, month: this.month, day: this.day, calendar: this.calendar }
  }

  /** `YYYY-MM-DD (calendar)`, with a leading minus for years before 0. */
  toString(): string {
    const sign = this.year < 0 ? '-' : ''
    return `${sign}${pad4(Math.abs(this.year))}-${pad2(this.month)}-${pad2(this.day)} (${this.calendar})`
  }
}

function readNumber(raw: unknown, field: 'year' | 'month' | 'day'): number {
  if (typeof raw !== 'number') {
    throw new ParseError(`Expected ${field} to be a number, got ${typeof raw}`, field)
  }
  return raw
}
