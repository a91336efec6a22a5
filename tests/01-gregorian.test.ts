/**
 * Segment 01: Gregorian Engine Tests
 *
 * Leap rule, month lengths, closed-form day numbers and range limits of the
 * proleptic Gregorian calendar.
 */

import { describe, it, expect } from 'vitest'
import { gregorianEngine } from '../src/gregorian'
import { InvalidDateError, OutOfRangeError } from '../src/errors'
import { asAbsoluteDay } from '../src/types'
import { catchError } from './helpers/catch-error'

// ============================================================================
// 1. LEAP YEARS
// ============================================================================

describe('Gregorian leap years', () => {
  it.each([
    [2024, true],
    [2023, false],
    [2000, true],
    [1900, false],
    [1600, true],
    [0, true],
    [-4, true],
    [-100, false],
    [-400, true],
  ])('isLeapYear(%i) is %s', (year, expected) => {
    expect(gregorianEngine.isLeapYear(year)).toBe(expected)
  })

  it('daysInYear follows the leap rule', () => {
    expect(gregorianEngine.daysInYear(2000)).toBe(366)
    expect(gregorianEngine.daysInYear(1900)).toBe(365)
  })
})

// ============================================================================
// 2. MONTH STRUCTURE
// ============================================================================

describe('Gregorian months', () => {
  it('always has 12 months', () => {
    expect(gregorianEngine.monthsPerYear(2024)).toBe(12)
    expect(gregorianEngine.monthsPerYear(-500)).toBe(12)
  })

  it('February has 29 days in a leap year', () => {
    expect(gregorianEngine.daysInMonth(2024, 2)).toBe(29)
  })

  it('February has 28 days in a common year', () => {
    expect(gregorianEngine.daysInMonth(2023, 2)).toBe(28)
    expect(gregorianEngine.daysInMonth(1900, 2)).toBe(28)
  })

  it('30- and 31-day months', () => {
    expect(gregorianEngine.daysInMonth(2024, 1)).toBe(31)
    expect(gregorianEngine.daysInMonth(2024, 4)).toBe(30)
    expect(gregorianEngine.daysInMonth(2024, 9)).toBe(30)
    expect(gregorianEngine.daysInMonth(2024, 12)).toBe(31)
  })

  it('rejects month 13 and month 0', () => {
    expect(() => gregorianEngine.daysInMonth(2024, 13)).toThrow(InvalidDateError)
    expect(() => gregorianEngine.daysInMonth(2024, 0)).toThrow(InvalidDateError)
  })
})

// ============================================================================
// 3. DAY NUMBERS
// ============================================================================

describe('Gregorian day numbers', () => {
  it.each([
    [2000, 1, 1, 2451545],
    [1970, 1, 1, 2440588],
    [1, 1, 1, 1721426],
    [1792, 9, 22, 2375840],
    [-4713, 11, 24, 0],
  ])('%i-%i-%i is day %i', (year, month, day, expected) => {
    expect(gregorianEngine.toAbsoluteDay(year, month, day)).toBe(expected)
  })

  it('fromAbsoluteDay inverts known days', () => {
    expect(gregorianEngine.fromAbsoluteDay(asAbsoluteDay(2451545))).toEqual({ year: 2000, month: 1, day: 1 })
    expect(gregorianEngine.fromAbsoluteDay(asAbsoluteDay(0))).toEqual({ year: -4713, month: 11, day: 24 })
  })

  it('consecutive days across a year boundary differ by one', () => {
    const dec31 = gregorianEngine.toAbsoluteDay(1999, 12, 31)
    const jan1 = gregorianEngine.toAbsoluteDay(2000, 1, 1)
    expect(jan1 - dec31).toBe(1)
  })

  it('leap day sits between Feb 28 and Mar 1', () => {
    const feb28 = gregorianEngine.toAbsoluteDay(2000, 2, 28)
    expect(gregorianEngine.toAbsoluteDay(2000, 2, 29)).toBe(feb28 + 1)
    expect(gregorianEngine.toAbsoluteDay(2000, 3, 1)).toBe(feb28 + 2)
  })
})

// ============================================================================
// 4. VALIDATION
// ============================================================================

describe('Gregorian validation', () => {
  it('accepts Feb 29 2000', () => {
    expect(() => gregorianEngine.toAbsoluteDay(2000, 2, 29)).not.toThrow()
  })

  it('rejects Feb 29 1900 on the day field', () => {
    const error = catchError(() => gregorianEngine.toAbsoluteDay(1900, 2, 29))
    expect(error).toBeInstanceOf(InvalidDateError)
    expect(error).toMatchObject({ code: 'INVALID_DATE', field: 'day' })
  })

  it('rejects month 13 on the month field', () => {
    expect(() => gregorianEngine.toAbsoluteDay(2024, 13, 1)).toThrow(InvalidDateError)
    expect(() => gregorianEngine.toAbsoluteDay(2024, 13, 1)).toThrow(/Month 13/)
  })

  it('rejects day 0 and Apr 31', () => {
    expect(() => gregorianEngine.toAbsoluteDay(2024, 1, 0)).toThrow(InvalidDateError)
    expect(() => gregorianEngine.toAbsoluteDay(2024, 4, 31)).toThrow(InvalidDateError)
  })

  it('rejects fractional fields as invalid', () => {
    expect(() => gregorianEngine.toAbsoluteDay(2024.5, 1, 1)).toThrow(InvalidDateError)
    expect(() => gregorianEngine.toAbsoluteDay(2024, 1, 1.5)).toThrow(InvalidDateError)
  })

  it('rejects years outside ±999999 as out of range', () => {
    expect(catchError(() => gregorianEngine.toAbsoluteDay(1_000_000, 1, 1))).toMatchObject({
      code: 'OUT_OF_RANGE',
      field: 'year',
    })
    expect(() => gregorianEngine.toAbsoluteDay(-1_000_000, 1, 1)).toThrow(OutOfRangeError)
  })

  it('supported day range spans the supported years', () => {
    expect(gregorianEngine.minDay).toBe(-363521074)
    expect(gregorianEngine.maxDay).toBe(366963559)
    expect(gregorianEngine.fromAbsoluteDay(gregorianEngine.maxDay)).toEqual({ year: 999999, month: 12, day: 31 })
  })

  it('fromAbsoluteDay rejects days past the range and fractional days', () => {
    expect(() => gregorianEngine.fromAbsoluteDay(asAbsoluteDay(366963560))).toThrow(OutOfRangeError)
    expect(() => gregorianEngine.fromAbsoluteDay(asAbsoluteDay(1.5))).toThrow(OutOfRangeError)
  })
})
