/**
 * Property tests for comparison and day arithmetic.
 */
import { describe, it, expect } from 'vitest'
import * as fc from 'fast-check'
import { calendarKindGen, sharedCivilDateGen } from '../generators'

const MAX_OFFSET = 50_000
const offsetGen = fc.integer({ min: -MAX_OFFSET, max: MAX_OFFSET })
const movableDateGen = sharedCivilDateGen(MAX_OFFSET)

describe('compare', () => {
  it('is antisymmetric', () => {
    fc.assert(
      fc.property(sharedCivilDateGen(), sharedCivilDateGen(), (a, b) => {
        const forward = a.compare(b)
        const backward = b.compare(a)
        if (forward === 'same') expect(backward).toBe('same')
        else expect(backward).toBe(forward === 'before' ? 'after' : 'before')
      })
    )
  })

  it('is transitive', () => {
    fc.assert(
      fc.property(sharedCivilDateGen(), sharedCivilDateGen(), sharedCivilDateGen(), (a, b, c) => {
        if (a.isBefore(b) && b.isBefore(c)) expect(a.isBefore(c)).toBe(true)
      })
    )
  })

  it('agrees with daysUntil', () => {
    fc.assert(
      fc.property(sharedCivilDateGen(), sharedCivilDateGen(), (a, b) => {
        const gap = a.daysUntil(b)
        expect(a.compare(b)).toBe(gap > 0 ? 'before' : gap < 0 ? 'after' : 'same')
      })
    )
  })

  it('does not depend on the calendar a date is written in', () => {
    fc.assert(
      fc.property(sharedCivilDateGen(), sharedCivilDateGen(), calendarKindGen(), (a, b, target) => {
        expect(a.convertTo(target).compare(b)).toBe(a.compare(b))
      })
    )
  })
})

describe('addDays', () => {
  it('moves by exactly n days and keeps the calendar', () => {
    fc.assert(
      fc.property(movableDateGen, offsetGen, (date, n) => {
        const moved = date.addDays(n)
        expect(date.daysUntil(moved)).toBe(n)
        expect(moved.calendar).toBe(date.calendar)
      })
    )
  })

  it('is undone by the opposite offset', () => {
    fc.assert(
      fc.property(movableDateGen, offsetGen, (date, n) => {
        expect(date.addDays(n).addDays(-n).equals(date)).toBe(true)
      })
    )
  })

  it('preserves order', () => {
    fc.assert(
      fc.property(movableDateGen, movableDateGen, offsetGen, (a, b, n) => {
        expect(a.addDays(n).compare(b.addDays(n))).toBe(a.compare(b))
      })
    )
  })
})
