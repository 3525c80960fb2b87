/**
 * Calendar generators.
 *
 * fast-check arbitraries for Gregorian dates and points on each calendar cycle.
 */
import * as fc from 'fast-check'
import type { Arbitrary } from 'fast-check'
import { fromOrdinal, toOrdinal, makeDate, type LocalDate } from '../../../src/time-date'
import { getTable } from '../../../src/calendar-system'
import type { CalendarDate, CalendarSystem, Direction } from '../../../src/types'

// ============================================================================
// Gregorian Dates
// ============================================================================

/**
 * LocalDate between `min` and `max` years inclusive. The default range keeps
 * a few centuries of room so ±cycle searches never leave years 1-9999.
 */
export function localDateGen(options?: { minYear?: number; maxYear?: number }): Arbitrary<LocalDate> {
  const min = toOrdinal(makeDate(options?.minYear ?? 1000, 1, 1))
  const max = toOrdinal(makeDate(options?.maxYear ?? 3000, 12, 31))
  return fc.integer({ min, max }).map(fromOrdinal)
}

export function directionGen(): Arbitrary<Direction> {
  return fc.constantFrom<Direction>('forward', 'backward')
}

// ============================================================================
// Calendar Dates
// ============================================================================

/** Table offset together with the date stored there. */
export function calendarEntryGen<D extends CalendarDate>(
  system: CalendarSystem<D>
): Arbitrary<{ offset: number; date: D }> {
  return fc.integer({ min: 0, max: system.cycleLength - 1 }).map((offset) => ({
    offset,
    date: getTable(system)[offset]!,
  }))
}

export function calendarDateGen<D extends CalendarDate>(system: CalendarSystem<D>): Arbitrary<D> {
  return calendarEntryGen(system).map((e) => e.date)
}
