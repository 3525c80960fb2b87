/**
 * Cyclic Calendar Engine
 *
 * Generic algorithms over any CalendarSystem: lookup table construction,
 * Gregorian conversion, day arithmetic, day differences and recurrence search.
 * Lookup tables are built on first use and cached for the process lifetime.
 */

import type { CalendarDate, CalendarRules, CalendarSystem, Direction, LookupTable } from './types'
import { type LocalDate, addDays, toOrdinal } from './time-date'
import { floorMod, dateKey } from './internal/helpers'
import { InvalidNumberError } from './errors'

// ============================================================================
// Lookup Tables
// ============================================================================

/**
 * Every date of the cycle, offset 0 first, generated by stepping one day at a
 * time from `rules.first`. Not cached; see defineCalendarSystem.
 */
export function buildTable<D extends CalendarDate>(rules: CalendarRules<D>): readonly D[] {
  const entries: D[] = [rules.first]
  let current = rules.first
  for (let i = 1; i < rules.cycleLength; i++) {
    current = rules.advance(current, 1)
    entries.push(current)
  }
  return Object.freeze(entries)
}

/**
 * Attach a lazily built lookup table to a set of calendar rules.
 */
export function defineCalendarSystem<D extends CalendarDate>(rules: CalendarRules<D>): CalendarSystem<D> {
  let table: LookupTable<D> | null = null
  return Object.freeze({
    ...rules,
    lookup(): LookupTable<D> {
      if (table === null) {
        const entries = buildTable(rules)
        const offsets = new Map<string, number>()
        entries.forEach((d, i) => offsets.set(dateKey(d.number, d.name), i))
        table = { entries, offsets }
      }
      return table
    },
  })
}

export function getTable<D extends CalendarDate>(system: CalendarSystem<D>): readonly D[] {
  return system.lookup().entries
}

/** Position of `date` in the lookup table, 0 to cycleLength - 1. */
export function offsetOf<D extends CalendarDate>(system: CalendarSystem<D>, date: D): number {
  const offset = system.lookup().offsets.get(dateKey(date.number, date.name))
  if (offset === undefined) {
    throw new InvalidNumberError(`${date.number}/${date.name} is not a ${system.kind} date`)
  }
  return offset
}

export function dateAtOffset<D extends CalendarDate>(system: CalendarSystem<D>, offset: number): D {
  return getTable(system)[floorMod(offset, system.cycleLength)]!
}

/** Day of the calendar year: 1 for the first table entry, cycleLength for the last. */
export function yearDay<D extends CalendarDate>(system: CalendarSystem<D>, date: D): number {
  return offsetOf(system, date) + 1
}

// ============================================================================
// Conversion
// ============================================================================

function gregorianOffset<D extends CalendarDate>(system: CalendarSystem<D>, date: LocalDate): number {
  return floorMod(toOrdinal(date) - toOrdinal(system.epoch), system.cycleLength)
}

export function gregorianToCalendar<D extends CalendarDate>(system: CalendarSystem<D>, date: LocalDate): D {
  return dateAtOffset(system, gregorianOffset(system, date))
}

// ============================================================================
// Arithmetic
// ============================================================================

export function addCalendarDays<D extends CalendarDate>(system: CalendarSystem<D>, date: D, n: number): D {
  if (!Number.isInteger(n)) throw new InvalidNumberError(`Day count must be an integer, got ${n}`)
  return system.advance(date, n)
}

/**
 * Days to travel forward from `start` to reach `end`, in [0, cycleLength).
 * Never negative: an `end` earlier in the cycle wraps through the full cycle.
 */
export function dayDiff<D extends CalendarDate>(system: CalendarSystem<D>, start: D, end: D): number {
  return system.diff(start, end)
}

export function sameDate(a: CalendarDate, b: CalendarDate): boolean {
  return a.number === b.number && a.name === b.name
}

// ============================================================================
// Search
// ============================================================================

/**
 * Nearest Gregorian date on or after (forward) / on or before (backward)
 * `start` that falls on `target`.
 */
export function searchDate<D extends CalendarDate>(
  system: CalendarSystem<D>,
  target: D,
  start: LocalDate,
  direction: Direction
): LocalDate {
  const targetOffset = offsetOf(system, target)
  const startOffset = gregorianOffset(system, start)
  const delta =
    direction === 'forward'
      ? floorMod(targetOffset - startOffset, system.cycleLength)
      : -floorMod(startOffset - targetOffset, system.cycleLength)
  return addDays(start, delta)
}

/**
 * Lazy sequence of the next `count` matching dates in `direction`.
 * Every iteration starts over from `start`.
 */
export function occurrences<D extends CalendarDate>(
  system: CalendarSystem<D>,
  target: D,
  start: LocalDate,
  count: number,
  direction: Direction
): Iterable<LocalDate> {
  const step = direction === 'forward' ? system.cycleLength : -system.cycleLength
  return {
    *[Symbol.iterator]() {
      if (count < 1) return
      const first = searchDate(system, target, start, direction)
      for (let i = 0; i < count; i++) {
        yield addDays(first, i * step)
      }
    },
  }
}

export function searchDates<D extends CalendarDate>(
  system: CalendarSystem<D>,
  target: D,
  start: LocalDate,
  count: number,
  direction: Direction
): LocalDate[] {
  return Array.from(occurrences(system, target, start, count, direction))
}
