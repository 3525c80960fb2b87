/**
 * Shared Types
 *
 * Calendar date values and the description of a cyclic calendar system.
 * Branded per system so a Haab' date cannot be handed to Tzolk'in code.
 */

import type { LocalDate } from './time-date'

export type { LocalDate } from './time-date'

// ============================================================================
// Calendar Dates
// ============================================================================

declare const __haabDate: unique symbol
declare const __tzolkinDate: unique symbol

/** A point on a calendar cycle: day number plus 1-based name index. */
export type CalendarDate = {
  readonly number: number
  readonly name: number
}

/** number 0-19 (0-4 in Wayebʼ), name 1-19 */
export type HaabDate = CalendarDate & { readonly [__haabDate]: true }

/** number 1-13, name 1-20 */
export type TzolkinDate = CalendarDate & { readonly [__tzolkinDate]: true }

export type CalendarKind = 'haab' | 'tzolkin'

export type Direction = 'forward' | 'backward'

// ============================================================================
// Calendar System
// ============================================================================

/**
 * Everything the generic algorithms need to know about one calendar.
 * `advance` and `diff` carry the per-system wraparound rules.
 */
export type CalendarRules<D extends CalendarDate> = {
  readonly kind: CalendarKind
  readonly cycleLength: number
  /** Date at offset 0 of the lookup table */
  readonly first: D
  /** Gregorian date on which `first` falls */
  readonly epoch: LocalDate
  readonly numbers: { readonly min: number; readonly max: number }
  /** Ordered name table, index 0 holds name number 1 */
  readonly names: readonly string[]
  /** Checks the number/name pair, throwing InvalidNumberError or InvalidNameError */
  validate(number: number, name: number): D
  advance(date: D, n: number): D
  diff(start: D, end: D): number
}

/** Offset -> date, plus the inverse keyed by `number:name` */
export type LookupTable<D extends CalendarDate> = {
  readonly entries: readonly D[]
  readonly offsets: ReadonlyMap<string, number>
}

export type CalendarSystem<D extends CalendarDate> = CalendarRules<D> & {
  /** Lookup table, built on first call and shared afterwards */
  lookup(): LookupTable<D>
}
