/**
 * Calendar Day Objects
 *
 * Consumer-facing wrapper around a validated calendar date. Objects are
 * immutable: addDays returns a new object. Search methods default to starting
 * from today.
 */

import type { CalendarDate, CalendarSystem, HaabDate, TzolkinDate } from './types'
import { type LocalDate, parseDate, parseDateWithFormat, fromJsDate, today } from './time-date'
import {
  gregorianToCalendar, addCalendarDays, dayDiff, yearDay,
  searchDate, searchDates, sameDate,
} from './calendar-system'
import { nameOf, formatCalendarDate, calendarList } from './names'
import { unwrap } from './result'
import { HAAB, makeHaabDate } from './haab'
import { TZOLKIN, makeTzolkinDate } from './tzolkin'

// ============================================================================
// Types
// ============================================================================

export const DEFAULT_LIST_SIZE = 50

export type CalendarDay<D extends CalendarDate> = {
  readonly system: CalendarSystem<D>
  readonly date: D
  readonly number: number
  readonly name: string
  readonly nameNumber: number
  /** 1 for the first day of the cycle, cycleLength for the last */
  readonly yearDay: number
  addDays(n: number): CalendarDay<D>
  /** Days forward from this day to `other`, never negative */
  dayDiff(other: CalendarDay<D>): number
  equals(other: CalendarDay<D>): boolean
  nextDate(start?: LocalDate): LocalDate
  nextDates(start?: LocalDate, size?: number): LocalDate[]
  lastDate(start?: LocalDate): LocalDate
  lastDates(start?: LocalDate, size?: number): LocalDate[]
  toString(): string
}

export type HaabDay = CalendarDay<HaabDate>
export type TzolkinDay = CalendarDay<TzolkinDate>

/** Gregorian input accepted by the fromDate constructors */
export type GregorianInput = LocalDate | Date

// ============================================================================
// Construction
// ============================================================================

export function createCalendarDay<D extends CalendarDate>(system: CalendarSystem<D>, date: D): CalendarDay<D> {
  const day: CalendarDay<D> = {
    system,
    date,
    number: date.number,
    name: nameOf(system, date.name),
    nameNumber: date.name,
    yearDay: yearDay(system, date),

    addDays(n) {
      return createCalendarDay(system, addCalendarDays(system, date, n))
    },

    dayDiff(other) {
      return dayDiff(system, date, other.date)
    },

    equals(other) {
      return other.system === system && sameDate(date, other.date)
    },

    nextDate(start = today()) {
      return searchDate(system, date, start, 'forward')
    },

    nextDates(start = today(), size = DEFAULT_LIST_SIZE) {
      return searchDates(system, date, start, size, 'forward')
    },

    lastDate(start = today()) {
      return searchDate(system, date, start, 'backward')
    },

    lastDates(start = today(), size = DEFAULT_LIST_SIZE) {
      return searchDates(system, date, start, size, 'backward')
    },

    toString() {
      return formatCalendarDate(system, date)
    },
  }
  return Object.freeze(day)
}

function toLocalDate(input: GregorianInput): LocalDate {
  return input instanceof Date ? fromJsDate(input) : input
}

// ============================================================================
// Haabʼ
// ============================================================================

export function haab(number: number, name?: number | string): HaabDay {
  return createCalendarDay(HAAB, makeHaabDate(number, name))
}

export function haabFromDate(date: GregorianInput): HaabDay {
  return createCalendarDay(HAAB, gregorianToCalendar(HAAB, toLocalDate(date)))
}

/** `format` uses date-fns tokens, e.g. `dd.MM.yyyy` */
export function haabFromDateString(str: string, format: string): HaabDay {
  return haabFromDate(unwrap(parseDateWithFormat(str, format)))
}

export function haabFromIsoFormat(str: string): HaabDay {
  return haabFromDate(unwrap(parseDate(str)))
}

export function haabToday(clock?: () => Date): HaabDay {
  return haabFromDate(today(clock))
}

/** `["0 Pop", "1 Pop", ..., "4 Wayebʼ"]` */
export function haabCalendar(): string[] {
  return calendarList(HAAB)
}

// ============================================================================
// Tzolkʼin
// ============================================================================

export function tzolkin(number: number, name?: number | string): TzolkinDay {
  return createCalendarDay(TZOLKIN, makeTzolkinDate(number, name))
}

export function tzolkinFromDate(date: GregorianInput): TzolkinDay {
  return createCalendarDay(TZOLKIN, gregorianToCalendar(TZOLKIN, toLocalDate(date)))
}

export function tzolkinFromDateString(str: string, format: string): TzolkinDay {
  return tzolkinFromDate(unwrap(parseDateWithFormat(str, format)))
}

export function tzolkinFromIsoFormat(str: string): TzolkinDay {
  return tzolkinFromDate(unwrap(parseDate(str)))
}

export function tzolkinToday(clock?: () => Date): TzolkinDay {
  return tzolkinFromDate(today(clock))
}

/** `["1 Imix", "2 Ikʼ", ..., "13 Ajaw"]` */
export function tzolkinCalendar(): string[] {
  return calendarList(TZOLKIN)
}
