/**
 * maya-calendar
 *
 * Public API exports
 */

// Error system (base class, codes, all error classes)
export {
  MayaCalendarError, MayaCalendarErrorCode,
  InvalidNumberError, InvalidNameError, InvalidDateError,
} from './errors'
export type { MayaCalendarErrorCode as MayaCalendarErrorCodeType } from './errors'

// Result type
export type { Result } from './result'
export { Ok, Err, unwrap } from './result'

// Gregorian dates
export type { LocalDate } from './time-date'
export {
  MIN_YEAR, MAX_YEAR,
  isLeapYear, daysInMonth,
  parseDate, parseDateWithFormat,
  makeDate, fromJsDate, today,
  yearOf, monthOf, dayOf, formatDate,
  toOrdinal, fromOrdinal,
  addDays, daysBetween,
  compareDates, dateBefore, dateAfter,
} from './time-date'

// Shared types
export type {
  CalendarDate, HaabDate, TzolkinDate,
  CalendarKind, Direction,
  CalendarRules, CalendarSystem, LookupTable,
} from './types'

// Cyclic calendar engine
export {
  buildTable, defineCalendarSystem, getTable,
  offsetOf, dateAtOffset, yearDay,
  gregorianToCalendar,
  addCalendarDays, dayDiff, sameDate,
  searchDate, searchDates, occurrences,
} from './calendar-system'

// Calendar systems
export { HAAB, HAAB_CYCLE, HAAB_NAMES, makeHaabDate } from './haab'
export { TZOLKIN, TZOLKIN_CYCLE, TZOLKIN_NAMES, makeTzolkinDate } from './tzolkin'

// Day names
export {
  nameOf, nameNumberFromName, parseName,
  formatCalendarDate, calendarList,
} from './names'

// Day objects (wraps the engine into immutable per-day values)
export type { CalendarDay, HaabDay, TzolkinDay, GregorianInput } from './calendar-day'
export {
  DEFAULT_LIST_SIZE, createCalendarDay,
  haab, haabFromDate, haabFromDateString, haabFromIsoFormat, haabToday, haabCalendar,
  tzolkin, tzolkinFromDate, tzolkinFromDateString, tzolkinFromIsoFormat, tzolkinToday, tzolkinCalendar,
} from './calendar-day'
