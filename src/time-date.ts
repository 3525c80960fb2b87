/**
 * Gregorian Date Utilities
 *
 * Pure functions for parsing, formatting and day arithmetic on proleptic
 * Gregorian dates. Uses Julian Day Number for all date arithmetic to avoid
 * month-length edge cases. Format-pattern parsing is delegated to date-fns.
 */

import { parse, isValid } from 'date-fns'
import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

// ============================================================================
// Errors
// ============================================================================

export { InvalidDateError } from './errors'
import { InvalidDateError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const MIN_YEAR = 1
export const MAX_YEAR = 9999

/** JDN of 0000-12-31, so that 0001-01-01 has ordinal 1 */
const ORDINAL_JDN_OFFSET = 1721425

const MIN_ORDINAL = 1
const MAX_ORDINAL = 3652059

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

export function daysInMonth(year: number, month: number): number {
  const days = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]
  if (month === 2 && isLeapYear(year)) return 29
  return days[month]!
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  if (n < 10) return '000' + n
  if (n < 100) return '00' + n
  if (n < 1000) return '0' + n
  return '' + n
}

function inRange(year: number, month: number, day: number): boolean {
  return (
    Number.isInteger(year) && Number.isInteger(month) && Number.isInteger(day) &&
    year >= MIN_YEAR && year <= MAX_YEAR &&
    month >= 1 && month <= 12 &&
    day >= 1 && day <= daysInMonth(year, month)
  )
}

// ============================================================================
// Julian Day Number (for date arithmetic)
// ============================================================================

function dateToJDN(year: number, month: number, day: number): number {
  const a = Math.floor((14 - month) / 12)
  const y = year + 4800 - a
  const m = month + 12 * a - 3
  return (
    day +
    Math.floor((153 * m + 2) / 5) +
    365 * y +
    Math.floor(y / 4) -
    Math.floor(y / 100) +
    Math.floor(y / 400) -
    32045
  )
}

function jdnToDate(jdn: number): { year: number; month: number; day: number } {
  const a = jdn + 32044
  const b = Math.floor((4 * a + 3) / 146097)
  const c = a - Math.floor(146097 * b / 4)
  const d = Math.floor((4 * c + 3) / 1461)
  const e = c - Math.floor(1461 * d / 4)
  const m = Math.floor((5 * e + 2) / 153)
  const day = e - Math.floor((153 * m + 2) / 5) + 1
  const month = m + 3 - 12 * Math.floor(m / 10)
  const year = 100 * b + d - 4800 + Math.floor(m / 10)
  return { year, month, day }
}

// ============================================================================
// Parsing
// ============================================================================

export function parseDate(str: string): Result<LocalDate, InvalidDateError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new InvalidDateError(`Invalid date format: '${str}'`))

  const year = parseInt(match[1]!, 10)
  const month = parseInt(match[2]!, 10)
  const day = parseInt(match[3]!, 10)

  if (year < MIN_YEAR)
    return Err(new InvalidDateError(`Invalid year in date: '${str}'`))
  if (month < 1 || month > 12)
    return Err(new InvalidDateError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new InvalidDateError(`Invalid day in date: '${str}'`))

  return Ok(str as LocalDate)
}

/**
 * Parse a date string with a date-fns format pattern, e.g. `dd.MM.yyyy`.
 * Time fields in the pattern are accepted and discarded.
 */
export function parseDateWithFormat(str: string, format: string): Result<LocalDate, InvalidDateError> {
  const parsed = parse(str, format, new Date(2000, 0, 1))
  if (!isValid(parsed)) {
    return Err(new InvalidDateError(`Date '${str}' does not match format '${format}'`))
  }
  const year = parsed.getFullYear()
  const month = parsed.getMonth() + 1
  const day = parsed.getDate()
  if (!inRange(year, month, day)) {
    return Err(new InvalidDateError(`Date '${str}' is outside years ${MIN_YEAR}-${MAX_YEAR}`))
  }
  return Ok(makeDate(year, month, day))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  if (!inRange(year, month, day)) {
    throw new InvalidDateError(`Invalid date: ${year}-${month}-${day}`)
  }
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

/** Calendar date of a JS Date in the local time zone. */
export function fromJsDate(date: Date): LocalDate {
  if (!isValid(date)) throw new InvalidDateError('Invalid Date')
  return makeDate(date.getFullYear(), date.getMonth() + 1, date.getDate())
}

export function today(clock: () => Date = () => new Date()): LocalDate {
  return fromJsDate(clock())
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return parseInt(date.substring(0, 4), 10)
}

export function monthOf(date: LocalDate): number {
  return parseInt(date.substring(5, 7), 10)
}

export function dayOf(date: LocalDate): number {
  return parseInt(date.substring(8, 10), 10)
}

export function formatDate(date: LocalDate): string {
  return `${pad4(yearOf(date))}-${pad2(monthOf(date))}-${pad2(dayOf(date))}`
}

// ============================================================================
// Ordinals (0001-01-01 is day 1)
// ============================================================================

export function toOrdinal(date: LocalDate): number {
  return dateToJDN(yearOf(date), monthOf(date), dayOf(date)) - ORDINAL_JDN_OFFSET
}

export function fromOrdinal(ordinal: number): LocalDate {
  if (!Number.isInteger(ordinal) || ordinal < MIN_ORDINAL || ordinal > MAX_ORDINAL) {
    throw new InvalidDateError(`Ordinal ${ordinal} is outside years ${MIN_YEAR}-${MAX_YEAR}`)
  }
  const { year, month, day } = jdnToDate(ordinal + ORDINAL_JDN_OFFSET)
  return makeDate(year, month, day)
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  return fromOrdinal(toOrdinal(date) + n)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  return toOrdinal(b) - toOrdinal(a)
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDates(a: LocalDate, b: LocalDate): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}

export function dateBefore(a: LocalDate, b: LocalDate): boolean {
  return a < b
}

export function dateAfter(a: LocalDate, b: LocalDate): boolean {
  return a > b
}
