/**
 * Haabʼ Calendar
 *
 * 365-day civil calendar: 18 months of 20 days numbered 0-19, then the
 * five-day Wayebʼ numbered 0-4. Offset 0 is 0 Pop.
 */

import type { CalendarSystem, HaabDate } from './types'
import { makeDate } from './time-date'
import { defineCalendarSystem, offsetOf } from './calendar-system'
import { nameNumberFromName } from './names'
import { floorMod } from './internal/helpers'
import { InvalidNumberError, InvalidNameError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const HAAB_CYCLE = 365

export const HAAB_NAMES: readonly string[] = Object.freeze([
  'Pop', 'Woʼ', 'Sip', 'Sotzʼ', 'Tzek', 'Xul', 'Yaxkʼin', 'Mol', 'Chʼen', 'Yax',
  'Sakʼ', 'Keh', 'Mak', 'Kʼankʼin', 'Muwanʼ', 'Pax', 'Kʼayab', 'Kumkʼu', 'Wayebʼ',
])

const MONTH_DAYS = 20
const WAYEB = 19
const WAYEB_DAYS = 5

// ============================================================================
// Rules
// ============================================================================

function validate(number: number, name: number): HaabDate {
  if (!Number.isInteger(name) || name < 1 || name > HAAB_NAMES.length) {
    throw new InvalidNameError(
      `${name} is not a valid Haabʼ name number, it must be between 1 and ${HAAB_NAMES.length}`
    )
  }
  if (!Number.isInteger(number) || number < 0 || number >= MONTH_DAYS) {
    throw new InvalidNumberError(
      `${number} is not a valid Haabʼ day number, it must be between 0 and ${MONTH_DAYS - 1}`
    )
  }
  if (name === WAYEB && number >= WAYEB_DAYS) {
    throw new InvalidNumberError(
      `${number} is not a valid day of Wayebʼ, it must be between 0 and ${WAYEB_DAYS - 1}`
    )
  }
  return Object.freeze({ number, name }) as HaabDate
}

/** Months are 20 days long, so the year position is a plain base-20 read. */
function advance(date: HaabDate, n: number): HaabDate {
  const pos = floorMod((date.name - 1) * MONTH_DAYS + date.number + n, HAAB_CYCLE)
  return validate(pos % MONTH_DAYS, Math.floor(pos / MONTH_DAYS) + 1)
}

export const HAAB: CalendarSystem<HaabDate> = defineCalendarSystem({
  kind: 'haab',
  cycleLength: HAAB_CYCLE,
  first: validate(0, 1),
  // 0 Pop under the GMT correlation (584283)
  epoch: makeDate(2012, 4, 2),
  numbers: { min: 0, max: MONTH_DAYS - 1 },
  names: HAAB_NAMES,
  validate,
  advance,
  diff: (start, end) => floorMod(offsetOf(HAAB, end) - offsetOf(HAAB, start), HAAB_CYCLE),
})

// ============================================================================
// Construction
// ============================================================================

/**
 * Validated Haabʼ date. `name` is a name number (1-19) or a day name such as
 * `'Pop'` or `"Wayeb'"`.
 */
export function makeHaabDate(number: number, name: number | string = 1): HaabDate {
  const nameNumber = typeof name === 'string' ? nameNumberFromName(HAAB, name) : name
  return validate(number, nameNumber)
}
