/**
 * Tzolkʼin Calendar
 *
 * 260-day ritual calendar: a 13-number cycle and a 20-name cycle advancing
 * together. Offset 0 is 1 Imix.
 */

import type { CalendarSystem, TzolkinDate } from './types'
import { makeDate } from './time-date'
import { defineCalendarSystem } from './calendar-system'
import { nameNumberFromName } from './names'
import { floorMod } from './internal/helpers'
import { InvalidNumberError, InvalidNameError } from './errors'

// ============================================================================
// Constants
// ============================================================================

export const TZOLKIN_CYCLE = 260

export const TZOLKIN_NAMES: readonly string[] = Object.freeze([
  'Imix', 'Ikʼ', 'Akʼbʼal', 'Kʼan', 'Chikchan', 'Kimi', 'Manikʼ', 'Lamat', 'Muluk', 'Ok',
  'Chuwen', 'Ebʼ', 'Bʼen', 'Ix', 'Men', 'Kʼibʼ', 'Kabʼan', 'Etzʼnabʼ', 'Kawak', 'Ajaw',
])

const NUMBERS = 13
const NAMES = 20

/** 20 * 2 ≡ 1 (mod 13) */
const INVERSE_OF_NAMES_MOD_NUMBERS = 2

// ============================================================================
// Rules
// ============================================================================

function validate(number: number, name: number): TzolkinDate {
  if (!Number.isInteger(name) || name < 1 || name > NAMES) {
    throw new InvalidNameError(
      `${name} is not a valid Tzolkʼin name number, it must be between 1 and ${NAMES}`
    )
  }
  if (!Number.isInteger(number) || number < 1 || number > NUMBERS) {
    throw new InvalidNumberError(
      `${number} is not a valid Tzolkʼin day number, it must be between 1 and ${NUMBERS}`
    )
  }
  return Object.freeze({ number, name }) as TzolkinDate
}

function advance(date: TzolkinDate, n: number): TzolkinDate {
  return validate(floorMod(date.number - 1 + n, NUMBERS) + 1, floorMod(date.name - 1 + n, NAMES) + 1)
}

/**
 * Solve k ≡ Δnumber (mod 13), k ≡ Δname (mod 20) for k in [0, 260):
 * k = Δname + 20t with 20t ≡ Δnumber - Δname (mod 13).
 */
function diff(start: TzolkinDate, end: TzolkinDate): number {
  const byNumber = floorMod(end.number - start.number, NUMBERS)
  const byName = floorMod(end.name - start.name, NAMES)
  const t = floorMod(INVERSE_OF_NAMES_MOD_NUMBERS * (byNumber - byName), NUMBERS)
  return byName + NAMES * t
}

export const TZOLKIN: CalendarSystem<TzolkinDate> = defineCalendarSystem({
  kind: 'tzolkin',
  cycleLength: TZOLKIN_CYCLE,
  first: validate(1, 1),
  // 1 Imix under the GMT correlation (584283)
  epoch: makeDate(2012, 7, 15),
  numbers: { min: 1, max: NUMBERS },
  names: TZOLKIN_NAMES,
  validate,
  advance,
  diff,
})

// ============================================================================
// Construction
// ============================================================================

/**
 * Validated Tzolkʼin date. `name` is a name number (1-20) or a day name such
 * as `'Imix'` or `"K'an"`.
 */
export function makeTzolkinDate(number: number, name: number | string = 1): TzolkinDate {
  const nameNumber = typeof name === 'string' ? nameNumberFromName(TZOLKIN, name) : name
  return validate(number, nameNumber)
}
