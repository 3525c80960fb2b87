/**
 * Day Names
 *
 * Name-index resolution and "<number> <name>" rendering for any calendar
 * system. Names are 1-based: name number 1 is `names[0]`.
 */

import type { CalendarDate, CalendarKind, CalendarSystem } from './types'
import { getTable } from './calendar-system'

export { InvalidNameError } from './errors'
import { InvalidNameError } from './errors'

type NameTable = {
  readonly kind: CalendarKind
  readonly names: readonly string[]
}

// ============================================================================
// Helpers
// ============================================================================

/** Treat the ASCII and typographic apostrophes as the glottal-stop letter ʼ. */
function canonical(str: string): string {
  return str.replace(/['’‘`]/g, 'ʼ').toUpperCase()
}

function loose(str: string): string {
  return str.toLowerCase().replace(/[^a-z0-9]/g, '')
}

// ============================================================================
// Resolution
// ============================================================================

export function nameOf(table: NameTable, nameNumber: number): string {
  const name = Number.isInteger(nameNumber) ? table.names[nameNumber - 1] : undefined
  if (name === undefined) {
    throw new InvalidNameError(
      `${nameNumber} is not a valid ${table.kind} name number, it must be between 1 and ${table.names.length}`
    )
  }
  return name
}

/**
 * Name number of an exact day name, ignoring case.
 * `Pop` yields 1 for Haabʼ, `Ajaw` yields 20 for Tzolkʼin.
 */
export function nameNumberFromName(table: NameTable, nameStr: string): number {
  const wanted = canonical(nameStr)
  const index = table.names.findIndex((n) => canonical(n) === wanted)
  if (index === -1) {
    throw new InvalidNameError(
      `'${nameStr}' is not a valid ${table.kind} day name, one of ${table.names.join(', ')}`
    )
  }
  return index + 1
}

/**
 * Tolerant lookup for user input: ignores case and every character that is
 * not an ASCII letter or digit. Returns 0 when nothing matches.
 */
export function parseName(table: NameTable, nameStr: string): number {
  const wanted = loose(nameStr)
  if (wanted === '') return 0
  return table.names.findIndex((n) => loose(n) === wanted) + 1
}

// ============================================================================
// Rendering
// ============================================================================

export function formatCalendarDate(table: NameTable, date: CalendarDate): string {
  return `${date.number} ${nameOf(table, date.name)}`
}

/** Every day of the cycle rendered, in lookup-table order. */
export function calendarList<D extends CalendarDate>(system: CalendarSystem<D>): string[] {
  return getTable(system).map((d) => formatCalendarDate(system, d))
}
