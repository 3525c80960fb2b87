/**
 * Segment 07: Calendar Day Objects
 *
 * Immutable per-day wrappers: constructors from Gregorian input, accessors,
 * arithmetic returning new objects, and search defaults.
 */

import { describe, it, expect } from 'vitest'
import {
  haab, haabFromDate, haabFromDateString, haabFromIsoFormat, haabToday, haabCalendar,
  tzolkin, tzolkinFromDate, tzolkinFromDateString, tzolkinFromIsoFormat, tzolkinToday, tzolkinCalendar,
  DEFAULT_LIST_SIZE,
} from '../src/calendar-day'
import { parseDate, today, type LocalDate } from '../src/time-date'
import { InvalidDateError, InvalidNameError, InvalidNumberError } from '../src/errors'

function date(s: string): LocalDate {
  const r = parseDate(s)
  if (!r.ok) throw new Error(`Invalid test date: ${s}`)
  return r.value
}

describe('Segment 07: Calendar Day Objects', () => {
  // ========================================================================
  // Construction
  // ========================================================================

  describe('constructors', () => {
    it('haab() validates like makeHaabDate', () => {
      expect(() => haab(20, 'Pop')).toThrow(InvalidNumberError)
      expect(() => haab(0, 'Nope')).toThrow(InvalidNameError)
    })

    it('tzolkin() validates like makeTzolkinDate', () => {
      expect(() => tzolkin(14, 1)).toThrow(InvalidNumberError)
      expect(() => tzolkin(1, 21)).toThrow(InvalidNameError)
    })

    it('fromDate takes a LocalDate', () => {
      expect(haabFromDate(date('2012-12-21')).toString()).toBe('3 Kʼankʼin')
      expect(tzolkinFromDate(date('2012-12-21')).toString()).toBe('4 Ajaw')
    })

    it('fromDate takes a JS Date', () => {
      expect(tzolkinFromDate(new Date(2019, 2, 21)).toString()).toBe('10 Imix')
    })

    it('fromDateString uses a date-fns pattern', () => {
      expect(tzolkinFromDateString('21.03.2019', 'dd.MM.yyyy').toString()).toBe('10 Imix')
      expect(haabFromDateString('21.03.2019', 'dd.MM.yyyy').toString()).toBe('14 Kumkʼu')
    })

    it('fromDateString throws InvalidDateError on a mismatch', () => {
      expect(() => haabFromDateString('2019-03-21', 'dd.MM.yyyy')).toThrow(InvalidDateError)
    })

    it('fromIsoFormat parses YYYY-MM-DD', () => {
      expect(haabFromIsoFormat('2019-03-21').toString()).toBe('14 Kumkʼu')
      expect(() => tzolkinFromIsoFormat('21.03.2019')).toThrow(InvalidDateError)
    })

    it('today() reads the clock', () => {
      const clock = () => new Date(2012, 11, 21, 12)
      expect(haabToday(clock).toString()).toBe('3 Kʼankʼin')
      expect(tzolkinToday(clock).toString()).toBe('4 Ajaw')
    })
  })

  // ========================================================================
  // Accessors
  // ========================================================================

  describe('accessors', () => {
    it('exposes number, name and year day', () => {
      const day = haab(4, "Wayeb'")
      expect(day.number).toBe(4)
      expect(day.name).toBe('Wayebʼ')
      expect(day.nameNumber).toBe(19)
      expect(day.yearDay).toBe(365)
      expect(day.date).toEqual({ number: 4, name: 19 })
    })

    it('0 Pop is Haabʼ year day 1', () => {
      expect(haab(0, 'Pop').yearDay).toBe(1)
    })

    it('tzolkin year day', () => {
      expect(tzolkin(4, 'Ajaw').yearDay).toBe(160)
    })

    it('is frozen', () => {
      expect(Object.isFrozen(tzolkin(1, 1))).toBe(true)
    })
  })

  // ========================================================================
  // Arithmetic
  // ========================================================================

  describe('addDays', () => {
    it('returns a new object and leaves the original alone', () => {
      const start = haab(19, 'Pop')
      const next = start.addDays(1)
      expect(next.toString()).toBe('0 Woʼ')
      expect(start.toString()).toBe('19 Pop')
    })

    it('chains', () => {
      expect(tzolkin(13, 'Ajaw').addDays(1).addDays(-2).toString()).toBe('12 Kawak')
    })
  })

  describe('dayDiff / equals', () => {
    it('dayDiff is forward only', () => {
      expect(tzolkin(1, 'Imix').dayDiff(tzolkin(4, 'Ajaw'))).toBe(159)
      expect(tzolkin(4, 'Ajaw').dayDiff(tzolkin(1, 'Imix'))).toBe(101)
      expect(haab(4, 19).dayDiff(haab(0, 1))).toBe(1)
    })

    it('equals compares the calendar date', () => {
      expect(haab(3, 14).equals(haabFromDate(date('2012-12-21')))).toBe(true)
      expect(haab(3, 14).equals(haab(4, 14))).toBe(false)
    })
  })

  // ========================================================================
  // Search
  // ========================================================================

  describe('search', () => {
    it('nextDate and lastDate from an explicit start', () => {
      const newYear = haab(0, 'Pop')
      expect(newYear.nextDate(date('2019-03-21'))).toBe('2019-04-01')
      expect(newYear.lastDate(date('2019-03-21'))).toBe('2018-04-01')
    })

    it('nextDates and lastDates', () => {
      const day = tzolkin(4, 'Ajaw')
      expect(day.nextDates(date('2012-12-21'), 2)).toEqual(['2012-12-21', '2013-09-07'])
      expect(day.lastDates(date('2012-12-21'), 2)).toEqual(['2012-12-21', '2012-04-05'])
      expect(day.nextDates(date('2012-12-21'), 0)).toEqual([])
    })

    it('lists default to 50 dates', () => {
      const dates = tzolkin(4, 'Ajaw').nextDates(date('2012-12-21'))
      expect(DEFAULT_LIST_SIZE).toBe(50)
      expect(dates).toHaveLength(50)
    })

    it('start defaults to today', () => {
      const day = tzolkinFromDate(today())
      expect(day.nextDate()).toBe(today())
      expect(day.lastDate()).toBe(today())
    })
  })

  it('calendar listings', () => {
    expect(haabCalendar()[0]).toBe('0 Pop')
    expect(tzolkinCalendar()[259]).toBe('13 Ajaw')
  })
})
