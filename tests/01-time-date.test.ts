/**
 * Segment 01: Time & Date Utilities Tests
 *
 * Local wall-clock datetimes are branded ISO strings. These are pure
 * functions with no dependency on the host timezone, except fromJsDate.
 */

import { describe, it, expect } from 'vitest'
import {
  parseDate,
  parseTime,
  parseDateTime,
  makeDate,
  makeTime,
  makeDateTime,
  fromJsDate,
  isLeapYear,
  daysInMonth,
  dateOf,
  timeOf,
  addDays,
  daysBetween,
  addSeconds,
  addMinutes,
  secondsBetween,
  compareDateTimes,
  ParseError,
} from '../src/time-date'
import { dt } from './helpers/reminders'

// ============================================================================
// Parsing
// ============================================================================

describe('parseDate', () => {
  it('accepts a valid ISO date', () => {
    const result = parseDate('2025-01-01')
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value).toBe('2025-01-01')
  })

  it('rejects Feb 29 outside a leap year', () => {
    const result = parseDate('2025-02-29')
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ParseError)
      expect(result.error.message).toBe("Invalid day in date: '2025-02-29'")
    }
  })

  it('accepts Feb 29 in a leap year', () => {
    expect(parseDate('2024-02-29').ok).toBe(true)
  })

  it('rejects month 13', () => {
    const result = parseDate('2025-13-01')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid month in date: '2025-13-01'")
  })

  it('rejects other formats', () => {
    expect(parseDate('01/01/2025').ok).toBe(false)
    expect(parseDate('2025-1-1').ok).toBe(false)
  })
})

describe('parseTime', () => {
  it('accepts HH:MM and pads seconds', () => {
    const result = parseTime('10:45')
    expect(result.ok && result.value).toBe('10:45:00')
  })

  it('accepts HH:MM:SS', () => {
    const result = parseTime('23:59:59')
    expect(result.ok && result.value).toBe('23:59:59')
  })

  it('drops fractional seconds', () => {
    const result = parseTime('10:45:30.250')
    expect(result.ok && result.value).toBe('10:45:30')
  })

  it('rejects out-of-range components', () => {
    expect(parseTime('24:00').ok).toBe(false)
    expect(parseTime('10:60').ok).toBe(false)
    expect(parseTime('10:00:60').ok).toBe(false)
  })
})

describe('parseDateTime', () => {
  it('accepts the T separator', () => {
    const result = parseDateTime('2025-01-01T10:45:00')
    expect(result.ok && result.value).toBe('2025-01-01T10:45:00')
  })

  it('accepts a space separator and normalises it to T', () => {
    const result = parseDateTime('2025-01-01 10:45')
    expect(result.ok && result.value).toBe('2025-01-01T10:45:00')
  })

  it('rejects a bare date', () => {
    const result = parseDateTime('2025-01-01')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid datetime format: '2025-01-01'")
  })

  it('rejects an invalid time part', () => {
    const result = parseDateTime('2025-01-01T25:00')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error.message).toBe("Invalid datetime: '2025-01-01T25:00'")
  })
})

// ============================================================================
// Construction
// ============================================================================

describe('construction', () => {
  it('pads every component', () => {
    expect(makeDate(987, 3, 4)).toBe('0987-03-04')
    expect(makeTime(7, 5)).toBe('07:05:00')
    expect(makeDateTime(makeDate(2025, 1, 1), makeTime(9, 0, 5))).toBe('2025-01-01T09:00:05')
  })

  it('reads a JS Date in local time', () => {
    expect(fromJsDate(new Date(2025, 0, 1, 10, 29, 7))).toBe('2025-01-01T10:29:07')
  })

  it('splits a datetime into date and time', () => {
    const value = dt('2025-06-30T23:15:00')
    expect(dateOf(value)).toBe('2025-06-30')
    expect(timeOf(value)).toBe('23:15:00')
  })
})

describe('calendar helpers', () => {
  it('knows leap years', () => {
    expect(isLeapYear(2024)).toBe(true)
    expect(isLeapYear(1900)).toBe(false)
    expect(isLeapYear(2000)).toBe(true)
  })

  it('knows month lengths', () => {
    expect(daysInMonth(2025, 2)).toBe(28)
    expect(daysInMonth(2024, 2)).toBe(29)
    expect(daysInMonth(2025, 4)).toBe(30)
    expect(daysInMonth(2025, 12)).toBe(31)
  })
})

// ============================================================================
// Arithmetic
// ============================================================================

describe('date arithmetic', () => {
  it('adds days across month and year ends', () => {
    expect(addDays(makeDate(2024, 12, 31), 1)).toBe('2025-01-01')
    expect(addDays(makeDate(2024, 3, 1), -1)).toBe('2024-02-29')
  })

  it('counts days between dates', () => {
    expect(daysBetween(makeDate(2025, 1, 1), makeDate(2025, 3, 1))).toBe(59)
    expect(daysBetween(makeDate(2025, 3, 1), makeDate(2025, 1, 1))).toBe(-59)
  })
})

describe('datetime arithmetic', () => {
  it('adds seconds within a day', () => {
    expect(addSeconds(dt('2025-01-01T10:29:00'), 30)).toBe('2025-01-01T10:29:30')
  })

  it('rolls over midnight forward and backward', () => {
    expect(addSeconds(dt('2025-01-01T23:59:30'), 45)).toBe('2025-01-02T00:00:15')
    expect(addSeconds(dt('2025-01-01T00:00:10'), -20)).toBe('2024-12-31T23:59:50')
  })

  it('adds minutes', () => {
    expect(addMinutes(dt('2025-01-01T10:45:00'), -15)).toBe('2025-01-01T10:30:00')
    expect(addMinutes(dt('2025-01-01T10:45:00'), -1440)).toBe('2024-12-31T10:45:00')
  })

  it('measures signed seconds between datetimes', () => {
    expect(secondsBetween(dt('2025-01-01T10:29:00'), dt('2025-01-01T10:45:00'))).toBe(960)
    expect(secondsBetween(dt('2025-01-01T10:46:00'), dt('2025-01-01T10:45:00'))).toBe(-60)
    expect(secondsBetween(dt('2024-12-31T23:59:00'), dt('2025-01-01T00:01:00'))).toBe(120)
  })

  it('compares lexicographically', () => {
    expect(compareDateTimes(dt('2025-01-01T10:00:00'), dt('2025-01-01T10:00:01'))).toBe(-1)
    expect(compareDateTimes(dt('2025-01-02T00:00:00'), dt('2025-01-01T23:59:59'))).toBe(1)
    expect(compareDateTimes(dt('2025-01-01T10:00:00'), dt('2025-01-01T10:00:00'))).toBe(0)
  })
})
