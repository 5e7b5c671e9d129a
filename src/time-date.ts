/**
 * Time & Date Utilities
 *
 * Pure functions for local date/time parsing, construction and arithmetic.
 * Task due times are naive local wall-clock instants, so all values here are
 * timezone-free strings. Uses Julian Day Number for date arithmetic to avoid
 * month-length edge cases.
 */

import { type Result, Ok, Err } from './result'

// ============================================================================
// Branded Types
// ============================================================================

declare const __localDate: unique symbol
declare const __localTime: unique symbol
declare const __localDateTime: unique symbol

/** ISO 8601 date string: YYYY-MM-DD */
export type LocalDate = string & { readonly [__localDate]: true }

/** ISO 8601 time string: HH:MM:SS */
export type LocalTime = string & { readonly [__localTime]: true }

/** ISO 8601 datetime string: YYYY-MM-DDThh:mm:ss */
export type LocalDateTime = string & { readonly [__localDateTime]: true }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_DAYS = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_DAYS[month - 1] ?? 0
}

function pad2(n: number): string {
  return n < 10 ? '0' + n : '' + n
}

function pad4(n: number): string {
  return String(n).padStart(4, '0')
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

export function parseDate(str: string): Result<LocalDate, ParseError> {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid date format: '${str}'`))

  const year = Number(match[1])
  const month = Number(match[2])
  const day = Number(match[3])

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

/** Accepts HH:MM or HH:MM:SS, with an optional fractional second that is dropped */
export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2})(?:\.\d+)?)?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = Number(match[1])
  const minute = Number(match[2])
  const second = match[3] ? Number(match[3]) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

/**
 * Parse a local datetime. The date/time separator may be 'T' or a single
 * space (the form SQLite's datetime() produces).
 */
export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const sep = /^\d{4}-\d{2}-\d{2}[T ]/.test(str) ? 10 : -1
  if (sep === -1) return Err(new ParseError(`Invalid datetime format: '${str}'`))

  const dateResult = parseDate(str.substring(0, sep))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(sep + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

// ============================================================================
// Construction
// ============================================================================

export function makeDate(year: number, month: number, day: number): LocalDate {
  return `${pad4(year)}-${pad2(month)}-${pad2(day)}` as LocalDate
}

export function makeTime(hour: number, minute: number, second?: number): LocalTime {
  return `${pad2(hour)}:${pad2(minute)}:${pad2(second ?? 0)}` as LocalTime
}

export function makeDateTime(date: LocalDate, time: LocalTime): LocalDateTime {
  return `${date}T${time}` as LocalDateTime
}

/** Local wall-clock reading of a JS Date */
export function fromJsDate(d: Date): LocalDateTime {
  return makeDateTime(
    makeDate(d.getFullYear(), d.getMonth() + 1, d.getDate()),
    makeTime(d.getHours(), d.getMinutes(), d.getSeconds())
  )
}

// ============================================================================
// Component Extraction
// ============================================================================

export function yearOf(date: LocalDate): number {
  return Number(date.substring(0, 4))
}

export function monthOf(date: LocalDate): number {
  return Number(date.substring(5, 7))
}

export function dayOf(date: LocalDate): number {
  return Number(date.substring(8, 10))
}

export function hourOf(time: LocalTime): number {
  return Number(time.substring(0, 2))
}

export function minuteOf(time: LocalTime): number {
  return Number(time.substring(3, 5))
}

export function secondOf(time: LocalTime): number {
  return Number(time.substring(6, 8))
}

export function dateOf(dt: LocalDateTime): LocalDate {
  return dt.substring(0, 10) as LocalDate
}

export function timeOf(dt: LocalDateTime): LocalTime {
  return dt.substring(11) as LocalTime
}

// ============================================================================
// Date Arithmetic (via JDN)
// ============================================================================

export function addDays(date: LocalDate, n: number): LocalDate {
  const jdn = dateToJDN(yearOf(date), monthOf(date), dayOf(date))
  const { year, month, day } = jdnToDate(jdn + n)
  return makeDate(year, month, day)
}

export function daysBetween(a: LocalDate, b: LocalDate): number {
  const jdnA = dateToJDN(yearOf(a), monthOf(a), dayOf(a))
  const jdnB = dateToJDN(yearOf(b), monthOf(b), dayOf(b))
  return jdnB - jdnA
}

// ============================================================================
// DateTime Arithmetic
// ============================================================================

function secondOfDay(time: LocalTime): number {
  return hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time)
}

export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  let total = secondOfDay(timeOf(dt)) + n

  // Floor division keeps negative overflow on the previous day
  const dayDelta = Math.floor(total / 86400)
  total -= dayDelta * 86400

  const date = dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta)
  const time = makeTime(Math.floor(total / 3600), Math.floor((total % 3600) / 60), total % 60)
  return makeDateTime(date, time)
}

export function addMinutes(dt: LocalDateTime, n: number): LocalDateTime {
  return addSeconds(dt, n * 60)
}

/** Signed seconds from a to b */
export function secondsBetween(a: LocalDateTime, b: LocalDateTime): number {
  const days = daysBetween(dateOf(a), dateOf(b))
  return days * 86400 + secondOfDay(timeOf(b)) - secondOfDay(timeOf(a))
}

// ============================================================================
// Comparison
// ============================================================================

export function compareDateTimes(a: LocalDateTime, b: LocalDateTime): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
