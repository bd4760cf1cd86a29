/**
 * Time & Date Utilities
 *
 * Pure functions for date/time parsing, arithmetic, and timezone conversion,
 * plus the zoned Timestamp value stored in time-bearing cells.
 * Uses Julian Day Number for all date arithmetic to avoid month-length edge cases.
 * Timezone support comes from Intl.DateTimeFormat.
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

/**
 * A wall-clock reading plus the zone it was read in.
 * `tz === null` is a naive timestamp: it names no instant.
 */
export type Timestamp = {
  readonly wall: LocalDateTime
  readonly tz: string | null
  /**
   * UTC offset in minutes, present only when `wall` occurs twice in `tz`
   * (the repeated hour when clocks go back). Without it a repeated wall time
   * resolves to standard time.
   */
  readonly offset?: number
}

/** A Timestamp known to carry a zone */
export type ZonedTimestamp = Timestamp & { readonly tz: string }

// ============================================================================
// Errors
// ============================================================================

export { ParseError } from './errors'
import { ParseError, NaiveTimestampError, InvalidTimezoneError } from './errors'

// ============================================================================
// Helpers
// ============================================================================

export function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

const MONTH_LENGTHS = [0, 31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31] as const

export function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29
  return MONTH_LENGTHS[month] ?? 0
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

export function isValidTimezone(tz: string): boolean {
  try {
    Intl.DateTimeFormat('en-US', { timeZone: tz })
    return true
  } catch {
    return false
  }
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

  const year = parseInt(match[1] ?? '', 10)
  const month = parseInt(match[2] ?? '', 10)
  const day = parseInt(match[3] ?? '', 10)

  if (month < 1 || month > 12)
    return Err(new ParseError(`Invalid month in date: '${str}'`))
  if (day < 1 || day > daysInMonth(year, month))
    return Err(new ParseError(`Invalid day in date: '${str}'`))

  return Ok(makeDate(year, month, day))
}

export function parseTime(str: string): Result<LocalTime, ParseError> {
  const match = /^(\d{2}):(\d{2})(?::(\d{2}))?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid time format: '${str}'`))

  const hour = parseInt(match[1] ?? '', 10)
  const minute = parseInt(match[2] ?? '', 10)
  const second = match[3] ? parseInt(match[3], 10) : 0

  if (hour > 23)
    return Err(new ParseError(`Invalid hour in time: '${str}'`))
  if (minute > 59)
    return Err(new ParseError(`Invalid minute in time: '${str}'`))
  if (second > 59)
    return Err(new ParseError(`Invalid second in time: '${str}'`))

  return Ok(makeTime(hour, minute, second))
}

export function parseDateTime(str: string): Result<LocalDateTime, ParseError> {
  const tIdx = str.indexOf('T')
  if (tIdx === -1) return Err(new ParseError(`Invalid datetime format (missing T): '${str}'`))

  const dateResult = parseDate(str.substring(0, tIdx))
  if (!dateResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  const timeResult = parseTime(str.substring(tIdx + 1))
  if (!timeResult.ok) return Err(new ParseError(`Invalid datetime: '${str}'`))

  return Ok(makeDateTime(dateResult.value, timeResult.value))
}

/**
 * Parse `YYYY-MM-DDThh:mm[:ss][±hh:mm][Zone/Name]`. Without the bracketed
 * zone the result is a naive timestamp. The offset picks one reading of a
 * repeated wall time and must be one the zone actually uses there.
 */
export function parseTimestamp(str: string): Result<Timestamp, ParseError> {
  const match = /^([^[\]+]+?)([+-]\d{2}:\d{2})?(?:\[([^[\]]+)\])?$/.exec(str)
  if (!match) return Err(new ParseError(`Invalid timestamp format: '${str}'`))

  const wall = parseDateTime(match[1] ?? '')
  if (!wall.ok) return Err(new ParseError(`Invalid timestamp: '${str}'`))

  const tz = match[3] ?? null
  if (tz !== null && !isValidTimezone(tz))
    return Err(new ParseError(`Unknown timezone in timestamp: '${str}'`))

  const offsetText = match[2]
  if (offsetText === undefined) return Ok({ wall: wall.value, tz })
  if (tz === null) return Err(new ParseError(`Offset without a timezone: '${str}'`))

  const sign = offsetText.startsWith('-') ? -1 : 1
  const offset = sign * (parseInt(offsetText.slice(1, 3), 10) * 60 + parseInt(offsetText.slice(4, 6), 10))
  const instant = dtToMs(wall.value) - offset * 60000
  if (utcOffsetAtMs(instant, tz) !== offset)
    return Err(new ParseError(`Offset does not match timezone in timestamp: '${str}'`))

  return Ok(fromInstant(instant, tz))
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

export function hourOf(time: LocalTime): number {
  return parseInt(time.substring(0, 2), 10)
}

export function minuteOf(time: LocalTime): number {
  return parseInt(time.substring(3, 5), 10)
}

export function secondOf(time: LocalTime): number {
  return parseInt(time.substring(6, 8), 10)
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

// ============================================================================
// DateTime Arithmetic
// ============================================================================

/** Wall-clock addition: no zone, no DST adjustment */
export function addSeconds(dt: LocalDateTime, n: number): LocalDateTime {
  const time = timeOf(dt)
  let totalSeconds = hourOf(time) * 3600 + minuteOf(time) * 60 + secondOf(time) + Math.round(n)

  // Floor division keeps negative offsets on the previous day
  const dayDelta = Math.floor(totalSeconds / 86400)
  totalSeconds = totalSeconds - dayDelta * 86400

  const hour = Math.floor(totalSeconds / 3600)
  const minute = Math.floor((totalSeconds % 3600) / 60)
  const second = totalSeconds % 60

  const date = dayDelta === 0 ? dateOf(dt) : addDays(dateOf(dt), dayDelta)
  return makeDateTime(date, makeTime(hour, minute, second))
}

export function startOfDay(date: LocalDate): LocalDateTime {
  return makeDateTime(date, makeTime(0, 0, 0))
}

// ============================================================================
// Timezone Conversion
// ============================================================================

/** Given a UTC epoch in ms, return the UTC offset in minutes for timezone tz */
function utcOffsetAtMs(utcMs: number, tz: string): number {
  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: tz,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hour12: false,
  })

  const parts = formatter.formatToParts(new Date(utcMs))
  const get = (type: string) => {
    const part = parts.find((p) => p.type === type)
    return part ? parseInt(part.value, 10) : 0
  }

  let h = get('hour')
  if (h === 24) h = 0
  const localMs = Date.UTC(get('year'), get('month') - 1, get('day'), h, get('minute'), get('second'))
  return (localMs - utcMs) / 60000
}

/** Convert a LocalDateTime to epoch ms (treating it as UTC) */
function dtToMs(dt: LocalDateTime): number {
  const d = dateOf(dt), t = timeOf(dt)
  return Date.UTC(yearOf(d), monthOf(d) - 1, dayOf(d), hourOf(t), minuteOf(t), secondOf(t))
}

/** Convert epoch ms to a LocalDateTime (treating ms as UTC) */
function msToDt(ms: number): LocalDateTime {
  const d = new Date(ms)
  return makeDateTime(
    makeDate(d.getUTCFullYear(), d.getUTCMonth() + 1, d.getUTCDate()),
    makeTime(d.getUTCHours(), d.getUTCMinutes(), d.getUTCSeconds())
  )
}

export function toLocal(utc: LocalDateTime, tz: string): LocalDateTime {
  const utcMs = dtToMs(utc)
  const offset = utcOffsetAtMs(utcMs, tz)
  return msToDt(utcMs + offset * 60000)
}

export function toUTC(local: LocalDateTime, tz: string): LocalDateTime {
  if (tz === 'UTC') return local

  const localMs = dtToMs(local)
  const year = yearOf(dateOf(local))

  // Determine standard and daylight offsets from Jan/Jul
  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) {
    return msToDt(localMs - janOffset * 60000)
  }

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)
  const dstStatus = isDSTAt(local, tz)

  if (dstStatus === 'gap') {
    // DST transitions are always minute-aligned
    const utcViaDst = localMs - dstOffset * 60000
    const utcViaStd = localMs - stdOffset * 60000
    for (let ms = utcViaDst; ms <= utcViaStd; ms += 60000) {
      if (utcOffsetAtMs(ms, tz) !== stdOffset) {
        return msToDt(ms)
      }
    }
    return msToDt(utcViaStd)
  }

  if (dstStatus === 'overlap') {
    // Use standard time (post-fallback)
    return msToDt(localMs - stdOffset * 60000)
  }

  if (dstStatus === true) {
    return msToDt(localMs - dstOffset * 60000)
  }

  return msToDt(localMs - stdOffset * 60000)
}

export function isDSTAt(
  dt: LocalDateTime,
  tz: string
): boolean | 'gap' | 'overlap' {
  if (tz === 'UTC') return false

  const localMs = dtToMs(dt)
  const year = yearOf(dateOf(dt))

  const janOffset = utcOffsetAtMs(Date.UTC(year, 0, 15, 12, 0, 0), tz)
  const julOffset = utcOffsetAtMs(Date.UTC(year, 6, 15, 12, 0, 0), tz)

  if (janOffset === julOffset) return false

  const stdOffset = Math.min(janOffset, julOffset)
  const dstOffset = Math.max(janOffset, julOffset)

  // Map local → UTC through both offsets, then check which round-trips
  const utcViaStd = localMs - stdOffset * 60000
  const utcViaDst = localMs - dstOffset * 60000

  const stdMapsBack = utcViaStd + utcOffsetAtMs(utcViaStd, tz) * 60000 === localMs
  const dstMapsBack = utcViaDst + utcOffsetAtMs(utcViaDst, tz) * 60000 === localMs

  if (stdMapsBack && dstMapsBack) return 'overlap'
  if (!stdMapsBack && !dstMapsBack) return 'gap'

  return dstMapsBack
}

// ============================================================================
// Timestamps
// ============================================================================

export function zoned(wall: LocalDateTime, tz: string): ZonedTimestamp {
  if (!isValidTimezone(tz)) throw new InvalidTimezoneError(`Unknown timezone: '${tz}'`)
  return { wall, tz }
}

export function naive(wall: LocalDateTime): Timestamp {
  return { wall, tz: null }
}

export function isZoned(ts: Timestamp): ts is ZonedTimestamp {
  return ts.tz !== null
}

/** Epoch milliseconds of a zoned timestamp */
export function instantOf(ts: Timestamp): number {
  if (!isZoned(ts)) throw new NaiveTimestampError(`Timestamp '${ts.wall}' has no timezone`)
  if (ts.offset !== undefined) return dtToMs(ts.wall) - ts.offset * 60000
  return dtToMs(toUTC(ts.wall, ts.tz))
}

/** The instant read in `tz`; a repeated wall time keeps its offset */
export function fromInstant(epochMs: number, tz: string): ZonedTimestamp {
  const wall = toLocal(msToDt(epochMs), tz)
  if (isDSTAt(wall, tz) !== 'overlap') return { wall, tz }
  return { wall, tz, offset: utcOffsetAtMs(epochMs, tz) }
}

/** Same instant, read in another zone */
export function convertTimestamp(ts: Timestamp, tz: string): ZonedTimestamp {
  return fromInstant(instantOf(ts), tz)
}

/** Wall-clock addition; the result drops any offset and resolves afresh */
export function addSecondsToTimestamp(ts: ZonedTimestamp, n: number): ZonedTimestamp
export function addSecondsToTimestamp(ts: Timestamp, n: number): Timestamp
export function addSecondsToTimestamp(ts: Timestamp, n: number): Timestamp {
  return { wall: addSeconds(ts.wall, n), tz: ts.tz }
}

export function timestampEquals(a: Timestamp | null, b: Timestamp | null): boolean {
  if (a === null || b === null) return a === b
  return a.wall === b.wall && a.tz === b.tz && a.offset === b.offset
}

function formatOffset(minutes: number): string {
  const sign = minutes < 0 ? '-' : '+'
  const abs = Math.abs(minutes)
  return `${sign}${pad2(Math.floor(abs / 60))}:${pad2(abs % 60)}`
}

export function formatTimestamp(ts: Timestamp): string {
  if (ts.tz === null) return ts.wall
  const offset = ts.offset === undefined ? '' : formatOffset(ts.offset)
  return `${ts.wall}${offset}[${ts.tz}]`
}
