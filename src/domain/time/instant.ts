/**
 * Absolute instants are Rational seconds since 1970-01-01T00:00:00Z.
 * Calendar conversion goes through Date.UTC on whole seconds only; the
 * sub-second part never touches a float.
 */
import { Rational } from './Rational.ts'

export type Instant = Rational

export interface CalendarTime {
  year: number
  month: number
  day: number
  hour: number
  minute: number
  second: number
  /** Sub-second part in [0, 1) */
  fraction: Rational
}

const ISO_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,12}))?\s*(Z|[+-]\d{2}:?\d{2})?$/

export function instantFromUnix(seconds: number | bigint, fraction: Rational = Rational.ZERO): Instant {
  const whole = typeof seconds === 'bigint' ? Rational.of(seconds) : Rational.fromNumber(seconds)
  return whole.add(fraction)
}

export function instantFromCalendar(
  year: number,
  month: number,
  day: number,
  hour: number,
  minute: number,
  second: number,
  fraction: Rational = Rational.ZERO,
): Instant | null {
  if (month < 1 || month > 12 || day < 1 || day > 31) return null
  if (hour > 23 || minute > 59 || second > 60) return null
  const ms = Date.UTC(year, month - 1, day, hour, minute, second)
  if (Number.isNaN(ms)) return null
  // Date.UTC silently rolls 31 Feb into March
  const check = new Date(ms)
  if (check.getUTCDate() !== day && second !== 60) return null
  return Rational.of(BigInt(ms / 1000)).add(fraction)
}

/** SEED style year + day-of-year timestamps. */
export function instantFromDayOfYear(
  year: number,
  dayOfYear: number,
  hour: number,
  minute: number,
  second: number,
  fraction: Rational = Rational.ZERO,
): Instant | null {
  if (dayOfYear < 1 || dayOfYear > 366) return null
  const jan1 = Date.UTC(year, 0, 1)
  const ms = jan1 + (dayOfYear - 1) * 86_400_000 + ((hour * 60 + minute) * 60 + second) * 1000
  if (Number.isNaN(ms)) return null
  return Rational.of(BigInt(ms / 1000)).add(fraction)
}

/**
 * Parse an ISO-8601 timestamp. A zone designator (Z or ±hh:mm) is mandatory:
 * local-time strings are ambiguous and return null.
 */
export function parseInstant(text: string): Instant | null {
  const m = text.trim().match(ISO_PATTERN)
  if (!m || !m[8]) return null

  const [year, month, day, hour, minute, second] = m.slice(1, 7).map(v => parseInt(v, 10))
  const fractionDigits = m[7] ?? ''
  const fraction = fractionDigits
    ? Rational.of(BigInt(fractionDigits), 10n ** BigInt(fractionDigits.length))
    : Rational.ZERO

  const base = instantFromCalendar(year, month, day, hour, minute, second, fraction)
  if (!base) return null

  const zone = m[8]
  if (zone === 'Z') return base
  const zm = zone.match(/^([+-])(\d{2}):?(\d{2})$/)
  if (!zm) return null
  const offsetMinutes = parseInt(zm[2], 10) * 60 + parseInt(zm[3], 10)
  if (offsetMinutes > 18 * 60) return null
  const offsetSeconds = (zm[1] === '-' ? -1 : 1) * offsetMinutes * 60
  return base.sub(offsetSeconds)
}

export function toCalendar(instant: Instant): CalendarTime {
  const whole = instant.floor()
  const fraction = instant.sub(Rational.of(whole))
  const d = new Date(Number(whole) * 1000)
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
    fraction,
  }
}

/** Day of year (1-based) for a calendar date. */
export function dayOfYear(year: number, month: number, day: number): number {
  return Math.round((Date.UTC(year, month - 1, day) - Date.UTC(year, 0, 1)) / 86_400_000) + 1
}

/**
 * Format as ISO-8601 UTC with up to nanosecond digits (truncated), trailing
 * zeros dropped.
 */
export function formatInstant(instant: Instant): string {
  const cal = toCalendar(instant)
  const pad = (v: number, w = 2) => String(v).padStart(w, '0')
  let text = `${pad(cal.year, 4)}-${pad(cal.month)}-${pad(cal.day)}T${pad(cal.hour)}:${pad(cal.minute)}:${pad(cal.second)}`

  const nanos = cal.fraction.mul(1_000_000_000).floor()
  if (nanos > 0n) {
    text += '.' + nanos.toString().padStart(9, '0').replace(/0+$/, '')
  }
  return text + 'Z'
}
