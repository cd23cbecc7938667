import { describe, it, expect } from 'vitest'
import { Rational } from './Rational'
import { dayOfYear, formatInstant, instantFromCalendar, instantFromDayOfYear, parseInstant, toCalendar } from './instant'

const T0 = 1_704_067_200 // 2024-01-01T00:00:00Z

describe('instant', () => {
  it('parses zoned ISO timestamps', () => {
    expect(parseInstant('2024-01-01T00:00:00Z')?.eq(T0)).toBe(true)
    expect(parseInstant('2024-01-01T01:00:00+01:00')?.eq(T0)).toBe(true)
    expect(parseInstant('2024-01-01 00:00:00.25Z')?.eq(Rational.of(T0 * 4 + 1, 4))).toBe(true)
  })

  it('refuses local or impossible times', () => {
    expect(parseInstant('2024-01-01T00:00:00')).toBeNull()
    expect(parseInstant('2024-02-31T00:00:00Z')).toBeNull()
    expect(instantFromCalendar(2024, 13, 1, 0, 0, 0)).toBeNull()
  })

  it('reads day-of-year stamps', () => {
    expect(instantFromDayOfYear(2024, 60, 0, 0, 0)?.eq(1_709_164_800)).toBe(true)
    expect(dayOfYear(2024, 2, 29)).toBe(60)
    expect(instantFromDayOfYear(2024, 0, 0, 0, 0)).toBeNull()
  })

  it('formats with sub-second digits', () => {
    expect(formatInstant(Rational.of(T0))).toBe('2024-01-01T00:00:00Z')
    expect(formatInstant(Rational.of(T0 * 8 + 1, 8))).toBe('2024-01-01T00:00:00.125Z')
    expect(formatInstant(Rational.of(T0 * 3 + 1, 3))).toBe('2024-01-01T00:00:00.333333333Z')
  })

  it('splits an instant into calendar fields', () => {
    const cal = toCalendar(Rational.of(T0 * 2 + 3, 2))
    expect([cal.year, cal.month, cal.day, cal.hour, cal.minute, cal.second]).toEqual([2024, 1, 1, 0, 0, 1])
    expect(cal.fraction.eq(Rational.of(1, 2))).toBe(true)
  })
})
