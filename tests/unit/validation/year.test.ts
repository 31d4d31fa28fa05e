import { describe, it, expect } from 'vitest'
import { isFutureYear, MIN_RELEASE_YEAR, releaseYearSchema, validateYear } from '../../../src/validation/year.js'
import { ValidationError } from '../../../src/lib/api-errors.js'

describe('validateYear', () => {
  const now = new Date(2024, 5, 15)

  it('accepts the current year', () => {
    expect(validateYear(2024, now)).toBe(2024)
  })

  it('accepts past years', () => {
    expect(validateYear(1965, now)).toBe(1965)
  })

  it('rejects the next year', () => {
    expect(() => validateYear(2025, now)).toThrow(ValidationError)
    expect(() => validateYear(2025, now)).toThrow('Year 2025 is in the future')
  })

  it('rejects years before the floor', () => {
    expect(() => validateYear(0, now)).toThrow('Year must be 1 or later')
    expect(validateYear(MIN_RELEASE_YEAR, now)).toBe(1)
  })

  it('moves the ceiling with the clock', () => {
    expect(isFutureYear(2025, now)).toBe(true)
    expect(isFutureYear(2025, new Date(2025, 0, 1))).toBe(false)
  })
})

describe('releaseYearSchema', () => {
  const thisYear = new Date().getFullYear()

  it('accepts the current calendar year', () => {
    expect(releaseYearSchema.safeParse(thisYear).success).toBe(true)
  })

  it('rejects next calendar year with a message naming the year', () => {
    const result = releaseYearSchema.safeParse(thisYear + 1)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(`Year ${String(thisYear + 1)} is in the future`)
    }
  })

  it('rejects a year beyond the integer column range', () => {
    const result = releaseYearSchema.safeParse(-3_000_000_000)
    expect(result.success).toBe(false)
    if (!result.success) {
      expect(result.error.issues.map((i) => i.message)).toStrictEqual(['Year must be 1 or later'])
    }
  })

  it('rejects non-integer years', () => {
    expect(releaseYearSchema.safeParse(1999.5).success).toBe(false)
  })
})
