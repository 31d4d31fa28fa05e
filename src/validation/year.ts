import { z } from 'zod/v4'
import { ValidationError } from '../lib/api-errors.js'

/** Earliest accepted release year. */
export const MIN_RELEASE_YEAR = 1

const TOO_EARLY_MESSAGE = `Year must be ${String(MIN_RELEASE_YEAR)} or later`

function futureYearMessage(year: number): string {
  return `Year ${String(year)} is in the future`
}

/** True when `year` lies after the calendar year of `now`. */
export function isFutureYear(year: number, now: Date = new Date()): boolean {
  return year > now.getFullYear()
}

/**
 * Reject a release year before {@link MIN_RELEASE_YEAR} or later than the
 * current calendar year. The ceiling is read from `now` on every call, never cached.
 */
export function validateYear(year: number, now: Date = new Date()): number {
  if (year < MIN_RELEASE_YEAR) {
    throw new ValidationError(TOO_EARLY_MESSAGE, [{ path: 'year', message: TOO_EARLY_MESSAGE }])
  }
  if (isFutureYear(year, now)) {
    const message = futureYearMessage(year)
    throw new ValidationError(message, [{ path: 'year', message }])
  }
  return year
}

/** Release year: an integer from MIN_RELEASE_YEAR up to the current year at parse time. */
export const releaseYearSchema = z
  .number()
  .int('Year must be an integer')
  .min(MIN_RELEASE_YEAR, TOO_EARLY_MESSAGE)
  .superRefine((year, ctx) => {
    if (isFutureYear(year)) {
      ctx.addIssue({ code: 'custom', message: futureYearMessage(year), input: year })
    }
  })
