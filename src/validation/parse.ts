import type { z } from 'zod/v4'
import { toValidationError } from '../lib/api-errors.js'

/** Parse `input` against `schema`, throwing a ValidationError on failure. */
export function parseInput<T extends z.ZodType>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw toValidationError(result.error)
  }
  return result.data
}
