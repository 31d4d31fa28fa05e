// ---------------------------------------------------------------------------
// Error taxonomy for the persistence layer
// ---------------------------------------------------------------------------
// Every write failure surfaces as one of these. Fastify's error handler reads
// `statusCode` to pick the HTTP response code, so callers that sit behind an
// HTTP layer get the right status without extra mapping.
// ---------------------------------------------------------------------------

import type { z } from 'zod/v4'

/**
 * Base API error with an HTTP status code.
 * Fastify uses `statusCode` on thrown errors to set the response status.
 */
export class ApiError extends Error {
  readonly statusCode: number

  constructor(statusCode: number, message: string) {
    super(message)
    this.statusCode = statusCode
    this.name = 'ApiError'
  }
}

export interface ValidationIssue {
  path: string
  message: string
}

/** A field failed its constraint (range, length, format, release year). */
export class ValidationError extends ApiError {
  readonly issues: ValidationIssue[]

  constructor(message: string, issues: ValidationIssue[] = []) {
    super(400, message)
    this.name = 'ValidationError'
    this.issues = issues
  }
}

/** A write collided with a unique constraint. */
export class UniquenessError extends ApiError {
  readonly constraint: string
  readonly fields: string[]

  constructor(message: string, constraint: string, fields: string[]) {
    super(409, message)
    this.name = 'UniquenessError'
    this.constraint = constraint
    this.fields = fields
  }
}

/** The targeted or referenced record does not exist. */
export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(404, message)
    this.name = 'NotFoundError'
  }
}

/**
 * Convert a zod failure into a ValidationError.
 * The message lists each issue as `path: message`.
 */
export function toValidationError(error: z.ZodError): ValidationError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }))
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ')
  return new ValidationError(summary, issues)
}

/**
 * Create a 404 Not Found error.
 *
 * @param entity - Record kind, e.g. "Title".
 * @param id - Identifier that was looked up.
 */
export function notFound(entity: string, id: number | string): NotFoundError {
  return new NotFoundError(`${entity} ${String(id)} not found`)
}
