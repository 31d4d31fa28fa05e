import { ApiError, NotFoundError, UniquenessError, ValidationError } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'

// SQLSTATE codes raised by constraint violations.
const UNIQUE_VIOLATION = '23505'
const FOREIGN_KEY_VIOLATION = '23503'
const CHECK_VIOLATION = '23514'

interface ConstraintInfo {
  message: string
  fields: string[]
}

const UNIQUE_CONSTRAINTS: Record<string, ConstraintInfo> = {
  users_username_uniq: { message: 'A user with that username already exists', fields: ['username'] },
  users_email_uniq: { message: 'A user with that email already exists', fields: ['email'] },
  categories_slug_uniq: { message: 'A category with that slug already exists', fields: ['slug'] },
  genres_slug_uniq: { message: 'A genre with that slug already exists', fields: ['slug'] },
  reviews_author_title_uniq: {
    message: 'This author has already reviewed this title',
    fields: ['authorId', 'titleId'],
  },
}

const FOREIGN_KEYS: Record<string, string> = {
  titles_category_id_categories_id_fk: 'Category',
  title_genres_genre_id_genres_id_fk: 'Genre',
  title_genres_title_id_titles_id_fk: 'Title',
  reviews_author_id_users_id_fk: 'User',
  reviews_title_id_titles_id_fk: 'Title',
  comments_author_id_users_id_fk: 'User',
  comments_review_id_reviews_id_fk: 'Review',
}

const CHECKS: Record<string, ConstraintInfo> = {
  reviews_score_range: { message: 'Score must be between 1 and 10', fields: ['score'] },
}

export interface PgErrorDetails {
  code: string
  constraint: string | undefined
}

/**
 * Find the driver error behind a Drizzle failure. Drizzle wraps query errors
 * and keeps the original as `cause`; postgres.js names the constraint
 * `constraint_name`, node-postgres style drivers (PGlite) name it `constraint`.
 */
export function pgErrorDetails(err: unknown): PgErrorDetails | undefined {
  let current: unknown = err
  for (let depth = 0; depth < 4 && current instanceof Error; depth++) {
    const code: unknown = Reflect.get(current, 'code')
    if (typeof code === 'string' && /^[0-9A-Z]{5}$/.test(code)) {
      const name: unknown = Reflect.get(current, 'constraint_name') ?? Reflect.get(current, 'constraint')
      return { code, constraint: typeof name === 'string' ? name : undefined }
    }
    current = current.cause
  }
  return undefined
}

/**
 * Translate a constraint violation into the layer's error taxonomy.
 * Returns the original error untouched for anything else.
 */
export function translateDbError(err: unknown): unknown {
  const details = pgErrorDetails(err)
  if (!details) return err

  const constraint = details.constraint ?? 'unknown'

  switch (details.code) {
    case UNIQUE_VIOLATION: {
      const info = UNIQUE_CONSTRAINTS[constraint]
      return new UniquenessError(
        info?.message ?? `Unique constraint ${constraint} violated`,
        constraint,
        info?.fields ?? []
      )
    }
    case FOREIGN_KEY_VIOLATION: {
      const entity = FOREIGN_KEYS[constraint] ?? 'Referenced record'
      return new NotFoundError(`${entity} not found`)
    }
    case CHECK_VIOLATION: {
      const info = CHECKS[constraint]
      return new ValidationError(
        info?.message ?? `Check constraint ${constraint} violated`,
        (info?.fields ?? []).map((path) => ({ path, message: info?.message ?? constraint }))
      )
    }
    default:
      return err
  }
}

/**
 * Log and rethrow a failed write. Constraint violations and the layer's own
 * errors are rejected writes (warn); anything else is a storage failure
 * (error) and propagates unchanged.
 */
export function rethrowWriteError(
  err: unknown,
  logger: Logger,
  context: Record<string, unknown>,
  action: string
): never {
  const translated = translateDbError(err)
  if (translated instanceof ApiError) {
    logger.warn({ ...context, reason: translated.message }, `Rejected ${action}`)
    throw translated
  }
  logger.error({ err, ...context }, `Failed to ${action}`)
  throw err
}
