import { eq, inArray, or } from 'drizzle-orm'
import { users } from '../db/schema/users.js'
import type { User, UserRole } from '../db/schema/users.js'
import { reviews } from '../db/schema/reviews.js'
import { comments } from '../db/schema/comments.js'
import type { Database } from '../db/index.js'
import { rethrowWriteError } from '../db/errors.js'
import { notFound } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'
import { parseInput } from '../validation/parse.js'
import { createUserSchema, roleSchema, updateProfileSchema } from '../validation/users.js'
import type { CreateUserInput, UpdateProfileInput } from '../validation/users.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Rows removed alongside a deleted user. */
export interface DeleteUserResult {
  reviews: number
  comments: number
}

/** User service interface for dependency injection and testing. */
export interface UserService {
  createUser(input: CreateUserInput): Promise<User>
  getUser(id: number): Promise<User>
  getUserByUsername(username: string): Promise<User>
  updateProfile(id: number, patch: UpdateProfileInput): Promise<User>
  setRole(id: number, role: UserRole): Promise<User>
  deleteUser(id: number): Promise<DeleteUserResult>
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the user service.
 *
 * Username and email uniqueness is left to the database constraints so that
 * concurrent registrations cannot both succeed; the violation surfaces as a
 * UniquenessError.
 *
 * @param db - Drizzle database instance
 * @param logger - Pino logger instance
 */
export function createUserService(db: Database, logger: Logger): UserService {
  async function createUser(input: CreateUserInput): Promise<User> {
    try {
      const data = parseInput(createUserSchema, input)

      const [row] = await db.insert(users).values(data).returning()
      if (!row) {
        throw new Error('User insert returned no row')
      }

      logger.info({ userId: row.id, username: row.username, role: row.role }, 'Created user')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { username: input.username }, 'create user')
    }
  }

  async function getUser(id: number): Promise<User> {
    const [row] = await db.select().from(users).where(eq(users.id, id))
    if (!row) {
      throw notFound('User', id)
    }
    return row
  }

  async function getUserByUsername(username: string): Promise<User> {
    const [row] = await db.select().from(users).where(eq(users.username, username))
    if (!row) {
      throw notFound('User', username)
    }
    return row
  }

  async function updateProfile(id: number, patch: UpdateProfileInput): Promise<User> {
    try {
      const data = parseInput(updateProfileSchema, patch)
      if (Object.values(data).every((value) => value === undefined)) {
        return await getUser(id)
      }

      const [row] = await db.update(users).set(data).where(eq(users.id, id)).returning()
      if (!row) {
        throw notFound('User', id)
      }

      logger.info({ userId: id }, 'Updated user profile')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { userId: id }, 'update user profile')
    }
  }

  /**
   * Change a user's role. Callers are expected to have checked that the
   * acting account is an admin.
   */
  async function setRole(id: number, role: UserRole): Promise<User> {
    try {
      const parsedRole = parseInput(roleSchema, role)
      const [row] = await db
        .update(users)
        .set({ role: parsedRole })
        .where(eq(users.id, id))
        .returning()
      if (!row) {
        throw notFound('User', id)
      }

      logger.info({ userId: id, role: parsedRole }, 'Changed user role')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { userId: id, role }, 'change user role')
    }
  }

  /**
   * Hard-delete a user together with everything they authored: their
   * comments, their reviews, and the comments other users left on those
   * reviews. Runs as a single transaction.
   */
  async function deleteUser(id: number): Promise<DeleteUserResult> {
    try {
      const result = await db.transaction(async (tx) => {
        const [existing] = await tx.select({ id: users.id }).from(users).where(eq(users.id, id))
        if (!existing) {
          throw notFound('User', id)
        }

        const authoredReviews = tx
          .select({ id: reviews.id })
          .from(reviews)
          .where(eq(reviews.authorId, id))

        const removedComments = await tx
          .delete(comments)
          .where(or(eq(comments.authorId, id), inArray(comments.reviewId, authoredReviews)))
          .returning({ id: comments.id })

        const removedReviews = await tx
          .delete(reviews)
          .where(eq(reviews.authorId, id))
          .returning({ id: reviews.id })

        await tx.delete(users).where(eq(users.id, id))

        return { reviews: removedReviews.length, comments: removedComments.length }
      })

      logger.info({ userId: id, ...result }, 'Deleted user')
      return result
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { userId: id }, 'delete user')
    }
  }

  return { createUser, getUser, getUserByUsername, updateProfile, setRole, deleteUser }
}
