import { asc, eq } from 'drizzle-orm'
import { reviews } from '../db/schema/reviews.js'
import type { Review } from '../db/schema/reviews.js'
import { titles } from '../db/schema/titles.js'
import { comments } from '../db/schema/comments.js'
import type { Database } from '../db/index.js'
import { rethrowWriteError } from '../db/errors.js'
import { notFound } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'
import { parseInput } from '../validation/parse.js'
import { createReviewSchema, updateReviewSchema } from '../validation/reviews.js'
import type { CreateReviewInput, UpdateReviewInput } from '../validation/reviews.js'

export interface DeleteReviewResult {
  comments: number
}

export interface ReviewService {
  createReview(input: CreateReviewInput): Promise<Review>
  getReview(id: number): Promise<Review>
  listReviews(titleId: number): Promise<Review[]>
  updateReview(id: number, patch: UpdateReviewInput): Promise<Review>
  deleteReview(id: number): Promise<DeleteReviewResult>
}

/**
 * Create the review service.
 *
 * One review per (author, title) is guaranteed by the
 * `reviews_author_title_uniq` constraint rather than a read-then-write check.
 *
 * @param db - Drizzle database instance
 * @param logger - Pino logger instance
 */
export function createReviewService(db: Database, logger: Logger): ReviewService {
  async function createReview(input: CreateReviewInput): Promise<Review> {
    try {
      const data = parseInput(createReviewSchema, input)
      const [row] = await db.insert(reviews).values(data).returning()
      if (!row) {
        throw new Error('Review insert returned no row')
      }

      logger.info(
        { reviewId: row.id, authorId: row.authorId, titleId: row.titleId, score: row.score },
        'Created review'
      )
      return row
    } catch (err: unknown) {
      rethrowWriteError(
        err,
        logger,
        { authorId: input.authorId, titleId: input.titleId },
        'create review'
      )
    }
  }

  async function getReview(id: number): Promise<Review> {
    const [row] = await db.select().from(reviews).where(eq(reviews.id, id))
    if (!row) {
      throw notFound('Review', id)
    }
    return row
  }

  /** Reviews of a title, oldest first. */
  async function listReviews(titleId: number): Promise<Review[]> {
    const [title] = await db.select({ id: titles.id }).from(titles).where(eq(titles.id, titleId))
    if (!title) {
      throw notFound('Title', titleId)
    }

    return await db
      .select()
      .from(reviews)
      .where(eq(reviews.titleId, titleId))
      .orderBy(asc(reviews.pubDate), asc(reviews.id))
  }

  /** Edit text and/or score. The publication date is left as it was. */
  async function updateReview(id: number, patch: UpdateReviewInput): Promise<Review> {
    try {
      const data = parseInput(updateReviewSchema, patch)
      if (data.text === undefined && data.score === undefined) {
        return await getReview(id)
      }

      const [row] = await db.update(reviews).set(data).where(eq(reviews.id, id)).returning()
      if (!row) {
        throw notFound('Review', id)
      }

      logger.info({ reviewId: id }, 'Updated review')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { reviewId: id }, 'update review')
    }
  }

  async function deleteReview(id: number): Promise<DeleteReviewResult> {
    try {
      const result = await db.transaction(async (tx) => {
        const [existing] = await tx.select({ id: reviews.id }).from(reviews).where(eq(reviews.id, id))
        if (!existing) {
          throw notFound('Review', id)
        }

        const removedComments = await tx
          .delete(comments)
          .where(eq(comments.reviewId, id))
          .returning({ id: comments.id })

        await tx.delete(reviews).where(eq(reviews.id, id))

        return { comments: removedComments.length }
      })

      logger.info({ reviewId: id, ...result }, 'Deleted review')
      return result
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { reviewId: id }, 'delete review')
    }
  }

  return { createReview, getReview, listReviews, updateReview, deleteReview }
}
