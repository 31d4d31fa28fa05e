import { asc, eq } from 'drizzle-orm'
import { comments } from '../db/schema/comments.js'
import type { Comment } from '../db/schema/comments.js'
import { reviews } from '../db/schema/reviews.js'
import type { Database } from '../db/index.js'
import { rethrowWriteError } from '../db/errors.js'
import { notFound } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'
import { parseInput } from '../validation/parse.js'
import { createCommentSchema, updateCommentSchema } from '../validation/comments.js'
import type { CreateCommentInput, UpdateCommentInput } from '../validation/comments.js'

export interface CommentService {
  createComment(input: CreateCommentInput): Promise<Comment>
  getComment(id: number): Promise<Comment>
  listComments(reviewId: number): Promise<Comment[]>
  updateComment(id: number, patch: UpdateCommentInput): Promise<Comment>
  deleteComment(id: number): Promise<void>
}

export function createCommentService(db: Database, logger: Logger): CommentService {
  // A missing review or author fails on its foreign key and comes back as NotFoundError.
  async function createComment(input: CreateCommentInput): Promise<Comment> {
    try {
      const data = parseInput(createCommentSchema, input)
      const [row] = await db.insert(comments).values(data).returning()
      if (!row) {
        throw new Error('Comment insert returned no row')
      }

      logger.info({ commentId: row.id, reviewId: row.reviewId, authorId: row.authorId }, 'Created comment')
      return row
    } catch (err: unknown) {
      rethrowWriteError(
        err,
        logger,
        { reviewId: input.reviewId, authorId: input.authorId },
        'create comment'
      )
    }
  }

  async function getComment(id: number): Promise<Comment> {
    const [row] = await db.select().from(comments).where(eq(comments.id, id))
    if (!row) {
      throw notFound('Comment', id)
    }
    return row
  }

  /** Comments on a review, oldest first. */
  async function listComments(reviewId: number): Promise<Comment[]> {
    const [review] = await db.select({ id: reviews.id }).from(reviews).where(eq(reviews.id, reviewId))
    if (!review) {
      throw notFound('Review', reviewId)
    }

    return await db
      .select()
      .from(comments)
      .where(eq(comments.reviewId, reviewId))
      .orderBy(asc(comments.pubDate), asc(comments.id))
  }

  async function updateComment(id: number, patch: UpdateCommentInput): Promise<Comment> {
    try {
      const data = parseInput(updateCommentSchema, patch)
      const [row] = await db
        .update(comments)
        .set({ text: data.text })
        .where(eq(comments.id, id))
        .returning()
      if (!row) {
        throw notFound('Comment', id)
      }

      logger.info({ commentId: id }, 'Updated comment')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { commentId: id }, 'update comment')
    }
  }

  async function deleteComment(id: number): Promise<void> {
    try {
      const removed = await db.delete(comments).where(eq(comments.id, id)).returning({ id: comments.id })
      if (removed.length === 0) {
        throw notFound('Comment', id)
      }

      logger.info({ commentId: id }, 'Deleted comment')
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { commentId: id }, 'delete comment')
    }
  }

  return { createComment, getComment, listComments, updateComment, deleteComment }
}
