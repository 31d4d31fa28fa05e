import { and, asc, avg, eq, ilike, inArray } from 'drizzle-orm'
import type { SQL } from 'drizzle-orm'
import { titles, titleGenres } from '../db/schema/titles.js'
import type { Title } from '../db/schema/titles.js'
import { categories } from '../db/schema/categories.js'
import type { Category } from '../db/schema/categories.js'
import { genres } from '../db/schema/genres.js'
import type { Genre } from '../db/schema/genres.js'
import { reviews } from '../db/schema/reviews.js'
import { comments } from '../db/schema/comments.js'
import type { Database } from '../db/index.js'
import { rethrowWriteError } from '../db/errors.js'
import { notFound } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'
import { parseInput } from '../validation/parse.js'
import { createTitleSchema, titleFilterSchema, updateTitleSchema } from '../validation/titles.js'
import type { CreateTitleInput, TitleFilter, UpdateTitleInput } from '../validation/titles.js'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** A title with its category, genres and average review score. */
export interface TitleDetail extends Title {
  category: Category | null
  genres: Genre[]
  /** Mean review score rounded to the nearest integer; null before the first review. */
  rating: number | null
}

export interface DeleteTitleResult {
  reviews: number
  comments: number
}

export interface TitleService {
  createTitle(input: CreateTitleInput): Promise<TitleDetail>
  getTitle(id: number): Promise<TitleDetail>
  listTitles(filter?: TitleFilter): Promise<Title[]>
  updateTitle(id: number, patch: UpdateTitleInput): Promise<TitleDetail>
  deleteTitle(id: number): Promise<DeleteTitleResult>
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Escape LIKE wildcards so user text matches literally. */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`)
}

/** Insert genre links for a title. Unknown genre ids fail on the foreign key. */
async function linkGenres(db: Database, titleId: number, genreIds: number[] | undefined) {
  const unique = [...new Set(genreIds ?? [])]
  if (unique.length === 0) return
  await db.insert(titleGenres).values(unique.map((genreId) => ({ titleId, genreId })))
}

async function loadDetail(db: Database, id: number): Promise<TitleDetail> {
  const [row] = await db
    .select({ title: titles, category: categories })
    .from(titles)
    .leftJoin(categories, eq(titles.categoryId, categories.id))
    .where(eq(titles.id, id))
  if (!row) {
    throw notFound('Title', id)
  }

  const genreRows = await db
    .select({ genre: genres })
    .from(titleGenres)
    .innerJoin(genres, eq(titleGenres.genreId, genres.id))
    .where(eq(titleGenres.titleId, id))
    .orderBy(asc(genres.name), asc(genres.id))

  const [stats] = await db
    .select({ rating: avg(reviews.score) })
    .from(reviews)
    .where(eq(reviews.titleId, id))

  const average = stats?.rating
  return {
    ...row.title,
    category: row.category,
    genres: genreRows.map((r) => r.genre),
    rating: average == null ? null : Math.round(Number(average)),
  }
}

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create the title service.
 *
 * The release year is validated on every write against the calendar year at
 * that moment, so a year accepted today is never re-checked later.
 *
 * @param db - Drizzle database instance
 * @param logger - Pino logger instance
 */
export function createTitleService(db: Database, logger: Logger): TitleService {
  async function createTitle(input: CreateTitleInput): Promise<TitleDetail> {
    try {
      const data = parseInput(createTitleSchema, input)

      const id = await db.transaction(async (tx) => {
        const [row] = await tx
          .insert(titles)
          .values({
            name: data.name,
            year: data.year,
            description: data.description,
            categoryId: data.categoryId ?? null,
          })
          .returning({ id: titles.id })
        if (!row) {
          throw new Error('Title insert returned no row')
        }

        await linkGenres(tx, row.id, data.genreIds)
        return row.id
      })

      logger.info({ titleId: id, year: data.year }, 'Created title')
      return await loadDetail(db, id)
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { name: input.name, year: input.year }, 'create title')
    }
  }

  async function getTitle(id: number): Promise<TitleDetail> {
    return await loadDetail(db, id)
  }

  async function listTitles(filter: TitleFilter = {}): Promise<Title[]> {
    const { categorySlug, genreSlug, name, year } = parseInput(titleFilterSchema, filter)
    const conditions: SQL[] = []

    if (categorySlug !== undefined) {
      conditions.push(
        inArray(
          titles.categoryId,
          db.select({ id: categories.id }).from(categories).where(eq(categories.slug, categorySlug))
        )
      )
    }
    if (genreSlug !== undefined) {
      conditions.push(
        inArray(
          titles.id,
          db
            .select({ id: titleGenres.titleId })
            .from(titleGenres)
            .innerJoin(genres, eq(titleGenres.genreId, genres.id))
            .where(eq(genres.slug, genreSlug))
        )
      )
    }
    if (name !== undefined) {
      conditions.push(ilike(titles.name, `%${escapeLike(name)}%`))
    }
    if (year !== undefined) {
      conditions.push(eq(titles.year, year))
    }

    return await db
      .select()
      .from(titles)
      .where(and(...conditions))
      .orderBy(asc(titles.id))
  }

  /** Update a title. A supplied `genreIds` replaces the existing genre set. */
  async function updateTitle(id: number, patch: UpdateTitleInput): Promise<TitleDetail> {
    try {
      const { genreIds, ...fields } = parseInput(updateTitleSchema, patch)

      await db.transaction(async (tx) => {
        const [existing] = await tx.select({ id: titles.id }).from(titles).where(eq(titles.id, id))
        if (!existing) {
          throw notFound('Title', id)
        }

        if (Object.values(fields).some((value) => value !== undefined)) {
          await tx.update(titles).set(fields).where(eq(titles.id, id))
        }

        if (genreIds !== undefined) {
          await tx.delete(titleGenres).where(eq(titleGenres.titleId, id))
          await linkGenres(tx, id, genreIds)
        }
      })

      logger.info({ titleId: id }, 'Updated title')
      return await loadDetail(db, id)
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { titleId: id }, 'update title')
    }
  }

  /**
   * Delete a title with its reviews and, through those reviews, their
   * comments. Genre links go too; the genres stay. One transaction.
   */
  async function deleteTitle(id: number): Promise<DeleteTitleResult> {
    try {
      const result = await db.transaction(async (tx) => {
        const [existing] = await tx.select({ id: titles.id }).from(titles).where(eq(titles.id, id))
        if (!existing) {
          throw notFound('Title', id)
        }

        const titleReviews = tx.select({ id: reviews.id }).from(reviews).where(eq(reviews.titleId, id))

        const removedComments = await tx
          .delete(comments)
          .where(inArray(comments.reviewId, titleReviews))
          .returning({ id: comments.id })

        const removedReviews = await tx
          .delete(reviews)
          .where(eq(reviews.titleId, id))
          .returning({ id: reviews.id })

        await tx.delete(titleGenres).where(eq(titleGenres.titleId, id))
        await tx.delete(titles).where(eq(titles.id, id))

        return { reviews: removedReviews.length, comments: removedComments.length }
      })

      logger.info({ titleId: id, ...result }, 'Deleted title')
      return result
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { titleId: id }, 'delete title')
    }
  }

  return { createTitle, getTitle, listTitles, updateTitle, deleteTitle }
}
