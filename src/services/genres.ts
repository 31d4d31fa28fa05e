import { asc, eq } from 'drizzle-orm'
import { genres } from '../db/schema/genres.js'
import type { Genre } from '../db/schema/genres.js'
import { titleGenres } from '../db/schema/titles.js'
import type { Database } from '../db/index.js'
import { rethrowWriteError } from '../db/errors.js'
import { notFound } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'
import { parseInput } from '../validation/parse.js'
import { slugNameSchema } from '../validation/slug-name.js'
import type { SlugNameInput } from '../validation/slug-name.js'

export interface DeleteGenreResult {
  /** Title links dropped with the genre. */
  unlinkedTitles: number
}

export interface GenreService {
  createGenre(input: SlugNameInput): Promise<Genre>
  getGenre(slug: string): Promise<Genre>
  listGenres(): Promise<Genre[]>
  deleteGenre(slug: string): Promise<DeleteGenreResult>
}

export function createGenreService(db: Database, logger: Logger): GenreService {
  async function createGenre(input: SlugNameInput): Promise<Genre> {
    try {
      const data = parseInput(slugNameSchema, input)
      const [row] = await db.insert(genres).values(data).returning()
      if (!row) {
        throw new Error('Genre insert returned no row')
      }

      logger.info({ genreId: row.id, slug: row.slug }, 'Created genre')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { slug: input.slug }, 'create genre')
    }
  }

  async function getGenre(slug: string): Promise<Genre> {
    const [row] = await db.select().from(genres).where(eq(genres.slug, slug))
    if (!row) {
      throw notFound('Genre', slug)
    }
    return row
  }

  async function listGenres(): Promise<Genre[]> {
    return await db.select().from(genres).orderBy(asc(genres.name), asc(genres.id))
  }

  /** Remove a genre and its title links. The titles themselves are untouched. */
  async function deleteGenre(slug: string): Promise<DeleteGenreResult> {
    try {
      const result = await db.transaction(async (tx) => {
        const [existing] = await tx.select({ id: genres.id }).from(genres).where(eq(genres.slug, slug))
        if (!existing) {
          throw notFound('Genre', slug)
        }

        const unlinked = await tx
          .delete(titleGenres)
          .where(eq(titleGenres.genreId, existing.id))
          .returning({ titleId: titleGenres.titleId })

        await tx.delete(genres).where(eq(genres.id, existing.id))

        return { unlinkedTitles: unlinked.length }
      })

      logger.info({ slug, ...result }, 'Deleted genre')
      return result
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { slug }, 'delete genre')
    }
  }

  return { createGenre, getGenre, listGenres, deleteGenre }
}
