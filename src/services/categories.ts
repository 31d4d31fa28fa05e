import { asc, eq } from 'drizzle-orm'
import { categories } from '../db/schema/categories.js'
import type { Category } from '../db/schema/categories.js'
import { titles } from '../db/schema/titles.js'
import type { Database } from '../db/index.js'
import { rethrowWriteError } from '../db/errors.js'
import { notFound } from '../lib/api-errors.js'
import type { Logger } from '../lib/logger.js'
import { parseInput } from '../validation/parse.js'
import { slugNameSchema } from '../validation/slug-name.js'
import type { SlugNameInput } from '../validation/slug-name.js'

export interface DeleteCategoryResult {
  /** Titles whose category reference was cleared. */
  detachedTitles: number
}

export interface CategoryService {
  createCategory(input: SlugNameInput): Promise<Category>
  getCategory(slug: string): Promise<Category>
  listCategories(): Promise<Category[]>
  deleteCategory(slug: string): Promise<DeleteCategoryResult>
}

export function createCategoryService(db: Database, logger: Logger): CategoryService {
  async function createCategory(input: SlugNameInput): Promise<Category> {
    try {
      const data = parseInput(slugNameSchema, input)
      const [row] = await db.insert(categories).values(data).returning()
      if (!row) {
        throw new Error('Category insert returned no row')
      }

      logger.info({ categoryId: row.id, slug: row.slug }, 'Created category')
      return row
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { slug: input.slug }, 'create category')
    }
  }

  async function getCategory(slug: string): Promise<Category> {
    const [row] = await db.select().from(categories).where(eq(categories.slug, slug))
    if (!row) {
      throw notFound('Category', slug)
    }
    return row
  }

  async function listCategories(): Promise<Category[]> {
    return await db.select().from(categories).orderBy(asc(categories.name), asc(categories.id))
  }

  /** Remove a category. Its titles survive with no category. */
  async function deleteCategory(slug: string): Promise<DeleteCategoryResult> {
    try {
      const result = await db.transaction(async (tx) => {
        const [existing] = await tx
          .select({ id: categories.id })
          .from(categories)
          .where(eq(categories.slug, slug))
        if (!existing) {
          throw notFound('Category', slug)
        }

        const detached = await tx
          .update(titles)
          .set({ categoryId: null })
          .where(eq(titles.categoryId, existing.id))
          .returning({ id: titles.id })

        await tx.delete(categories).where(eq(categories.id, existing.id))

        return { detachedTitles: detached.length }
      })

      logger.info({ slug, ...result }, 'Deleted category')
      return result
    } catch (err: unknown) {
      rethrowWriteError(err, logger, { slug }, 'delete category')
    }
  }

  return { createCategory, getCategory, listCategories, deleteCategory }
}
