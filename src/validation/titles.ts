import { z } from 'zod/v4'
import { MIN_RELEASE_YEAR, releaseYearSchema } from './year.js'
import { atMostChars } from './length.js'

const idSchema = z.number().int().positive()

const descriptionSchema = z.string('Description is required').trim().min(1, 'Description is required')

const nameSchema = z
  .string()
  .trim()
  .min(1, 'Name is required')
  .refine(atMostChars(256), 'Name must be at most 256 characters')

/** Schema for creating a title. Category and genres are optional. */
export const createTitleSchema = z.object({
  name: nameSchema,
  year: releaseYearSchema,
  description: descriptionSchema,
  categoryId: idSchema.nullable().optional(),
  genreIds: z.array(idSchema).optional(),
})

export type CreateTitleInput = z.input<typeof createTitleSchema>

/** Schema for updating a title. `genreIds` replaces the whole genre set. */
export const updateTitleSchema = z.object({
  name: nameSchema.optional(),
  year: releaseYearSchema.optional(),
  description: descriptionSchema.optional(),
  categoryId: idSchema.nullable().optional(),
  genreIds: z.array(idSchema).optional(),
})

export type UpdateTitleInput = z.input<typeof updateTitleSchema>

export const titleFilterSchema = z.object({
  categorySlug: z.string().optional(),
  genreSlug: z.string().optional(),
  name: z.string().optional(),
  // Upper bound is Postgres `integer`; a later year simply matches nothing.
  year: z.number().int().min(MIN_RELEASE_YEAR).max(2_147_483_647).optional(),
})

export type TitleFilter = z.input<typeof titleFilterSchema>
