import { z } from 'zod/v4'
import { SCORE_MAX, SCORE_MIN } from '../db/schema/reviews.js'

const scoreMessage = `Score must be between ${String(SCORE_MIN)} and ${String(SCORE_MAX)}`

export const scoreSchema = z
  .number()
  .int('Score must be an integer')
  .min(SCORE_MIN, scoreMessage)
  .max(SCORE_MAX, scoreMessage)

const textSchema = z.string().trim().min(1, 'Text is required')

export const createReviewSchema = z.object({
  authorId: z.number().int().positive(),
  titleId: z.number().int().positive(),
  text: textSchema,
  score: scoreSchema,
})

export type CreateReviewInput = z.input<typeof createReviewSchema>

export const updateReviewSchema = z.object({
  text: textSchema.optional(),
  score: scoreSchema.optional(),
})

export type UpdateReviewInput = z.input<typeof updateReviewSchema>
