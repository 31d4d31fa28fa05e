import { z } from 'zod/v4'

const textSchema = z.string().trim().min(1, 'Text is required')

export const createCommentSchema = z.object({
  authorId: z.number().int().positive(),
  reviewId: z.number().int().positive(),
  text: textSchema,
})

export type CreateCommentInput = z.input<typeof createCommentSchema>

export const updateCommentSchema = z.object({
  text: textSchema,
})

export type UpdateCommentInput = z.input<typeof updateCommentSchema>
