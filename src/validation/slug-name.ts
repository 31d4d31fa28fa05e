import { z } from 'zod/v4'
import { atMostChars } from './length.js'

/** Letters, digits, hyphens and underscores. */
export const slugPattern = /^[-a-zA-Z0-9_]+$/

/** Fields shared by categories and genres. */
export const slugNameSchema = z.object({
  name: z
    .string()
    .trim()
    .min(1, 'Name is required')
    .refine(atMostChars(256), 'Name must be at most 256 characters'),
  slug: z
    .string()
    .min(1, 'Slug is required')
    .refine(atMostChars(50), 'Slug must be at most 50 characters')
    .regex(slugPattern, 'Slug may contain only letters, digits, hyphens and underscores'),
})

export type SlugNameInput = z.input<typeof slugNameSchema>
