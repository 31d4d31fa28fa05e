import { z } from 'zod/v4'
import { USER_ROLES } from '../db/schema/users.js'
import { atMostChars } from './length.js'

export const roleSchema = z.enum(USER_ROLES)

const usernameSchema = z
  .string()
  .trim()
  .min(1, 'Username is required')
  .refine(atMostChars(150), 'Username must be at most 150 characters')

const emailSchema = z
  .email('Enter a valid email address')
  .refine(atMostChars(254), 'Email must be at most 254 characters')

const nameSchema = (label: string) =>
  z.string().refine(atMostChars(150), `${label} must be at most 150 characters`).nullable()

/** Schema for registering a new user. */
export const createUserSchema = z.object({
  username: usernameSchema,
  email: emailSchema,
  firstName: nameSchema('First name').optional(),
  lastName: nameSchema('Last name').optional(),
  bio: z.string().nullable().optional(),
  role: roleSchema.default('user'),
  isSuperuser: z.boolean().default(false),
  isStaff: z.boolean().default(false),
})

export type CreateUserInput = z.input<typeof createUserSchema>

/** Schema for profile edits. Role changes go through setRole instead. */
export const updateProfileSchema = z.object({
  username: usernameSchema.optional(),
  email: emailSchema.optional(),
  firstName: nameSchema('First name').optional(),
  lastName: nameSchema('Last name').optional(),
  bio: z.string().nullable().optional(),
})

export type UpdateProfileInput = z.input<typeof updateProfileSchema>
