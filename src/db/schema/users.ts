import { pgTable, text, varchar, boolean, integer, timestamp, index, unique } from 'drizzle-orm/pg-core'
import { sql } from 'drizzle-orm'

export const USER_ROLES = ['user', 'moderator', 'admin'] as const

export type UserRole = (typeof USER_ROLES)[number]

export const users = pgTable(
  'users',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    username: varchar('username', { length: 150 }).notNull(),
    email: varchar('email', { length: 254 }).notNull(),
    firstName: varchar('first_name', { length: 150 }),
    lastName: varchar('last_name', { length: 150 }),
    bio: text('bio'),
    role: text('role', { enum: USER_ROLES }).notNull().default('user'),
    /** Elevated access flag, independent of role. Grants admin on its own. */
    isSuperuser: boolean('is_superuser').notNull().default(false),
    isStaff: boolean('is_staff').notNull().default(false),
    isActive: boolean('is_active').notNull().default(true),
    dateJoined: timestamp('date_joined', { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [
    unique('users_username_uniq').on(table.username),
    unique('users_email_uniq').on(table.email),
    index('users_role_elevated_idx')
      .on(table.role)
      .where(sql`role IN ('moderator', 'admin')`),
  ]
)

export type User = typeof users.$inferSelect
export type NewUser = typeof users.$inferInsert
