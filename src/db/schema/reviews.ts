import { pgTable, text, integer, timestamp, index, unique, check } from 'drizzle-orm/pg-core'
import { sql } from 'drizzle-orm'
import { users } from './users.js'
import { titles } from './titles.js'

export const SCORE_MIN = 1
export const SCORE_MAX = 10

export const reviews = pgTable(
  'reviews',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    text: text('text').notNull(),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    score: integer('score').notNull(),
    /** Set once on insert; updates never touch it. */
    pubDate: timestamp('pub_date', { withTimezone: true }).notNull().defaultNow(),
    titleId: integer('title_id')
      .notNull()
      .references(() => titles.id, { onDelete: 'cascade' }),
  },
  (table) => [
    unique('reviews_author_title_uniq').on(table.authorId, table.titleId),
    check('reviews_score_range', sql`${table.score} BETWEEN 1 AND 10`),
    index('reviews_title_id_pub_date_idx').on(table.titleId, table.pubDate),
  ]
)

export type Review = typeof reviews.$inferSelect
