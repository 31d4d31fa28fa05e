import { pgTable, text, integer, timestamp, index } from 'drizzle-orm/pg-core'
import { users } from './users.js'
import { reviews } from './reviews.js'

export const comments = pgTable(
  'comments',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    text: text('text').notNull(),
    authorId: integer('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    pubDate: timestamp('pub_date', { withTimezone: true }).notNull().defaultNow(),
    // Comments hang off reviews only; deleting a title reaches them through its reviews.
    reviewId: integer('review_id')
      .notNull()
      .references(() => reviews.id, { onDelete: 'cascade' }),
  },
  (table) => [
    index('comments_review_id_pub_date_idx').on(table.reviewId, table.pubDate),
    index('comments_author_id_idx').on(table.authorId),
  ]
)

export type Comment = typeof comments.$inferSelect
