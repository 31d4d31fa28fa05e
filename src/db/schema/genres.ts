import { pgTable, unique } from 'drizzle-orm/pg-core'
import { slugNameColumns } from './slug-columns.js'

export const genres = pgTable('genres', slugNameColumns(), (table) => [
  unique('genres_slug_uniq').on(table.slug),
])

export type Genre = typeof genres.$inferSelect
