import { pgTable, unique } from 'drizzle-orm/pg-core'
import { slugNameColumns } from './slug-columns.js'

export const categories = pgTable('categories', slugNameColumns(), (table) => [
  unique('categories_slug_uniq').on(table.slug),
])

export type Category = typeof categories.$inferSelect
