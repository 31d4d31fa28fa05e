import { pgTable, text, varchar, integer, index, primaryKey } from 'drizzle-orm/pg-core'
import { categories } from './categories.js'
import { genres } from './genres.js'

export const titles = pgTable(
  'titles',
  {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    name: varchar('name', { length: 256 }).notNull(),
    /** Release year. Never later than the current year at write time (checked in the service). */
    year: integer('year').notNull(),
    description: text('description').notNull(),
    // Titles outlive their category.
    categoryId: integer('category_id').references(() => categories.id, { onDelete: 'set null' }),
  },
  (table) => [
    index('titles_category_id_idx').on(table.categoryId),
    index('titles_year_idx').on(table.year),
  ]
)

export const titleGenres = pgTable(
  'title_genres',
  {
    titleId: integer('title_id')
      .notNull()
      .references(() => titles.id, { onDelete: 'cascade' }),
    genreId: integer('genre_id')
      .notNull()
      .references(() => genres.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ name: 'title_genres_pk', columns: [table.titleId, table.genreId] }),
    index('title_genres_genre_id_idx').on(table.genreId),
  ]
)

export type Title = typeof titles.$inferSelect
