import { integer, varchar } from 'drizzle-orm/pg-core'

/**
 * Columns shared by categories and genres. Spread into each table so the two
 * stay independent records with the same shape.
 */
export function slugNameColumns() {
  return {
    id: integer('id').primaryKey().generatedAlwaysAsIdentity(),
    name: varchar('name', { length: 256 }).notNull(),
    slug: varchar('slug', { length: 50 }).notNull(),
  }
}
