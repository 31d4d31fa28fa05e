import { and, eq, getTableName, inArray } from 'drizzle-orm'
import { pgSchema, text } from 'drizzle-orm/pg-core'
import type { Database } from './index.js'
import { categories, comments, genres, reviews, titleGenres, titles, users } from './schema/index.js'

const informationSchema = pgSchema('information_schema')

const catalogTables = informationSchema.table('tables', {
  tableSchema: text('table_schema').notNull(),
  tableName: text('table_name').notNull(),
})

export const SCHEMA_TABLES: readonly string[] = [
  users,
  categories,
  genres,
  titles,
  titleGenres,
  reviews,
  comments,
].map((table) => getTableName(table))

/** Names of the application's tables that do not exist in `public`. */
export async function missingTables(db: Database): Promise<string[]> {
  const rows = await db
    .select({ name: catalogTables.tableName })
    .from(catalogTables)
    .where(
      and(eq(catalogTables.tableSchema, 'public'), inArray(catalogTables.tableName, [...SCHEMA_TABLES]))
    )
  const present = new Set(rows.map((row) => row.name))
  return SCHEMA_TABLES.filter((name) => !present.has(name))
}
