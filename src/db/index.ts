import { drizzle } from 'drizzle-orm/postgres-js'
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core'
import postgres from 'postgres'
import * as schema from './schema/index.js'

export interface CreateDbOptions {
  /** Upper bound on pooled connections. */
  max?: number
}

export function createDb(databaseUrl: string, options: CreateDbOptions = {}) {
  const client = postgres(databaseUrl, {
    max: options.max ?? 20,
    idle_timeout: 30,
    connect_timeout: 5,
  })

  const db = drizzle(client, { schema })

  return { db, client }
}

/**
 * Any Postgres-backed Drizzle database over this schema. The production
 * driver is postgres.js; tests hand in an in-process PGlite instance.
 */
export type Database = PgDatabase<PgQueryResultHKT, typeof schema>

export { schema }

/** The handle Drizzle passes to a `db.transaction` callback. */
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0]
