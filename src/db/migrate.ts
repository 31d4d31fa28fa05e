import { fileURLToPath } from 'node:url'
import { migrate } from 'drizzle-orm/postgres-js/migrator'
import { createDb } from './index.js'
import type { Logger } from '../lib/logger.js'

/** drizzle-kit's output folder (`out` in drizzle.config.ts). */
export const DEFAULT_MIGRATIONS_FOLDER = fileURLToPath(new URL('../../drizzle/', import.meta.url))

/**
 * Apply pending drizzle-kit migrations over a single non-pooled connection,
 * closed once the run finishes.
 */
export async function runMigrations(
  databaseUrl: string,
  logger: Logger,
  migrationsFolder: string = DEFAULT_MIGRATIONS_FOLDER
): Promise<void> {
  const { db, client } = createDb(databaseUrl, { max: 1 })
  try {
    await migrate(db, { migrationsFolder })
    logger.info({ migrationsFolder }, 'Migrations applied')
  } catch (err: unknown) {
    logger.error({ err, migrationsFolder }, 'Migration failed')
    throw err
  } finally {
    await client.end()
  }
}
