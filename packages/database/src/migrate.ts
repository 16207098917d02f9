import { Kysely, Migrator, PostgresDialect, SqliteDialect, type Migration } from 'kysely'
import { Pool } from 'pg'
import { pathToFileURL } from 'node:url'
import { createLogger, describeError } from '@fleetwise/core'
import { DEFAULT_SQLITE_PATH, isPostgresUrl, openSqlite, type BetterSqlite3Database } from './db'
import type { Database } from './types'
import * as initialSchema from '../migrations/20261019_000001_initial_schema'

const log = createLogger('Migrate')

// Registered explicitly so migrations load the same way under Vitest, tsx and a bundle
const MIGRATIONS: Record<string, Migration> = {
  '20261019_000001_initial_schema': initialSchema,
}

/**
 * Applies every pending migration on an existing connection.
 * Throws when any migration fails.
 */
export async function migrateToLatest(db: Kysely<Database>): Promise<string[]> {
  const migrator = new Migrator({
    db,
    provider: {
      getMigrations: () => Promise.resolve(MIGRATIONS),
    },
  })

  const { error, results } = await migrator.migrateToLatest()
  const applied: string[] = []

  for (const result of results ?? []) {
    if (result.status === 'Success') {
      applied.push(result.migrationName)
      log.debug(`✓ ${result.migrationName}`)
    } else if (result.status === 'Error') {
      log.error(`✗ ${result.migrationName}`)
    }
  }

  if (error) {
    throw error instanceof Error ? error : new Error(describeError(error))
  }

  return applied
}

/**
 * Run database migrations against DATABASE_URL
 * (a postgres:// URL or a SQLite file path, defaulting to the package-local file).
 */
export async function runMigrations(): Promise<void> {
  const dbUrl = process.env.DATABASE_URL || DEFAULT_SQLITE_PATH
  const isPostgres = isPostgresUrl(dbUrl)

  log.info(`Running migrations for ${isPostgres ? 'PostgreSQL' : 'SQLite'}...`)
  log.info(`Database: ${isPostgres ? '[postgres connection]' : dbUrl}`)

  let db: Kysely<Database>
  let pool: Pool | null = null
  let sqlite: BetterSqlite3Database | null = null

  if (isPostgres) {
    pool = new Pool({ connectionString: dbUrl })
    db = new Kysely<Database>({
      dialect: new PostgresDialect({ pool }),
    })
  } else {
    sqlite = openSqlite(dbUrl)
    db = new Kysely<Database>({
      dialect: new SqliteDialect({ database: sqlite }),
    })
  }

  try {
    const applied = await migrateToLatest(db)
    if (applied.length === 0) {
      log.info('No pending migrations')
    } else {
      log.info(`Applied ${applied.length} migration(s): ${applied.join(', ')}`)
    }
  } catch (error) {
    log.error('Migration failed', error)
    throw error
  } finally {
    await db.destroy()
    if (pool) await pool.end()
    if (sqlite) sqlite.close()
  }
}

const isDirectRun =
  typeof process.argv[1] === 'string' && import.meta.url === pathToFileURL(process.argv[1]).href

if (isDirectRun) {
  runMigrations().catch(() => process.exit(1))
}
