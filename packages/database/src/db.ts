import { Kysely, SqliteDialect, PostgresDialect } from 'kysely'
import { createRequire } from 'module'
import { Pool } from 'pg'
import { existsSync, mkdirSync } from 'fs'
import { dirname, resolve } from 'path'
import { fileURLToPath } from 'url'
import type { Database } from './types'

// Resolve default SQLite path relative to this package, not CWD
const __dirname = dirname(fileURLToPath(import.meta.url))
export const DEFAULT_SQLITE_PATH = resolve(__dirname, '..', 'data', 'fleetwise.db')

// better-sqlite3 is a native module; load it lazily so postgres deployments never touch it
const require = createRequire(import.meta.url)

type SqliteStatement = {
  readonly reader: boolean
  all(parameters?: unknown): unknown[]
  get(parameters?: unknown): unknown
  run(parameters?: unknown): {
    changes: number | bigint
    lastInsertRowid: number | bigint
  }
  iterate(parameters?: unknown): IterableIterator<unknown>
}

// Extended type for better-sqlite3 database with pragma support
export type BetterSqlite3Database = {
  close(): void
  prepare(sql: string): SqliteStatement
  pragma(source: string): unknown
}

let db: Kysely<Database> | null = null
let sqliteConnection: BetterSqlite3Database | null = null
let pgPool: Pool | null = null

export type DatabaseType = 'sqlite' | 'postgres'

export function isPostgresUrl(url: string): boolean {
  return url.startsWith('postgres://') || url.startsWith('postgresql://')
}

export function getDatabaseType(): DatabaseType {
  const dbUrl = process.env.DATABASE_URL
  if (dbUrl && isPostgresUrl(dbUrl)) {
    return 'postgres'
  }
  return 'sqlite'
}

export function openSqlite(dbPath: string): BetterSqlite3Database {
  const Database = require('better-sqlite3') as new (path: string) => BetterSqlite3Database
  // Ensure directory exists
  const dir = dirname(dbPath)
  if (dir && dir !== '.' && !existsSync(dir)) {
    mkdirSync(dir, { recursive: true })
  }
  const connection = new Database(dbPath)
  connection.pragma('journal_mode = WAL')
  return connection
}

export function getDb(): Kysely<Database> {
  if (db) {
    return db
  }

  if (getDatabaseType() === 'postgres') {
    pgPool = new Pool({ connectionString: process.env.DATABASE_URL })
    db = new Kysely<Database>({
      dialect: new PostgresDialect({
        pool: pgPool,
      }),
    })
  } else {
    sqliteConnection = openSqlite(process.env.DATABASE_URL || DEFAULT_SQLITE_PATH)
    db = new Kysely<Database>({
      dialect: new SqliteDialect({
        database: sqliteConnection,
      }),
    })
  }

  return db
}

export async function closeDb(): Promise<void> {
  if (db) {
    await db.destroy()
    db = null
  }
  if (pgPool) {
    await pgPool.end()
    pgPool = null
  }
  if (sqliteConnection) {
    sqliteConnection.close()
    sqliteConnection = null
  }
}

// Re-export types
export type { Database } from './types'
