import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { mkdirSync, readdirSync, readFileSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { config } from '@infrastructure/config.ts'
import * as schema from './schema.ts'

const MIGRATIONS_DIR = path.join(path.dirname(fileURLToPath(import.meta.url)), 'migrations')

export type AppDatabase = BetterSQLite3Database<typeof schema>

/**
 * Apply every `migrations/*.sql` file not yet recorded in `schema_migrations`,
 * in file-name order.
 */
function applyMigrations(sqlite: Database.Database): void {
  sqlite.exec('CREATE TABLE IF NOT EXISTS schema_migrations (name TEXT PRIMARY KEY, applied_at TEXT NOT NULL)')

  const applied = new Set(
    sqlite
      .prepare('SELECT name FROM schema_migrations')
      .pluck()
      .all()
      .filter((name): name is string => typeof name === 'string'),
  )
  const pending = readdirSync(MIGRATIONS_DIR)
    .filter((file) => file.endsWith('.sql') && !applied.has(file))
    .sort()

  const record = sqlite.prepare('INSERT INTO schema_migrations (name, applied_at) VALUES (?, ?)')
  for (const file of pending) {
    const ddl = readFileSync(path.join(MIGRATIONS_DIR, file), 'utf-8')
    sqlite.transaction(() => {
      sqlite.exec(ddl)
      record.run(file, new Date().toISOString())
    })()
  }
}

export function openDatabase(url: string): Database.Database {
  if (url !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(url)), { recursive: true })
  }

  const sqlite = new Database(url)
  sqlite.pragma('journal_mode = WAL')
  sqlite.pragma('foreign_keys = ON')
  // Unicode-aware lowercase; SQLite's own lower() only folds ASCII
  sqlite.function('casefold', { deterministic: true }, (value: unknown) =>
    typeof value === 'string' ? value.toLowerCase() : value,
  )

  applyMigrations(sqlite)
  return sqlite
}

export const sqlite = openDatabase(config.databaseUrl)
export const db: AppDatabase = drizzle(sqlite, { schema })
