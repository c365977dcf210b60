import Database from "better-sqlite3"
import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3"

import type { Logger } from "../types.js"
import { parseConnectionString } from "./connection-string.js"

export type SqliteDatabase = Database.Database

export type Connection<TSchema extends Record<string, unknown> = Record<string, never>> = {
  sqlite: SqliteDatabase
  orm: BetterSQLite3Database<TSchema>
}

const SUPPLEMENTARY_PRAGMAS = ["temp_store = memory"]

export function setupSqlite(sqlite: SqliteDatabase): void {
  for (const pragma of SUPPLEMENTARY_PRAGMAS) {
    sqlite.pragma(pragma)
  }
}

export type OpenConnectionOptions<TSchema extends Record<string, unknown>> = {
  schema?: TSchema
  logger?: Logger
  safeIntegers?: boolean
}

export function openSqlite(
  connectionString: string,
  options: Omit<OpenConnectionOptions<Record<string, never>>, "schema"> = {},
): SqliteDatabase {
  const { logger = console, safeIntegers = true } = options
  const { filename, settings } = parseConnectionString(connectionString)
  const sqlite = new Database(filename)
  try {
    sqlite.defaultSafeIntegers(safeIntegers)
    // busy_timeout goes first so switching the journal mode can wait out other connections.
    sqlite.pragma(`busy_timeout = ${settings.busyTimeoutMs}`)
    const journalMode = sqlite.pragma(`journal_mode = ${settings.journalMode}`, { simple: true })
    if (String(journalMode).toUpperCase() !== settings.journalMode) {
      logger.warn(
        `SQLite kept journal mode '${String(journalMode)}' for ${filename} (requested ${settings.journalMode}).`,
      )
    }
    sqlite.pragma(`synchronous = ${settings.synchronous}`)
    sqlite.pragma(`cache_size = ${settings.cacheSize}`)
    sqlite.pragma(`foreign_keys = ${settings.foreignKeys ? "ON" : "OFF"}`)
    setupSqlite(sqlite)
  } catch (error) {
    sqlite.close()
    throw error
  }
  return sqlite
}

export function openConnection<TSchema extends Record<string, unknown> = Record<string, never>>(
  connectionString: string,
  options: OpenConnectionOptions<TSchema> = {},
): Connection<TSchema> {
  const sqlite = openSqlite(connectionString, options)
  return { sqlite, orm: drizzle(sqlite, { schema: options.schema }) }
}
