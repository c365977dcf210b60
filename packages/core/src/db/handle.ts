import { errorMessage } from "../errors.js"
import type { HandleRole, Logger, PoolStats, TxLock } from "../types.js"
import type { Connection, SqliteDatabase } from "./client.js"
import type { ConnectionPool } from "./pool.js"

export type ConnectionAction<TSchema extends Record<string, unknown>, R> = (
  connection: Connection<TSchema>,
) => R | Promise<R>

/**
 * One side of a {@link FastDb} pair. All work runs on a connection checked out
 * of the handle's pool for the duration of the action.
 */
export class DbHandle<TSchema extends Record<string, unknown> = Record<string, never>> {
  readonly role: HandleRole

  private readonly pool: ConnectionPool<Connection<TSchema>>
  private readonly txLock: TxLock
  private readonly logger: Logger

  constructor(
    role: HandleRole,
    pool: ConnectionPool<Connection<TSchema>>,
    txLock: TxLock,
    logger: Logger = console,
  ) {
    this.role = role
    this.pool = pool
    this.logger = logger
    // Readers never take the write lock, so their transactions see a stable WAL snapshot.
    this.txLock = role === "reader" ? "deferred" : txLock
  }

  get closed(): boolean {
    return this.pool.closed
  }

  get lockMode(): TxLock {
    return this.txLock
  }

  stats(): PoolStats {
    return this.pool.stats()
  }

  use<R>(action: ConnectionAction<TSchema, R>): Promise<R> {
    return this.pool.use(action)
  }

  transaction<R>(action: ConnectionAction<TSchema, R>): Promise<R> {
    return this.pool.use(async (connection) => {
      const { sqlite } = connection
      sqlite.exec(`BEGIN ${this.txLock.toUpperCase()}`)
      try {
        const result = await action(connection)
        sqlite.exec("COMMIT")
        return result
      } catch (error) {
        this.rollback(sqlite)
        throw error
      }
    })
  }

  // The action's error is what the caller sees; a failed rollback is only logged.
  private rollback(sqlite: SqliteDatabase): void {
    if (!sqlite.inTransaction) {
      return
    }
    try {
      sqlite.exec("ROLLBACK")
    } catch (rollbackError) {
      this.logger.error(`Rollback failed on ${this.role} connection: ${errorMessage(rollbackError)}`)
    }
  }

  close(): void {
    this.pool.close()
  }
}
