import { resolveOptions } from "../config.js"
import { errorMessage, FastDbError } from "../errors.js"
import { isMemoryPath, resolveDbPath } from "../paths.js"
import type { HandleRole, Logger, OpenOptions, PoolLimits } from "../types.js"
import { openConnection, type Connection } from "./client.js"
import { buildConnectionString } from "./connection-string.js"
import { DbHandle } from "./handle.js"
import { ConnectionPool } from "./pool.js"

/**
 * A pair of handles on one SQLite file: a writer serialized through a single
 * connection and a reader pool sized for parallel reads under WAL.
 */
export class FastDb<TSchema extends Record<string, unknown> = Record<string, never>> {
  readonly filename: string
  readonly connectionString: string

  private readonly writerHandle: DbHandle<TSchema>
  private readonly readerHandle: DbHandle<TSchema>
  private readonly logger: Logger
  private isClosed = false

  constructor(
    filename: string,
    connectionString: string,
    writer: DbHandle<TSchema>,
    reader: DbHandle<TSchema>,
    logger: Logger,
  ) {
    this.filename = filename
    this.connectionString = connectionString
    this.writerHandle = writer
    this.readerHandle = reader
    this.logger = logger
  }

  get closed(): boolean {
    return this.isClosed
  }

  /** Read-write handle; at most one write runs at a time. */
  writer(): DbHandle<TSchema> {
    return this.writerHandle
  }

  /** Handle for reads, which may run in parallel. */
  reader(): DbHandle<TSchema> {
    return this.readerHandle
  }

  /**
   * Closes the writer, then the reader. Both are always attempted; the first
   * failure is thrown as CLOSE_FAILED and any later ones are logged.
   */
  close(): void {
    if (this.isClosed) {
      return
    }
    this.isClosed = true

    const failures: unknown[] = []
    for (const handle of [this.writerHandle, this.readerHandle]) {
      try {
        handle.close()
      } catch (error) {
        failures.push(error)
      }
    }

    const [first, ...rest] = failures
    if (failures.length === 0) {
      return
    }
    for (const failure of rest) {
      this.logger.error(`Failed to close ${this.filename}: ${errorMessage(failure)}`)
    }
    throw new FastDbError(`Failed to close ${this.filename}: ${errorMessage(first)}`, "CLOSE_FAILED", {
      cause: first,
    })
  }
}

export type PoolFactory<T> = (role: HandleRole, max: number) => ConnectionPool<T>

export type PoolPair<T> = {
  writer: ConnectionPool<T>
  reader: ConnectionPool<T>
}

/**
 * Creates and warms the writer pool, then the reader pool. If either fails,
 * pools already opened are closed before OPEN_FAILED is thrown; a failure to
 * close them is logged.
 */
export function openPools<T>(
  dbPath: string,
  limits: PoolLimits,
  createPool: PoolFactory<T>,
  logger: Logger,
): PoolPair<T> {
  const memory = isMemoryPath(dbPath)
  const opened: ConnectionPool<T>[] = []
  try {
    const writer = createPool("writer", memory ? 1 : limits.writer)
    opened.push(writer)
    writer.warm()

    if (memory) {
      return { writer, reader: writer }
    }

    const reader = createPool("reader", limits.reader)
    opened.push(reader)
    reader.warm()
    return { writer, reader }
  } catch (error) {
    for (const pool of opened) {
      try {
        pool.close()
      } catch (closeError) {
        logger.error(`Failed to release ${pool.name} pool for ${dbPath}: ${errorMessage(closeError)}`)
      }
    }
    throw new FastDbError(`Failed to open ${dbPath}: ${errorMessage(error)}`, "OPEN_FAILED", {
      cause: error,
    })
  }
}

/**
 * Opens a {@link FastDb} pair on the SQLite database at `filename`.
 *
 * `:memory:` gives every connection its own private database, so for it both
 * handles share one single-connection pool.
 */
export function open<TSchema extends Record<string, unknown> = Record<string, never>>(
  filename: string,
  options: OpenOptions<TSchema> = {},
): FastDb<TSchema> {
  const resolved = resolveOptions(options)
  const dbPath = resolveDbPath(filename)
  const connectionString = buildConnectionString(dbPath, resolved.settings)
  const { schema, logger, safeIntegers } = resolved

  const { writer, reader } = openPools<Connection<TSchema>>(
    dbPath,
    resolved.pool,
    (name, max) =>
      new ConnectionPool({
        name,
        max,
        acquireTimeoutMs: resolved.settings.busyTimeoutMs,
        create: () => openConnection(connectionString, { schema, logger, safeIntegers }),
        destroy: (connection) => {
          connection.sqlite.close()
        },
      }),
    logger,
  )

  const { txLock } = resolved.settings
  return new FastDb(
    dbPath,
    connectionString,
    new DbHandle("writer", writer, txLock, logger),
    new DbHandle("reader", reader, txLock, logger),
    logger,
  )
}

export async function withFastDb<T, TSchema extends Record<string, unknown> = Record<string, never>>(
  filename: string,
  options: OpenOptions<TSchema>,
  action: (db: FastDb<TSchema>) => Promise<T>,
): Promise<T> {
  const db = open(filename, options)
  try {
    return await action(db)
  } finally {
    db.close()
  }
}
