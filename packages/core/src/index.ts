export { DEFAULT_SETTINGS, defaultPoolLimits, MIN_READERS, resolveOptions } from "./config.js"
export { openConnection, openSqlite, setupSqlite } from "./db/client.js"
export type { Connection, OpenConnectionOptions, SqliteDatabase } from "./db/client.js"
export { buildConnectionString, parseConnectionString } from "./db/connection-string.js"
export type { ParsedConnectionString } from "./db/connection-string.js"
export { FastDb, open, openPools, withFastDb } from "./db/fastdb.js"
export type { PoolFactory, PoolPair } from "./db/fastdb.js"
export { DbHandle } from "./db/handle.js"
export type { ConnectionAction } from "./db/handle.js"
export { ConnectionPool } from "./db/pool.js"
export type { ConnectionPoolOptions } from "./db/pool.js"
export {
  decodeTime,
  encodeTime,
  int64,
  nowTime,
  parseRfc3339,
  time,
  timeFromDate,
  timeToDate,
} from "./db/time.js"
export { asFastDbError, FastDbError, TimeDecodeError } from "./errors.js"
export type { FastDbErrorCode } from "./errors.js"
export { MEMORY_DB, resolveDbPath } from "./paths.js"
export type * from "./types.js"
