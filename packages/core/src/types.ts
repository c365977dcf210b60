export type TxLock = "deferred" | "immediate" | "exclusive"
export type JournalMode = "DELETE" | "TRUNCATE" | "PERSIST" | "MEMORY" | "WAL" | "OFF"
export type SynchronousMode = "OFF" | "NORMAL" | "FULL" | "EXTRA"
export type HandleRole = "writer" | "reader"

export type ConnectionSettings = {
  txLock: TxLock
  journalMode: JournalMode
  busyTimeoutMs: number
  synchronous: SynchronousMode
  cacheSize: number
  foreignKeys: boolean
}

export type PoolLimits = {
  writer: number
  reader: number
}

export type Logger = Pick<Console, "error" | "warn">

export type OpenOptions<TSchema extends Record<string, unknown> = Record<string, never>> = {
  settings?: Partial<ConnectionSettings>
  pool?: Partial<PoolLimits>
  schema?: TSchema
  logger?: Logger
  // Read INTEGER values as bigint so 64-bit values arrive exactly. Defaults to true.
  safeIntegers?: boolean
}

export type ResolvedOptions<TSchema extends Record<string, unknown>> = {
  settings: ConnectionSettings
  pool: PoolLimits
  schema: TSchema | undefined
  logger: Logger
  safeIntegers: boolean
}

export type PoolStats = {
  name: string
  max: number
  size: number
  idle: number
  inUse: number
  waiting: number
}

// Milliseconds since 1970-01-01T00:00:00Z, as a signed 64-bit integer.
export type Time = bigint
