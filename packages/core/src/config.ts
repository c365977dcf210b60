import os from "node:os"

import { FastDbError } from "./errors.js"
import type {
  ConnectionSettings,
  JournalMode,
  OpenOptions,
  PoolLimits,
  ResolvedOptions,
  SynchronousMode,
  TxLock,
} from "./types.js"

export const TX_LOCKS: readonly TxLock[] = ["deferred", "immediate", "exclusive"]
export const JOURNAL_MODES: readonly JournalMode[] = [
  "DELETE",
  "TRUNCATE",
  "PERSIST",
  "MEMORY",
  "WAL",
  "OFF",
]
export const SYNCHRONOUS_MODES: readonly SynchronousMode[] = ["OFF", "NORMAL", "FULL", "EXTRA"]

export const DEFAULT_SETTINGS: Readonly<ConnectionSettings> = {
  txLock: "immediate",
  journalMode: "WAL",
  busyTimeoutMs: 5000,
  synchronous: "NORMAL",
  cacheSize: 1_000_000_000,
  foreignKeys: true,
}

export const MIN_READERS = 4

// Connection settings before their enumerated values have been checked.
export type SettingsInput = {
  [K in keyof ConnectionSettings]: ConnectionSettings[K] extends string ? string : ConnectionSettings[K]
}

export function defaultPoolLimits(): PoolLimits {
  return {
    writer: 1,
    reader: Math.max(MIN_READERS, os.availableParallelism()),
  }
}

function asPositiveInt(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new FastDbError(`${field} must be a positive integer.`, "CONFIG_ERROR")
  }
  return value
}

function asNonNegativeInt(value: number, field: string): number {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new FastDbError(`${field} must be a non-negative integer.`, "CONFIG_ERROR")
  }
  return value
}

function asOneOf<T extends string>(value: string, allowed: readonly T[], field: string): T {
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new FastDbError(`Invalid ${field}. Use ${allowed.join(", ")}.`, "CONFIG_ERROR")
  }
  return match
}

export function validateSettings(settings: SettingsInput): ConnectionSettings {
  // cache_size accepts negative values (KiB instead of pages), so only integrality is checked.
  if (!Number.isSafeInteger(settings.cacheSize)) {
    throw new FastDbError("cacheSize must be an integer.", "CONFIG_ERROR")
  }

  return {
    txLock: asOneOf(settings.txLock, TX_LOCKS, "txLock"),
    journalMode: asOneOf(settings.journalMode, JOURNAL_MODES, "journalMode"),
    busyTimeoutMs: asNonNegativeInt(settings.busyTimeoutMs, "busyTimeoutMs"),
    synchronous: asOneOf(settings.synchronous, SYNCHRONOUS_MODES, "synchronous"),
    cacheSize: settings.cacheSize,
    foreignKeys: settings.foreignKeys,
  }
}

export function resolveOptions<TSchema extends Record<string, unknown>>(
  options: OpenOptions<TSchema>,
): ResolvedOptions<TSchema> {
  const defaults = defaultPoolLimits()
  const pool: PoolLimits = {
    writer: asPositiveInt(options.pool?.writer ?? defaults.writer, "pool.writer"),
    reader: asPositiveInt(options.pool?.reader ?? defaults.reader, "pool.reader"),
  }

  return {
    settings: validateSettings({ ...DEFAULT_SETTINGS, ...options.settings }),
    pool,
    schema: options.schema,
    logger: options.logger ?? console,
    safeIntegers: options.safeIntegers ?? true,
  }
}
