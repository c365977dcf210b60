import { DEFAULT_SETTINGS, type SettingsInput, validateSettings } from "../config.js"
import { FastDbError } from "../errors.js"
import type { ConnectionSettings } from "../types.js"

const SCHEME = "file:"

export type ParsedConnectionString = {
  filename: string
  settings: ConnectionSettings
}

// Characters that would end the filename or start an escape in the URI form.
const RESERVED = /[%?#]/g
const ESCAPED = /%(25|3F|23)/gi

function escapeFilename(filename: string): string {
  return filename.replace(RESERVED, (char) => encodeURIComponent(char))
}

function unescapeFilename(filename: string): string {
  return filename.replace(ESCAPED, (escape) => decodeURIComponent(escape))
}

export function buildConnectionString(filename: string, settings: ConnectionSettings): string {
  const params = new URLSearchParams({
    _txlock: settings.txLock,
    _journal_mode: settings.journalMode,
    _busy_timeout: String(settings.busyTimeoutMs),
    _synchronous: settings.synchronous,
    _cache_size: String(settings.cacheSize),
    _foreign_keys: String(settings.foreignKeys),
  })
  params.sort()
  return `${SCHEME}${escapeFilename(filename)}?${params.toString()}`
}

function parseInteger(value: string, key: string): number {
  if (!/^-?\d+$/.test(value)) {
    throw new FastDbError(`Invalid ${key} value '${value}': expected an integer.`, "CONFIG_ERROR")
  }
  return Number.parseInt(value, 10)
}

function parseBoolean(value: string, key: string): boolean {
  switch (value.toLowerCase()) {
    case "1":
    case "true":
    case "yes":
    case "on":
      return true
    case "0":
    case "false":
    case "no":
    case "off":
      return false
    default:
      throw new FastDbError(`Invalid ${key} value '${value}': expected a boolean.`, "CONFIG_ERROR")
  }
}

export function parseConnectionString(connectionString: string): ParsedConnectionString {
  if (!connectionString.startsWith(SCHEME)) {
    throw new FastDbError(
      `Connection string must start with '${SCHEME}': ${connectionString}`,
      "CONFIG_ERROR",
    )
  }

  const rest = connectionString.slice(SCHEME.length)
  const queryStart = rest.indexOf("?")
  const filename = unescapeFilename(queryStart === -1 ? rest : rest.slice(0, queryStart))
  const query = queryStart === -1 ? "" : rest.slice(queryStart + 1)

  if (filename.length === 0) {
    throw new FastDbError("Connection string has no database filename.", "CONFIG_ERROR")
  }

  // Values stay loosely typed here; validateSettings narrows them below.
  const raw: SettingsInput = { ...DEFAULT_SETTINGS }

  for (const [key, value] of new URLSearchParams(query)) {
    switch (key) {
      case "_txlock":
        raw.txLock = value.toLowerCase()
        break
      case "_journal_mode":
        raw.journalMode = value.toUpperCase()
        break
      case "_busy_timeout":
        raw.busyTimeoutMs = parseInteger(value, key)
        break
      case "_synchronous":
        raw.synchronous = value.toUpperCase()
        break
      case "_cache_size":
        raw.cacheSize = parseInteger(value, key)
        break
      case "_foreign_keys":
        raw.foreignKeys = parseBoolean(value, key)
        break
      default:
        throw new FastDbError(`Unknown connection string parameter '${key}'.`, "CONFIG_ERROR")
    }
  }

  return { filename, settings: validateSettings(raw) }
}

