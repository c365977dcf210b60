import { customType } from "drizzle-orm/sqlite-core"

import { FastDbError, TimeDecodeError } from "../errors.js"
import type { Time } from "../types.js"

// YYYY-MM-DDTHH:MM:SS[.fraction](Z|+HH:MM|-HH:MM)
const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?(?:(Z)|([+-])(\d{2}):(\d{2}))$/

const DAYS_IN_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31]

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) {
    return 29
  }
  return DAYS_IN_MONTH[month - 1] ?? 0
}

function kindOf(value: unknown): string {
  if (value === null) {
    return "null"
  }
  if (typeof value === "number") {
    return Number.isInteger(value) ? "integer" : "float"
  }
  if (value instanceof Uint8Array) {
    return "blob"
  }
  if (Array.isArray(value)) {
    return "array"
  }
  if (value instanceof Date) {
    return "Date"
  }
  return typeof value
}

function invalidText(text: string, reason: string): TimeDecodeError {
  return new TimeDecodeError(`Cannot parse '${text}' as an RFC3339 timestamp: ${reason}.`, "text")
}

/** Parses an RFC3339 timestamp into epoch milliseconds, truncating sub-millisecond digits. */
export function parseRfc3339(text: string): Time {
  const match = RFC3339_PATTERN.exec(text)
  if (!match) {
    throw invalidText(text, "malformed")
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText] = match
  const fraction = match[7] ?? ""
  const year = Number(yearText)
  const month = Number(monthText)
  const day = Number(dayText)
  const hour = Number(hourText)
  const minute = Number(minuteText)
  const second = Number(secondText)

  if (month < 1 || month > 12) {
    throw invalidText(text, "month out of range")
  }
  if (day < 1 || day > daysInMonth(year, month)) {
    throw invalidText(text, "day out of range")
  }
  if (hour > 23) {
    throw invalidText(text, "hour out of range")
  }
  if (minute > 59) {
    throw invalidText(text, "minute out of range")
  }
  if (second > 59) {
    throw invalidText(text, "second out of range")
  }

  let offsetMinutes = 0
  if (match[8] === undefined) {
    const offsetHours = Number(match[10])
    const offsetMins = Number(match[11])
    if (offsetHours > 23 || offsetMins > 59) {
      throw invalidText(text, "time zone offset out of range")
    }
    offsetMinutes = (match[9] === "-" ? -1 : 1) * (offsetHours * 60 + offsetMins)
  }

  const millis = Number(fraction.slice(0, 3).padEnd(3, "0"))

  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC.
  const date = new Date(0)
  date.setUTCFullYear(year, month - 1, day)
  date.setUTCHours(hour, minute, second, millis)
  return BigInt(date.getTime() - offsetMinutes * 60_000)
}

const INT64_MIN = -(2n ** 63n)
const INT64_MAX = 2n ** 63n - 1n

function isInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX
}

/**
 * Decodes a stored timestamp. Integers are epoch milliseconds; text is legacy
 * RFC3339. Anything else is rejected with the name of its kind.
 *
 * Connections read integers as bigint, so a non-integer number is a REAL value.
 * Safe integer numbers are still accepted for rows read without safe integers.
 */
export function decodeTime(value: unknown): Time {
  if (typeof value === "bigint") {
    if (!isInt64(value)) {
      throw new TimeDecodeError(`Cannot decode time: integer ${value} is out of range.`, "bigint")
    }
    return value
  }

  if (typeof value === "number") {
    if (Number.isSafeInteger(value)) {
      return BigInt(value)
    }
    if (Number.isInteger(value)) {
      throw new TimeDecodeError(
        `Cannot decode time: integer ${value} has lost precision; read it with safe integers.`,
        "integer",
      )
    }
  }

  if (typeof value === "string") {
    return parseRfc3339(value)
  }

  const kind = kindOf(value)
  throw new TimeDecodeError(`Cannot decode time: unsupported type: ${kind}.`, kind)
}

/** Always writes the integer form. Numbers must be safe integers. */
export function encodeTime(value: Time | number): bigint {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value)) {
      throw new FastDbError(`Cannot encode time ${value}: expected integer milliseconds.`, "ENCODE_ERROR")
    }
    return BigInt(value)
  }
  if (!isInt64(value)) {
    throw new FastDbError(`Cannot encode time ${value}: outside the 64-bit range.`, "ENCODE_ERROR")
  }
  return value
}

export function timeFromDate(date: Date): Time {
  return encodeTime(date.getTime())
}

// Date covers +/-8.64e15 ms around the epoch.
const DATE_LIMIT = 8_640_000_000_000_000n

export function timeToDate(value: Time): Date {
  if (value > DATE_LIMIT || value < -DATE_LIMIT) {
    throw new FastDbError(`Time ${value} is outside the range of Date.`, "DECODE_ERROR")
  }
  return new Date(Number(value))
}

export function nowTime(): Time {
  return BigInt(Date.now())
}

/** Integer epoch-millisecond column that also reads legacy RFC3339 text. */
export const time = customType<{ data: Time; driverData: unknown }>({
  dataType() {
    return "integer"
  },
  toDriver(value: Time): bigint {
    return encodeTime(value)
  },
  fromDriver(value: unknown): Time {
    return decodeTime(value)
  },
})

/** Exact 64-bit integer column for connections that read integers as bigint. */
export const int64 = customType<{ data: bigint; driverData: unknown }>({
  dataType() {
    return "integer"
  },
  toDriver(value: bigint): bigint {
    return value
  },
  fromDriver(value: unknown): bigint {
    if (typeof value === "bigint") {
      return value
    }
    if (typeof value === "number" && Number.isSafeInteger(value)) {
      return BigInt(value)
    }
    throw new FastDbError(`Expected an integer, got ${kindOf(value)}.`, "DECODE_ERROR")
  },
})
