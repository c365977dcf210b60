import { describe, expect, it } from "vitest"

import {
  decodeTime,
  encodeTime,
  nowTime,
  parseRfc3339,
  timeFromDate,
  timeToDate,
} from "../src/db/time.js"
import { FastDbError, TimeDecodeError } from "../src/errors.js"

function decodeError(value: unknown): TimeDecodeError {
  try {
    decodeTime(value)
  } catch (error) {
    if (error instanceof TimeDecodeError) {
      return error
    }
    throw error
  }
  throw new Error("expected decodeTime to throw")
}

describe("time codec", () => {
  it("decodes integers as epoch milliseconds", () => {
    expect(decodeTime(0n)).toBe(0n)
    expect(decodeTime(1673778600000n)).toBe(1673778600000n)
    expect(decodeTime(-86_400_000n)).toBe(-86_400_000n)
  })

  it("keeps the full 64-bit range", () => {
    for (const value of [2n ** 62n, -(2n ** 63n), 2n ** 63n - 1n]) {
      expect(decodeTime(encodeTime(value))).toBe(value)
    }
    expect(decodeError(2n ** 63n).kind).toBe("bigint")
    expect(decodeError(2n ** 63n).message).toBe(
      "Cannot decode time: integer 9223372036854775808 is out of range.",
    )
  })

  it("accepts safe integer numbers read without safe integers", () => {
    expect(decodeTime(1673778600000)).toBe(1673778600000n)
    expect(decodeTime(Number.MIN_SAFE_INTEGER)).toBe(-9007199254740991n)
    expect(decodeError(2 ** 60).kind).toBe("integer")
  })

  it("round-trips encoded values unchanged", () => {
    for (const value of [0n, 1n, -1n, 1673778600000n, -62135596800000n, 253402300799999n]) {
      expect(decodeTime(encodeTime(value))).toBe(value)
    }
  })

  it("decodes RFC3339 text in UTC", () => {
    expect(decodeTime("2023-01-15T10:30:00Z")).toBe(1673778600000n)
    expect(decodeTime("2023-01-15T10:30:00Z")).toBe(BigInt(Date.UTC(2023, 0, 15, 10, 30, 0)))
  })

  it("normalizes time zone offsets to UTC", () => {
    expect(decodeTime("2023-01-15T12:30:00+02:00")).toBe(1673778600000n)
    expect(decodeTime("2023-01-15T05:00:00-05:30")).toBe(1673778600000n)
  })

  it("truncates fractional seconds to milliseconds", () => {
    expect(decodeTime("2023-01-15T10:30:00.123456789Z")).toBe(1673778600123n)
    expect(decodeTime("2023-01-15T10:30:00.5Z")).toBe(1673778600500n)
  })

  it("handles dates before 1970 and small years", () => {
    expect(parseRfc3339("1969-12-31T23:59:59.999Z")).toBe(-1n)
    expect(parseRfc3339("0001-01-01T00:00:00Z")).toBe(-62135596800000n)
  })

  it("accepts leap days only in leap years", () => {
    expect(parseRfc3339("2024-02-29T00:00:00Z")).toBe(BigInt(Date.UTC(2024, 1, 29)))
    expect(() => parseRfc3339("2023-02-29T00:00:00Z")).toThrow(
      "Cannot parse '2023-02-29T00:00:00Z' as an RFC3339 timestamp: day out of range.",
    )
  })

  it("rejects text that is not RFC3339", () => {
    const error = decodeError("not-a-date")
    expect(error.code).toBe("DECODE_ERROR")
    expect(error.kind).toBe("text")
    expect(error.message).toBe("Cannot parse 'not-a-date' as an RFC3339 timestamp: malformed.")

    expect(() => decodeTime("2023-01-15 10:30:00Z")).toThrow(TimeDecodeError)
    expect(() => decodeTime("2023-01-15T10:30:00")).toThrow(TimeDecodeError)
    expect(() => decodeTime("2023-13-01T00:00:00Z")).toThrow("month out of range")
    expect(() => decodeTime("2023-01-15T24:00:00Z")).toThrow("hour out of range")
    expect(() => decodeTime("2023-01-15T10:30:60Z")).toThrow("second out of range")
    expect(() => decodeTime("2023-01-15T10:30:00+24:00")).toThrow("time zone offset out of range")
  })

  it("names the unsupported kind", () => {
    expect(decodeError(1.5).kind).toBe("float")
    expect(decodeError(1.5).message).toBe("Cannot decode time: unsupported type: float.")
    expect(decodeError(null).kind).toBe("null")
    expect(decodeError(Buffer.from("x")).kind).toBe("blob")
    expect(decodeError(true).kind).toBe("boolean")
  })

  it("only encodes 64-bit integer milliseconds", () => {
    expect(encodeTime(42)).toBe(42n)
    expect(encodeTime(42n)).toBe(42n)
    expect(() => encodeTime(1.5)).toThrow(FastDbError)
    expect(() => encodeTime(2n ** 63n)).toThrow(
      "Cannot encode time 9223372036854775808: outside the 64-bit range.",
    )
    expect(() => timeFromDate(new Date("invalid"))).toThrow(FastDbError)
  })

  it("converts to and from Date", () => {
    const date = new Date("2023-01-15T10:30:00.000Z")
    expect(timeFromDate(date)).toBe(1673778600000n)
    expect(timeToDate(1673778600000n).toISOString()).toBe("2023-01-15T10:30:00.000Z")
    expect(() => timeToDate(2n ** 62n)).toThrow("is outside the range of Date.")
  })

  it("reads the current time as integer milliseconds", () => {
    const before = BigInt(Date.now())
    const now = nowTime()
    const after = BigInt(Date.now())
    expect(typeof now).toBe("bigint")
    expect(now >= before && now <= after).toBe(true)
  })
})
