import os from "node:os"
import path from "node:path"

import { describe, expect, it } from "vitest"

import { asFastDbError, FastDbError, MEMORY_DB, resolveDbPath } from "../src/index.js"

describe("database paths", () => {
  it("expands the home directory", () => {
    expect(resolveDbPath("~/data/app.db")).toBe(path.join(os.homedir(), "data", "app.db"))
  })

  it("makes relative paths absolute", () => {
    expect(resolveDbPath("app.db")).toBe(path.resolve("app.db"))
  })

  it("keeps the in-memory designator", () => {
    expect(resolveDbPath(MEMORY_DB)).toBe(":memory:")
  })

  it("rejects blank filenames", () => {
    expect(() => resolveDbPath("")).toThrow("Database filename is required.")
  })
})

describe("errors", () => {
  it("passes FastDbError through unchanged", () => {
    const error = new FastDbError("closed", "HANDLE_CLOSED")
    expect(asFastDbError(error)).toBe(error)
  })

  it("wraps foreign errors with the given code", () => {
    const cause = new Error("disk I/O error")
    const wrapped = asFastDbError(cause, "OPEN_FAILED")
    expect(wrapped.code).toBe("OPEN_FAILED")
    expect(wrapped.message).toBe("disk I/O error")
    expect(wrapped.cause).toBe(cause)
    expect(asFastDbError("nope").message).toBe("Unknown error")
  })
})
