import os from "node:os"
import path from "node:path"

import { FastDbError } from "./errors.js"

export const MEMORY_DB = ":memory:"

export function isMemoryPath(filename: string): boolean {
  return filename === MEMORY_DB
}

function resolvePath(input: string): string {
  if (input.startsWith("~/")) {
    return path.join(os.homedir(), input.slice(2))
  }

  return path.resolve(input)
}

export function resolveDbPath(input: string): string {
  if (input.trim().length === 0) {
    throw new FastDbError("Database filename is required.", "CONFIG_ERROR")
  }
  if (isMemoryPath(input)) {
    return input
  }
  return resolvePath(input)
}
