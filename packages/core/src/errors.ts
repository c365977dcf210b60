export type FastDbErrorCode =
  | "CONFIG_ERROR"
  | "OPEN_FAILED"
  | "POOL_TIMEOUT"
  | "HANDLE_CLOSED"
  | "DECODE_ERROR"
  | "ENCODE_ERROR"
  | "CLOSE_FAILED"
  | "INTERNAL_ERROR"

export class FastDbError extends Error {
  code: FastDbErrorCode

  constructor(message: string, code: FastDbErrorCode, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "FastDbError"
    this.code = code
  }
}

export class TimeDecodeError extends FastDbError {
  // The kind of stored value that could not be decoded ("text", "float", "blob", ...).
  kind: string

  constructor(message: string, kind: string) {
    super(message, "DECODE_ERROR")
    this.name = "TimeDecodeError"
    this.kind = kind
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function asFastDbError(error: unknown, code: FastDbErrorCode = "INTERNAL_ERROR"): FastDbError {
  if (error instanceof FastDbError) {
    return error
  }

  const message = error instanceof Error ? error.message : "Unknown error"
  return new FastDbError(message, code, { cause: error })
}
