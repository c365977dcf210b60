import { FastDbError } from "../errors.js"
import type { PoolStats } from "../types.js"

export type ConnectionPoolOptions<T> = {
  name: string
  max: number
  // How long acquire() may wait for a free connection before failing.
  acquireTimeoutMs: number
  create: () => T
  destroy: (connection: T) => void
}

type Waiter<T> = {
  resolve: (connection: T) => void
  reject: (error: Error) => void
  timer: NodeJS.Timeout
}

/**
 * A fixed-size pool of synchronous SQLite connections.
 *
 * Connections are created lazily up to `max`. Callers beyond that wait in
 * FIFO order for a release, bounded by `acquireTimeoutMs`.
 */
export class ConnectionPool<T> {
  readonly name: string
  readonly max: number

  private readonly acquireTimeoutMs: number
  private readonly create: () => T
  private readonly destroy: (connection: T) => void
  private readonly all = new Set<T>()
  private readonly idle: T[] = []
  private readonly waiters: Waiter<T>[] = []
  private isClosed = false

  constructor(options: ConnectionPoolOptions<T>) {
    this.name = options.name
    this.max = options.max
    this.acquireTimeoutMs = options.acquireTimeoutMs
    this.create = options.create
    this.destroy = options.destroy
  }

  get closed(): boolean {
    return this.isClosed
  }

  stats(): PoolStats {
    return {
      name: this.name,
      max: this.max,
      size: this.all.size,
      idle: this.idle.length,
      inUse: this.all.size - this.idle.length,
      waiting: this.waiters.length,
    }
  }

  /** Opens one connection up front so configuration errors surface at open time. */
  warm(): void {
    if (this.all.size === 0) {
      this.release(this.acquireSync())
    }
  }

  acquire(): Promise<T> {
    if (this.isClosed) {
      return Promise.reject(this.closedError())
    }

    const idle = this.idle.pop()
    if (idle !== undefined) {
      return Promise.resolve(idle)
    }

    if (this.all.size < this.max) {
      try {
        return Promise.resolve(this.acquireSync())
      } catch (error) {
        return Promise.reject(error)
      }
    }

    return new Promise<T>((resolve, reject) => {
      const waiter: Waiter<T> = {
        resolve,
        reject,
        timer: setTimeout(() => {
          const index = this.waiters.indexOf(waiter)
          if (index !== -1) {
            this.waiters.splice(index, 1)
          }
          reject(
            new FastDbError(
              `Timed out after ${this.acquireTimeoutMs}ms waiting for a ${this.name} connection.`,
              "POOL_TIMEOUT",
            ),
          )
        }, this.acquireTimeoutMs),
      }
      this.waiters.push(waiter)
    })
  }

  release(connection: T): void {
    if (!this.all.has(connection)) {
      return
    }

    const waiter = this.waiters.shift()
    if (waiter) {
      clearTimeout(waiter.timer)
      waiter.resolve(connection)
      return
    }

    this.idle.push(connection)
  }

  async use<R>(action: (connection: T) => R | Promise<R>): Promise<R> {
    const connection = await this.acquire()
    try {
      return await action(connection)
    } finally {
      this.release(connection)
    }
  }

  /**
   * Closes every connection, including ones still checked out. All of them are
   * attempted; a single failure is rethrown, several become an AggregateError.
   */
  close(): void {
    if (this.isClosed) {
      return
    }
    this.isClosed = true

    for (const waiter of this.waiters.splice(0)) {
      clearTimeout(waiter.timer)
      waiter.reject(this.closedError())
    }

    const failures: unknown[] = []
    for (const connection of this.all) {
      try {
        this.destroy(connection)
      } catch (error) {
        failures.push(error)
      }
    }
    this.all.clear()
    this.idle.length = 0

    if (failures.length === 1) {
      throw failures[0]
    }
    if (failures.length > 1) {
      throw new AggregateError(failures, `Failed to close ${failures.length} ${this.name} connections.`)
    }
  }

  private acquireSync(): T {
    const connection = this.create()
    this.all.add(connection)
    return connection
  }

  private closedError(): FastDbError {
    return new FastDbError(`The ${this.name} pool is closed.`, "HANDLE_CLOSED")
  }
}
