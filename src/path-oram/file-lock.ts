import { mkdir, open, rm } from 'node:fs/promises'
import { dirname } from 'node:path'

const defaultLockTimeout = 10_000
const retryInterval = 100

/**
 * Exclusive lock file guarding an ORAM store against writers in other
 * processes.
 *
 * The lock file is created with the exclusive flag, so only one process can
 * hold it at a time. It holds the owner's pid.
 */
export class FileLock {
  private locked = false
  private readonly filePath: string
  private readonly timeoutMs: number

  constructor(filePath: string, timeoutMs: number = defaultLockTimeout) {
    this.filePath = filePath
    this.timeoutMs = timeoutMs
  }

  /**
   * Acquire the lock, retrying every 100ms until `timeoutMs` has passed.
   * Throws StoreLockedError on timeout.
   */
  async acquire(): Promise<void> {
    if (this.locked) {
      throw new Error('Lock already acquired')
    }

    await mkdir(dirname(this.filePath), { recursive: true })

    const startTime = Date.now()

    while (true) {
      try {
        const fileHandle = await open(this.filePath, 'wx')
        try {
          await fileHandle.write(`${process.pid}\n`)
        } finally {
          await fileHandle.close()
        }

        this.locked = true
        return
      } catch (error) {
        if (error instanceof Error && 'code' in error) {
          if (error.code === 'EEXIST') {
            if (Date.now() - startTime >= this.timeoutMs) {
              throw new StoreLockedError(this.filePath, this.timeoutMs)
            }
            await sleep(retryInterval)
            continue
          }

          if (error.code === 'EACCES' || error.code === 'EROFS') {
            throw new LockPermissionError(this.filePath, error)
          }
        }
        throw error
      }
    }
  }

  /**
   * Release the lock by deleting the lock file.
   */
  async release(): Promise<void> {
    if (!this.locked) {
      return
    }

    try {
      await rm(this.filePath, { force: true })
    } finally {
      this.locked = false
    }
  }

  isLocked(): boolean {
    return this.locked
  }
}

/**
 * Error thrown when another process holds the store's lock file for longer
 * than the lock timeout.
 */
export class StoreLockedError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly timeoutMs: number
  ) {
    super(
      `ORAM store is locked by another process (timeout after ${timeoutMs}ms): ${lockPath}`
    )
    this.name = 'StoreLockedError'
  }
}

/**
 * Error thrown when the lock file cannot be created, typically on a
 * read-only filesystem.
 */
export class LockPermissionError extends Error {
  constructor(
    public readonly lockPath: string,
    public readonly originalError?: Error
  ) {
    super(
      `Permission denied when creating lock file: ${lockPath}\n\n` +
        `Flushing an ORAM store needs a writable directory for its lock file.`
    )
    this.name = 'LockPermissionError'
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}
