/**
 * Async mutex that serializes store operations.
 *
 * Waiters are granted the lock in the order they called acquire().
 */
export class Mutex {
  private locked = false
  private waiting: Array<() => void> = []

  /**
   * Acquire the mutex, waiting behind earlier callers if it is held.
   */
  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true
      return
    }

    return new Promise<void>((resolve) => {
      this.waiting.push(resolve)
    })
  }

  /**
   * Release the mutex, handing it straight to the next waiter if any.
   */
  release(): void {
    const next = this.waiting.shift()
    if (next) {
      next()
    } else {
      this.locked = false
    }
  }

  /**
   * Run `task` while holding the mutex. The mutex is released whether the
   * task resolves or throws.
   */
  async runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire()
    try {
      return await task()
    } finally {
      this.release()
    }
  }

  isLocked(): boolean {
    return this.locked
  }

  /**
   * Callers currently waiting for the mutex.
   */
  get pending(): number {
    return this.waiting.length
  }
}
