/**
 * Counting semaphore with FIFO waiters.
 *
 * Bounds the number of in-flight promises when fanning out many storage
 * calls. `acquire()` resolves immediately while permits remain; otherwise the
 * caller queues until a `release()` hands its permit over.
 *
 * @module utils/semaphore
 */

export class Semaphore {
  private available: number
  private readonly waitQueue: Array<() => void> = []

  constructor(readonly permits: number) {
    if (!Number.isInteger(permits) || permits < 1) {
      throw new RangeError(`Semaphore permits must be a positive integer, got ${permits}`)
    }
    this.available = permits
  }

  async acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--
      return
    }

    return new Promise((resolve) => {
      this.waitQueue.push(resolve)
    })
  }

  release(): void {
    const next = this.waitQueue.shift()
    if (next) {
      // Permit passes straight to the next waiter
      next()
    } else if (this.available < this.permits) {
      this.available++
    }
  }

  /** Permits not currently held */
  get free(): number {
    return this.available
  }

  /** Callers blocked in acquire() */
  get waiting(): number {
    return this.waitQueue.length
  }
}

/**
 * Run `task(0) .. task(count - 1)` with at most `limit` in flight.
 *
 * Resolves once every started task has settled. After the first failure no
 * new task is started; tasks already running are awaited and the first error
 * is then rethrown.
 */
export async function runBounded(
  count: number,
  limit: number,
  task: (index: number) => Promise<void>
): Promise<void> {
  const gate = new Semaphore(limit)
  const running: Promise<void>[] = []
  const errors: unknown[] = []

  for (let i = 0; i < count && errors.length === 0; i++) {
    await gate.acquire()
    if (errors.length > 0) {
      gate.release()
      break
    }
    running.push(
      task(i)
        .catch((error: unknown) => {
          errors.push(error)
        })
        .finally(() => gate.release())
    )
  }

  await Promise.all(running)
  if (errors.length > 0) throw errors[0]
}
