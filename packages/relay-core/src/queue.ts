/**
 * Unbounded FIFO queue connecting one producer side to one consumer side.
 *
 * Either side can close its end: `end()` when the producer is gone (buffered
 * values still drain), `cancel()` when the consumer is gone (the buffer is
 * dropped and further pushes fail). Teardown travels through these closures;
 * nothing else signals it.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TryShiftResult<T extends object> =
  | { status: 'value'; value: T }
  | { status: 'empty' }
  | { status: 'closed' }

export interface AsyncQueue<T extends object> {
  /** Append `value`. Returns `false` once either end is closed. */
  push(value: T): boolean
  /**
   * Resolve the next value. Resolves `undefined` once the producer has ended
   * and the buffer is drained, or once the consumer cancelled.
   */
  next(): Promise<T | undefined>
  /** Take the next value without waiting. */
  tryShift(): TryShiftResult<T>
  /** Producer side: no more values will be pushed. */
  end(): void
  /** Consumer side: no more values will be taken. */
  cancel(): void
  /** `true` once `end()` or `cancel()` has been called. */
  readonly closed: boolean
  /** Number of buffered values. */
  readonly size: number
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

export function createQueue<T extends object>(): AsyncQueue<T> {
  const buffer: T[] = []
  // Consumers waiting in next(); only populated while the buffer is empty.
  const waiters: Array<(value: T | undefined) => void> = []
  let ended = false
  let cancelled = false

  function releaseWaiters(): void {
    for (const resolve of waiters.splice(0)) resolve(undefined)
  }

  const queue: AsyncQueue<T> = {
    push(value) {
      if (ended || cancelled) return false
      const waiter = waiters.shift()
      if (waiter) waiter(value)
      else buffer.push(value)
      return true
    },

    next() {
      if (buffer.length > 0) return Promise.resolve(buffer.shift())
      if (ended || cancelled) return Promise.resolve(undefined)
      return new Promise((resolve) => {
        waiters.push(resolve)
      })
    },

    tryShift() {
      const value = buffer.shift()
      if (value !== undefined) return { status: 'value', value }
      return ended || cancelled ? { status: 'closed' } : { status: 'empty' }
    },

    end() {
      ended = true
      releaseWaiters()
    },

    cancel() {
      cancelled = true
      buffer.length = 0
      releaseWaiters()
    },

    get closed() {
      return ended || cancelled
    },

    get size() {
      return buffer.length
    },
  }

  return queue
}
