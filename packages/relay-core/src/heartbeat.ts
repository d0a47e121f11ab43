/**
 * Periodic tick source for keepalive pings.
 *
 * Ticks land on fixed multiples of the interval measured from `start()`.
 * When the event loop stalls past one or more ticks, the missed ones are
 * skipped: the next tick fires at the next multiple still in the future
 * instead of replaying a burst of catch-up ticks.
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HeartbeatOptions {
  /**
   * Tick period in milliseconds.
   * @default 1000
   */
  interval?: number
  /** Called on every tick, starting with one immediately on `start()`. */
  onTick: () => void
}

export interface Heartbeat {
  start(): void
  stop(): void
  readonly running: boolean
}

export const DEFAULT_HEARTBEAT_INTERVAL = 1000

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Delay from `now` until the next tick of a schedule that started at
 * `origin`. In `(0, interval]` whenever `now` is not before `origin`.
 */
export function nextTickDelay(
  origin: number,
  now: number,
  interval: number,
): number {
  const elapsed = Math.max(0, now - origin)
  const ticksSoFar = Math.floor(elapsed / interval)
  return origin + (ticksSoFar + 1) * interval - now
}

export function createHeartbeat(options: HeartbeatOptions): Heartbeat {
  const { interval = DEFAULT_HEARTBEAT_INTERVAL, onTick } = options

  if (!(interval > 0)) {
    throw new Error(`[relay] Heartbeat interval must be positive, got ${interval}`)
  }

  let timer: ReturnType<typeof setTimeout> | null = null
  let origin = 0

  function schedule(): void {
    timer = setTimeout(() => {
      timer = null
      schedule()
      onTick()
    }, nextTickDelay(origin, Date.now(), interval))
  }

  return {
    start() {
      if (timer !== null) return
      origin = Date.now()
      schedule()
      onTick()
    },

    stop() {
      if (timer !== null) {
        clearTimeout(timer)
        timer = null
      }
    },

    get running() {
      return timer !== null
    },
  }
}
