/**
 * Time source and single-shot wait primitive behind the deadline timer.
 *
 * Injectable so tests can drive deadlines by hand.
 */
export interface Clock {
  /** Current time in milliseconds. */
  now(): number
  /**
   * Resolve once `now() >= deadline`. Reject if the timer mechanism fails.
   * When `signal` aborts the wait is abandoned and the promise may reject
   * with the abort reason.
   */
  sleepUntil(deadline: number, signal: AbortSignal): Promise<void>
}

/**
 * Clock backed by Date.now() and setTimeout.
 */
export const systemClock: Clock = {
  now(): number {
    return Date.now()
  },

  sleepUntil(deadline: number, signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(signal.reason)
        return
      }
      const onAbort = (): void => {
        clearTimeout(handle)
        reject(signal.reason)
      }
      const handle = setTimeout(
        () => {
          signal.removeEventListener('abort', onAbort)
          resolve()
        },
        Math.max(0, deadline - Date.now())
      )
      signal.addEventListener('abort', onAbort, { once: true })
    })
  }
}

/**
 * How an armed deadline settled.
 */
export type TimerOutcome = { readonly type: 'elapsed' } | { readonly type: 'failed'; readonly error: unknown }

/**
 * A deadline armed for an absolute instant.
 *
 * `outcome` never rejects: timer failures settle as `{ type: 'failed' }`.
 * After `disarm()` the outcome is meaningless and must not be acted on.
 */
export class DeadlineTimer {
  readonly deadline: number
  readonly outcome: Promise<TimerOutcome>
  private readonly controller = new AbortController()

  constructor(clock: Clock, deadline: number) {
    this.deadline = deadline
    this.outcome = clock.sleepUntil(deadline, this.controller.signal).then(
      (): TimerOutcome => ({ type: 'elapsed' }),
      (error: unknown): TimerOutcome => ({ type: 'failed', error })
    )
  }

  get armed(): boolean {
    return !this.controller.signal.aborted
  }

  /** Abandon the wait. Idempotent. */
  disarm(): void {
    this.controller.abort()
  }
}

/**
 * Arm a deadline `maxWaitMs` from the clock's current time.
 */
export function armDeadline(clock: Clock, maxWaitMs: number): DeadlineTimer {
  return new DeadlineTimer(clock, clock.now() + maxWaitMs)
}
