/**
 * Promise helpers for driving the adaptor step by step.
 */

/**
 * Let every queued promise reaction run before continuing.
 */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve))
}

/**
 * Sleep for the specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

export type Observed<T> =
  | { readonly state: 'pending' }
  | { readonly state: 'fulfilled'; readonly value: T }
  | { readonly state: 'rejected'; readonly reason: unknown }

/**
 * Track a promise's settlement without awaiting it.
 */
export function observe<T>(promise: Promise<T>): { readonly current: Observed<T> } {
  const tracker: { current: Observed<T> } = { current: { state: 'pending' } }
  promise.then(
    (value) => {
      tracker.current = { state: 'fulfilled', value }
    },
    (reason: unknown) => {
      tracker.current = { state: 'rejected', reason }
    }
  )
  return tracker
}

/**
 * Drain an async iterable into an array.
 */
export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = []
  for await (const value of iterable) {
    out.push(value)
  }
  return out
}
