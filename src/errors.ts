/**
 * Error thrown when the wrapped source rejects or throws while pulling.
 * The underlying failure is kept as `cause`.
 */
export class SourceFailedError extends Error {
  readonly kind = 'source' as const

  constructor(cause: unknown) {
    super(`Chunks source failed: ${describeCause(cause)}`)
    this.name = 'SourceFailedError'
    this.cause = cause
  }
}

/**
 * Error thrown when the deadline timer fails instead of elapsing.
 * The underlying failure is kept as `cause`.
 */
export class TimerFailedError extends Error {
  readonly kind = 'timer' as const

  constructor(cause: unknown) {
    super(`Chunks deadline timer failed: ${describeCause(cause)}`)
    this.name = 'TimerFailedError'
    this.cause = cause
  }
}

/**
 * Failure reported by a Chunks adaptor, tagged by what failed.
 */
export type ChunksError = SourceFailedError | TimerFailedError

/**
 * Error thrown when the adaptor's internal state is inconsistent,
 * e.g. buffered items without an armed deadline.
 */
export class ChunksInvariantError extends Error {
  constructor(detail: string) {
    super(`Chunks invariant violated: ${detail}`)
    this.name = 'ChunksInvariantError'
  }
}

export function isChunksError(value: unknown): value is ChunksError {
  return value instanceof SourceFailedError || value instanceof TimerFailedError
}

/** Message of an Error, or the value rendered as a string. */
export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause)
}
