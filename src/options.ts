import { type Clock, systemClock } from './clock'
import { type ChunksLogger, silentLogger } from './logger'

/**
 * Options for creating a Chunks adaptor.
 */
export type ChunksOptions = {
  /** Items per batch before it is released (positive integer) */
  readonly capacity: number
  /** Longest a batch waits after its first item before it is released, in ms (>= 0) */
  readonly maxWaitMs: number
  /** Time source for deadlines. Default: systemClock */
  readonly clock?: Clock
  /** Diagnostics sink. Default: silentLogger */
  readonly logger?: ChunksLogger
}

/**
 * Options with defaults applied.
 */
export type ResolvedChunksOptions = Required<ChunksOptions>

/**
 * Apply defaults and validate.
 *
 * @throws RangeError when capacity is not a positive integer or maxWaitMs
 *   is not a finite number >= 0
 */
export function resolveChunksOptions(options: ChunksOptions): ResolvedChunksOptions {
  if (!Number.isInteger(options.capacity) || options.capacity < 1) {
    throw new RangeError(`Chunks capacity must be a positive integer, got ${options.capacity}`)
  }
  if (!Number.isFinite(options.maxWaitMs) || options.maxWaitMs < 0) {
    throw new RangeError(`Chunks maxWaitMs must be a finite number >= 0, got ${options.maxWaitMs}`)
  }

  return {
    capacity: options.capacity,
    maxWaitMs: options.maxWaitMs,
    clock: options.clock ?? systemClock,
    logger: options.logger ?? silentLogger
  }
}
