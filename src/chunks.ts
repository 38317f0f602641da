/**
 * Chunks: groups items from a source into batches bounded by size and age.
 *
 * A batch is released when it holds `capacity` items, when `maxWaitMs`
 * has passed since its first item arrived, or when the source ends,
 * whichever comes first.
 *
 * State:
 * - idle: empty buffer, no deadline armed
 * - draining: non-empty buffer, deadline armed at the first item
 * - error pending: a failure is held behind the batch it flushed
 * - finished: done or error reported, closed, or released
 *
 * Failure ordering:
 * - Buffered items are delivered before the failure that flushed them;
 *   the failure rejects the following next() call.
 * - With nothing buffered the failure rejects the current call.
 * - After a failure is reported every next() resolves done.
 *
 * Single consumer: overlapping next() calls are queued and run in call
 * order, never interleaved.
 *
 * @module
 */
import { armDeadline, type DeadlineTimer, type TimerOutcome } from './clock'
import {
  type ChunksError,
  ChunksInvariantError,
  describeCause,
  SourceFailedError,
  TimerFailedError
} from './errors'
import { type ChunksOptions, type ResolvedChunksOptions, resolveChunksOptions } from './options'
import { type ChunkSource, FusedSource, type SourceOutcome } from './source'

/**
 * Why a batch left the buffer.
 */
export type FlushReason = 'capacity' | 'deadline' | 'end' | 'failure' | 'manual'

/** Whichever of the source and the deadline settled first. */
type Ready<T> =
  | { readonly from: 'source'; readonly outcome: SourceOutcome<T> }
  | { readonly from: 'timer'; readonly timer: DeadlineTimer; readonly outcome: TimerOutcome }

const DONE: IteratorReturnResult<undefined> = { done: true, value: undefined }

export class Chunks<T, S extends ChunkSource<T> = ChunkSource<T>>
  implements AsyncIterableIterator<T[]>
{
  private readonly options: ResolvedChunksOptions
  private readonly input: FusedSource<T, S>
  private buffer: T[] = []
  private timer: DeadlineTimer | null = null
  private deferred: ChunksError | null = null
  private finished = false
  private chain: Promise<void> = Promise.resolve()

  /**
   * @throws RangeError when capacity is not a positive integer or maxWaitMs
   *   is not a finite number >= 0
   */
  constructor(source: S, options: ChunksOptions) {
    this.options = resolveChunksOptions(options)
    this.input = new FusedSource<T, S>(source)
  }

  /**
   * The wrapped source. Pulling from it directly while the adaptor is in
   * use steals items from the adaptor and desynchronizes its state.
   */
  get source(): S {
    return this.input.source
  }

  /** Number of buffered items not yet released. */
  get pending(): number {
    return this.buffer.length
  }

  /**
   * Advance to the next batch.
   *
   * Resolves with a non-empty batch, resolves done once the source is
   * exhausted, or rejects with a ChunksError. Calls made while one is
   * still pending are serialized behind it.
   */
  next(): Promise<IteratorResult<T[], undefined>> {
    const result = this.chain.then(() => this.advance())
    // Chain continues regardless to maintain serialization
    this.chain = result.then(
      () => {},
      () => {}
    )
    return result
  }

  /**
   * End iteration early. Buffered items are discarded.
   * Called by `for await` on break.
   */
  async return(): Promise<IteratorResult<T[], undefined>> {
    await this.close()
    return DONE
  }

  /**
   * Disarm the deadline, discard buffered items and close the source.
   *
   * Does not interrupt a next() that is already waiting; that call settles
   * done once the source or deadline it waits on settles. Use flush() first
   * to keep buffered items.
   *
   * Resolves once the source's return() settles, or at once while a pull is
   * pending on the source. A failing return() is logged at warn.
   */
  async close(): Promise<void> {
    this.discard('close')
    await this.closeSource()
  }

  /**
   * Release the buffered items now, as a batch, without waiting for
   * capacity or the deadline. Returns an empty array when nothing is buffered.
   */
  flush(): T[] {
    return this.takeBatch('manual')
  }

  /**
   * Consume the adaptor and hand the source back to the caller.
   *
   * Buffered items are discarded, and an item already pulled from the source
   * but not yet buffered is lost. Call flush() first to keep what is buffered.
   */
  release(): S {
    this.discard('release')
    return this.input.source
  }

  [Symbol.asyncIterator](): this {
    return this
  }

  private async advance(): Promise<IteratorResult<T[], undefined>> {
    if (this.deferred !== null) {
      const error = this.deferred
      this.deferred = null
      await this.finish()
      throw error
    }

    while (!this.finished) {
      const ready = await this.waitForReady()
      if (this.finished) break

      if (ready.from === 'source') {
        this.input.take()
        const outcome = ready.outcome

        if (outcome.type === 'item') {
          if (this.buffer.length === 0) {
            this.arm()
          }
          this.buffer.push(outcome.value)
          if (this.buffer.length >= this.options.capacity) {
            return this.emit('capacity')
          }
          continue
        }

        if (outcome.type === 'end') {
          if (this.buffer.length > 0) {
            return this.emit('end')
          }
          await this.finish()
          return DONE
        }

        return this.fail(new SourceFailedError(outcome.error))
      }

      // Disarmed by flush() while this call was waiting
      if (ready.timer !== this.timer) continue

      if (ready.outcome.type === 'failed') {
        return this.fail(new TimerFailedError(ready.outcome.error))
      }
      if (this.buffer.length === 0) {
        throw new ChunksInvariantError('deadline elapsed over an empty buffer')
      }
      return this.emit('deadline')
    }

    return DONE
  }

  /**
   * Wait for the in-flight source pull or the armed deadline, whichever
   * settles first. A pull that loses stays in flight for the next wait.
   * On a tie the source wins.
   */
  private waitForReady(): Promise<Ready<T>> {
    const timer = this.timer
    const pull = this.input
      .pull()
      .then((outcome): Ready<T> => ({ from: 'source', outcome }))

    if (timer === null) {
      if (this.buffer.length > 0) {
        throw new ChunksInvariantError(
          `${this.buffer.length} buffered items without an armed deadline`
        )
      }
      return pull
    }

    return Promise.race([
      pull,
      timer.outcome.then((outcome): Ready<T> => ({ from: 'timer', timer, outcome }))
    ])
  }

  /**
   * Report a failure, holding it behind the buffered batch if there is one.
   */
  private async fail(error: ChunksError): Promise<IteratorResult<T[], undefined>> {
    if (this.buffer.length === 0) {
      await this.finish()
      throw error
    }
    this.options.logger.warn('deferring failure until buffered batch is delivered', {
      kind: error.kind,
      size: this.buffer.length
    })
    this.deferred = error
    return this.emit('failure')
  }

  private emit(reason: FlushReason): IteratorYieldResult<T[]> {
    return { done: false, value: this.takeBatch(reason) }
  }

  private takeBatch(reason: FlushReason): T[] {
    this.disarm()
    const batch = this.buffer
    this.buffer = []
    if (batch.length > 0) {
      this.options.logger.debug('flushed batch', { reason, size: batch.length })
    }
    return batch
  }

  private arm(): void {
    const timer = armDeadline(this.options.clock, this.options.maxWaitMs)
    this.timer = timer
    this.options.logger.debug('armed deadline', { deadline: timer.deadline })
  }

  private disarm(): void {
    this.timer?.disarm()
    this.timer = null
  }

  private discard(via: 'close' | 'release'): void {
    if (this.buffer.length > 0) {
      this.options.logger.warn('discarding buffered items', {
        via,
        discarded: this.buffer.length
      })
    }
    this.buffer = []
    this.deferred = null
    this.finished = true
    this.disarm()
  }

  /** Terminal transition after end or a reported failure; the buffer is empty here. */
  private async finish(): Promise<void> {
    this.finished = true
    this.disarm()
    await this.closeSource()
  }

  /**
   * Close the source without letting it hold up the caller: while a pull is
   * still pending, return() is left to settle on its own. A failing return()
   * is logged, never thrown.
   */
  private async closeSource(): Promise<void> {
    const pulling = this.input.pulling
    const closing = this.input.close().catch((error: unknown) => {
      this.options.logger.warn('closing source failed', { error: describeCause(error) })
    })
    if (!pulling) {
      await closing
    }
  }
}

/**
 * Create a Chunks adaptor over an async or sync iterable.
 *
 * @example
 * ```ts
 * const batches = createChunks(events, { capacity: 100, maxWaitMs: 1_000 })
 * for await (const batch of batches) {
 *   await insertMany(batch)
 * }
 * ```
 */
export function createChunks<T, S extends ChunkSource<T> = ChunkSource<T>>(
  source: S & ChunkSource<T>,
  options: ChunksOptions
): Chunks<T, S> {
  return new Chunks<T, S>(source, options)
}
