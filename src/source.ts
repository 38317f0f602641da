/**
 * Anything Chunks can pull items from.
 */
export type ChunkSource<T> = AsyncIterable<T> | Iterable<T>

/**
 * How a single pull from the source settled.
 */
export type SourceOutcome<T> =
  | { readonly type: 'item'; readonly value: T }
  | { readonly type: 'end' }
  | { readonly type: 'failed'; readonly error: unknown }

const END: SourceOutcome<never> = { type: 'end' }

/**
 * Fusing wrapper around a source iterator.
 *
 * - The iterator is obtained on the first pull, not at construction.
 * - At most one pull is in flight; `pull()` returns it until `take()`.
 * - Once the iterator ends or fails it is never pulled again, and every
 *   later pull settles as `end`.
 * - Outcomes never reject: rejections and synchronous throws settle as
 *   `{ type: 'failed' }`.
 */
export class FusedSource<T, S extends ChunkSource<T> = ChunkSource<T>> {
  readonly source: S
  private iterator: AsyncIterator<T> | Iterator<T> | null = null
  private inflight: Promise<SourceOutcome<T>> | null = null
  private fused = false
  private settling = false

  constructor(source: S) {
    this.source = source
  }

  /** True once the source has ended, failed or been closed. */
  get terminated(): boolean {
    return this.fused
  }

  /** True while a pull is waiting on the underlying iterator. */
  get pulling(): boolean {
    return this.settling
  }

  /** Start a pull, or return the one still in flight. */
  pull(): Promise<SourceOutcome<T>> {
    if (this.inflight === null) {
      this.inflight = this.fused ? Promise.resolve(END) : this.pullIterator()
    }
    return this.inflight
  }

  /** Mark the in-flight pull as consumed so the next pull() reads a fresh item. */
  take(): void {
    this.inflight = null
  }

  /**
   * Terminate and close the underlying iterator. Idempotent.
   * Resolves once the iterator's return() has settled. An async generator
   * settles return() only after a pending pull, so this may wait on the
   * source while `pulling` is true.
   */
  async close(): Promise<void> {
    if (this.fused) return
    this.fused = true
    this.inflight = null
    const iterator = this.iterator
    this.iterator = null
    if (iterator !== null && iterator.return !== undefined) {
      await iterator.return()
    }
  }

  private async pullIterator(): Promise<SourceOutcome<T>> {
    this.settling = true
    try {
      const result = await this.open().next()
      if (result.done === true) {
        this.fuse()
        return END
      }
      return { type: 'item', value: result.value }
    } catch (error) {
      this.fuse()
      return { type: 'failed', error }
    } finally {
      this.settling = false
    }
  }

  private open(): AsyncIterator<T> | Iterator<T> {
    if (this.iterator === null) {
      const source: ChunkSource<T> = this.source
      this.iterator = isAsyncIterable(source)
        ? source[Symbol.asyncIterator]()
        : source[Symbol.iterator]()
    }
    return this.iterator
  }

  private fuse(): void {
    this.fused = true
    this.iterator = null
  }
}

function isAsyncIterable<T>(source: ChunkSource<T>): source is AsyncIterable<T> {
  return typeof source === 'object' && source !== null && Symbol.asyncIterator in source
}
