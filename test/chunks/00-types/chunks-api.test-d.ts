/**
 * Type-level contract tests for Chunks.
 *
 * Goal: Prevent invalid adaptor usage from compiling.
 * Invariant: If it compiles, it is a valid Chunks call.
 *
 * Uses tsd for compile-time type assertions.
 */
import { expectAssignable, expectError, expectType } from 'tsd'
import { Chunks, createChunks, type FlushReason } from '../../../src/chunks'
import type { Clock } from '../../../src/clock'
import { type ChunksError, isChunksError } from '../../../src/errors'
import type { ChunksLogger } from '../../../src/logger'
import type { ChunksOptions } from '../../../src/options'

declare const events: AsyncIterable<{ id: string }>
declare const generator: AsyncGenerator<number, void, undefined>
declare const clock: Clock
declare const logger: ChunksLogger

// ============================================
// Construction
// ============================================

// Element and source types flow from the source
expectType<Chunks<{ id: string }, AsyncIterable<{ id: string }>>>(
  createChunks(events, { capacity: 10, maxWaitMs: 100 })
)
expectType<Chunks<number, number[]>>(createChunks([1, 2, 3], { capacity: 2, maxWaitMs: 0 }))
expectType<Chunks<string, Set<string>>>(createChunks(new Set(['a']), { capacity: 1, maxWaitMs: 50 }))

// Clock and logger are optional
expectAssignable<ChunksOptions>({ capacity: 1, maxWaitMs: 1 })
expectAssignable<ChunksOptions>({ capacity: 1, maxWaitMs: 1, clock, logger })

// @ts-expect-error - missing maxWaitMs
expectError(createChunks(events, { capacity: 10 }))
// @ts-expect-error - missing capacity
expectError(createChunks(events, { maxWaitMs: 10 }))
// @ts-expect-error - capacity must be a number
expectError(createChunks(events, { capacity: '10', maxWaitMs: 10 }))
// @ts-expect-error - source must be iterable
expectError(createChunks(42, { capacity: 10, maxWaitMs: 10 }))

// ============================================
// Iteration
// ============================================

declare const chunks: Chunks<number>

expectType<Promise<IteratorResult<number[], undefined>>>(chunks.next())
expectType<Promise<IteratorResult<number[], undefined>>>(chunks.return())
expectAssignable<AsyncIterable<number[]>>(chunks)
expectType<number[]>(chunks.flush())
expectType<number>(chunks.pending)
expectType<Promise<void>>(chunks.close())

// ============================================
// Accessors
// ============================================

const typed = new Chunks<number, AsyncGenerator<number, void, undefined>>(generator, {
  capacity: 4,
  maxWaitMs: 25
})

// The concrete source type is kept
expectType<AsyncGenerator<number, void, undefined>>(
  createChunks(generator, { capacity: 4, maxWaitMs: 25 }).release()
)
expectType<AsyncGenerator<number, void, undefined>>(typed.source)
expectType<AsyncGenerator<number, void, undefined>>(typed.release())

// @ts-expect-error - source is read-only
expectError((typed.source = generator))

// ============================================
// Errors
// ============================================

declare const failure: unknown

if (isChunksError(failure)) {
  expectType<ChunksError>(failure)
  expectType<'source' | 'timer'>(failure.kind)
}

expectAssignable<FlushReason>('deadline')
// @ts-expect-error - not a flush reason
expectError<FlushReason>('timeout')
