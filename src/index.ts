// Adaptor: size- and age-bounded batching over async iterables
export type { FlushReason } from './chunks'
export { Chunks, createChunks } from './chunks'
// Deadline timer: injectable clock
export type { Clock, TimerOutcome } from './clock'
export { armDeadline, DeadlineTimer, systemClock } from './clock'
// Errors
export type { ChunksError } from './errors'
export { ChunksInvariantError, isChunksError, SourceFailedError, TimerFailedError } from './errors'
// Logging
export type { ChunksLogger, ChunksLogLevel, StderrLoggerOptions } from './logger'
export { createStderrLogger, silentLogger } from './logger'
// Options
export type { ChunksOptions, ResolvedChunksOptions } from './options'
export { resolveChunksOptions } from './options'
// Source fusing
export type { ChunkSource, SourceOutcome } from './source'
export { FusedSource } from './source'
