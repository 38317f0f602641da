/**
 * Log level for adaptor diagnostics.
 */
export type ChunksLogLevel = 'debug' | 'info' | 'warn' | 'error'

/**
 * Leveled logger receiving adaptor diagnostics.
 * `fields` carries structured context (batch size, flush reason, ...).
 */
export type ChunksLogger = {
  readonly debug: (message: string, fields?: Record<string, unknown>) => void
  readonly info: (message: string, fields?: Record<string, unknown>) => void
  readonly warn: (message: string, fields?: Record<string, unknown>) => void
  readonly error: (message: string, fields?: Record<string, unknown>) => void
}

/**
 * Options for createStderrLogger.
 */
export type StderrLoggerOptions = {
  /** Minimum level written. Default: 'info' */
  readonly level?: ChunksLogLevel
  /** Line prefix, rendered as `[prefix]`. Default: 'timed-chunks' */
  readonly prefix?: string
  /** Line writer. Default: process.stderr.write */
  readonly write?: (line: string) => void
}

const LEVEL_ORDER: readonly ChunksLogLevel[] = ['debug', 'info', 'warn', 'error']

function noop(): void {}

/**
 * Logger that drops everything. Default for new adaptors.
 */
export const silentLogger: ChunksLogger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop
}

/**
 * Create a logger writing one line per message:
 * `[prefix] level: message {"field":"value"}`
 *
 * Fields are omitted from the line when absent or empty.
 */
export function createStderrLogger(options?: StderrLoggerOptions): ChunksLogger {
  const threshold = LEVEL_ORDER.indexOf(options?.level ?? 'info')
  const prefix = options?.prefix ?? 'timed-chunks'
  const write =
    options?.write ??
    ((line: string): void => {
      process.stderr.write(line)
    })

  function logAt(level: ChunksLogLevel) {
    return (message: string, fields?: Record<string, unknown>): void => {
      if (LEVEL_ORDER.indexOf(level) < threshold) return
      const suffix =
        fields !== undefined && Object.keys(fields).length > 0 ? ` ${JSON.stringify(fields)}` : ''
      write(`[${prefix}] ${level}: ${message}${suffix}\n`)
    }
  }

  return {
    debug: logAt('debug'),
    info: logAt('info'),
    warn: logAt('warn'),
    error: logAt('error')
  }
}
