/**
 * Structured JSON logger.
 *
 * Usage:
 *   import { logger } from '../utils/logger'
 *   logger.info('Index tables accepted', { currentYear: 2022 })
 *
 * Output (one JSON object per line):
 *   {"timestamp":"2025-06-01T12:00:00.000Z","level":"info","message":"Index tables accepted","currentYear":2022}
 *
 * Threshold comes from the LOG_LEVEL env var (default "info").
 * Levels in ascending severity: debug, info, warn, error. "silent" drops everything.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogThreshold = LogLevel | 'silent'

const LEVEL_PRIORITY: Record<LogThreshold, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
}

function isThreshold(raw: string): raw is LogThreshold {
  return raw in LEVEL_PRIORITY
}

export function resolveLevel(env: string | undefined): LogThreshold {
  const raw = (env ?? 'info').toLowerCase()
  return isThreshold(raw) ? raw : 'info'
}

export interface LogEntry {
  timestamp: string
  level: LogLevel
  message: string
  [key: string]: unknown
}

/** Receives each formatted line (without trailing newline). */
export type LogSink = (level: LogLevel, line: string) => void

export const processSink: LogSink = (level, line) => {
  if (level === 'error') {
    process.stderr.write(line + '\n')
  } else {
    process.stdout.write(line + '\n')
  }
}

/** What engine components depend on; both Logger and its children satisfy it. */
export interface EngineLogger {
  debug(message: string, context?: Record<string, unknown>): void
  info(message: string, context?: Record<string, unknown>): void
  warn(message: string, context?: Record<string, unknown>): void
  error(message: string, context?: Record<string, unknown>): void
  child(defaults: Record<string, unknown>): EngineLogger
}

export interface LoggerOptions {
  level?: LogThreshold
  sink?: LogSink
  now?: () => Date
}

export class Logger implements EngineLogger {
  private threshold: number
  private sink: LogSink
  private now: () => Date

  constructor(options: LoggerOptions = {}) {
    const effective = options.level ?? resolveLevel(process.env.LOG_LEVEL)
    this.threshold = LEVEL_PRIORITY[effective]
    this.sink = options.sink ?? processSink
    this.now = options.now ?? (() => new Date())
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_PRIORITY[level] >= this.threshold
  }

  private write(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) return

    const entry: LogEntry = {
      timestamp: this.now().toISOString(),
      level,
      message,
      ...context,
    }

    this.sink(level, JSON.stringify(entry))
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.write('debug', message, context)
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.write('info', message, context)
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.write('warn', message, context)
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.write('error', message, context)
  }

  /** Create a child logger that injects fixed context fields into every log line. */
  child(defaults: Record<string, unknown>): EngineLogger {
    return new ChildLogger(this, defaults)
  }
}

class ChildLogger implements EngineLogger {
  constructor(
    private parent: EngineLogger,
    private defaults: Record<string, unknown>,
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, { ...this.defaults, ...context })
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, { ...this.defaults, ...context })
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, { ...this.defaults, ...context })
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, { ...this.defaults, ...context })
  }

  child(defaults: Record<string, unknown>): EngineLogger {
    return new ChildLogger(this.parent, { ...this.defaults, ...defaults })
  }
}

/** Default logger for the engine. */
export const logger = new Logger()
