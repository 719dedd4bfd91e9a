/**
 * Structured JSONL logger
 * One JSON object per line on stdout/stderr for structured parsing
 */

import { serializeError } from 'serialize-error'
import { getRunId, getRunMarketId } from './run-context'

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'
export type LoggerType = 'ingest' | 'http' | 'db' | 'cli' | 'app'

/**
 * All available logger types for filtering
 */
const ALL_LOGGER_TYPES: readonly LoggerType[] = ['ingest', 'http', 'db', 'cli', 'app']

/**
 * Log level ordering for comparison (higher = more severe)
 */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
}

interface LogConfig {
  level: LogLevel
  enabledTypes: Set<LoggerType> | 'all'
}

/**
 * Cached log configuration (parsed once per process)
 */
let cachedLogConfig: LogConfig | null = null

function isLoggerType(value: string): value is LoggerType {
  return (ALL_LOGGER_TYPES as readonly string[]).includes(value)
}

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVEL_ORDER
}

/**
 * Parse LOG_TYPES environment variable
 * Supports: "*" (all), "type1,type2" (include), "*,-type1,-type2" (exclude)
 */
export function parseLogTypes(typesStr: string | undefined): Set<LoggerType> | 'all' {
  if (!typesStr || typesStr === '*') return 'all'
  if (typesStr === 'none') return new Set()

  const tokens = typesStr.split(',').map((t) => t.trim())

  if (tokens[0] === '*') {
    const all = new Set<LoggerType>(ALL_LOGGER_TYPES)
    for (const token of tokens.slice(1)) {
      const type = token.slice(1)
      if (token.startsWith('-') && isLoggerType(type)) {
        all.delete(type)
      }
    }
    return all
  }

  const enabled = new Set<LoggerType>()
  for (const token of tokens) {
    if (isLoggerType(token)) {
      enabled.add(token)
    }
  }
  return enabled
}

function getLogConfig(): LogConfig {
  if (cachedLogConfig) return cachedLogConfig

  const rawLevel = process.env.LOG_LEVEL ?? 'info'

  cachedLogConfig = {
    level: isLogLevel(rawLevel) ? rawLevel : 'info',
    enabledTypes: parseLogTypes(process.env.LOG_TYPES),
  }

  return cachedLogConfig
}

function shouldLog(level: LogLevel, loggerType?: LoggerType): boolean {
  const config = getLogConfig()

  if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[config.level]) {
    return false
  }

  if (config.enabledTypes !== 'all' && loggerType) {
    return config.enabledTypes.has(loggerType)
  }

  return true
}

/**
 * Reset cached log config (useful for testing)
 */
export function resetLogConfig(): void {
  cachedLogConfig = null
}

export interface LogContext {
  operation?: string
  duration?: number
  [key: string]: unknown
}

interface LogEntry {
  timestamp: string
  level: LogLevel
  loggerType?: LoggerType
  runId?: string
  message: string
  context?: LogContext
}

const SENSITIVE_KEYS = ['password', 'apikey', 'api_key', 'secret', 'token', 'authorization']

/**
 * Sanitize sensitive data from objects before logging.
 * Converts Error instances to plain objects with stack traces preserved.
 * Converts BigInt values to strings for JSON serialization.
 */
export function sanitize(data: unknown, depth = 0): unknown {
  if (typeof data === 'bigint') {
    return data.toString() + 'n'
  }

  if (!data || typeof data !== 'object') {
    return data
  }

  // Prevent infinite recursion
  if (depth > 5) return '[Max Depth Reached]'

  if (data instanceof Error) {
    return sanitize(serializeError(data), depth + 1)
  }

  if (Array.isArray(data)) {
    return data.map((item) => sanitize(item, depth + 1))
  }

  if (data instanceof Set) {
    return { size: data.size }
  }

  const sanitized: Record<string, unknown> = {}

  for (const [key, value] of Object.entries(data)) {
    const lowerKey = key.toLowerCase()
    if (SENSITIVE_KEYS.some((sensitive) => lowerKey.includes(sensitive))) {
      sanitized[key] = '[REDACTED]'
    } else {
      sanitized[key] = sanitize(value, depth + 1)
    }
  }

  return sanitized
}

function mergeErrorIntoContext(context: LogContext | undefined, error: unknown): LogContext {
  return {
    ...context,
    error: error instanceof Error ? serializeError(error) : error,
  }
}

/**
 * Format log entry as a single JSON line
 */
export function formatLogEntry(
  level: LogLevel,
  message: string,
  context?: LogContext,
  loggerType?: LoggerType,
  runId?: string,
): string {
  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
  }

  if (loggerType) {
    entry.loggerType = loggerType
  }

  if (runId) {
    entry.runId = runId
  }

  if (context && Object.keys(context).length > 0) {
    const sanitized = sanitize(context)
    if (sanitized && typeof sanitized === 'object' && !Array.isArray(sanitized)) {
      entry.context = { ...sanitized }
    }
  }

  return JSON.stringify(entry)
}

const WRITERS: Record<LogLevel, (line: string) => void> = {
  debug: (line) => console.debug(line),
  info: (line) => console.log(line),
  warn: (line) => console.warn(line),
  error: (line) => console.error(line),
}

/**
 * Logger class with structured logging support
 */
export class Logger {
  private readonly loggerType?: LoggerType
  private readonly baseContext: LogContext

  constructor(loggerType?: LoggerType, baseContext: LogContext = {}) {
    this.loggerType = loggerType
    this.baseContext = baseContext
  }

  debug(message: string, context?: LogContext, error?: unknown): void {
    this.write('debug', message, context, error)
  }

  info(message: string, context?: LogContext, error?: unknown): void {
    this.write('info', message, context, error)
  }

  warn(message: string, context?: LogContext, error?: unknown): void {
    this.write('warn', message, context, error)
  }

  error(message: string, context?: LogContext, error?: unknown): void {
    this.write('error', message, context, error)
  }

  /**
   * Create a child logger with a base operation context
   */
  child(baseContext: LogContext): Logger {
    return new Logger(this.loggerType, { ...this.baseContext, ...baseContext })
  }

  private write(level: LogLevel, message: string, context: LogContext | undefined, error: unknown): void {
    if (!shouldLog(level, this.loggerType)) return

    const marketId = getRunMarketId()
    const withBase = { ...(marketId ? { marketId } : {}), ...this.baseContext, ...context }
    const merged = error !== undefined ? mergeErrorIntoContext(withBase, error) : withBase

    WRITERS[level](formatLogEntry(level, message, merged, this.loggerType, getRunId()))
  }
}

// Default app logger
export const logger = new Logger('app')

/**
 * Create a logger with a specific type
 */
export function createLogger(loggerType: LoggerType): Logger {
  return new Logger(loggerType)
}

/**
 * Helper to measure execution time
 */
export async function measureTime<T>(
  fn: () => Promise<T>,
): Promise<{ result: T; duration: number }> {
  const start = Date.now()
  const result = await fn()
  return { result, duration: Date.now() - start }
}
