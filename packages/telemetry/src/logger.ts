import { configure, getLogger, reset } from '@logtape/logtape'
import type { LogRecord, Sink } from '@logtape/logtape'
import { ROOT_CATEGORY, validateEnvironment, validateLogLevel } from './constants.js'
import type { Environment, LogLevel } from './constants.js'

export interface LoggerConfig {
  level?: LogLevel
  environment?: Environment
  /** Replaces the environment-selected sink. Used by tests to capture records. */
  sink?: Sink
}

let configPromise: Promise<void> | null = null
let configured = false

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value)
  } catch {
    // Circular reference: retry with a replacer that marks cycles
    const seen = new WeakSet<object>()
    return JSON.stringify(value, (_key, val: unknown) => {
      if (typeof val === 'object' && val !== null) {
        if (seen.has(val)) return '[Circular]'
        seen.add(val)
      }
      return val
    })
  }
}

export function formatMessage(record: LogRecord): string {
  return record.message.map((part) => (typeof part === 'string' ? part : String(part))).join('')
}

const ANSI = {
  reset: '\x1b[0m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
}

const LEVEL_COLORS: Record<string, string> = {
  debug: ANSI.dim,
  info: ANSI.cyan,
  warning: ANSI.yellow,
  error: ANSI.red,
  fatal: ANSI.magenta,
}

// ---------------------------------------------------------------------------
// Sink factories
// ---------------------------------------------------------------------------

// Logs go to stderr: stdout carries rendered configurations and command lists.
function createPrettySink(): Sink {
  return (record: LogRecord) => {
    const time = new Date(record.timestamp).toISOString().slice(11, 23)
    const level = record.level.toUpperCase().padEnd(7)
    const color = LEVEL_COLORS[record.level] ?? ''
    const category = record.category.join('.')
    const msg = formatMessage(record)
    const props = Object.keys(record.properties).length
      ? ` ${safeStringify(record.properties)}`
      : ''
    process.stderr.write(
      `${ANSI.dim}${time}${ANSI.reset} ${color}${level}${ANSI.reset} ${ANSI.blue}${category}${ANSI.reset}: ${msg}${props}\n`
    )
  }
}

function createJsonSink(): Sink {
  return (record: LogRecord) => {
    const line = safeStringify({
      timestamp: record.timestamp,
      level: record.level,
      category: record.category.join('.'),
      message: formatMessage(record),
      ...(Object.keys(record.properties).length ? { properties: record.properties } : {}),
    })
    process.stderr.write(line + '\n')
  }
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Configure LogTape once for the process.
 *
 * Production gets JSON lines, everything else the pretty sink. Later calls
 * are no-ops once configuration succeeds; a failed attempt can be retried.
 */
export async function configureLogger(config?: LoggerConfig): Promise<void> {
  if (configured) return
  if (configPromise) return configPromise

  configPromise = doConfigureLogger(config)
    .then(() => {
      configured = true
    })
    .catch((err: unknown) => {
      configPromise = null
      throw err
    })
  return configPromise
}

async function doConfigureLogger(config?: LoggerConfig): Promise<void> {
  const level: LogLevel = config?.level ?? validateLogLevel(process.env.LOG_LEVEL) ?? 'info'
  const environment =
    config?.environment ?? validateEnvironment(process.env.NODE_ENV) ?? 'development'

  let sink: Sink
  if (config?.sink) {
    sink = config.sink
  } else if (environment === 'production') {
    sink = createJsonSink()
  } else {
    sink = createPrettySink()
  }

  await configure({
    sinks: { main: sink },
    loggers: [
      { category: ['logtape', 'meta'], lowestLevel: 'warning', sinks: ['main'] },
      { category: [ROOT_CATEGORY], lowestLevel: level, sinks: ['main'] },
    ],
  })
}

/**
 * @internal
 * Reset all internal state so `configureLogger` can be called again.
 * Intended for test teardown only.
 */
export async function resetLogger(): Promise<void> {
  await reset()
  configPromise = null
  configured = false
}

export { getLogger }
