/**
 * @intentcfg/telemetry: shared constants
 */

/** Root logger category. Every library logger lives below it. */
export const ROOT_CATEGORY = 'intentcfg'

// ---------------------------------------------------------------------------
// Environment validation helpers
// ---------------------------------------------------------------------------

export const VALID_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const
export type LogLevel = (typeof VALID_LOG_LEVELS)[number]

export const VALID_ENVIRONMENTS = ['development', 'production', 'test'] as const
export type Environment = (typeof VALID_ENVIRONMENTS)[number]

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value)
}

export function validateLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_LOG_LEVELS, value)) return value
  process.stderr.write(`[telemetry] invalid LOG_LEVEL "${value}", defaulting to "info"\n`)
  return undefined
}

export function validateEnvironment(value: string | undefined): Environment | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_ENVIRONMENTS, value)) return value
  process.stderr.write(`[telemetry] invalid NODE_ENV "${value}", defaulting to "development"\n`)
  return undefined
}
