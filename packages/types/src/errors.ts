export const ERROR_CODES = [
  'InvalidIntent',
  'AddressConflict',
  'AddressSpaceExhausted',
  'InterfaceConflict',
  'InterfaceExhausted',
  'MalformedConfig',
] as const

export type ErrorCode = (typeof ERROR_CODES)[number]

/**
 * Structured details attached to an error: AS number, link endpoints,
 * interface name, offending line, or the full list of intent issues.
 */
export type ErrorContext = Readonly<Record<string, string | number | readonly string[]>>

export class IntentCfgError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly context: ErrorContext = {}
  ) {
    super(message)
    this.name = 'IntentCfgError'
  }
}

export function isIntentCfgError(err: unknown, code?: ErrorCode): err is IntentCfgError {
  if (!(err instanceof IntentCfgError)) return false
  return code === undefined || err.code === code
}

/**
 * Human-readable message for any thrown value, prefixed with the error code
 * when it is one of ours.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof IntentCfgError) return `${err.code}: ${err.message}`
  if (err instanceof Error) return err.message
  return String(err)
}
