export type { Result } from './result.js'
export { ok, fail } from './result.js'
export {
  ERROR_CODES,
  IntentCfgError,
  isIntentCfgError,
  errorMessage,
} from './errors.js'
export type { ErrorCode, ErrorContext } from './errors.js'
