export { configureLogger, resetLogger, getLogger, formatMessage } from './logger.js'
export type { LoggerConfig } from './logger.js'
export {
  ROOT_CATEGORY,
  VALID_LOG_LEVELS,
  VALID_ENVIRONMENTS,
  validateLogLevel,
  validateEnvironment,
} from './constants.js'
export type { LogLevel, Environment } from './constants.js'
