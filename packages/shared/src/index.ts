// Shared building blocks: error hierarchy, input schemas, structured logging.

export {
  TimerError,
  UnsupportedClockError,
  TimerCompatibilityError,
  TimerKeyError,
  TimerTypeError,
  TimerValueError,
} from './errors'

export {
  labelSchema,
  sessionNameSchema,
  clockIdSchema,
  labelFilterSchema,
  logLevelSchema,
  LOG_LEVELS,
  type LogLevel,
} from './schemas/index'

export { validate } from './validate'

export {
  createLogger,
  DEFAULT_LOG_SCOPE,
  type Logger,
  type LoggerOptions,
  type LogFields,
  type LogWriter,
} from './logger'
