export {
  labelSchema,
  sessionNameSchema,
  clockIdSchema,
  labelFilterSchema,
  logLevelSchema,
  LOG_LEVELS,
  type LogLevel,
} from './timers'
