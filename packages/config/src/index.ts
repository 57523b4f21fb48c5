// Shared configuration: session defaults resolved from the environment.

export {
  loadConfig,
  readClockId,
  readSessionName,
  readLogLevel,
  DEFAULT_CONFIG,
  DEFAULT_CLOCK_ID,
  DEFAULT_SESSION_NAME,
  DEFAULT_LOG_LEVEL,
  ENV_KEYS,
  type TimersConfig,
  type EnvSource,
} from './env'
