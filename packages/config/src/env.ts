/**
 * Environment-driven defaults for timing sessions.
 *
 * Variables (empty values count as unset):
 * - SMARTTIMERS_CLOCK      clock identifier for new sessions
 * - SMARTTIMERS_NAME       session name used to label exports
 * - SMARTTIMERS_LOG_LEVEL  debug | info | warn | error | silent
 */

import {
  clockIdSchema,
  sessionNameSchema,
  logLevelSchema,
  validate,
  type LogLevel,
} from '@smarttimers/shared'

export const DEFAULT_CLOCK_ID = 'perf_counter'
export const DEFAULT_SESSION_NAME = 'smarttimer'
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn'

export interface TimersConfig {
  readonly clock: string
  readonly name: string
  readonly logLevel: LogLevel
}

export const DEFAULT_CONFIG: TimersConfig = {
  clock: DEFAULT_CLOCK_ID,
  name: DEFAULT_SESSION_NAME,
  logLevel: DEFAULT_LOG_LEVEL,
}

/** Env variable name for each config key. */
export const ENV_KEYS: Record<keyof TimersConfig, string> = {
  clock: 'SMARTTIMERS_CLOCK',
  name: 'SMARTTIMERS_NAME',
  logLevel: 'SMARTTIMERS_LOG_LEVEL',
}

export type EnvSource = Record<string, string | undefined>

function optional(env: EnvSource, key: string): string | undefined {
  const val = env[key]
  return val === undefined || val === '' ? undefined : val
}

export function readClockId(env: EnvSource = process.env): string {
  return validate(clockIdSchema.default(DEFAULT_CLOCK_ID), optional(env, ENV_KEYS.clock), ENV_KEYS.clock)
}

export function readSessionName(env: EnvSource = process.env): string {
  return validate(sessionNameSchema.default(DEFAULT_SESSION_NAME), optional(env, ENV_KEYS.name), ENV_KEYS.name)
}

export function readLogLevel(env: EnvSource = process.env): LogLevel {
  return validate(logLevelSchema.default(DEFAULT_LOG_LEVEL), optional(env, ENV_KEYS.logLevel), ENV_KEYS.logLevel)
}

/** Read and validate config from an environment map. */
export function loadConfig(env: EnvSource = process.env): TimersConfig {
  return {
    clock: readClockId(env),
    name: readSessionName(env),
    logLevel: readLogLevel(env),
  }
}
