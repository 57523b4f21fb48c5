import { z } from 'zod'

export const labelSchema = z
  .string({ invalid_type_error: 'label must be a string' })
  .min(1, 'label must be a non-empty string')

export const sessionNameSchema = z
  .string({ invalid_type_error: 'name must be a string' })
  .min(1, 'name must be a non-empty string')

export const clockIdSchema = z
  .string({ invalid_type_error: 'clock identifier must be a string' })
  .min(1, 'clock identifier must be a non-empty string')

/** Substring filter for aggregate stats. Empty matches every label. */
export const labelFilterSchema = z.string({ invalid_type_error: 'label filter must be a string' })

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const

export const logLevelSchema = z.enum(LOG_LEVELS)

export type LogLevel = z.infer<typeof logLevelSchema>
