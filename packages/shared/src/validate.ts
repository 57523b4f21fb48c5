import type { z } from 'zod'
import { TimerTypeError, TimerValueError } from './errors'

/**
 * Parse a value with a Zod schema and raise a typed timer error on failure.
 * A wrong type becomes TimerTypeError; anything else TimerValueError.
 */
export function validate<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  value: unknown,
  field: string,
): T {
  const result = schema.safeParse(value)
  if (result.success) return result.data

  const issue = result.error.issues[0]
  const detail = issue ? issue.message : 'invalid value'
  const message = `${field} '${String(value)}' rejected: ${detail}`
  if (issue?.code === 'invalid_type') {
    throw new TimerTypeError(message)
  }
  throw new TimerValueError(message)
}
