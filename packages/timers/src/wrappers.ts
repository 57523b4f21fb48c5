import type { TimingSession } from './session'

/**
 * Wrap a function so each call is measured in `session` under `label`
 * (the function's name by default). Bind methods before wrapping.
 * Minifiers and some transforms rename functions; pass `label` where the
 * name must be stable.
 */
export function timed<A extends unknown[], R>(
  session: TimingSession,
  fn: (...args: A) => R,
  label?: string,
): (...args: A) => R {
  const name = label ?? (fn.name || 'anonymous')
  return (...args: A) => session.measure(name, () => fn(...args))
}

/** Like `timed`, but the measurement lasts until the returned promise settles. */
export function timedAsync<A extends unknown[], R>(
  session: TimingSession,
  fn: (...args: A) => Promise<R>,
  label?: string,
): (...args: A) => Promise<R> {
  const name = label ?? (fn.name || 'anonymous')
  return (...args: A) => session.measureAsync(name, () => fn(...args))
}
