import { TimerCompatibilityError } from '@smarttimers/shared'
import type { ClockSource, Timestamp } from './types'

/**
 * Two clocks are compatible when they read the same underlying source with
 * the same semantics. The id is only a name and is not compared.
 */
export function areClocksCompatible(a: ClockSource, b: ClockSource): boolean {
  return (
    a.info.implementation === b.info.implementation &&
    a.info.resolution === b.info.resolution &&
    a.info.monotonic === b.info.monotonic &&
    a.info.adjustable === b.info.adjustable
  )
}

/** @throws TimerCompatibilityError */
export function assertCompatible(a: ClockSource, b: ClockSource): void {
  if (!areClocksCompatible(a, b)) {
    throw new TimerCompatibilityError(
      `clocks '${a.id}' (${a.info.implementation}) and '${b.id}' (${b.info.implementation}) are not compatible`,
    )
  }
}

/** Seconds from `start` to `end`. Negative if the clock went backwards. */
export function elapsedBetween(start: Timestamp, end: Timestamp): number {
  assertCompatible(start.clock, end.clock)
  return end.seconds - start.seconds
}
