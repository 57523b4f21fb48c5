/**
 * Arithmetic and ordering over completed intervals. Operands must come from
 * compatible clocks; mixing sources throws TimerCompatibilityError.
 */

import { assertCompatible, type ClockSource } from '@smarttimers/clocks'
import type { Interval } from './types'

/** A duration derived from one or more intervals. */
export interface Duration {
  readonly label: string
  readonly seconds: number
  readonly minutes: number
  readonly clock: ClockSource
}

type Measured = Interval | Duration

function clockOf(m: Measured): ClockSource {
  return 'clock' in m ? m.clock : m.start.clock
}

function joinLabels(sep: string, a: Measured, b: Measured): string {
  return [a.label, b.label].filter(l => l !== '').join(sep)
}

function duration(label: string, seconds: number, clock: ClockSource): Duration {
  return Object.freeze({ label, seconds, minutes: seconds / 60, clock })
}

/** Combined duration, labeled `a+b`. */
export function sumIntervals(a: Measured, b: Measured): Duration {
  assertCompatible(clockOf(a), clockOf(b))
  return duration(joinLabels('+', a, b), a.seconds + b.seconds, clockOf(a))
}

/** Absolute difference, labeled `a-b`. Symmetric in its operands' seconds. */
export function diffIntervals(a: Measured, b: Measured): Duration {
  assertCompatible(clockOf(a), clockOf(b))
  return duration(joinLabels('-', a, b), Math.abs(a.seconds - b.seconds), clockOf(a))
}

/** Negative, zero or positive as `a` is shorter than, as long as, or longer than `b`. Usable with Array#sort. */
export function compareIntervals(a: Measured, b: Measured): number {
  assertCompatible(clockOf(a), clockOf(b))
  return Math.sign(a.seconds - b.seconds)
}
