/**
 * Types for timing sessions.
 *
 * A session pairs begin/end calls into intervals kept in begin order, and
 * derives per-row percentages and per-label aggregates from them.
 */

import type { ClockInfo, Timestamp } from '@smarttimers/clocks'

/** Duration expressed both ways */
export type TimePair = [seconds: number, minutes: number]

// ─── Marks and Intervals ─────────────────────────────────────────────────────

/** An open begin() awaiting its end(). */
export interface PendingMark {
  /** Id returned by begin(); increases with every begin() of a session */
  readonly id: number
  readonly label: string
  readonly start: Timestamp
  /** Open marks below this one when it was created */
  readonly depth: number
}

/** A completed measurement. Frozen once closed. */
export interface Interval {
  /** Id of the mark this interval closed */
  readonly id: number
  readonly label: string
  readonly start: Timestamp
  readonly end: Timestamp
  readonly seconds: number
  readonly minutes: number
  readonly depth: number
  /** An adjustable clock went backwards; `seconds` is negative */
  readonly clockAdjusted: boolean
}

export interface TimeEntry {
  readonly label: string
  readonly seconds: number
}

// ─── Aggregates ──────────────────────────────────────────────────────────────

export interface TimerStats {
  readonly count: number
  readonly total: TimePair
  readonly min: TimePair
  readonly max: TimePair
  readonly avg: TimePair
}

export interface ReportRow {
  readonly label: string
  readonly seconds: number
  readonly minutes: number
  /** Share of the grand total, 0–100 */
  readonly relPercent: number
  readonly cumulativeSeconds: number
  readonly cumulativeMinutes: number
  readonly cumulativePercent: number
}

export interface SessionSnapshot {
  readonly name: string
  readonly capturedAt: string
  readonly clock: ClockInfo & { readonly id: string }
  readonly rows: ReportRow[]
  readonly stats: TimerStats | null
  readonly walltime: TimePair | null
  readonly pending: string[]
}
