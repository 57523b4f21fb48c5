/**
 * Derived views over completed intervals: report rows with relative and
 * cumulative percentages, label-filtered aggregates, and the text export
 * format.
 */

import type { Interval, ReportRow, TimePair, TimerStats } from './types'

// ─── Constants ───────────────────────────────────────────────────────────────

export const REPORT_HEADER = [
  'label',
  'seconds',
  'minutes',
  'rel_percent',
  'cumul_sec',
  'cumul_min',
  'cumul_percent',
] as const

/** Field width of the padded table */
export const COLUMN_WIDTH = 12

/** Decimals for seconds and minutes */
export const TIME_PRECISION = 6

/** Decimals for percentages */
export const PERCENT_PRECISION = 4

// ─── Rows ────────────────────────────────────────────────────────────────────

/**
 * One row per interval, in the given order. Percentages are relative to the
 * sum of all intervals, so a nested child counts alongside its parent.
 * With a zero grand total every percentage is 0.
 */
export function buildReport(intervals: readonly Interval[]): ReportRow[] {
  const total = intervals.reduce((a, t) => a + t.seconds, 0)
  const percent = (s: number) => (total !== 0 ? (s / total) * 100 : 0)

  let cumulativeSeconds = 0
  let cumulativeMinutes = 0
  return intervals.map(t => {
    cumulativeSeconds += t.seconds
    cumulativeMinutes += t.minutes
    return {
      label: t.label,
      seconds: t.seconds,
      minutes: t.minutes,
      relPercent: percent(t.seconds),
      cumulativeSeconds,
      cumulativeMinutes,
      cumulativePercent: percent(cumulativeSeconds),
    }
  })
}

// ─── Aggregates ──────────────────────────────────────────────────────────────

/** Count, total, min, max and average. Null when there is nothing to aggregate. */
export function computeStats(intervals: readonly Interval[]): TimerStats | null {
  if (intervals.length === 0) return null

  const seconds = intervals.map(t => t.seconds)
  const minutes = intervals.map(t => t.minutes)
  const sum = (xs: number[]) => xs.reduce((a, b) => a + b, 0)
  const min = (xs: number[]) => xs.reduce((a, b) => Math.min(a, b), Infinity)
  const max = (xs: number[]) => xs.reduce((a, b) => Math.max(a, b), -Infinity)
  const count = intervals.length

  const total: TimePair = [sum(seconds), sum(minutes)]
  return {
    count,
    total,
    min: [min(seconds), min(minutes)],
    max: [max(seconds), max(minutes)],
    avg: [total[0] / count, total[1] / count],
  }
}

// ─── Export Format ───────────────────────────────────────────────────────────

export interface FormatOptions {
  /** Right-align fields to COLUMN_WIDTH and join with ", " (default true) */
  padded?: boolean
}

function quoteLabel(label: string): string {
  return /[",]/.test(label) ? `"${label.replace(/"/g, '""')}"` : label
}

function rowFields(row: ReportRow): string[] {
  return [
    row.label,
    row.seconds.toFixed(TIME_PRECISION),
    row.minutes.toFixed(TIME_PRECISION),
    row.relPercent.toFixed(PERCENT_PRECISION),
    row.cumulativeSeconds.toFixed(TIME_PRECISION),
    row.cumulativeMinutes.toFixed(TIME_PRECISION),
    row.cumulativePercent.toFixed(PERCENT_PRECISION),
  ]
}

function joinFields(fields: readonly string[], padded: boolean): string {
  return padded
    ? fields.map(f => f.padStart(COLUMN_WIDTH)).join(', ')
    : fields.join(',')
}

/** Header line followed by one line per row. */
export function formatReport(rows: readonly ReportRow[], options: FormatOptions = {}): string[] {
  const padded = options.padded ?? true
  const lines = [joinFields(REPORT_HEADER, padded)]
  for (const row of rows) {
    const fields = rowFields(row)
    if (!padded) fields[0] = quoteLabel(row.label)
    lines.push(joinFields(fields, padded))
  }
  return lines
}
