/**
 * Timing session: pairs begin/end calls into intervals.
 *
 * Supported schemes, freely mixed within one session:
 * - consecutive  begin('A') end() begin('B') end()
 * - nested       begin('A') begin('B') end() end()
 * - cascade      several end() in a row unwinding the stack top-down
 * - label-paired begin('A') begin('B') end('A') end('B')
 *
 * Intervals are always reported in begin order, whatever order they close in.
 */

import {
  ClockHandle,
  ClockRegistry,
  areClocksCompatible,
  elapsedBetween,
  formatClockInfo,
  type Timestamp,
} from '@smarttimers/clocks'
import { readClockId, readLogLevel, readSessionName } from '@smarttimers/config'
import {
  TimerCompatibilityError,
  TimerKeyError,
  TimerValueError,
  createLogger,
  labelFilterSchema,
  labelSchema,
  sessionNameSchema,
  validate,
  type Logger,
} from '@smarttimers/shared'
import { PendingStack } from './pending-stack'
import { buildReport, computeStats, formatReport } from './report'
import { FileSink, defaultFileName, type FileMode, type ReportSink } from './sinks'
import type {
  Interval,
  PendingMark,
  ReportRow,
  SessionSnapshot,
  TimeEntry,
  TimePair,
  TimerStats,
} from './types'

/** Prefix of labels generated for begin() without a label */
export const AUTO_LABEL_PREFIX = 'tic-'

export interface SessionOptions {
  /** Labels exports. Defaults to SMARTTIMERS_NAME, else 'smarttimer'. */
  name?: string
  /** Clock id resolved in `registry`, or an already resolved handle. */
  clock?: string | ClockHandle
  /** Defaults to a registry of the built-in clocks. */
  registry?: ClockRegistry
  /** Sessions log under a `session` child of this logger. */
  logger?: Logger
}

export class TimingSession {
  readonly clock: ClockHandle
  private readonly registry: ClockRegistry
  private readonly baseLogger: Logger
  private readonly logger: Logger
  private _name: string

  private readonly pending = new PendingStack<PendingMark>()
  /** Mark id -> interval, null while open. Map order is begin order. */
  private readonly slots = new Map<number, Interval | null>()
  /** Label -> ids of closed intervals */
  private readonly byLabel = new Map<string, Set<number>>()
  private nextId = 1
  private firstStart: Timestamp | null = null
  private lastEnd: Timestamp | null = null

  constructor(options: SessionOptions = {}) {
    // Environment variables are read only for the options left out
    this._name = validate(sessionNameSchema, options.name ?? readSessionName(), 'name')
    this.registry = options.registry ?? new ClockRegistry()
    this.clock = options.clock instanceof ClockHandle
      ? options.clock
      : this.registry.resolve(options.clock ?? readClockId())
    this.baseLogger = options.logger ?? createLogger({ level: readLogLevel() })
    this.logger = this.baseLogger.child('session')
  }

  get name(): string { return this._name }
  set name(name: string) { this._name = validate(sessionNameSchema, name, 'name') }

  // ── Measuring ──

  /**
   * Open a mark and start measuring. The clock is read last.
   * Without a label, one unique among the open marks is generated.
   * @returns id of the mark, also the id of the interval it becomes
   */
  begin(label?: string): number {
    const resolved = label === undefined ? this.autoLabel() : validate(labelSchema, label, 'label')
    const depth = this.pending.depth
    const start = this.clock.now()
    const id = this.nextId++

    const mark: PendingMark = Object.freeze({ id, label: resolved, start, depth })
    this.slots.set(id, null)
    this.pending.push(mark)
    if (this.firstStart === null) this.firstStart = start

    this.logger.debug('begin', { session: this._name, id, label: resolved, depth })
    return id
  }

  /**
   * Close a mark. The clock is read first.
   *
   * With a label, closes the most recently opened mark carrying it, wherever
   * it sits in the stack. Without one, closes the top of the stack.
   *
   * @throws TimerKeyError if no open mark matches
   * @throws TimerValueError if the reading is not finite, or a non-adjustable
   *   clock went backwards
   */
  end(label?: string): Interval {
    const stop = this.clock.now()
    return this.resolveMark(this.findMark(label), stop)
  }

  /** Run `fn` inside its own mark. The mark is closed even if `fn` throws. */
  measure<T>(label: string, fn: () => T): T {
    const id = this.begin(label)
    let result: T
    try {
      result = fn()
    } catch (err) {
      this.closeIfOpen(id)
      throw err
    }
    this.endById(id)
    return result
  }

  async measureAsync<T>(label: string, fn: () => Promise<T>): Promise<T> {
    const id = this.begin(label)
    let result: T
    try {
      result = await fn()
    } catch (err) {
      this.closeIfOpen(id)
      throw err
    }
    this.endById(id)
    return result
  }

  // ── Queries ──

  /** Completed intervals in begin order. */
  intervals(): Interval[] {
    const out: Interval[] = []
    for (const t of this.slots.values()) {
      if (t !== null) out.push(t)
    }
    return out
  }

  labels(): string[] {
    return this.intervals().map(t => t.label)
  }

  /** Labels of open marks, bottom of the stack first. */
  activeLabels(): string[] {
    return this.pending.toArray().map(m => m.label)
  }

  pendingMarks(): PendingMark[] {
    return this.pending.toArray()
  }

  seconds(): number[] {
    return this.intervals().map(t => t.seconds)
  }

  minutes(): number[] {
    return this.intervals().map(t => t.minutes)
  }

  times(): TimeEntry[] {
    return this.intervals().map(t => ({ label: t.label, seconds: t.seconds }))
  }

  /** Seconds of every interval grouped by label, each list in begin order. */
  timesByLabel(): Map<string, number[]> {
    const map = new Map<string, number[]>()
    for (const t of this.intervals()) {
      const list = map.get(t.label)
      if (list) list.push(t.seconds)
      else map.set(t.label, [t.seconds])
    }
    return map
  }

  /** Interval at a begin-order position. */
  at(index: number): Interval | undefined {
    return this.intervals()[index]
  }

  /**
   * Most recently begun completed interval carrying `label`.
   * @throws TimerKeyError if there is none
   */
  getInterval(label: string): Interval {
    let latest: Interval | undefined
    for (const id of this.byLabel.get(label) ?? []) {
      const t = this.slots.get(id)
      if (t && (latest === undefined || t.id > latest.id)) latest = t
    }
    if (latest === undefined) {
      throw new TimerKeyError(`no completed interval labeled '${label}'`, label)
    }
    return latest
  }

  /**
   * Aggregates over intervals whose label contains `filter` (all when omitted).
   * Returns null when no interval matches.
   */
  stats(filter?: string): TimerStats | null {
    if (filter === undefined) return computeStats(this.intervals())
    const f = validate(labelFilterSchema, filter, 'label filter')
    return computeStats(this.intervals().filter(t => t.label.includes(f)))
  }

  report(): ReportRow[] {
    return buildReport(this.intervals())
  }

  /** Time from the first begin() to the latest end(). Null before any end(). */
  walltime(): TimePair | null {
    if (this.firstStart === null || this.lastEnd === null) return null
    const seconds = elapsedBetween(this.firstStart, this.lastEnd)
    return [seconds, seconds / 60]
  }

  // ── Editing ──

  /**
   * Drop completed intervals: every one with a label, or the one at a
   * begin-order index. Out-of-range indices remove nothing.
   * @returns number of intervals removed
   */
  remove(key: string | number): number {
    if (typeof key === 'string') {
      const doomed = this.intervals().filter(t => t.label === key)
      for (const t of doomed) this.drop(t)
      return doomed.length
    }
    if (typeof key === 'number' && Number.isInteger(key)) {
      const t = this.intervals()[key]
      if (t === undefined) return 0
      this.drop(t)
      return 1
    }
    throw new TimerKeyError(`key '${String(key)}' is not a label or an integer index`)
  }

  /** Forget all intervals and open marks. The clock and name are kept. */
  reset(): void {
    this.slots.clear()
    this.byLabel.clear()
    this.pending.clear()
    this.firstStart = null
    this.lastEnd = null
  }

  /**
   * Discard open marks, e.g. after an exception skipped their end().
   * Walltime is measured again from the earliest remaining begin.
   */
  clearPending(): PendingMark[] {
    const discarded = this.pending.clear()
    for (const m of discarded) this.slots.delete(m.id)
    this.firstStart = this.intervals()[0]?.start ?? null
    if (discarded.length > 0) {
      this.logger.warn('discarded pending marks', {
        session: this._name,
        labels: discarded.map(m => m.label),
      })
    }
    return discarded
  }

  /**
   * New session holding the intervals of both. Each side keeps its own begin
   * order; the two are interleaved by start reading. Open marks are not
   * carried over.
   * @throws TimerCompatibilityError if the clocks cannot be compared
   */
  merge(other: TimingSession): TimingSession {
    if (!areClocksCompatible(this.clock, other.clock)) {
      throw new TimerCompatibilityError(
        `cannot merge session '${other.name}' (clock '${other.clock.id}') ` +
        `into '${this._name}' (clock '${this.clock.id}')`,
      )
    }
    const merged = new TimingSession({
      name: `${this._name}+${other.name}`,
      clock: this.clock,
      registry: this.registry,
      logger: this.baseLogger,
    })
    const mine = this.intervals()
    const theirs = other.intervals()
    let i = 0
    let j = 0
    while (i < mine.length || j < theirs.length) {
      const a = mine[i]
      const b = theirs[j]
      if (a !== undefined && (b === undefined || a.start.seconds <= b.start.seconds)) {
        merged.adopt(a)
        i++
      } else if (b !== undefined) {
        merged.adopt(b)
        j++
      }
    }
    return merged
  }

  // ── Export ──

  /** Padded export table: header plus one line per interval. */
  toString(): string {
    return formatReport(this.report()).map(l => l + '\n').join('')
  }

  /** Report columns: seconds, minutes, rel %, cumulative s, cumulative min, cumulative %. */
  toArray(): number[][] {
    const rows = this.report()
    return [
      rows.map(r => r.seconds),
      rows.map(r => r.minutes),
      rows.map(r => r.relPercent),
      rows.map(r => r.cumulativeSeconds),
      rows.map(r => r.cumulativeMinutes),
      rows.map(r => r.cumulativePercent),
    ]
  }

  snapshot(): SessionSnapshot {
    return {
      name: this._name,
      capturedAt: new Date().toISOString(),
      clock: { id: this.clock.id, ...this.clock.info },
      rows: this.report(),
      stats: this.stats(),
      walltime: this.walltime(),
      pending: this.activeLabels(),
    }
  }

  exportJSON(): string {
    return JSON.stringify(this.snapshot(), null, 2)
  }

  /** Write the compact export format to a sink. */
  exportTo(sink: ReportSink): void {
    sink.write(formatReport(this.report(), { padded: false }))
  }

  /**
   * Write the compact export format to a file, by default named after the session.
   * @returns path written
   */
  toFile(filePath?: string, mode: FileMode = 'write'): string {
    const sink = new FileSink(filePath ?? defaultFileName(this._name), mode)
    this.exportTo(sink)
    return sink.filePath
  }

  describeClock(): string {
    return formatClockInfo(this.clock.id, this.clock.info)
  }

  // ── Internals ──

  private autoLabel(): string {
    const base = `${AUTO_LABEL_PREFIX}${this.nextId}`
    let label = base
    for (let n = 2; this.pending.hasLabel(label); n++) label = `${base}-${n}`
    return label
  }

  private findMark(label: string | undefined): PendingMark {
    if (label === undefined) {
      const top = this.pending.peek()
      if (top === undefined) throw new TimerKeyError("'end()' has no matching 'begin()'")
      return top
    }
    const key = validate(labelSchema, label, 'label')
    const mark = this.pending.findLabel(key)
    if (mark === undefined) {
      throw new TimerKeyError(`label '${key}' has no matching 'begin()'`, key)
    }
    return mark
  }

  private resolveMark(mark: PendingMark, stop: Timestamp): Interval {
    const interval = this.close(mark, stop)
    this.pending.remove(mark)
    this.slots.set(mark.id, interval)
    this.index(interval)
    this.lastEnd = stop

    this.logger.debug('end', {
      session: this._name,
      id: mark.id,
      label: mark.label,
      seconds: interval.seconds,
    })
    return interval
  }

  private close(mark: PendingMark, stop: Timestamp): Interval {
    const seconds = elapsedBetween(mark.start, stop)
    if (!Number.isFinite(seconds)) {
      throw new TimerValueError(`non-finite elapsed time ${seconds}s for '${mark.label}'`)
    }
    let clockAdjusted = false
    if (seconds < 0) {
      if (!this.clock.info.adjustable) {
        throw new TimerValueError(
          `negative elapsed time ${seconds}s for '${mark.label}' on non-adjustable clock '${this.clock.id}'`,
        )
      }
      clockAdjusted = true
      this.logger.warn('clock adjusted during measurement', {
        session: this._name,
        label: mark.label,
        seconds,
      })
    }
    return Object.freeze({
      id: mark.id,
      label: mark.label,
      start: mark.start,
      end: stop,
      seconds,
      minutes: seconds / 60,
      depth: mark.depth,
      clockAdjusted,
    })
  }

  private openMark(id: number): PendingMark | undefined {
    for (const m of this.pending) {
      if (m.id === id) return m
    }
    return undefined
  }

  private endById(id: number): Interval {
    const stop = this.clock.now()
    const mark = this.openMark(id)
    if (mark === undefined) {
      throw new TimerKeyError(`mark ${id} is no longer open`, id)
    }
    return this.resolveMark(mark, stop)
  }

  private closeIfOpen(id: number): void {
    if (this.openMark(id) !== undefined) this.endById(id)
  }

  private index(t: Interval): void {
    const ids = this.byLabel.get(t.label)
    if (ids) ids.add(t.id)
    else this.byLabel.set(t.label, new Set([t.id]))
  }

  private drop(t: Interval): void {
    this.slots.delete(t.id)
    const ids = this.byLabel.get(t.label)
    if (!ids) return
    ids.delete(t.id)
    if (ids.size === 0) this.byLabel.delete(t.label)
  }

  private adopt(t: Interval): void {
    const id = this.nextId++
    const interval: Interval = Object.freeze({ ...t, id })
    this.slots.set(id, interval)
    this.index(interval)
    if (this.firstStart === null || t.start.seconds < this.firstStart.seconds) this.firstStart = t.start
    if (this.lastEnd === null || t.end.seconds > this.lastEnd.seconds) this.lastEnd = t.end
  }
}
