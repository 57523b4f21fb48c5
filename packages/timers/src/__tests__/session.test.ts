import { describe, it, expect, vi, afterEach } from 'vitest'
import {
  TimerCompatibilityError,
  TimerKeyError,
  TimerTypeError,
  TimerValueError,
  UnsupportedClockError,
} from '@smarttimers/shared'
import { createClockRegistry } from '@smarttimers/clocks'
import { TimingSession } from '../session'
import { manualClock, manualSession } from './manual-clock'

// ─── Resolution Schemes ─────────────────────────────────────────────────────

describe('TimingSession — schemes', () => {
  it('consecutive: begin A, end, begin B, end', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.end()
    session.begin('B')
    clock.set(3)
    session.end()

    expect(session.labels()).toEqual(['A', 'B'])
    expect(session.seconds()).toEqual([1, 2])
    expect(session.activeLabels()).toEqual([])
  })

  it('nested: inner interval closes first but is listed second', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.begin('B')
    clock.set(3)
    const inner = session.end()
    clock.set(4)
    const outer = session.end()

    expect(session.labels()).toEqual(['A', 'B'])
    expect(inner.label).toBe('B')
    expect(inner.seconds).toBe(2)
    expect(outer.seconds).toBe(4)
    expect(inner.seconds).toBeLessThanOrEqual(outer.seconds)
    expect(outer.depth).toBe(0)
    expect(inner.depth).toBe(1)
  })

  it('cascade: consecutive end() calls unwind the stack', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.begin('B')
    clock.set(2)
    session.begin('C')
    clock.set(5)
    session.end()
    clock.set(6)
    session.end()
    clock.set(7)
    session.end()

    expect(session.labels()).toEqual(['A', 'B', 'C'])
    expect(session.seconds()).toEqual([7, 5, 3])
  })

  it('cascade past the last open mark raises TimerKeyError', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.end()
    clock.set(2)

    expect(() => session.end()).toThrow(TimerKeyError)
    expect(() => session.end()).toThrow("'end()' has no matching 'begin()'")
  })

  it('cascade past the last open mark does not measure from the last begin', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.end()
    clock.set(2)
    expect(() => session.end()).toThrow(TimerKeyError)

    expect(session.labels()).toEqual(['A'])
    expect(session.seconds()).toEqual([1])
    expect(session.walltime()).toEqual([1, 1 / 60])
  })

  it('label-paired: closes out of begin order, listed in begin order', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.begin('B')
    clock.set(2)
    const a = session.end('A')
    expect(session.activeLabels()).toEqual(['B'])
    clock.set(4)
    const b = session.end('B')

    expect(session.labels()).toEqual(['A', 'B'])
    expect(a.seconds).toBe(2)
    expect(b.seconds).toBe(3)
  })

  it('mixed: label-paired and LIFO closes in one session', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    session.begin('B')
    clock.set(2)
    session.begin('C')
    clock.set(3)
    session.end('B')
    clock.set(5)
    expect(session.end().label).toBe('C')
    session.begin('D')
    clock.set(6)
    session.end('A')
    clock.set(8)
    session.end()

    expect(session.labels()).toEqual(['A', 'B', 'C', 'D'])
    expect(session.seconds()).toEqual([6, 2, 3, 3])
  })

  it('a repeated open label resolves to the most recently opened mark', () => {
    const { session, clock } = manualSession()
    const first = session.begin('X')
    clock.set(1)
    const second = session.begin('X')
    clock.set(3)
    expect(session.end('X').id).toBe(second)
    clock.set(7)
    expect(session.end('X').id).toBe(first)

    expect(session.labels()).toEqual(['X', 'X'])
    expect(session.seconds()).toEqual([7, 2])
    expect(session.getInterval('X').id).toBe(second)
  })
})

// ─── Errors ─────────────────────────────────────────────────────────────────

describe('TimingSession — errors', () => {
  it('end() on a fresh session raises TimerKeyError', () => {
    const { session } = manualSession()
    expect(() => session.end()).toThrow(TimerKeyError)
  })

  it('end(label) for a label never opened raises TimerKeyError', () => {
    const { session } = manualSession()
    expect(() => session.end('ghost')).toThrow(TimerKeyError)
    expect(() => session.end('ghost')).toThrow("label 'ghost' has no matching 'begin()'")
  })

  it('end(label) for an unknown label leaves open marks untouched', () => {
    const { session } = manualSession()
    session.begin('A')
    expect(() => session.end('ghost')).toThrow(TimerKeyError)
    expect(session.activeLabels()).toEqual(['A'])
    expect(session.labels()).toEqual([])
  })

  it('rejects non-string and empty labels', () => {
    const { session } = manualSession()
    expect(() => Reflect.apply(session.begin, session, [5])).toThrow(TimerTypeError)
    expect(() => session.begin('')).toThrow(TimerValueError)
    expect(() => Reflect.apply(session.end, session, [5])).toThrow(TimerTypeError)
    expect(session.activeLabels()).toEqual([])
  })

  it('a backwards non-adjustable clock fails the end() and keeps the mark open', () => {
    const { session, clock } = manualSession()
    clock.set(5)
    session.begin('A')
    clock.set(3)
    expect(() => session.end()).toThrow(TimerValueError)
    expect(session.activeLabels()).toEqual(['A'])

    clock.set(6)
    expect(session.end().seconds).toBe(1)
  })

  it('a backwards adjustable clock is flagged and logged', () => {
    const { session, clock, logLines } = manualSession({ clock: { adjustable: true, monotonic: false } })
    clock.set(5)
    session.begin('A')
    clock.set(3)
    const interval = session.end()

    expect(interval.seconds).toBe(-2)
    expect(interval.clockAdjusted).toBe(true)
    expect(logLines).toHaveLength(1)
    const entry = JSON.parse(logLines[0] ?? '{}')
    expect(entry.level).toBe('warn')
    expect(entry.msg).toBe('clock adjusted during measurement')
    expect(entry.label).toBe('A')
    expect(entry.scope).toBe('smarttimers:session')
  })

  it('a non-finite reading fails the end() and keeps the mark open', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(Number.NaN)
    expect(() => session.end()).toThrow(TimerValueError)
    expect(session.activeLabels()).toEqual(['A'])
    expect(session.labels()).toEqual([])

    clock.set(2)
    expect(session.end().seconds).toBe(2)
    expect(session.report()[0]?.relPercent).toBe(100)
  })

  it('a non-finite reading fails the begin() without opening a mark', () => {
    const { session, clock } = manualSession()
    clock.set(Number.POSITIVE_INFINITY)
    expect(() => session.begin('A')).toThrow(TimerValueError)
    expect(session.activeLabels()).toEqual([])

    clock.set(0)
    expect(session.begin()).toBe(1)
    expect(session.activeLabels()).toEqual(['tic-1'])
  })

  it('fails construction on an unknown clock', () => {
    expect(() => new TimingSession({ clock: 'sundial' })).toThrow(UnsupportedClockError)
  })

  it('validates the name', () => {
    const { session } = manualSession()
    expect(() => { session.name = '' }).toThrow(TimerValueError)
    expect(() => Reflect.set(session, 'name', 5)).toThrow(TimerTypeError)
    expect(session.name).toBe('test')
    session.name = 'renamed'
    expect(session.name).toBe('renamed')
  })
})

// ─── Labels and Queries ─────────────────────────────────────────────────────

describe('TimingSession — queries', () => {
  it('generates labels for unlabeled begins', () => {
    const { session } = manualSession()
    session.begin()
    expect(session.activeLabels()).toEqual(['tic-1'])
  })

  it('generated labels are unique among open marks', () => {
    const { session } = manualSession()
    session.begin('tic-2')
    session.begin()
    expect(session.activeLabels()).toEqual(['tic-2', 'tic-2-2'])
  })

  it('returns mark ids in begin order', () => {
    const { session } = manualSession()
    expect(session.begin('a')).toBe(1)
    expect(session.begin('b')).toBe(2)
    expect(session.pendingMarks().map(m => [m.id, m.label, m.depth])).toEqual([[1, 'a', 0], [2, 'b', 1]])
  })

  it('times() and timesByLabel()', () => {
    const { session, clock } = manualSession()
    session.measure('load', () => clock.advance(1))
    session.measure('parse', () => clock.advance(2))
    session.measure('load', () => clock.advance(4))

    expect(session.times()).toEqual([
      { label: 'load', seconds: 1 },
      { label: 'parse', seconds: 2 },
      { label: 'load', seconds: 4 },
    ])
    expect(session.timesByLabel()).toEqual(new Map([['load', [1, 4]], ['parse', [2]]]))
    expect(session.minutes()).toEqual([1 / 60, 2 / 60, 4 / 60])
  })

  it('getInterval returns the latest begun interval or throws', () => {
    const { session, clock } = manualSession()
    session.measure('load', () => clock.advance(1))
    session.measure('load', () => clock.advance(4))

    expect(session.getInterval('load').seconds).toBe(4)
    expect(() => session.getInterval('parse')).toThrow(TimerKeyError)
  })

  it('at() indexes in begin order', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    session.begin('B')
    clock.set(1)
    session.end()
    session.end()
    expect(session.at(0)?.label).toBe('A')
    expect(session.at(1)?.label).toBe('B')
    expect(session.at(2)).toBeUndefined()
  })

  it('intervals are frozen', () => {
    const { session, clock } = manualSession()
    session.begin('A')
    clock.set(1)
    const interval = session.end()
    expect(Object.isFrozen(interval)).toBe(true)
  })

  it('walltime spans first begin to latest end', () => {
    const { session, clock } = manualSession()
    expect(session.walltime()).toBeNull()
    session.begin('A')
    expect(session.walltime()).toBeNull()
    clock.set(1)
    session.end()
    clock.set(2)
    session.begin('B')
    clock.set(4)
    session.end()

    expect(session.walltime()).toEqual([4, 4 / 60])
    const total = session.seconds().reduce((a, b) => a + b, 0)
    expect(total).toBe(3)
  })
})

// ─── Stats ──────────────────────────────────────────────────────────────────

describe('TimingSession — stats', () => {
  function loaded() {
    const ctx = manualSession()
    ctx.session.measure('load:a', () => ctx.clock.advance(1))
    ctx.session.measure('parse', () => ctx.clock.advance(2))
    ctx.session.measure('load:b', () => ctx.clock.advance(3))
    return ctx
  }

  it('aggregates every interval without a filter', () => {
    const stats = loaded().session.stats()
    expect(stats?.count).toBe(3)
    expect(stats?.total[0]).toBe(6)
    expect(stats?.min[0]).toBe(1)
    expect(stats?.max[0]).toBe(3)
    expect(stats?.avg[0]).toBe(2)
  })

  it('filters by label substring', () => {
    const stats = loaded().session.stats('load')
    expect(stats).not.toBeNull()
    if (!stats) return
    expect(stats.count).toBe(2)
    expect(stats.total[0]).toBe(4)
    expect(stats.total[1]).toBeCloseTo(4 / 60, 12)
    expect(stats.min).toEqual([1, 1 / 60])
    expect(stats.max).toEqual([3, 3 / 60])
    expect(stats.avg[0]).toBe(2)
  })

  it('returns null when nothing matches', () => {
    expect(loaded().session.stats('render')).toBeNull()
    expect(manualSession().session.stats()).toBeNull()
  })

  it('rejects a non-string filter', () => {
    const { session } = loaded()
    expect(() => Reflect.apply(session.stats, session, [3])).toThrow(TimerTypeError)
  })
})

// ─── Editing ────────────────────────────────────────────────────────────────

describe('TimingSession — editing', () => {
  it('remove by label drops every match', () => {
    const { session, clock } = manualSession()
    session.measure('A', () => clock.advance(1))
    session.measure('B', () => clock.advance(1))
    session.measure('A', () => clock.advance(1))

    expect(session.remove('A')).toBe(2)
    expect(session.labels()).toEqual(['B'])
    expect(() => session.getInterval('A')).toThrow(TimerKeyError)
  })

  it('remove by index', () => {
    const { session, clock } = manualSession()
    session.measure('A', () => clock.advance(1))
    session.measure('B', () => clock.advance(1))

    expect(session.remove(0)).toBe(1)
    expect(session.labels()).toEqual(['B'])
    expect(session.remove(5)).toBe(0)
    expect(() => session.remove(0.5)).toThrow(TimerKeyError)
  })

  it('reset clears intervals and open marks but keeps the clock', () => {
    const { session, clock } = manualSession()
    session.measure('A', () => clock.advance(1))
    session.begin('B')
    session.reset()

    expect(session.labels()).toEqual([])
    expect(session.activeLabels()).toEqual([])
    expect(session.walltime()).toBeNull()
    expect(session.clock.id).toBe('manual')
    expect(() => session.end()).toThrow(TimerKeyError)
  })

  it('sessions resume after reset', () => {
    const { session, clock } = manualSession()
    session.measure('A', () => clock.advance(1))
    session.reset()
    session.measure('B', () => clock.advance(2))
    expect(session.labels()).toEqual(['B'])
    expect(session.seconds()).toEqual([2])
  })

  it('clearPending discards open marks and keeps closed ones', () => {
    const { session, clock, logLines } = manualSession()
    session.measure('A', () => clock.advance(1))
    session.begin('B')
    session.begin('C')

    const discarded = session.clearPending()
    expect(discarded.map(m => m.label)).toEqual(['B', 'C'])
    expect(session.labels()).toEqual(['A'])
    expect(session.activeLabels()).toEqual([])
    expect(() => session.end()).toThrow(TimerKeyError)
    expect(JSON.parse(logLines[0] ?? '{}').labels).toEqual(['B', 'C'])
  })

  it('clearPending measures walltime from the earliest remaining begin', () => {
    const { session, clock } = manualSession()
    session.begin('leaked')
    clock.set(2)
    session.begin('A')
    clock.set(3)
    session.end('A')
    expect(session.walltime()).toEqual([3, 3 / 60])

    session.clearPending()
    expect(session.walltime()).toEqual([1, 1 / 60])
  })

  it('clearPending with no closed intervals leaves no walltime', () => {
    const { session } = manualSession()
    session.begin('leaked')
    session.clearPending()
    expect(session.walltime()).toBeNull()
  })

  it('clearPending on an empty stack is silent', () => {
    const { session, logLines } = manualSession()
    expect(session.clearPending()).toEqual([])
    expect(logLines).toEqual([])
  })
})

// ─── measure ────────────────────────────────────────────────────────────────

describe('TimingSession — measure', () => {
  it('returns the callback result', () => {
    const { session, clock } = manualSession()
    const value = session.measure('work', () => {
      clock.advance(2)
      return 42
    })
    expect(value).toBe(42)
    expect(session.times()).toEqual([{ label: 'work', seconds: 2 }])
  })

  it('closes its mark when the callback throws', () => {
    const { session, clock } = manualSession()
    expect(() =>
      session.measure('work', () => {
        clock.advance(1)
        throw new Error('boom')
      }),
    ).toThrow('boom')
    expect(session.times()).toEqual([{ label: 'work', seconds: 1 }])
    expect(session.activeLabels()).toEqual([])
  })

  it('closes only its own mark when nested begins are left open', () => {
    const { session, clock } = manualSession()
    session.measure('outer', () => {
      session.begin('leaked')
      clock.advance(1)
    })
    expect(session.labels()).toEqual(['outer'])
    expect(session.activeLabels()).toEqual(['leaked'])
  })

  it('measureAsync waits for the promise', async () => {
    const { session, clock } = manualSession()
    const value = await session.measureAsync('fetch', async () => {
      clock.advance(3)
      return 'rows'
    })
    expect(value).toBe('rows')
    expect(session.times()).toEqual([{ label: 'fetch', seconds: 3 }])
  })

  it('measureAsync closes its mark on rejection', async () => {
    const { session, clock } = manualSession()
    await expect(
      session.measureAsync('fetch', async () => {
        clock.advance(1)
        throw new Error('offline')
      }),
    ).rejects.toThrow('offline')
    expect(session.times()).toEqual([{ label: 'fetch', seconds: 1 }])
  })
})

// ─── merge ──────────────────────────────────────────────────────────────────

describe('TimingSession — merge', () => {
  it('interleaves compatible sessions by start time', () => {
    const clock = manualClock('manual')
    const registry = createClockRegistry([clock.descriptor, manualClock('manual-2').descriptor])
    const logger = manualSession().logger
    const s1 = new TimingSession({ name: 's1', clock: 'manual', registry, logger })
    const s2 = new TimingSession({ name: 's2', clock: 'manual', registry, logger })

    s1.begin('A')
    clock.set(1)
    s2.begin('B')
    clock.set(2)
    s1.end()
    clock.set(3)
    s2.end()
    clock.set(4)
    s1.begin('C')
    clock.set(5)
    s1.end()

    const merged = s1.merge(s2)
    expect(merged.name).toBe('s1+s2')
    expect(merged.labels()).toEqual(['A', 'B', 'C'])
    expect(merged.seconds()).toEqual([2, 2, 1])
    expect(merged.walltime()).toEqual([5, 5 / 60])
    expect(merged.getInterval('B').seconds).toBe(2)
    expect(s1.labels()).toEqual(['A', 'C'])
  })

  it('keeps each session in begin order on a clock that went backwards', () => {
    const { session, clock, logger } = manualSession({ clock: { adjustable: true, monotonic: false } })
    clock.set(10)
    session.begin('A')
    clock.set(11)
    session.end()
    clock.set(5)
    session.begin('B')
    clock.set(6)
    session.end()
    expect(session.labels()).toEqual(['A', 'B'])

    const empty = new TimingSession({ name: 'empty', clock: session.clock, logger })
    expect(session.merge(empty).labels()).toEqual(['A', 'B'])
    expect(empty.merge(session).labels()).toEqual(['A', 'B'])
  })

  it('accepts sessions on different ids of the same source', () => {
    const registry = createClockRegistry([manualClock('manual').descriptor, manualClock('manual-2').descriptor])
    const logger = manualSession().logger
    const s1 = new TimingSession({ clock: 'manual', registry, logger })
    const s2 = new TimingSession({ clock: 'manual-2', registry, logger })
    expect(() => s1.merge(s2)).not.toThrow()
  })

  it('refuses sessions on incompatible clocks', () => {
    const { session, registry, logger } = manualSession()
    const other = new TimingSession({ clock: 'perf_counter', registry, logger })
    expect(() => session.merge(other)).toThrow(TimerCompatibilityError)
  })

  it('sessions can share a resolved clock handle', () => {
    const { session, logger } = manualSession()
    const sibling = new TimingSession({ clock: session.clock, logger })
    expect(sibling.clock).toBe(session.clock)
  })
})

// ─── Configuration ──────────────────────────────────────────────────────────

describe('TimingSession — environment', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('ignores a bad log level when a logger is given', () => {
    vi.stubEnv('SMARTTIMERS_LOG_LEVEL', 'loud')
    const { session } = manualSession()
    expect(session.name).toBe('test')
  })

  it('reads the log level when no logger is given', () => {
    vi.stubEnv('SMARTTIMERS_LOG_LEVEL', 'loud')
    const { registry } = manualSession()
    expect(() => new TimingSession({ name: 'n', clock: 'manual', registry })).toThrow(TimerValueError)
    expect(() => new TimingSession({ name: 'n', clock: 'manual', registry })).toThrow(
      "SMARTTIMERS_LOG_LEVEL 'loud' rejected",
    )
  })

  it('takes missing options from the environment', () => {
    vi.stubEnv('SMARTTIMERS_NAME', 'nightly')
    vi.stubEnv('SMARTTIMERS_CLOCK', 'manual')
    const { registry, logger } = manualSession()
    const session = new TimingSession({ registry, logger })
    expect(session.name).toBe('nightly')
    expect(session.clock.id).toBe('manual')
  })
})

// ─── Real clocks ────────────────────────────────────────────────────────────

describe('TimingSession — built-in clocks', () => {
  it('measures non-negative durations on the default clock', () => {
    const session = new TimingSession({ name: 'real', logger: manualSession().logger })
    expect(session.clock.id).toBe('perf_counter')
    session.begin('A')
    session.begin('B')
    const inner = session.end()
    const outer = session.end()
    expect(inner.seconds).toBeGreaterThanOrEqual(0)
    expect(outer.seconds).toBeGreaterThanOrEqual(inner.seconds)
  })
})
