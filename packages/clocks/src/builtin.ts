/**
 * Clocks available on every Node.js process.
 */

import type { ClockDescriptor } from './types'

// Subtracted from hrtime readings so the Number conversion keeps ns precision.
const HRTIME_ORIGIN = process.hrtime.bigint()

export const PERF_COUNTER: ClockDescriptor = {
  id: 'perf_counter',
  read: () => performance.now() / 1000,
  resolution: 1e-6,
  monotonic: true,
  adjustable: false,
  implementation: 'performance.now()',
}

export const MONOTONIC: ClockDescriptor = {
  id: 'monotonic',
  read: () => Number(process.hrtime.bigint() - HRTIME_ORIGIN) / 1e9,
  resolution: 1e-9,
  monotonic: true,
  adjustable: false,
  implementation: 'process.hrtime.bigint()',
}

/** CPU time (user + system) consumed by this process. */
export const PROCESS_TIME: ClockDescriptor = {
  id: 'process_time',
  read: () => {
    const usage = process.cpuUsage()
    return (usage.user + usage.system) / 1e6
  },
  resolution: 1e-6,
  monotonic: true,
  adjustable: false,
  implementation: 'process.cpuUsage()',
}

/** Wall clock since the epoch. Follows system time changes. */
export const SYSTEM_TIME: ClockDescriptor = {
  id: 'time',
  read: () => Date.now() / 1000,
  resolution: 1e-3,
  monotonic: false,
  adjustable: true,
  implementation: 'Date.now()',
}

export const BUILTIN_CLOCKS: readonly ClockDescriptor[] = [
  PERF_COUNTER,
  MONOTONIC,
  PROCESS_TIME,
  SYSTEM_TIME,
]
