// Clock adapter: built-in clocks, an injectable registry, and compatibility checks

export type {
  ClockInfo,
  ClockDescriptor,
  ClockSource,
  Timestamp,
} from './types'

export {
  PERF_COUNTER,
  MONOTONIC,
  PROCESS_TIME,
  SYSTEM_TIME,
  BUILTIN_CLOCKS,
} from './builtin'

export {
  ClockHandle,
  ClockRegistry,
  createClockRegistry,
  formatClockInfo,
} from './registry'

export {
  areClocksCompatible,
  assertCompatible,
  elapsedBetween,
} from './compat'
