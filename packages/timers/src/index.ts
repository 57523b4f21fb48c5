// Timing sessions: begin/end pairing, reports, aggregates and export

export type {
  TimePair,
  PendingMark,
  Interval,
  TimeEntry,
  TimerStats,
  ReportRow,
  SessionSnapshot,
} from './types'

export { PendingStack } from './pending-stack'

export {
  REPORT_HEADER,
  COLUMN_WIDTH,
  TIME_PRECISION,
  PERCENT_PRECISION,
  buildReport,
  computeStats,
  formatReport,
  type FormatOptions,
} from './report'

export {
  sumIntervals,
  diffIntervals,
  compareIntervals,
  type Duration,
} from './arithmetic'

export {
  MemorySink,
  FileSink,
  defaultFileName,
  type ReportSink,
  type FileMode,
} from './sinks'

export {
  TimingSession,
  AUTO_LABEL_PREFIX,
  type SessionOptions,
} from './session'

export { timed, timedAsync } from './wrappers'
