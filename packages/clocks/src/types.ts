/**
 * Types for the clock adapter.
 *
 * A clock is a descriptor: a zero-argument read function returning
 * fractional seconds, plus static metadata. Handles are resolved from a
 * registry and produce timestamps tagged with their clock.
 */

// ─── Metadata ────────────────────────────────────────────────────────────────

export interface ClockInfo {
  /** Smallest measurable step, in seconds */
  readonly resolution: number
  /** Readings never decrease */
  readonly monotonic: boolean
  /** Can be changed by the system or an operator (NTP, manual set) */
  readonly adjustable: boolean
  /** Name of the underlying time source; the clock's identity */
  readonly implementation: string
}

export interface ClockDescriptor extends ClockInfo {
  readonly id: string
  /** Current reading in fractional seconds */
  readonly read: () => number
}

// ─── Readings ────────────────────────────────────────────────────────────────

export interface ClockSource {
  readonly id: string
  readonly info: ClockInfo
}

export interface Timestamp {
  readonly clock: ClockSource
  readonly seconds: number
}
