/**
 * Registry of clocks available to timing sessions.
 *
 * Built once at startup and passed to sessions. Holds descriptors only;
 * handles resolved from it keep their descriptor even if it is later
 * replaced or unregistered.
 */

import { DEFAULT_CLOCK_ID } from '@smarttimers/config'
import {
  UnsupportedClockError,
  TimerValueError,
  clockIdSchema,
  validate,
} from '@smarttimers/shared'
import { BUILTIN_CLOCKS } from './builtin'
import type { ClockDescriptor, ClockInfo, ClockSource, Timestamp } from './types'

// ─── Handle ──────────────────────────────────────────────────────────────────

export class ClockHandle implements ClockSource {
  readonly id: string
  readonly info: ClockInfo
  private readonly read: () => number

  constructor(descriptor: ClockDescriptor) {
    this.id = descriptor.id
    this.read = descriptor.read
    this.info = Object.freeze({
      resolution: descriptor.resolution,
      monotonic: descriptor.monotonic,
      adjustable: descriptor.adjustable,
      implementation: descriptor.implementation,
    })
  }

  /** @throws TimerValueError if the clock produced NaN or an infinite reading */
  now(): Timestamp {
    const seconds = this.read()
    if (!Number.isFinite(seconds)) {
      throw new TimerValueError(`clock '${this.id}' produced a non-finite reading: ${seconds}`)
    }
    return { clock: this, seconds }
  }
}

export function formatClockInfo(id: string, info: ClockInfo): string {
  return [
    `'${id}'`,
    `    adjustable    : ${info.adjustable}`,
    `    implementation: ${info.implementation}`,
    `    monotonic     : ${info.monotonic}`,
    `    resolution    : ${info.resolution}`,
  ].join('\n')
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class ClockRegistry {
  private readonly clocks = new Map<string, ClockDescriptor>()

  constructor(descriptors: Iterable<ClockDescriptor> = BUILTIN_CLOCKS) {
    for (const d of descriptors) this.register(d)
  }

  /**
   * Add a clock, replacing any clock with the same id.
   * @throws TimerValueError if the read function does not return a finite number
   */
  register(descriptor: ClockDescriptor): void {
    const id = validate(clockIdSchema, descriptor.id, 'clock identifier')
    let sample: unknown
    try {
      sample = descriptor.read()
    } catch (err) {
      throw new TimerValueError(`clock '${id}' failed to produce a reading`, { cause: err })
    }
    if (typeof sample !== 'number' || !Number.isFinite(sample)) {
      throw new TimerValueError(`clock '${id}' does not return a numeric value`)
    }
    this.clocks.set(id, descriptor)
  }

  /** @throws UnsupportedClockError */
  unregister(id: string): void {
    if (!this.clocks.delete(id)) {
      throw new UnsupportedClockError(id, this.ids())
    }
  }

  has(id: string): boolean {
    return this.clocks.has(id)
  }

  /** Registered ids in registration order. */
  ids(): string[] {
    return Array.from(this.clocks.keys())
  }

  /** @throws UnsupportedClockError */
  resolve(clockId: string = DEFAULT_CLOCK_ID): ClockHandle {
    const id = validate(clockIdSchema, clockId, 'clock identifier')
    const descriptor = this.clocks.get(id)
    if (!descriptor) {
      throw new UnsupportedClockError(id, this.ids())
    }
    return new ClockHandle(descriptor)
  }

  info(clockId: string): ClockInfo {
    return this.resolve(clockId).info
  }

  describe(clockId: string): string {
    return formatClockInfo(clockId, this.info(clockId))
  }

  describeAll(): string {
    return this.ids().map(id => this.describe(id)).join('\n\n')
  }
}

/** Registry of the built-in clocks plus any extra descriptors. */
export function createClockRegistry(extra: Iterable<ClockDescriptor> = []): ClockRegistry {
  const registry = new ClockRegistry()
  for (const d of extra) registry.register(d)
  return registry
}
