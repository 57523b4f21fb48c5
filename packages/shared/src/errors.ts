/**
 * Error hierarchy for timing operations.
 *
 * Every failure is a caller error raised synchronously at the point of
 * violation. Catch `TimerError` to handle all of them at once.
 */

export class TimerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TimerError'
  }
}

/** A clock identifier is not registered with the clock registry. */
export class UnsupportedClockError extends TimerError {
  constructor(
    public readonly clockId: string,
    public readonly known: readonly string[] = [],
  ) {
    super(
      known.length > 0
        ? `Unsupported clock '${clockId}'. Known clocks: ${known.join(', ')}`
        : `Unsupported clock '${clockId}'`,
    )
    this.name = 'UnsupportedClockError'
  }
}

/** Readings or sessions from clocks that cannot be combined. */
export class TimerCompatibilityError extends TimerError {
  constructor(message = 'incompatible clocks') {
    super(message)
    this.name = 'TimerCompatibilityError'
  }
}

/** A label or key has no matching open mark or completed interval. */
export class TimerKeyError extends TimerError {
  constructor(message: string, public readonly key?: string | number) {
    super(message)
    this.name = 'TimerKeyError'
  }
}

export class TimerTypeError extends TimerError {
  constructor(message: string) {
    super(message)
    this.name = 'TimerTypeError'
  }
}

export class TimerValueError extends TimerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TimerValueError'
  }
}
