/**
 * A component failed to initialize, or the listener could not be acquired.
 * Fatal for the run: nothing is left bound or attached when it is thrown.
 */
export class ConstructionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'ConstructionError'
  }
}

/** A connection-level failure. Only the affected connection is dropped. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'TransportError'
  }
}

/** Requests were still running when the drain deadline passed. Non-fatal. */
export class ShutdownTimeoutError extends Error {
  readonly abandoned: number
  readonly timeoutMs: number

  constructor(abandoned: number, timeoutMs: number) {
    super(`${abandoned} request(s) abandoned after ${timeoutMs} ms drain deadline`)
    this.name = 'ShutdownTimeoutError'
    this.abandoned = abandoned
    this.timeoutMs = timeoutMs
  }
}
