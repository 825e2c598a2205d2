import type { ServerResponse } from 'node:http'

export interface DrainResult {
  readonly drained: number
  readonly abandoned: number
}

/**
 * Tracks responses that have been dispatched but not yet closed.
 *
 * A response counts as settled once it emits `close`, which Node fires both
 * after a normal finish and when the underlying socket goes away.
 */
export class InFlightTracker {
  private readonly _pending = new Map<ServerResponse, Promise<void>>()

  get size(): number {
    return this._pending.size
  }

  track(res: ServerResponse): void {
    const settled = new Promise<void>((resolve) => {
      res.once('close', () => {
        this._pending.delete(res)
        resolve()
      })
    })
    this._pending.set(res, settled)
  }

  /**
   * Wait for every tracked response to settle, up to `timeoutMs`. Responses
   * still open at the deadline are destroyed and counted as abandoned.
   */
  async drain(timeoutMs: number): Promise<DrainResult> {
    const total = this._pending.size
    if (total === 0) return { drained: 0, abandoned: 0 }

    let timer: NodeJS.Timeout | undefined
    const deadline = new Promise<void>((resolve) => {
      timer = setTimeout(resolve, timeoutMs)
    })

    try {
      await Promise.race([Promise.all(this._pending.values()), deadline])
    } finally {
      clearTimeout(timer)
    }

    const abandoned = [...this._pending.keys()]
    for (const res of abandoned) {
      res.destroy()
    }
    this._pending.clear()

    return { drained: total - abandoned.length, abandoned: abandoned.length }
  }
}
