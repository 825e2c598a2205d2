import type { EchoRecord, EchoStore, Mutation } from './types.js'
import { StoreClosedError } from './types.js'

/**
 * In-memory EchoStore
 *
 * Writes to the same key are chained on a per-key promise, so a mutation
 * that awaits in the middle of a read-modify-write still sees the result of
 * the previous one.
 */
export class InMemoryEchoStore implements EchoStore {
  private readonly records = new Map<string, EchoRecord>()
  private readonly locks = new Map<string, Promise<void>>()
  private closed = false

  async get(key: string): Promise<EchoRecord | null> {
    this.assertOpen()
    return this.records.get(key) ?? null
  }

  async put(key: string, record: EchoRecord): Promise<void> {
    this.assertOpen()
    await this.withLock(key, async () => {
      this.records.set(key, record)
    })
  }

  async update(key: string, mutate: Mutation): Promise<EchoRecord> {
    this.assertOpen()
    return this.withLock(key, async () => {
      const next = await mutate(this.records.get(key) ?? null)
      this.records.set(key, next)
      return next
    })
  }

  async close(): Promise<void> {
    this.closed = true
    await Promise.all(this.locks.values())
    this.records.clear()
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreClosedError()
  }

  private async withLock<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(key) ?? Promise.resolve()
    const run = previous.then(fn)
    const settled = run.then(
      () => undefined,
      () => undefined
    )
    this.locks.set(key, settled)
    try {
      return await run
    } finally {
      if (this.locks.get(key) === settled) {
        this.locks.delete(key)
      }
    }
  }
}
