import type { EchoRecord, EchoStore, Mutation } from './types.js'
import { StoreClosedError } from './types.js'

/** Keeps nothing. Every update starts from an empty record. */
export class NoopEchoStore implements EchoStore {
  private closed = false

  async get(_key: string): Promise<EchoRecord | null> {
    this.assertOpen()
    return null
  }

  async put(_key: string, _record: EchoRecord): Promise<void> {
    this.assertOpen()
  }

  async update(_key: string, mutate: Mutation): Promise<EchoRecord> {
    this.assertOpen()
    return mutate(null)
  }

  async close(): Promise<void> {
    this.closed = true
  }

  private assertOpen(): void {
    if (this.closed) throw new StoreClosedError()
  }
}
