/**
 * Data access capability for the echo service.
 *
 * Implementations must be safe to call from any number of concurrent
 * requests; they serialize their own mutable state.
 */

/** What the store keeps per echoed message. */
export interface EchoRecord {
  readonly message: string
  readonly count: number
}

/** Computes the next record from the current one (`null` when absent). */
export type Mutation = (current: EchoRecord | null) => EchoRecord | Promise<EchoRecord>

export interface EchoStore {
  get(key: string): Promise<EchoRecord | null>
  put(key: string, record: EchoRecord): Promise<void>
  /**
   * Atomic read-modify-write. No other `put` or `update` on the same key
   * interleaves between the read and the write.
   */
  update(key: string, mutate: Mutation): Promise<EchoRecord>
  /** Wait for pending writes, then refuse further calls. */
  close(): Promise<void>
}

export class StoreClosedError extends Error {
  constructor() {
    super('Echo store is closed')
    this.name = 'StoreClosedError'
  }
}
