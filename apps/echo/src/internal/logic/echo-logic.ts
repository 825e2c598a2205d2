import type { Logger } from '@tierline/telemetry'
import { err, ok } from '@tierline/types'
import type { Result } from '@tierline/types'
import type { EchoStore } from '../store/types.js'
import { StoreClosedError } from '../store/types.js'
import { domainError } from './types.js'
import type { DomainError, EchoInput, EchoLogic, EchoOutput } from './types.js'

// eslint-disable-next-line no-control-regex
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/

export interface EchoLogicOptions {
  maxMessageLength: number
  logger: Logger
}

export class DefaultEchoLogic implements EchoLogic {
  private readonly _store: EchoStore
  private readonly _maxMessageLength: number
  private readonly _logger: Logger
  private _closed = false

  constructor(store: EchoStore, options: EchoLogicOptions) {
    this._store = store
    this._maxMessageLength = options.maxMessageLength
    this._logger = options.logger
  }

  async execute(input: EchoInput): Promise<Result<EchoOutput, DomainError>> {
    const { message } = input
    const invalid = this._validate(message)
    if (invalid) return err(invalid)
    if (this._closed) {
      return err(domainError('unavailable', 'Echo service is shutting down'))
    }

    try {
      const record = await this._store.update(message, (current) => ({
        message,
        count: (current?.count ?? 0) + 1,
      }))
      return ok({ echo: message, length: message.length, count: record.count })
    } catch (error) {
      if (!(error instanceof StoreClosedError)) {
        this._logger.warn`Echo store failed: ${error}`
      }
      return err(domainError('unavailable', 'Echo store is unavailable'))
    }
  }

  async close(): Promise<void> {
    this._closed = true
  }

  private _validate(message: string): DomainError | undefined {
    if (message.length === 0) {
      return domainError('invalid_input', 'Message must not be empty')
    }
    if (message.length > this._maxMessageLength) {
      return domainError(
        'message_too_long',
        `Message exceeds ${this._maxMessageLength} characters`
      )
    }
    if (CONTROL_CHARACTERS.test(message)) {
      return domainError('invalid_input', 'Message must not contain control characters')
    }
    return undefined
  }
}
