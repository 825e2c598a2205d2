import type { Result } from '@tierline/types'

export type DomainErrorKind = 'invalid_input' | 'message_too_long' | 'unavailable'

/** Business failure carried in a Result, never thrown across layers. */
export type DomainError = {
  readonly kind: DomainErrorKind
  readonly message: string
}

export type EchoInput = {
  readonly message: string
}

export type EchoOutput = {
  readonly echo: string
  /** UTF-16 code units, as `String.prototype.length` counts them. */
  readonly length: number
  /** Times this exact message was echoed by this service instance, this call included. */
  readonly count: number
}

/** Business logic capability of the echo service. */
export interface EchoLogic {
  execute(input: EchoInput): Promise<Result<EchoOutput, DomainError>>
}

export function domainError(kind: DomainErrorKind, message: string): DomainError {
  return { kind, message }
}
