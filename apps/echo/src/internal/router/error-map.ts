import type { DomainErrorKind } from '../logic/types.js'

export type ErrorBody = {
  readonly error: {
    readonly code: string
    readonly message: string
  }
}

/** HTTP status for each domain error kind. */
export const DOMAIN_ERROR_STATUS = {
  invalid_input: 400,
  message_too_long: 413,
  unavailable: 503,
} as const satisfies Record<DomainErrorKind, number>

export function errorBody(code: string, message: string): ErrorBody {
  return { error: { code, message } }
}

export const NOT_FOUND_BODY = errorBody('not_found', 'Route not found')
export const INTERNAL_ERROR_BODY = errorBody('internal', 'Internal error')
