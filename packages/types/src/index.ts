/**
 * Generic success/error result.
 *
 * Layers below the transport return values of this shape instead of throwing,
 * so that the caller decides how a failure is rendered.
 *
 * @example
 * ```typescript
 * function parsePort(raw: string): Result<number> {
 *   const port = Number(raw)
 *   if (Number.isInteger(port)) {
 *     return ok(port)
 *   }
 *   return err(`Not a port: ${raw}`)
 * }
 * ```
 */
export type Result<T, E = string> = { success: true; data: T } | { success: false; error: E }

/** Success variant of {@link Result}. */
export type Ok<T> = Extract<Result<T, never>, { success: true }>

/** Failure variant of {@link Result}. */
export type Err<E> = Extract<Result<never, E>, { success: false }>

export function ok<T>(data: T): Ok<T> {
  return { success: true, data }
}

export function err<E>(error: E): Err<E> {
  return { success: false, error }
}

