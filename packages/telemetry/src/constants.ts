/**
 * @tierline/telemetry — Shared constants
 */

/**
 * OTEL semconv recommended bucket boundaries for HTTP latency histograms (seconds).
 *
 * @see https://opentelemetry.io/docs/specs/semconv/http/http-metrics/
 */
export const DURATION_BUCKETS = [
  0.005, 0.01, 0.025, 0.05, 0.075, 0.1, 0.25, 0.5, 0.75, 1, 2.5, 5, 7.5, 10,
]

/** Root logger category. Only loggers under it reach the configured sinks. */
export const ROOT_CATEGORY = 'tierline'

// ---------------------------------------------------------------------------
// Environment validation helpers
// ---------------------------------------------------------------------------

export const VALID_LOG_LEVELS = ['debug', 'info', 'warning', 'error', 'fatal'] as const
export type LogLevel = (typeof VALID_LOG_LEVELS)[number]

export const VALID_ENVIRONMENTS = ['development', 'production', 'test'] as const
export type Environment = (typeof VALID_ENVIRONMENTS)[number]

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value)
}

export function validateLogLevel(value: string | undefined): LogLevel | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_LOG_LEVELS, value)) return value
  console.warn(`[telemetry] invalid LOG_LEVEL "${value}", using the environment default`)
  return undefined
}

export function validateEnvironment(value: string | undefined): Environment | undefined {
  if (!value) return undefined
  if (isOneOf(VALID_ENVIRONMENTS, value)) return value
  console.warn(`[telemetry] invalid NODE_ENV "${value}", defaulting to "development"`)
  return undefined
}
