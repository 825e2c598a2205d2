/**
 * @tierline/telemetry — Shared type definitions
 *
 * Defines the ServiceTelemetry interface (the DI contract) and the
 * builder option types used by TelemetryBuilder.
 */

import type { Logger } from '@logtape/logtape'
import type { Meter, Tracer } from '@opentelemetry/api'
import type { Environment, LogLevel } from './constants.js'

/**
 * Immutable telemetry context bag injected into service constructors.
 *
 * Produced by `TelemetryBuilder.build()` or `TelemetryBuilder.noop()`.
 * The object is frozen after creation.
 */
export interface ServiceTelemetry {
  /** Service name used for scoping meter and tracer names. */
  readonly serviceName: string
  /** Scoped LogTape logger. Uses tagged template literal API. */
  readonly logger: Logger
  /** Scoped OpenTelemetry meter. Noop unless the host registers a MeterProvider. */
  readonly meter: Meter
  /** Scoped OpenTelemetry tracer. Noop unless the host registers a TracerProvider. */
  readonly tracer: Tracer
}

/** Options for `.withLogger()`. */
export interface LoggerBuilderOpts {
  /** Log level threshold. Defaults to LOG_LEVEL env var or the environment default. */
  level?: LogLevel
  /** Sink selection. Defaults to NODE_ENV. */
  environment?: Environment
  /** Logger category hierarchy. Defaults to ['tierline', serviceName]. */
  category?: string[]
}

/** Options for `.withMetrics()` and `.withTracing()`. */
export interface ScopeBuilderOpts {
  /** Instrumentation scope name. Defaults to the service name. */
  scope?: string
}

/** Options for `telemetryMiddleware()`. */
export interface MiddlewareOptions {
  /** Exact paths that are not instrumented. */
  ignorePaths?: string[]
  /** Span name prefix. Defaults to "HTTP". */
  spanNamePrefix?: string
  /** Logger category for per-request debug lines. Defaults to ['tierline', 'http']. */
  category?: string[]
  /** Tracer for request spans, usually `ServiceTelemetry.tracer`. Defaults to the global tracer. */
  tracer?: Tracer
  /** Meter for the duration histogram, usually `ServiceTelemetry.meter`. Defaults to the global meter. */
  meter?: Meter
}
